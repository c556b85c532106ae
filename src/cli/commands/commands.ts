/**
 * `voxgrid commands`: List the registered commands by category.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { RecordingBackend } from '../../capabilities/recording.js';
import { createRuntime } from '../../pipeline/runtime.js';
import { applyLogging } from '../logging.js';

export function createCommandsCommand(): Command {
  const cmd = new Command('commands');

  cmd
    .description('List available voice commands')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action(async (options: { dir: string; json?: boolean }, command: Command) => {
      const config = new ConfigManager(resolve(options.dir)).load();
      applyLogging(config, command);
      const backend = new RecordingBackend(config.screen);
      const runtime = createRuntime(config, { keyboard: backend.keyboard, mouse: backend.mouse });

      try {
        if (options.json) {
          console.log(JSON.stringify(runtime.registry.getHelpSections(), null, 2));
          return;
        }
        console.log(runtime.registry.getHelpText());
      } finally {
        await runtime.dispose();
      }
    });

  return cmd;
}
