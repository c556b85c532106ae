/**
 * `voxgrid config`: Show the merged configuration, or write a default one.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { stringify } from 'yaml';
import { ConfigManager } from '../../core/config.js';

export function createConfigCommand(): Command {
  const cmd = new Command('config');

  cmd
    .description('Show the resolved configuration')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .option('--init', 'Write a default global config if none exists')
    .action((options: { dir: string; json?: boolean; init?: boolean }) => {
      const manager = new ConfigManager(resolve(options.dir));

      if (options.init) {
        console.log(`Config: ${manager.createDefaultConfig()}`);
        return;
      }

      const config = manager.load();
      console.log(options.json ? JSON.stringify(config, null, 2) : stringify(config));
    });

  return cmd;
}
