/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { LoggingFlags } from './logging.js';
import { createRunCommand } from './commands/run.js';
import { createCommandsCommand } from './commands/commands.js';
import { createConfigCommand } from './commands/config.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('voxgrid: voice command dispatch with grid screen addressing')
    .option('-v, --verbose', 'Log to the terminal instead of the log file')
    .option('--log-level <level>', 'Log level (trace, debug, info, warn, error); defaults to the config')
    .hook('preAction', (thisCommand) => {
      // Until a command has loaded the config, flags or plain defaults apply.
      const opts = thisCommand.opts<LoggingFlags>();
      setLogger(createLogger(NAME, opts.verbose ?? false, opts.logLevel ?? 'info'));
    });

  program.addCommand(createRunCommand());
  program.addCommand(createCommandsCommand());
  program.addCommand(createConfigCommand());

  return program;
}

export async function main(): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
