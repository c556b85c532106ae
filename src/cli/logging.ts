import type { Command } from 'commander';
import { createLogger, setLogger } from '../core/logger.js';
import type { VoxConfig } from '../core/types.js';
import { NAME } from '../version.js';

export type LoggingFlags = {
  verbose?: boolean;
  logLevel?: string;
};

/** Flags given on the command line win over the `logging` config section. */
export function resolveLogging(
  config: VoxConfig['logging'],
  flags: LoggingFlags,
): { verbose: boolean; level: string } {
  return {
    verbose: flags.verbose ?? config.verbose,
    level: flags.logLevel ?? config.level,
  };
}

/** Replace the startup logger once the configuration is known. */
export function applyLogging(config: VoxConfig, command: Command): void {
  const { verbose, level } = resolveLogging(config.logging, command.optsWithGlobals<LoggingFlags>());
  setLogger(createLogger(NAME, verbose, level));
}
