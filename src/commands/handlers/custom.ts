/**
 * Custom Commands
 *
 * User-defined trigger phrases from the `customCommands` config section,
 * each bound to one action: type text, copy to the clipboard, launch a file
 * or press a key combination.
 */

import { CommandExecutionError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import {
  CustomCommandConfigSchema,
  type CustomCommandAction,
  type CustomCommandConfig,
  type VoxConfig,
} from '../../core/types.js';
import { BaseCommand, stripPunctuation, withModifiers } from '../base.js';
import type { CommandParser } from '../parser.js';
import { Priority, type CommandContext } from '../types.js';

const MAX_DESCRIPTION_TEXT = 30;

function truncate(text: string): string {
  return text.length > MAX_DESCRIPTION_TEXT ? `${text.slice(0, MAX_DESCRIPTION_TEXT - 3)}...` : text;
}

function basename(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] ?? path;
}

/** Expand $VAR, ${VAR} and %VAR% from the environment; unknown names stay as written. */
export function expandEnvVars(path: string, env: NodeJS.ProcessEnv = process.env): string {
  return path.replace(/\$\{(\w+)\}|\$(\w+)|%(\w+)%/g, (match: string, ...groups: Array<string | undefined>) => {
    const name = groups[0] ?? groups[1] ?? groups[2];
    return (name !== undefined ? env[name] : undefined) ?? match;
  });
}

export function describeAction(action: CustomCommandAction): string {
  switch (action.type) {
    case 'type_text':
      return `Type: ${truncate(action.text)}`;
    case 'copy_to_clipboard':
      return `Copy: ${truncate(action.text)}`;
    case 'execute_file':
      return `Run: ${basename(action.path)}`;
    case 'key_combination':
      return `Press: ${action.keys.join('+')}`;
  }
}

export interface CustomCommandOptions {
  /** Accept near-miss utterances through the parser's fuzzy matcher. */
  parser?: CommandParser;
}

export class CustomCommand extends BaseCommand {
  readonly priority = Priority.HIGH;
  readonly category = 'Custom';
  readonly trigger: string;
  readonly description: string;
  readonly examples: readonly string[] = [];

  constructor(
    private readonly definition: CustomCommandConfig,
    private readonly options: CustomCommandOptions = {},
  ) {
    super();
    this.trigger = definition.trigger.toLowerCase().trim();
    this.description = describeAction(definition.action);
    this.examples = [this.trigger];
  }

  get action(): CustomCommandAction {
    return this.definition.action;
  }

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    if (clean === this.trigger) return true;
    return this.options.parser?.isFuzzyMatch(clean, this.trigger) ?? false;
  }

  validate(context: CommandContext): boolean {
    const { type } = this.definition.action;
    if (type === 'copy_to_clipboard' || type === 'execute_file') {
      return context.system !== undefined;
    }
    return true;
  }

  execute(context: CommandContext, text: string): string | null {
    const action = this.definition.action;
    const logger = getLogger();

    switch (action.type) {
      case 'type_text':
        if (!action.text) {
          logger.warn({ trigger: this.trigger }, 'No text specified for type_text action');
          return null;
        }
        context.keyboard.type(action.text);
        break;

      case 'copy_to_clipboard':
        if (!action.text) {
          logger.warn({ trigger: this.trigger }, 'No text specified for copy_to_clipboard action');
          return null;
        }
        context.system?.copyToClipboard(action.text);
        break;

      case 'execute_file': {
        const path = expandEnvVars(action.path);
        const system = context.system;
        if (!system || !system.fileExists(path)) {
          throw new CommandExecutionError(this.name, `File not found: ${path}`);
        }
        system.launch(path);
        break;
      }

      case 'key_combination':
        if (action.keys.length === 0) {
          logger.warn({ trigger: this.trigger }, 'No keys specified for key_combination action');
          return null;
        }
        withModifiers(context.keyboard, action.keys, () => {});
        break;
    }

    this.report(context, text, { trigger: this.trigger, action: action.type });
    return null;
  }
}

/**
 * Build commands from the `customCommands` config section. Invalid entries
 * are logged and skipped.
 */
export function loadCustomCommands(
  section: VoxConfig['customCommands'],
  parser?: CommandParser,
): CustomCommand[] {
  const logger = getLogger();
  if (!section.enabled) {
    logger.info('Custom commands disabled in config');
    return [];
  }

  const commands: CustomCommand[] = [];
  section.commands.forEach((entry, index) => {
    const parsed = CustomCommandConfigSchema.safeParse(entry);
    if (!parsed.success) {
      logger.warn({ index, issues: parsed.error.issues }, 'Invalid custom command skipped');
      return;
    }
    commands.push(new CustomCommand(parsed.data, section.fuzzy && parser ? { parser } : {}));
    logger.debug({ trigger: parsed.data.trigger, action: parsed.data.action.type }, 'Loaded custom command');
  });

  logger.info({ count: commands.length }, 'Custom commands loaded');
  return commands;
}
