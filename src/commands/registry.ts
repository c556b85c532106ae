/**
 * Command Registry: priority-ordered matching and dispatch.
 *
 * Commands are kept sorted by descending priority; equal priorities keep
 * registration order. `process` runs the first matching command through
 * validate → execute and reports each step on the event sink.
 */

import { CommandExecutionError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { EventSink } from '../core/types.js';
import type { HelpSection } from '../overlays/types.js';
import type { Command, CommandContext, ProcessResult } from './types.js';

export class CommandRegistry {
  private commands: Command[] = [];

  constructor(private readonly events?: EventSink) {}

  register(command: Command): void {
    this.commands.push(command);
    // Array.prototype.sort is stable, so ties keep registration order.
    this.commands.sort((a, b) => b.priority - a.priority);
    getLogger().debug({ command: command.name, priority: command.priority }, 'Command registered');
  }

  unregister(command: Command): boolean {
    const index = this.commands.indexOf(command);
    if (index === -1) return false;
    this.commands.splice(index, 1);
    return true;
  }

  clear(): void {
    this.commands = [];
  }

  getCommands(enabledOnly = true): Command[] {
    return enabledOnly ? this.commands.filter((c) => c.enabled) : [...this.commands];
  }

  getCommandCount(enabledOnly = true): number {
    return this.getCommands(enabledOnly).length;
  }

  /**
   * First command, in priority order, whose matcher accepts `text`. A matcher
   * that throws counts as not matching.
   */
  findMatching(text: string, enabledOnly = true): Command | null {
    for (const command of this.commands) {
      if (enabledOnly && !command.enabled) continue;
      try {
        if (command.matches(text)) return command;
      } catch (err) {
        getLogger().error({ command: command.name, text, err }, 'Command matcher threw');
      }
    }
    return null;
  }

  /**
   * Match, validate and execute `text`.
   *
   * No match is not an error: `{ output: null, executed: false }`. Execution
   * failures are published and rethrown as CommandExecutionError.
   */
  process(text: string, context: CommandContext, enabledOnly = true): ProcessResult {
    const command = this.findMatching(text, enabledOnly);
    if (!command) {
      return { output: null, executed: false };
    }

    const sink = this.events ?? context.events;
    const commandName = command.name;
    sink?.publish({
      type: 'command:detected',
      data: { commandName, text, priority: command.priority },
    });

    let valid: boolean;
    try {
      valid = command.validate(context, text);
    } catch (err) {
      getLogger().error({ command: commandName, text, err }, 'Command validation threw');
      sink?.publish({
        type: 'command:failed',
        data: { commandName, text, reason: 'validation_error', error: toError(err).message },
      });
      return { output: null, executed: false };
    }

    if (!valid) {
      sink?.publish({
        type: 'command:failed',
        data: { commandName, text, reason: 'validation_failed' },
      });
      return { output: null, executed: false };
    }

    let output: string | null;
    try {
      output = command.execute(context, text);
    } catch (err) {
      if (err instanceof CommandExecutionError) {
        sink?.publish({
          type: 'command:failed',
          data: { commandName, text, reason: 'execution_error', error: err.message },
        });
        throw err;
      }

      const cause = toError(err);
      const wrapped = new CommandExecutionError(commandName, cause.message, cause);
      getLogger().error({ command: commandName, text, err: cause }, 'Unexpected command failure');
      sink?.publish({
        type: 'command:failed',
        data: { commandName, text, reason: 'unexpected_error', error: wrapped.message },
      });
      throw wrapped;
    }

    sink?.publish({
      type: 'command:executed',
      data: { commandName, text, result: output },
    });
    return { output, executed: true };
  }

  // ─── Help ────────────────────────────────────────────────────

  getHelpText(enabledOnly = true): string {
    const commands = this.getCommands(enabledOnly);
    if (commands.length === 0) {
      return 'No commands registered.';
    }

    const lines = ['Available Commands:', ''];
    for (const command of commands) {
      lines.push(`• ${command.description}`);
      if (command.examples.length > 0) {
        lines.push(`  Examples: ${command.examples.map((e) => `"${e}"`).join(', ')}`);
      }
      lines.push(`  Priority: ${command.priority}`);
      lines.push('');
    }
    return lines.join('\n');
  }

  /** Commands grouped by category, categories in order of first appearance. */
  getHelpSections(enabledOnly = true): HelpSection[] {
    const sections = new Map<string, HelpSection>();
    for (const command of this.getCommands(enabledOnly)) {
      let section = sections.get(command.category);
      if (!section) {
        section = { title: command.category, entries: [] };
        sections.set(command.category, section);
      }
      section.entries.push({ description: command.description, examples: [...command.examples] });
    }
    return [...sections.values()];
  }
}
