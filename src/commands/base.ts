/**
 * Base Command: shared defaults and helpers for built-in commands.
 */

import type { Command, CommandContext, KeyboardCapability } from './types.js';

const STRIPPED_PUNCTUATION = new Set('.!?,;:"\'(){}[]<>/@#$%^&*+=~`|\\');

/**
 * Remove punctuation speech recognition tends to attach to short commands,
 * then lowercase and trim. Hyphens survive.
 */
export function stripPunctuation(text: string): string {
  let result = '';
  for (const char of text) {
    if (!STRIPPED_PUNCTUATION.has(char)) result += char;
  }
  return result.toLowerCase().trim();
}

/** Press and release one key. */
export function tap(keyboard: KeyboardCapability, key: string): void {
  keyboard.press(key);
  keyboard.release(key);
}

/**
 * Hold modifiers (in order) around `action`, releasing them in reverse order
 * even when the action throws.
 */
export function withModifiers(
  keyboard: KeyboardCapability,
  modifiers: readonly string[],
  action: () => void,
): void {
  const held: string[] = [];
  try {
    for (const modifier of modifiers) {
      keyboard.press(modifier);
      held.push(modifier);
    }
    action();
  } finally {
    for (const modifier of held.reverse()) {
      keyboard.release(modifier);
    }
  }
}

export function pressCombo(keyboard: KeyboardCapability, modifiers: readonly string[], key: string): void {
  withModifiers(keyboard, modifiers, () => tap(keyboard, key));
}

export abstract class BaseCommand implements Command {
  readonly name: string = this.constructor.name;
  abstract readonly priority: number;
  abstract readonly description: string;
  readonly examples: readonly string[] = [];
  readonly category: string = 'General';

  get enabled(): boolean {
    return true;
  }

  abstract matches(text: string): boolean;

  validate(_context: CommandContext, _text: string): boolean {
    return true;
  }

  abstract execute(context: CommandContext, text: string): string | null;

  /** Publish what the command actually did, for feedback consumers. */
  protected report(context: CommandContext, text: string, detail: Record<string, unknown> = {}): void {
    context.events?.publish({
      type: 'command:action',
      data: { ...detail, command: this.name, text },
    });
  }
}
