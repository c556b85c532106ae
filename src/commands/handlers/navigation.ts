import { BaseCommand, pressCombo, stripPunctuation, tap } from '../base.js';
import { Priority, type CommandContext, type SpecialKey } from '../types.js';

const CATEGORY = 'Navigation';

/** Between single keys and multi-word commands. */
export const ARROW_KEY_PRIORITY = 150;

const ARROW_KEYS: ReadonlyMap<string, SpecialKey> = new Map([
  ['left', 'left'],
  ['right', 'right'],
  ['up', 'up'],
  ['down', 'down'],
]);

export class ArrowKeyCommand extends BaseCommand {
  readonly priority = ARROW_KEY_PRIORITY;
  readonly description = 'Press arrow keys for navigation';
  readonly examples = ['left', 'right', 'up', 'down'];
  readonly category = CATEGORY;

  matches(text: string): boolean {
    return ARROW_KEYS.has(stripPunctuation(text));
  }

  execute(context: CommandContext, text: string): string | null {
    const direction = stripPunctuation(text);
    const key = ARROW_KEYS.get(direction);
    if (!key) return null;
    tap(context.keyboard, key);
    this.report(context, text, { direction });
    return null;
  }
}

export class PageNavigationCommand extends BaseCommand {
  readonly priority = Priority.MEDIUM;
  readonly description = 'Navigate by page (Page Up / Page Down)';
  readonly examples = ['page up', 'page down'];
  readonly category = CATEGORY;

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    return clean.includes('page up') || clean.includes('page down');
  }

  execute(context: CommandContext, text: string): string | null {
    const direction = stripPunctuation(text).includes('page up') ? 'up' : 'down';
    tap(context.keyboard, direction === 'up' ? 'page_up' : 'page_down');
    this.report(context, text, { direction });
    return null;
  }
}

type JumpTarget = 'line_start' | 'line_end' | 'document_start' | 'document_end';

const DOCUMENT_START_PHRASES = ['go to start', 'go to top', 'go to beginning'];
const DOCUMENT_END_PHRASES = ['go to end', 'go to bottom'];

function jumpTarget(clean: string): JumpTarget | null {
  if (clean === 'line start') return 'line_start';
  if (clean === 'line end') return 'line_end';
  if (DOCUMENT_START_PHRASES.some((p) => clean.includes(p))) return 'document_start';
  if (DOCUMENT_END_PHRASES.some((p) => clean.includes(p))) return 'document_end';
  return null;
}

/** Home/End for the line, Ctrl+Home/Ctrl+End for the document. */
export class HomeEndCommand extends BaseCommand {
  readonly priority = Priority.MEDIUM;
  readonly description = 'Jump to start/end of document or line';
  readonly examples = ['go to start', 'go to top', 'go to end', 'go to bottom', 'line start', 'line end'];
  readonly category = CATEGORY;

  matches(text: string): boolean {
    return jumpTarget(stripPunctuation(text)) !== null;
  }

  execute(context: CommandContext, text: string): string | null {
    const target = jumpTarget(stripPunctuation(text));
    if (!target) return null;

    const { keyboard } = context;
    switch (target) {
      case 'line_start':
        tap(keyboard, 'home');
        break;
      case 'line_end':
        tap(keyboard, 'end');
        break;
      case 'document_start':
        pressCombo(keyboard, ['ctrl'], 'home');
        break;
      case 'document_end':
        pressCombo(keyboard, ['ctrl'], 'end');
        break;
    }

    this.report(context, text, { action: target });
    return null;
  }
}
