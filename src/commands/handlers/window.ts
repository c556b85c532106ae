import { BaseCommand, pressCombo, stripPunctuation, tap } from '../base.js';
import type { CommandParser } from '../parser.js';
import { Priority, type CommandContext } from '../types.js';

const CATEGORY = 'Window';

const SNAP_PHRASES = {
  left: ['move window left', 'move left', 'snap left'],
  right: ['move window right', 'move right', 'snap right'],
} as const;

/** Win+Left/Right, then Escape to dismiss the snap assistant. */
export class MoveWindowCommand extends BaseCommand {
  readonly priority = Priority.MEDIUM;
  readonly description = 'Snap window to left or right half of screen (Win+Left/Right)';
  readonly examples = ['move left', 'move right', 'move window left', 'move window right', 'snap left', 'snap right'];
  readonly category = CATEGORY;

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    return [...SNAP_PHRASES.left, ...SNAP_PHRASES.right].some((p) => clean.includes(p));
  }

  execute(context: CommandContext, text: string): string | null {
    const clean = stripPunctuation(text);
    const direction = SNAP_PHRASES.left.some((p) => clean.includes(p)) ? 'left' : 'right';
    pressCombo(context.keyboard, ['cmd'], direction);
    tap(context.keyboard, 'esc');
    this.report(context, text, { direction });
    return null;
  }
}

export class MinimizeCommand extends BaseCommand {
  readonly priority = Priority.MEDIUM;
  readonly description = 'Minimize current window (Win+Down / Cmd+M)';
  readonly examples = ['minimize', 'minimise'];
  readonly category = CATEGORY;

  constructor(private readonly platform: NodeJS.Platform = process.platform) {
    super();
  }

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    return clean.includes('minimize') || clean.includes('minimise');
  }

  execute(context: CommandContext, text: string): string | null {
    pressCombo(context.keyboard, ['cmd'], this.platform === 'win32' ? 'down' : 'm');
    this.report(context, text);
    return null;
  }
}

export class MaximizeCommand extends BaseCommand {
  readonly priority = Priority.MEDIUM;
  readonly description = 'Maximize current window (Win+Up)';
  readonly examples = ['maximize', 'maximise'];
  readonly category = CATEGORY;

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    return clean.includes('maximize') || clean.includes('maximise');
  }

  execute(context: CommandContext, text: string): string | null {
    pressCombo(context.keyboard, ['cmd'], 'up');
    this.report(context, text);
    return null;
  }
}

/** Alt+F4. Bare "close" hides overlays instead. */
export class CloseWindowCommand extends BaseCommand {
  readonly priority = Priority.MEDIUM;
  readonly description = 'Close current window (Alt+F4)';
  readonly examples = ['close window'];
  readonly category = CATEGORY;

  matches(text: string): boolean {
    return stripPunctuation(text).includes('close window');
  }

  execute(context: CommandContext, text: string): string | null {
    pressCombo(context.keyboard, ['alt'], 'f4');
    this.report(context, text);
    return null;
  }
}

/** Alt+Tab, or Alt+Shift+Tab for "previous"/"back". */
export class SwitchWindowCommand extends BaseCommand {
  readonly priority = Priority.MEDIUM;
  readonly description = 'Switch between windows (Alt+Tab)';
  readonly examples = ['switch', 'switch window', 'switch window previous'];
  readonly category = CATEGORY;

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    return clean === 'switch' || clean.includes('switch window');
  }

  execute(context: CommandContext, text: string): string | null {
    const clean = stripPunctuation(text);
    const previous = clean.includes('previous') || clean.includes('back');
    pressCombo(context.keyboard, previous ? ['alt', 'shift'] : ['alt'], 'tab');
    this.report(context, text, { direction: previous ? 'previous' : 'next' });
    return null;
  }
}

/** "switch 3" while the window list is shown focuses window 3 and hides the list. */
export class SwitchToWindowNumberCommand extends BaseCommand {
  readonly priority = Priority.HIGH;
  readonly description = 'Focus a numbered window from the window list';
  readonly examples = ['switch 2', 'switch to three'];
  readonly category = CATEGORY;

  constructor(private readonly parser: CommandParser) {
    super();
  }

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    return clean.startsWith('switch') && this.targetOf(clean) !== null;
  }

  validate(context: CommandContext): boolean {
    return context.overlays?.isVisible('windows') ?? false;
  }

  execute(context: CommandContext, text: string): string | null {
    const number = this.targetOf(stripPunctuation(text));
    if (number === null || !context.overlays) return null;

    const focused = context.overlays.activate(number);
    if (focused) {
      context.overlays.hide('windows');
    }
    this.report(context, text, { number, focused });
    return null;
  }

  /** Last number spoken, so "switch to three" is 3 rather than 2. */
  private targetOf(clean: string): number | null {
    const numbers = this.parser.extractNumbers(clean.replace(/^switch\s*/, ''));
    return numbers.length > 0 ? numbers[numbers.length - 1] : null;
  }
}
