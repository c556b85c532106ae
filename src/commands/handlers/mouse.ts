import { BaseCommand, stripPunctuation } from '../base.js';
import type { CommandParser } from '../parser.js';
import { Priority, type CommandContext, type MouseButton } from '../types.js';

const CATEGORY = 'Mouse';

// ═══════════════════════════════════════════════════════════════
// CLICKS
// ═══════════════════════════════════════════════════════════════

class FixedClickCommand extends BaseCommand {
  readonly category = CATEGORY;
  readonly examples: readonly string[] = [];
  private readonly triggers: ReadonlySet<string>;

  constructor(
    triggers: readonly string[],
    private readonly button: MouseButton,
    private readonly count: number,
    readonly description: string,
    readonly priority: number,
  ) {
    super();
    this.examples = [...triggers];
    this.triggers = new Set(triggers);
  }

  matches(text: string): boolean {
    return this.triggers.has(stripPunctuation(text));
  }

  execute(context: CommandContext, text: string): string | null {
    context.mouse.click(this.button, this.count);
    this.report(context, text, { button: this.button, count: this.count });
    return null;
  }
}

export class ClickCommand extends FixedClickCommand {
  constructor() {
    super(['click'], 'left', 1, 'Left click at current mouse position', Priority.NORMAL);
  }
}

export class RightClickCommand extends FixedClickCommand {
  constructor() {
    super(['right click'], 'right', 1, 'Right click at current mouse position', Priority.MEDIUM);
  }
}

export class DoubleClickCommand extends FixedClickCommand {
  constructor() {
    super(['double click'], 'left', 2, 'Double click at current mouse position', Priority.MEDIUM);
  }
}

export class MiddleClickCommand extends FixedClickCommand {
  constructor() {
    super(['middle click', 'wheel click'], 'middle', 1, 'Middle click at current mouse position', Priority.MEDIUM);
  }
}

// ═══════════════════════════════════════════════════════════════
// REPEAT-SCALED MOVEMENT
// ═══════════════════════════════════════════════════════════════

/**
 * Counts consecutive repeats of the same direction. Any other direction
 * resets the count to zero.
 */
export class RepeatTracker<D extends string> {
  private last: D | null = null;
  private count = 0;

  next(direction: D): number {
    if (this.last === direction) {
      this.count++;
    } else {
      this.last = direction;
      this.count = 0;
    }
    return this.count;
  }

  reset(): void {
    this.last = null;
    this.count = 0;
  }
}

type ScrollDirection = 'up' | 'down' | 'left' | 'right';

const SCROLL_DIRECTIONS: readonly ScrollDirection[] = ['up', 'down', 'left', 'right'];
const SCROLL_VECTORS: Record<ScrollDirection, [number, number]> = {
  up: [0, -1],
  down: [0, 1],
  left: [-1, 0],
  right: [1, 0],
};

export const BASE_SCROLL = 3;
export const MAX_SCROLL_MULTIPLIER = 16;

/**
 * Scroll with exponential scaling: repeating a direction doubles the amount
 * (3, 6, 12, 24, 48), changing direction starts over.
 */
export class ScrollCommand extends BaseCommand {
  readonly priority = Priority.NORMAL;
  readonly description = 'Scroll in specified direction (with exponential scaling when repeated)';
  readonly examples = ['scroll up', 'scroll down', 'scroll left', 'scroll right'];
  readonly category = CATEGORY;
  private readonly repeats = new RepeatTracker<ScrollDirection>();

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    return clean.startsWith('scroll') && SCROLL_DIRECTIONS.some((d) => clean.includes(d));
  }

  execute(context: CommandContext, text: string): string | null {
    const clean = stripPunctuation(text);
    const direction = SCROLL_DIRECTIONS.find((d) => clean.includes(d));
    if (!direction) return null;

    const multiplier = Math.min(2 ** this.repeats.next(direction), MAX_SCROLL_MULTIPLIER);
    const [dx, dy] = SCROLL_VECTORS[direction];
    const amount = BASE_SCROLL * multiplier;
    context.mouse.scroll(dx * amount, dy * amount);

    this.report(context, text, { direction, multiplier, amount });
    return null;
  }
}

type MoveDirection = 'up' | 'down';

export const BASE_MOVE_STEP = 50;
export const MAX_MOVE_STEP = 800;

/**
 * Nudge the pointer vertically, doubling the step on repeats up to 800 px.
 * Horizontal "move left/right" belongs to window snapping.
 */
export class MouseMoveCommand extends BaseCommand {
  readonly priority = Priority.NORMAL;
  readonly description = 'Move mouse cursor up/down (with exponential scaling when repeated)';
  readonly examples = ['move up', 'move down'];
  readonly category = CATEGORY;
  private readonly repeats = new RepeatTracker<MoveDirection>();

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    return clean.startsWith('move') && (clean.includes('up') || clean.includes('down'));
  }

  execute(context: CommandContext, text: string): string | null {
    const clean = stripPunctuation(text);
    const direction: MoveDirection | null = clean.includes('up') ? 'up' : clean.includes('down') ? 'down' : null;
    if (!direction) return null;

    const multiplier = 2 ** this.repeats.next(direction);
    const step = Math.min(BASE_MOVE_STEP * multiplier, MAX_MOVE_STEP);
    const { x, y } = context.mouse.position();
    const newY = direction === 'up'
      ? Math.max(0, y - step)
      : Math.min(context.screen.height - 1, y + step);
    context.mouse.moveTo({ x, y: newY });

    this.report(context, text, { direction, step, multiplier, position: { x, y: newY } });
    return null;
  }
}

// ═══════════════════════════════════════════════════════════════
// NUMBERED TARGETS
// ═══════════════════════════════════════════════════════════════

/** Utterances starting with these are never bare numbers. */
const COMMAND_PREFIXES = ['click', 'refine', 'type', 'switch', 'scroll', 'move', 'page'];

export class ClickNumberCommand extends BaseCommand {
  readonly priority = Priority.HIGH;
  readonly description = 'Click on numbered overlay element';
  readonly examples = ['click 5', 'click number 12', 'click two'];
  readonly category = CATEGORY;

  constructor(private readonly parser: CommandParser) {
    super();
  }

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    return clean.startsWith('click') && this.parser.containsNumbers(clean);
  }

  validate(context: CommandContext): boolean {
    return context.overlays !== undefined;
  }

  execute(context: CommandContext, text: string): string | null {
    const [number] = this.parser.extractNumbers(stripPunctuation(text));
    if (number === undefined) return null;

    const position = context.overlays?.getElementPosition(number) ?? null;
    if (!position) {
      this.report(context, text, { number, error: 'element_not_found' });
      return null;
    }

    context.mouse.moveTo(position);
    context.mouse.click('left', 1);
    this.report(context, text, { number, x: position.x, y: position.y });
    return null;
  }
}

/**
 * A bare number ("5", "forty five") while an overlay is up moves the pointer
 * to that target without clicking.
 */
export class MoveToNumberCommand extends BaseCommand {
  readonly priority = Priority.NORMAL;
  readonly description = 'Move mouse to numbered grid cell (without clicking)';
  readonly examples = ['5', 'twelve', '45'];
  readonly category = CATEGORY;

  constructor(private readonly parser: CommandParser) {
    super();
  }

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    if (COMMAND_PREFIXES.some((prefix) => clean.startsWith(prefix))) return false;
    return this.parser.containsNumbers(clean);
  }

  validate(context: CommandContext): boolean {
    return context.overlays?.isAnyVisible() ?? false;
  }

  execute(context: CommandContext, text: string): string | null {
    const [number] = this.parser.extractNumbers(stripPunctuation(text));
    if (number === undefined) return null;

    const position = context.overlays?.getElementPosition(number) ?? null;
    if (!position) {
      this.report(context, text, { number, error: 'element_not_found' });
      return null;
    }

    context.mouse.moveTo(position);
    this.report(context, text, { number, x: position.x, y: position.y });
    return null;
  }
}

/**
 * "A to B": press at target A, move to target B, release.
 * Each side is parsed on its own so "twenty to thirty" is 20 → 30.
 */
export class DragBetweenNumbersCommand extends BaseCommand {
  readonly priority = Priority.HIGH;
  readonly description = 'Click and drag from one grid cell to another';
  readonly examples = ['5 to 9', 'twenty to thirty', '45 to 52'];
  readonly category = CATEGORY;

  constructor(private readonly parser: CommandParser) {
    super();
  }

  /** Start and end targets, or null when `text` is not "A to B". */
  parseTargets(text: string): [number, number] | null {
    const clean = text.toLowerCase().trim();
    const separator = [' to ', ' two '].find((s) => clean.includes(s)) ?? (clean.includes('-') ? '-' : null);
    if (!separator) return null;
    // A hyphen only separates digits; "twenty-one" is not a drag.
    if (separator === '-' && !/^\d+\s*-\s*\d+$/.test(clean)) return null;

    const index = clean.indexOf(separator);
    const start = this.parseSide(clean.slice(0, index));
    const end = this.parseSide(clean.slice(index + separator.length));
    return start !== null && end !== null ? [start, end] : null;
  }

  matches(text: string): boolean {
    return this.parseTargets(text) !== null;
  }

  validate(context: CommandContext): boolean {
    return context.overlays?.isAnyVisible() ?? false;
  }

  execute(context: CommandContext, text: string): string | null {
    const targets = this.parseTargets(text);
    if (!targets) return null;
    const [start, end] = targets;

    const from = context.overlays?.getElementPosition(start) ?? null;
    const to = context.overlays?.getElementPosition(end) ?? null;
    if (!from || !to) {
      this.report(context, text, { start, end, error: 'element_not_found' });
      return null;
    }

    const { mouse } = context;
    mouse.moveTo(from);
    mouse.press('left');
    try {
      mouse.moveTo(to);
    } finally {
      mouse.release('left');
    }

    this.report(context, text, { start, end });
    return null;
  }

  private parseSide(side: string): number | null {
    const numbers = this.parser.extractNumbers(stripPunctuation(side));
    return numbers.length === 1 ? numbers[0] : null;
  }
}

export class RefineGridCommand extends BaseCommand {
  readonly priority = Priority.HIGH;
  readonly description = 'Zoom into grid cell with 3x3 subdivision';
  readonly examples = ['refine 5', 'refine grid 45', 'refine twelve'];
  readonly category = CATEGORY;

  constructor(private readonly parser: CommandParser) {
    super();
  }

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    return clean.startsWith('refine') && this.parser.containsNumbers(clean);
  }

  validate(context: CommandContext): boolean {
    return context.overlays?.isVisible('grid') ?? false;
  }

  execute(context: CommandContext, text: string): string | null {
    const [cell] = this.parser.extractNumbers(stripPunctuation(text));
    if (cell === undefined) return null;

    const refined = context.overlays?.refine(cell) ?? false;
    this.report(context, text, { cell, refined });
    return null;
  }
}
