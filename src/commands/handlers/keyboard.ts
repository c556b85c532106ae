import { z } from 'zod';
import { dataPath, loadYamlTable } from '../../utils/data.js';
import { BaseCommand, pressCombo, stripPunctuation, tap } from '../base.js';
import { Priority, type CommandContext, type SpecialKey } from '../types.js';

const CATEGORY = 'Keyboard';
const TYPE_PREFIX = 'type ';

// ═══════════════════════════════════════════════════════════════
// SINGLE KEYS
// ═══════════════════════════════════════════════════════════════

export class KeyPressCommand extends BaseCommand {
  readonly category = CATEGORY;
  readonly examples: readonly string[] = [];
  private readonly triggers: ReadonlySet<string>;

  constructor(
    triggers: readonly string[],
    private readonly key: SpecialKey,
    readonly description: string,
    readonly priority: number = Priority.NORMAL,
  ) {
    super();
    this.examples = triggers.map((t) => t.toLowerCase());
    this.triggers = new Set(this.examples);
  }

  matches(text: string): boolean {
    return this.triggers.has(stripPunctuation(text));
  }

  execute(context: CommandContext): string | null {
    tap(context.keyboard, this.key);
    return null;
  }
}

export class EnterCommand extends KeyPressCommand {
  constructor() {
    super(['enter'], 'enter', 'Press Enter key');
  }
}

export class TabCommand extends KeyPressCommand {
  constructor() {
    super(['tab'], 'tab', 'Press Tab key');
  }
}

export class EscapeCommand extends KeyPressCommand {
  constructor() {
    super(['escape', 'cancel'], 'esc', 'Press Escape key');
  }
}

export class SpaceCommand extends KeyPressCommand {
  constructor() {
    super(['space'], 'space', 'Press Space key');
  }
}

export class BackspaceCommand extends KeyPressCommand {
  constructor() {
    super(['delete', 'backspace'], 'backspace', 'Delete one character (Backspace)');
  }
}

// ═══════════════════════════════════════════════════════════════
// EDITING
// ═══════════════════════════════════════════════════════════════

export class DeleteWordCommand extends BaseCommand {
  readonly priority = Priority.HIGH;
  readonly description = 'Delete the previous word (Ctrl+Backspace)';
  readonly examples = ['delete word'];
  readonly category = CATEGORY;

  matches(text: string): boolean {
    return stripPunctuation(text) === 'delete word';
  }

  execute(context: CommandContext): string | null {
    pressCombo(context.keyboard, ['ctrl'], 'backspace');
    return null;
  }
}

export class DeleteLineCommand extends BaseCommand {
  readonly priority = Priority.HIGH;
  readonly description = 'Delete the current line';
  readonly examples = ['delete line'];
  readonly category = CATEGORY;

  matches(text: string): boolean {
    return stripPunctuation(text) === 'delete line';
  }

  execute(context: CommandContext): string | null {
    const { keyboard } = context;
    tap(keyboard, 'home');
    pressCombo(keyboard, ['shift'], 'end');
    tap(keyboard, 'delete');
    return null;
  }
}

const CLIPBOARD_KEYS: Readonly<Record<string, string>> = { copy: 'c', cut: 'x', paste: 'v' };

export class ClipboardCommand extends BaseCommand {
  readonly priority = Priority.MEDIUM;
  readonly description = 'Clipboard operations (copy, cut, paste)';
  readonly examples = ['copy', 'cut', 'paste'];
  readonly category = CATEGORY;

  matches(text: string): boolean {
    return Object.hasOwn(CLIPBOARD_KEYS, stripPunctuation(text));
  }

  execute(context: CommandContext, text: string): string | null {
    const operation = stripPunctuation(text);
    const key = CLIPBOARD_KEYS[operation];
    if (key === undefined) return null;
    pressCombo(context.keyboard, ['ctrl'], key);
    this.report(context, text, { operation });
    return null;
  }
}

/** Ctrl+<key> (or another modifier) bound to fixed phrases. */
export class KeyboardShortcutCommand extends BaseCommand {
  readonly category = CATEGORY;
  readonly examples: readonly string[] = [];
  private readonly triggers: ReadonlySet<string>;

  constructor(
    triggers: readonly string[],
    private readonly key: string,
    readonly description: string,
    readonly priority: number = Priority.MEDIUM,
    private readonly modifier: SpecialKey = 'ctrl',
  ) {
    super();
    this.examples = triggers.map((t) => t.toLowerCase());
    this.triggers = new Set(this.examples);
  }

  matches(text: string): boolean {
    return this.triggers.has(stripPunctuation(text));
  }

  execute(context: CommandContext): string | null {
    pressCombo(context.keyboard, [this.modifier], this.key);
    return null;
  }
}

export class SelectAllCommand extends KeyboardShortcutCommand {
  constructor() {
    super(['select all'], 'a', 'Select all text (Ctrl+A)');
  }
}

export class UndoCommand extends KeyboardShortcutCommand {
  constructor() {
    super(['undo'], 'z', 'Undo last action (Ctrl+Z)');
  }
}

export class RedoCommand extends KeyboardShortcutCommand {
  constructor() {
    super(['redo'], 'y', 'Redo last undone action (Ctrl+Y)');
  }
}

export class SaveCommand extends KeyboardShortcutCommand {
  constructor() {
    super(['save'], 's', 'Save file (Ctrl+S)');
  }
}

// ═══════════════════════════════════════════════════════════════
// TYPING
// ═══════════════════════════════════════════════════════════════

const SymbolsFileSchema = z.object({
  symbols: z.record(z.string().min(1)),
});

/** Spoken symbol names from data/symbols.yaml. */
export function loadSymbols(filePath: string = dataPath('symbols.yaml')): Map<string, string> {
  const table = loadYamlTable(filePath, SymbolsFileSchema);
  return new Map(Object.entries(table?.symbols ?? {}));
}

/** Symbol name of `text`, with or without a leading "type". */
function symbolName(text: string): string {
  const clean = stripPunctuation(text);
  return clean.startsWith(TYPE_PREFIX) ? clean.slice(TYPE_PREFIX.length).trim() : clean;
}

export class TypeSymbolCommand extends BaseCommand {
  readonly priority = Priority.NORMAL;
  readonly description = 'Type symbol characters';
  readonly examples = ['slash', 'open paren', 'close paren', 'equals', 'quote', 'comma'];
  readonly category = CATEGORY;

  constructor(private readonly symbols: ReadonlyMap<string, string> = loadSymbols()) {
    super();
  }

  isSymbol(name: string): boolean {
    return this.symbols.has(name);
  }

  matches(text: string): boolean {
    return this.symbols.has(symbolName(text));
  }

  execute(_context: CommandContext, text: string): string | null {
    return this.symbols.get(symbolName(text)) ?? null;
  }
}

/**
 * "type <words>" returns the words for the caller to type. Leaves
 * "type <symbol name>" to TypeSymbolCommand.
 */
export class TypeTextCommand extends BaseCommand {
  readonly priority = Priority.HIGH;
  readonly description = "Type text with 'type' prefix stripped";
  readonly examples = ['type hello world', 'type investigate why'];
  readonly category = CATEGORY;

  constructor(private readonly isSymbol: (name: string) => boolean = () => false) {
    super();
  }

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    if (!clean.startsWith(TYPE_PREFIX)) return false;
    return !this.isSymbol(clean.slice(TYPE_PREFIX.length).trim());
  }

  execute(_context: CommandContext, text: string): string | null {
    const clean = stripPunctuation(text);
    const remainder = clean.startsWith(TYPE_PREFIX) ? clean.slice(TYPE_PREFIX.length).trim() : clean;
    return remainder.length > 0 ? remainder : null;
  }
}
