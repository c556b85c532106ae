/**
 * Built-in command set.
 *
 * Registration order matters only between equal priorities: the earlier
 * command wins a tie. MoveToNumberCommand is registered last so every other
 * normal-priority phrase is tried before a bare number.
 */

import {
  BackspaceCommand,
  ClipboardCommand,
  DeleteLineCommand,
  DeleteWordCommand,
  EnterCommand,
  EscapeCommand,
  RedoCommand,
  SaveCommand,
  SelectAllCommand,
  SpaceCommand,
  TabCommand,
  TypeSymbolCommand,
  TypeTextCommand,
  UndoCommand,
} from './handlers/keyboard.js';
import {
  ClickCommand,
  ClickNumberCommand,
  DoubleClickCommand,
  DragBetweenNumbersCommand,
  MiddleClickCommand,
  MouseMoveCommand,
  MoveToNumberCommand,
  RefineGridCommand,
  RightClickCommand,
  ScrollCommand,
} from './handlers/mouse.js';
import { ArrowKeyCommand, HomeEndCommand, PageNavigationCommand } from './handlers/navigation.js';
import {
  HideOverlayCommand,
  ShowElementsCommand,
  ShowGridCommand,
  ShowHelpCommand,
  ShowWindowsCommand,
} from './handlers/overlay.js';
import { ReferenceScreenshotCommand, ScreenshotCommand, ScreenshotStore } from './handlers/screenshot.js';
import {
  CloseWindowCommand,
  MaximizeCommand,
  MinimizeCommand,
  MoveWindowCommand,
  SwitchToWindowNumberCommand,
  SwitchWindowCommand,
} from './handlers/window.js';
import type { CommandParser } from './parser.js';
import type { CommandRegistry } from './registry.js';
import type { Command } from './types.js';

export interface BuiltinOptions {
  parser: CommandParser;
  gridSize?: number;
  screenshots?: ScreenshotStore;
  symbols?: ReadonlyMap<string, string>;
  platform?: NodeJS.Platform;
}

export function createBuiltinCommands(options: BuiltinOptions): Command[] {
  const { parser } = options;
  const screenshots = options.screenshots ?? new ScreenshotStore();
  const typeSymbol = new TypeSymbolCommand(options.symbols);

  return [
    // Keyboard
    new TypeTextCommand((name) => typeSymbol.isSymbol(name)),
    new DeleteWordCommand(),
    new DeleteLineCommand(),
    new ClipboardCommand(),
    new SelectAllCommand(),
    new UndoCommand(),
    new RedoCommand(),
    new SaveCommand(),
    new EnterCommand(),
    new TabCommand(),
    new EscapeCommand(),
    new SpaceCommand(),
    new BackspaceCommand(),
    typeSymbol,

    // Mouse
    new ClickNumberCommand(parser),
    new DragBetweenNumbersCommand(parser),
    new RefineGridCommand(parser),
    new RightClickCommand(),
    new DoubleClickCommand(),
    new MiddleClickCommand(),
    new ClickCommand(),
    new ScrollCommand(),
    new MouseMoveCommand(),

    // Navigation
    new PageNavigationCommand(),
    new HomeEndCommand(),
    new ArrowKeyCommand(),

    // Window
    new SwitchToWindowNumberCommand(parser),
    new MoveWindowCommand(),
    new MinimizeCommand(options.platform),
    new MaximizeCommand(),
    new CloseWindowCommand(),
    new SwitchWindowCommand(),

    // Overlay
    new ShowGridCommand(options.gridSize),
    new ShowElementsCommand(),
    new ShowWindowsCommand(),
    new ShowHelpCommand(),
    new HideOverlayCommand(),

    // Screenshot
    new ReferenceScreenshotCommand(screenshots),
    new ScreenshotCommand(screenshots),

    new MoveToNumberCommand(parser),
  ];
}

export function registerBuiltinCommands(registry: CommandRegistry, options: BuiltinOptions): void {
  for (const command of createBuiltinCommands(options)) {
    registry.register(command);
  }
}
