/**
 * Command Types
 *
 * The command contract and the capability bundle handed to every
 * `validate`/`execute` call. Commands never own their capabilities; a
 * session builds one CommandContext and passes it by reference.
 */

import type { EventSink, Point, ScreenSize } from '../core/types.js';
import type { OverlayController } from '../overlays/types.js';

// ═══════════════════════════════════════════════════════════════
// PRIORITIES
// ═══════════════════════════════════════════════════════════════

/** Higher is checked first. */
export const Priority = {
  HIGH: 500,
  MEDIUM: 200,
  NORMAL: 100,
} as const;

// ═══════════════════════════════════════════════════════════════
// CAPABILITIES
// ═══════════════════════════════════════════════════════════════

/**
 * Named keys understood by every keyboard backend. Single characters are
 * passed through as-is.
 */
export type SpecialKey =
  | 'enter' | 'tab' | 'esc' | 'space' | 'backspace' | 'delete'
  | 'home' | 'end' | 'page_up' | 'page_down'
  | 'up' | 'down' | 'left' | 'right'
  | 'ctrl' | 'shift' | 'alt' | 'cmd' | 'f4';

export interface KeyboardCapability {
  press(key: string): void;
  release(key: string): void;
  type(text: string): void;
}

export type MouseButton = 'left' | 'right' | 'middle';

export interface MouseCapability {
  position(): Point;
  moveTo(point: Point): void;
  click(button: MouseButton, count: number): void;
  press(button: MouseButton): void;
  release(button: MouseButton): void;
  scroll(dx: number, dy: number): void;
}

/** Clipboard, process and screen-capture primitives. */
export interface SystemCapability {
  copyToClipboard(text: string): void;
  launch(path: string): void;
  fileExists(path: string): boolean;
  captureScreen(path: string): void;
}

export interface CommandContext {
  keyboard: KeyboardCapability;
  mouse: MouseCapability;
  overlays?: OverlayController;
  events?: EventSink;
  system?: SystemCapability;
  screen: ScreenSize;
  /** Free-form scratch space shared by commands within a session. */
  data: Record<string, unknown>;
}

// ═══════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════

export interface Command {
  /** Type name reported in events and errors. */
  readonly name: string;
  readonly priority: number;
  readonly description: string;
  readonly examples: readonly string[];
  /** Heading the command is listed under in help output. */
  readonly category: string;
  readonly enabled: boolean;

  matches(text: string): boolean;
  validate(context: CommandContext, text: string): boolean;
  /**
   * Perform the action. Returns literal text for the caller to type, or null.
   * Throws CommandExecutionError on failure.
   */
  execute(context: CommandContext, text: string): string | null;
}

export interface ProcessResult {
  output: string | null;
  executed: boolean;
}
