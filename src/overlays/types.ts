/**
 * Overlay Types
 *
 * Contracts between the overlay coordinator, the individual overlays, the
 * commands that drive them and the rendering surface that draws them.
 */

import type { Point, Rect } from '../core/types.js';

// ═══════════════════════════════════════════════════════════════
// KINDS & OPTIONS
// ═══════════════════════════════════════════════════════════════

export type OverlayKind = 'grid' | 'elements' | 'windows' | 'help';

export interface OverlayOptions {
  grid: { size?: number };
  elements: { maxElements?: number };
  windows: { maxWindows?: number };
  help: Record<string, never>;
}

// ═══════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════

export interface NumberedCell {
  number: number;
  rect: Rect;
  center: Point;
}

export interface UiElement {
  bounds: Rect;
  name?: string;
  role?: string;
}

export interface WindowInfo {
  id: string;
  title: string;
  app?: string;
}

export interface HelpSection {
  title: string;
  entries: Array<{ description: string; examples: string[] }>;
}

export type OverlayFrame =
  | { kind: 'grid'; bounds: Rect; size: number; refinedCell: number | null; cells: NumberedCell[] }
  | { kind: 'elements'; elements: Array<NumberedCell & { name?: string }>; fallback: boolean }
  | { kind: 'windows'; windows: Array<WindowInfo & { number: number; entry: Point }> }
  | { kind: 'help'; sections: HelpSection[] };

/**
 * Rendering collaborator. Implementations draw a frame over the screen or
 * clear it; they are only ever called from an overlay's render queue.
 */
export interface RenderSurface {
  draw(frame: OverlayFrame): void | Promise<void>;
  clear(): void | Promise<void>;
}

/** Detects clickable UI elements in the foreground window. */
export interface ElementSource {
  detect(maxElements: number): UiElement[] | Promise<UiElement[]>;
}

/** Enumerates and focuses top-level windows. */
export interface WindowSource {
  list(maxWindows: number): WindowInfo[] | Promise<WindowInfo[]>;
  focus(id: string): boolean;
}

// ═══════════════════════════════════════════════════════════════
// OVERLAYS
// ═══════════════════════════════════════════════════════════════

/**
 * Write access an overlay gets to the coordinator's shared state. Writes from
 * an overlay that is not the current one are dropped.
 */
export interface OverlayHost {
  publishPositions(kind: OverlayKind, positions: ReadonlyMap<number, Point>): void;
  setMetadata(kind: OverlayKind, key: string, value: unknown): void;
  /** Ask the coordinator to hide this overlay through the normal lifecycle. */
  requestHide(kind: OverlayKind): void;
}

export interface Overlay<K extends OverlayKind = OverlayKind> {
  readonly kind: K;
  /** Whether the overlay is currently drawn on its surface. */
  readonly isVisible: boolean;

  attach(host: OverlayHost): void;
  show(options?: OverlayOptions[K]): void;
  hide(): void;
  handleInput(text: string): boolean;
  getElementPosition(number: number): Point | null;
  validateBeforeShow(): boolean;
  onShow(): void;
  onHide(): void;

  /** Zoom into a numbered cell; overlays without refinement omit it. */
  refine?(cell: number): boolean;
  /** Act on a numbered entry (focus a window, ...). */
  activate?(number: number): boolean;

  idle(): Promise<void>;
  dispose(): void;
}

/**
 * The overlay operations commands are allowed to use.
 */
export interface OverlayController {
  show<K extends OverlayKind>(kind: K, options?: OverlayOptions[K]): boolean;
  hide(kind: OverlayKind): boolean;
  hideCurrent(): boolean;
  toggle<K extends OverlayKind>(kind: K, options?: OverlayOptions[K]): boolean;
  refine(cell: number): boolean;
  activate(number: number): boolean;
  handleInput(text: string): boolean;
  isVisible(kind: OverlayKind): boolean;
  isAnyVisible(): boolean;
  currentKind(): OverlayKind | null;
  getElementPosition(number: number): Point | null;
}
