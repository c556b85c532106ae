/**
 * Grid Address Space
 *
 * Pure state machine mapping a rectangle subdivided into size×size numbered
 * cells onto screen coordinates. Cells are numbered from 1, left to right and
 * top to bottom. Refinement narrows the grid to one cell and re-subdivides it
 * 3×3, so a 9×9 grid followed by one refinement addresses 27×27 targets with
 * two short utterances.
 *
 * Nothing here touches a rendering surface; overlays hold a GridState and
 * replace it with the results of these functions.
 */

import type { Point, Rect, ScreenSize } from '../core/types.js';
import type { NumberedCell } from './types.js';

export const REFINED_GRID_SIZE = 3;

export type GridState =
  | { readonly kind: 'unshown' }
  | { readonly kind: 'full'; readonly bounds: Rect; readonly size: number }
  | {
      readonly kind: 'refined';
      readonly bounds: Rect;
      readonly size: typeof REFINED_GRID_SIZE;
      readonly parentCell: number;
    };

export type ShownGridState = Exclude<GridState, { kind: 'unshown' }>;

export interface RefineResult {
  ok: boolean;
  state: GridState;
}

export const UNSHOWN: GridState = Object.freeze({ kind: 'unshown' });

export function isShown(state: GridState): state is ShownGridState {
  return state.kind !== 'unshown';
}

/**
 * Show a full-screen grid. Valid from any state; any refinement is dropped.
 */
export function showGrid(screen: ScreenSize, size: number): ShownGridState {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Grid size must be a positive integer, got ${size}`);
  }
  return {
    kind: 'full',
    bounds: { x: 0, y: 0, width: screen.width, height: screen.height },
    size,
  };
}

export function hideGrid(): GridState {
  return UNSHOWN;
}

export function cellCount(state: GridState): number {
  return isShown(state) ? state.size * state.size : 0;
}

function isValidCell(state: GridState, cell: number): state is ShownGridState {
  return isShown(state) && Number.isInteger(cell) && cell >= 1 && cell <= cellCount(state);
}

interface CellLocation {
  bounds: Rect;
  row: number;
  col: number;
  cellWidth: number;
  cellHeight: number;
}

function locate(state: GridState, cell: number): CellLocation | null {
  if (!isValidCell(state, cell)) return null;
  const { bounds, size } = state;
  return {
    bounds,
    row: Math.floor((cell - 1) / size),
    col: (cell - 1) % size,
    cellWidth: bounds.width / size,
    cellHeight: bounds.height / size,
  };
}

/**
 * Rectangle of a numbered cell under the current bounds, or null when the
 * number is outside 1..size².
 */
export function cellRect(state: GridState, cell: number): Rect | null {
  const loc = locate(state, cell);
  if (!loc) return null;
  return {
    x: loc.bounds.x + loc.col * loc.cellWidth,
    y: loc.bounds.y + loc.row * loc.cellHeight,
    width: loc.cellWidth,
    height: loc.cellHeight,
  };
}

export function cellCenter(state: GridState, cell: number): Point | null {
  const loc = locate(state, cell);
  if (!loc) return null;
  return {
    x: loc.bounds.x + (loc.col + 0.5) * loc.cellWidth,
    y: loc.bounds.y + (loc.row + 0.5) * loc.cellHeight,
  };
}

/**
 * Zoom into a cell of the current grid. Refining an already refined grid
 * subdivides the refined bounds again.
 */
export function refineGrid(state: GridState, cell: number): RefineResult {
  const rect = cellRect(state, cell);
  if (!rect) return { ok: false, state };

  return {
    ok: true,
    state: { kind: 'refined', bounds: rect, size: REFINED_GRID_SIZE, parentCell: cell },
  };
}

export function listCells(state: GridState): NumberedCell[] {
  const cells: NumberedCell[] = [];
  const total = cellCount(state);
  for (let number = 1; number <= total; number++) {
    const rect = cellRect(state, number);
    const center = cellCenter(state, number);
    if (!rect || !center) continue;
    cells.push({ number, rect, center });
  }
  return cells;
}
