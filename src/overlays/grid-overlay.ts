/**
 * Grid Overlay
 *
 * Numbered size×size grid over the screen, refinable into 3×3 sub-grids.
 * Transitions come from grid-space and are applied to the logical state as
 * soon as they are accepted, so refines and cell lookups see every earlier
 * command. The render queue only draws the resulting frames, in order.
 */

import { z } from 'zod';
import { OverlayError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { Point, ScreenSize } from '../core/types.js';
import { QueuedOverlay, roundPoint } from './base.js';
import {
  UNSHOWN,
  cellCenter,
  hideGrid,
  isShown,
  listCells,
  refineGrid,
  showGrid,
  type GridState,
  type ShownGridState,
} from './grid-space.js';
import type { OverlayOptions, RenderSurface } from './types.js';

export const DEFAULT_GRID_SIZE = 9;

const GridOptionsSchema = z.object({
  size: z.number().int().min(2).max(30).optional(),
});

export class GridOverlay extends QueuedOverlay<'grid', ShownGridState> {
  /** State seen by dispatch; updated as soon as a transition is accepted. */
  private logical: GridState = UNSHOWN;
  /** State last drawn by the render queue. */
  private drawn: GridState = UNSHOWN;

  constructor(
    surface: RenderSurface,
    screen: ScreenSize,
    private readonly defaultSize = DEFAULT_GRID_SIZE,
  ) {
    super('grid', surface, screen);
  }

  get gridState(): GridState {
    return this.logical;
  }

  get drawnState(): GridState {
    return this.drawn;
  }

  override show(options?: OverlayOptions['grid']): void {
    const target = this.parseOptions(options);
    this.logical = target;
    this.schedule('show', () => this.render(target));
  }

  override hide(): void {
    this.logical = hideGrid();
    super.hide();
  }

  refine(cell: number): boolean {
    const result = refineGrid(this.logical, cell);
    if (!result.ok || !isShown(result.state)) {
      getLogger().warn({ cell, state: this.logical.kind }, 'Refine target outside the grid');
      return false;
    }
    const target = result.state;
    this.logical = target;
    this.host?.setMetadata(this.kind, 'refinedCell', cell);
    this.schedule('refine', () => this.render(target));
    return true;
  }

  getElementPosition(number: number): Point | null {
    const center = cellCenter(this.logical, number);
    return center ? roundPoint(center) : null;
  }

  protected parseOptions(options: OverlayOptions['grid'] | undefined): ShownGridState {
    const parsed = GridOptionsSchema.safeParse(options ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new OverlayError(`Invalid grid options: ${issues}`, this.kind);
    }
    return showGrid(this.screen, parsed.data.size ?? this.defaultSize);
  }

  protected async render(target: ShownGridState): Promise<void> {
    this.drawn = target;
    const cells = listCells(target);
    const refinedCell = target.kind === 'refined' ? target.parentCell : null;
    await this.surface.draw({
      kind: 'grid',
      bounds: target.bounds,
      size: target.size,
      refinedCell,
      cells,
    });
    this.visible = true;

    // A later transition is already queued; its frame publishes instead.
    if (target !== this.logical) return;
    this.publishPositions(new Map(cells.map((c) => [c.number, roundPoint(c.center)])));
    this.host?.setMetadata(this.kind, 'refinedCell', refinedCell);
  }

  protected resetState(): void {
    this.drawn = hideGrid();
  }
}
