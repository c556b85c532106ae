/**
 * Element Overlay: numbers clickable UI elements of the foreground window.
 *
 * Elements come from an ElementSource. When there is no source, detection
 * fails, or it finds nothing, the screen is covered with a 5×5 grid of
 * pseudo-elements instead so "click N" still has targets.
 */

import { getLogger } from '../core/logger.js';
import type { Point, Rect, ScreenSize } from '../core/types.js';
import { QueuedOverlay, roundPoint } from './base.js';
import { listCells, showGrid } from './grid-space.js';
import type { ElementSource, NumberedCell, OverlayOptions, RenderSurface, UiElement } from './types.js';

export const DEFAULT_MAX_ELEMENTS = 50;
export const FALLBACK_GRID_SIZE = 5;

type NumberedElement = NumberedCell & { name?: string };

interface ElementShowOptions {
  maxElements: number;
}

function centerOf(rect: Rect): Point {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

export class ElementOverlay extends QueuedOverlay<'elements', ElementShowOptions> {
  private elements: NumberedElement[] = [];

  constructor(
    surface: RenderSurface,
    screen: ScreenSize,
    private readonly source: ElementSource | null = null,
    private readonly maxElements = DEFAULT_MAX_ELEMENTS,
  ) {
    super('elements', surface, screen);
  }

  get numberedElements(): readonly NumberedElement[] {
    return this.elements;
  }

  getElementPosition(number: number): Point | null {
    const element = this.elements[number - 1];
    return element ? roundPoint(element.center) : null;
  }

  protected parseOptions(options: OverlayOptions['elements'] | undefined): ElementShowOptions {
    const requested = options?.maxElements;
    const maxElements =
      requested !== undefined && Number.isInteger(requested) && requested > 0
        ? requested
        : this.maxElements;
    return { maxElements };
  }

  protected async render({ maxElements }: ElementShowOptions): Promise<void> {
    const detected = await this.detect(maxElements);
    const fallback = detected.length === 0;

    this.elements = fallback
      ? listCells(showGrid(this.screen, FALLBACK_GRID_SIZE))
      : detected.map((element, index) => ({
          number: index + 1,
          rect: element.bounds,
          center: centerOf(element.bounds),
          name: element.name,
        }));

    await this.surface.draw({ kind: 'elements', elements: this.elements, fallback });
    this.visible = true;
    this.publishPositions(new Map(this.elements.map((e) => [e.number, roundPoint(e.center)])));
  }

  protected resetState(): void {
    this.elements = [];
  }

  private async detect(maxElements: number): Promise<UiElement[]> {
    if (!this.source) return [];
    try {
      const found = await this.source.detect(maxElements);
      return found.slice(0, maxElements);
    } catch (err) {
      getLogger().warn({ err }, 'Element detection failed, using fallback grid');
      return [];
    }
  }
}
