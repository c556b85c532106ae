/**
 * Window Overlay: numbered list of open windows for "switch N".
 */

import { getLogger } from '../core/logger.js';
import type { Point, ScreenSize } from '../core/types.js';
import { QueuedOverlay } from './base.js';
import type { OverlayOptions, RenderSurface, WindowInfo, WindowSource } from './types.js';

export const DEFAULT_MAX_WINDOWS = 20;

const LIST_TOP = 100;
const ENTRY_HEIGHT = 40;

type NumberedWindow = WindowInfo & { number: number; entry: Point };

interface WindowShowOptions {
  maxWindows: number;
}

export class WindowOverlay extends QueuedOverlay<'windows', WindowShowOptions> {
  private windows: NumberedWindow[] = [];

  constructor(
    surface: RenderSurface,
    screen: ScreenSize,
    private readonly source: WindowSource | null = null,
    private readonly maxWindows = DEFAULT_MAX_WINDOWS,
  ) {
    super('windows', surface, screen);
  }

  get listedWindows(): readonly NumberedWindow[] {
    return this.windows;
  }

  /**
   * Focus the window listed under `number`. Returns false for an unknown
   * number or when the source refuses.
   */
  activate(number: number): boolean {
    const target = this.windows[number - 1];
    if (!target || !this.source) return false;
    const focused = this.source.focus(target.id);
    getLogger().debug({ number, window: target.title, focused }, 'Window activation');
    return focused;
  }

  getElementPosition(number: number): Point | null {
    const target = this.windows[number - 1];
    return target ? { ...target.entry } : null;
  }

  protected parseOptions(options: OverlayOptions['windows'] | undefined): WindowShowOptions {
    const requested = options?.maxWindows;
    const maxWindows =
      requested !== undefined && Number.isInteger(requested) && requested > 0
        ? requested
        : this.maxWindows;
    return { maxWindows };
  }

  protected async render({ maxWindows }: WindowShowOptions): Promise<void> {
    const listed = this.source ? await this.source.list(maxWindows) : [];
    const x = Math.floor(this.screen.width / 2);

    this.windows = listed.slice(0, maxWindows).map((window, index) => ({
      ...window,
      number: index + 1,
      entry: { x, y: LIST_TOP + index * ENTRY_HEIGHT + ENTRY_HEIGHT / 2 },
    }));

    await this.surface.draw({ kind: 'windows', windows: this.windows });
    this.visible = true;
    this.publishPositions(new Map(this.windows.map((w) => [w.number, { ...w.entry }])));
  }

  protected resetState(): void {
    this.windows = [];
  }
}
