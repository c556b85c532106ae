/**
 * Overlay Manager
 *
 * Coordinates the registered overlays so that at most one is current at a
 * time, owns the element-position table and metadata the current overlay
 * publishes, and forwards overlay-specific operations to it.
 *
 * Lifecycle calls here are synchronous; each overlay applies them later on
 * its own render queue. `flush()` waits for all queues to drain.
 */

import { getLogger } from '../core/logger.js';
import type { EventSink, Point } from '../core/types.js';
import type {
  Overlay,
  OverlayController,
  OverlayHost,
  OverlayKind,
  OverlayOptions,
} from './types.js';

function describeOptions(options: object | undefined): Record<string, unknown> {
  return options ? Object.fromEntries(Object.entries(options)) : {};
}

export class OverlayManager implements OverlayController {
  private overlays = new Map<OverlayKind, Overlay>();
  private current: OverlayKind | null = null;
  private positions: ReadonlyMap<number, Point> = new Map();
  private metadata = new Map<string, unknown>();
  private readonly host: OverlayHost;

  constructor(private readonly events?: EventSink) {
    this.host = {
      publishPositions: (kind, positions) => this.acceptPositions(kind, positions),
      setMetadata: (kind, key, value) => {
        if (kind !== this.current) return;
        this.metadata.set(key, value);
      },
      requestHide: (kind) => {
        this.hide(kind);
      },
    };
  }

  register(overlay: Overlay): void {
    if (this.overlays.has(overlay.kind)) {
      getLogger().warn({ overlay: overlay.kind }, 'Replacing registered overlay');
      this.overlays.get(overlay.kind)?.dispose();
    }
    this.overlays.set(overlay.kind, overlay);
    overlay.attach(this.host);
  }

  get(kind: OverlayKind): Overlay | undefined {
    return this.overlays.get(kind);
  }

  // ─── Lifecycle ───────────────────────────────────────────────

  show<K extends OverlayKind>(kind: K, options?: OverlayOptions[K]): boolean {
    const logger = getLogger();
    const overlay = this.overlays.get(kind);
    if (!overlay) {
      logger.warn({ overlay: kind }, 'Unknown overlay');
      return false;
    }
    if (!overlay.validateBeforeShow()) {
      logger.warn({ overlay: kind }, 'Overlay declined to show');
      return false;
    }

    if (this.current !== null && this.current !== kind) {
      this.hide(this.current);
    }

    try {
      overlay.show(options);
    } catch (err) {
      logger.error({ overlay: kind, err }, 'Overlay show failed');
      return false;
    }

    this.current = kind;
    this.resetShared();
    overlay.onShow();
    this.events?.publish({
      type: 'overlay:shown',
      data: { overlay: kind, options: describeOptions(options) },
    });
    logger.debug({ overlay: kind }, 'Overlay shown');
    return true;
  }

  hide(kind: OverlayKind): boolean {
    const overlay = this.overlays.get(kind);
    if (!overlay || this.current !== kind) return false;

    overlay.hide();
    this.current = null;
    this.resetShared();
    overlay.onHide();
    this.events?.publish({ type: 'overlay:hidden', data: { overlay: kind } });
    getLogger().debug({ overlay: kind }, 'Overlay hidden');
    return true;
  }

  hideCurrent(): boolean {
    return this.current !== null ? this.hide(this.current) : false;
  }

  toggle<K extends OverlayKind>(kind: K, options?: OverlayOptions[K]): boolean {
    return this.current === kind ? this.hide(kind) : this.show(kind, options);
  }

  // ─── Forwarded operations ────────────────────────────────────

  refine(cell: number): boolean {
    const refined = this.currentOverlay()?.refine?.(cell) ?? false;
    // The published table describes the parent grid until the refined frame lands.
    if (refined) this.positions = new Map();
    return refined;
  }

  activate(number: number): boolean {
    return this.currentOverlay()?.activate?.(number) ?? false;
  }

  handleInput(text: string): boolean {
    return this.currentOverlay()?.handleInput(text) ?? false;
  }

  // ─── Queries ─────────────────────────────────────────────────

  isVisible(kind: OverlayKind): boolean {
    return this.current === kind;
  }

  isAnyVisible(): boolean {
    return this.current !== null;
  }

  currentKind(): OverlayKind | null {
    return this.current;
  }

  getElementPosition(number: number): Point | null {
    const published = this.positions.get(number);
    if (published) return { ...published };
    return this.currentOverlay()?.getElementPosition(number) ?? null;
  }

  getElementPositions(): Map<number, Point> {
    return new Map([...this.positions].map(([n, p]) => [n, { ...p }]));
  }

  getMetadata(key: string): unknown {
    return this.metadata.get(key);
  }

  // ─── Teardown ────────────────────────────────────────────────

  async flush(): Promise<void> {
    await Promise.all([...this.overlays.values()].map((overlay) => overlay.idle()));
  }

  dispose(): void {
    this.current = null;
    this.resetShared();
    for (const overlay of this.overlays.values()) {
      overlay.dispose();
    }
  }

  private currentOverlay(): Overlay | undefined {
    return this.current !== null ? this.overlays.get(this.current) : undefined;
  }

  private acceptPositions(kind: OverlayKind, positions: ReadonlyMap<number, Point>): void {
    if (kind !== this.current) {
      getLogger().debug({ overlay: kind, current: this.current }, 'Dropped positions from inactive overlay');
      return;
    }
    this.positions = new Map([...positions].map(([n, p]) => [n, { ...p }]));
  }

  private resetShared(): void {
    this.positions = new Map();
    this.metadata.clear();
  }
}
