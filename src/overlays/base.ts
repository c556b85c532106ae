import type { Point, ScreenSize } from '../core/types.js';
import { RenderQueue } from './render-queue.js';
import type {
  Overlay,
  OverlayHost,
  OverlayKind,
  OverlayOptions,
  RenderSurface,
} from './types.js';

interface RenderTask {
  label: string;
  run: () => void | Promise<void>;
}

/**
 * Base for overlays whose drawing goes through a RenderQueue.
 *
 * Public methods are called from the dispatch side and only enqueue work;
 * `render` and `teardown` run later on the queue. Subclasses parse their show
 * options up front so invalid options fail the caller instead of the queue.
 */
export abstract class QueuedOverlay<K extends OverlayKind, P> implements Overlay<K> {
  protected host: OverlayHost | null = null;
  protected visible = false;
  private readonly queue: RenderQueue<RenderTask>;

  constructor(
    readonly kind: K,
    protected readonly surface: RenderSurface,
    protected readonly screen: ScreenSize,
  ) {
    this.queue = new RenderQueue<RenderTask>(`${kind}-overlay`, (task) => task.run());
  }

  get isVisible(): boolean {
    return this.visible;
  }

  attach(host: OverlayHost): void {
    this.host = host;
  }

  show(options?: OverlayOptions[K]): void {
    const parsed = this.parseOptions(options);
    this.schedule('show', () => this.render(parsed));
  }

  hide(): void {
    this.schedule('hide', () => this.teardown());
  }

  handleInput(_text: string): boolean {
    return false;
  }

  getElementPosition(_number: number): Point | null {
    return null;
  }

  validateBeforeShow(): boolean {
    return this.screen.width > 0 && this.screen.height > 0;
  }

  onShow(): void {}

  onHide(): void {}

  idle(): Promise<void> {
    return this.queue.idle();
  }

  dispose(): void {
    this.queue.stop();
    this.visible = false;
  }

  protected schedule(label: string, run: () => void | Promise<void>): void {
    this.queue.enqueue({ label, run });
  }

  protected publishPositions(positions: ReadonlyMap<number, Point>): void {
    this.host?.publishPositions(this.kind, positions);
  }

  protected async teardown(): Promise<void> {
    await this.surface.clear();
    this.visible = false;
    this.resetState();
  }

  protected abstract parseOptions(options: OverlayOptions[K] | undefined): P;
  protected abstract render(options: P): void | Promise<void>;
  protected abstract resetState(): void;
}

export function roundPoint(point: Point): Point {
  return { x: Math.round(point.x), y: Math.round(point.y) };
}
