import type { OverlayFrame, RenderSurface } from './types.js';

/**
 * Headless surface that keeps drawn frames in memory. Used by the CLI's
 * dry-run mode and by tests.
 */
export class MemorySurface implements RenderSurface {
  readonly frames: OverlayFrame[] = [];
  private current: OverlayFrame | null = null;
  private clears = 0;

  draw(frame: OverlayFrame): void {
    this.frames.push(frame);
    this.current = frame;
  }

  clear(): void {
    this.current = null;
    this.clears++;
  }

  get frame(): OverlayFrame | null {
    return this.current;
  }

  get clearCount(): number {
    return this.clears;
  }
}
