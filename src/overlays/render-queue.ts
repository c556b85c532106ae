/**
 * RenderQueue: per-overlay FIFO command queue with a single consumer.
 *
 * Rendering surfaces are not re-entrant, so every show/hide/refine request is
 * enqueued and applied later, strictly in arrival order, by one drain loop.
 * `enqueue` returns immediately. A command that throws is logged and the loop
 * moves on; the failure never reaches whoever enqueued it.
 */

import { getLogger } from '../core/logger.js';

export type RenderHandler<C> = (command: C) => void | Promise<void>;

export class RenderQueue<C> {
  private pending: C[] = [];
  private running = false;
  private loop: Promise<void> = Promise.resolve();
  private stopped = false;

  constructor(
    private readonly name: string,
    private readonly handler: RenderHandler<C>,
  ) {}

  enqueue(command: C): void {
    if (this.stopped) {
      getLogger().warn({ queue: this.name }, 'Render queue stopped; command dropped');
      return;
    }

    this.pending.push(command);
    if (!this.running) {
      this.running = true;
      this.loop = this.drain();
    }
  }

  /**
   * Resolves once every command enqueued so far has been applied.
   */
  async idle(): Promise<void> {
    while (this.running) {
      await this.loop;
    }
  }

  /**
   * Drop pending commands and refuse new ones.
   */
  stop(): void {
    this.stopped = true;
    this.pending = [];
  }

  get size(): number {
    return this.pending.length;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  private async drain(): Promise<void> {
    // Yield first so the enqueuing caller always returns before rendering starts.
    await new Promise<void>((resolve) => setImmediate(resolve));

    let command = this.pending.shift();
    while (command !== undefined) {
      try {
        await this.handler(command);
      } catch (err) {
        getLogger().error({ queue: this.name, err }, 'Render command failed');
      }
      command = this.pending.shift();
    }

    this.running = false;
  }
}
