/**
 * Help Overlay: shows the registered commands grouped by category.
 */

import type { ScreenSize } from '../core/types.js';
import { QueuedOverlay } from './base.js';
import type { HelpSection, RenderSurface } from './types.js';

const CLOSE_PHRASES = new Set(['close help', 'hide help', 'exit help']);

export type HelpProvider = () => HelpSection[];

export class HelpOverlay extends QueuedOverlay<'help', void> {
  constructor(
    surface: RenderSurface,
    screen: ScreenSize,
    private readonly provider: HelpProvider,
  ) {
    super('help', surface, screen);
  }

  static isClosePhrase(text: string): boolean {
    return CLOSE_PHRASES.has(text.toLowerCase().trim());
  }

  handleInput(text: string): boolean {
    if (!HelpOverlay.isClosePhrase(text)) return false;
    this.host?.requestHide(this.kind);
    return true;
  }

  protected parseOptions(): void {}

  protected async render(): Promise<void> {
    await this.surface.draw({ kind: 'help', sections: this.provider() });
    this.visible = true;
    this.publishPositions(new Map());
  }

  protected resetState(): void {}
}
