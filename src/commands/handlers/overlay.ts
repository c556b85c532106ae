import { HelpOverlay } from '../../overlays/help-overlay.js';
import type { OverlayKind } from '../../overlays/types.js';
import { BaseCommand, stripPunctuation } from '../base.js';
import { Priority, type CommandContext } from '../types.js';

const CATEGORY = 'Overlay';

/** Shows one overlay kind on an exact phrase. Fails validation without an overlay controller. */
abstract class ShowOverlayCommand extends BaseCommand {
  readonly priority = Priority.MEDIUM;
  readonly category = CATEGORY;
  protected abstract readonly overlay: OverlayKind;

  matches(text: string): boolean {
    return this.examples.includes(stripPunctuation(text));
  }

  validate(context: CommandContext): boolean {
    return context.overlays !== undefined;
  }

  execute(context: CommandContext, text: string): string | null {
    const shown = this.show(context);
    this.report(context, text, { overlay: this.overlay, shown });
    return null;
  }

  protected show(context: CommandContext): boolean {
    return context.overlays?.show(this.overlay) ?? false;
  }
}

export class ShowGridCommand extends ShowOverlayCommand {
  readonly description: string;
  readonly examples = ['grid'];
  protected readonly overlay = 'grid';

  constructor(private readonly size = 9) {
    super();
    this.description = `Show ${size}x${size} numbered grid overlay`;
  }

  protected show(context: CommandContext): boolean {
    return context.overlays?.show('grid', { size: this.size }) ?? false;
  }
}

export class ShowElementsCommand extends ShowOverlayCommand {
  readonly description = 'Show numbered UI elements overlay';
  readonly examples = ['numbers'];
  protected readonly overlay = 'elements';
}

export class ShowWindowsCommand extends ShowOverlayCommand {
  readonly description = 'Show numbered list of open windows';
  readonly examples = ['windows'];
  protected readonly overlay = 'windows';
}

export class ShowHelpCommand extends ShowOverlayCommand {
  readonly description = 'Show help overlay with available commands';
  readonly examples = ['commands', 'help'];
  protected readonly overlay = 'help';
}

const HIDE_PHRASES = new Set(['hide', 'height', 'close']);

/**
 * Hide whatever overlay is visible. "height" is a frequent mishearing of
 * "hide". Help-specific phrases go to the help overlay first.
 */
export class HideOverlayCommand extends BaseCommand {
  readonly priority = Priority.MEDIUM;
  readonly description = 'Hide visible overlay (grid, elements, windows, commands)';
  readonly examples = ['hide', 'close'];
  readonly category = CATEGORY;

  matches(text: string): boolean {
    const clean = stripPunctuation(text);
    return HIDE_PHRASES.has(clean) || HelpOverlay.isClosePhrase(clean);
  }

  validate(context: CommandContext): boolean {
    return context.overlays !== undefined;
  }

  execute(context: CommandContext, text: string): string | null {
    const overlays = context.overlays;
    if (!overlays) return null;

    const overlay = overlays.currentKind();
    const hidden = overlays.handleInput(stripPunctuation(text)) || overlays.hideCurrent();
    this.report(context, text, { overlay, hidden });
    return null;
  }
}
