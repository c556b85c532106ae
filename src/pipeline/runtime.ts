/**
 * Runtime wiring: builds every component of a voice-control session from a
 * resolved configuration and a set of automation capabilities.
 */

import { ConfigStore } from '../core/config.js';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import type { VoxConfig } from '../core/types.js';
import { registerBuiltinCommands } from '../commands/builtin.js';
import { loadCustomCommands } from '../commands/handlers/custom.js';
import { ScreenshotStore } from '../commands/handlers/screenshot.js';
import { CommandParser } from '../commands/parser.js';
import { CommandRegistry } from '../commands/registry.js';
import type {
  CommandContext,
  KeyboardCapability,
  MouseCapability,
  SystemCapability,
} from '../commands/types.js';
import { ElementOverlay } from '../overlays/element-overlay.js';
import { GridOverlay } from '../overlays/grid-overlay.js';
import { HelpOverlay } from '../overlays/help-overlay.js';
import { OverlayManager } from '../overlays/manager.js';
import { MemorySurface } from '../overlays/surface.js';
import type { ElementSource, OverlayKind, RenderSurface, WindowSource } from '../overlays/types.js';
import { WindowOverlay } from '../overlays/window-overlay.js';
import { DictationSession, type Transcriber } from './dictation.js';
import { TextProcessor } from './text-processor.js';

export interface RuntimeOptions {
  keyboard: KeyboardCapability;
  mouse: MouseCapability;
  system?: SystemCapability;
  /** One surface per overlay; defaults to in-memory surfaces. */
  createSurface?: (kind: OverlayKind) => RenderSurface;
  elementSource?: ElementSource;
  windowSource?: WindowSource;
  transcriber?: Transcriber;
  events?: EventBus;
  platform?: NodeJS.Platform;
}

export interface VoxRuntime {
  config: VoxConfig;
  events: EventBus;
  parser: CommandParser;
  registry: CommandRegistry;
  overlays: OverlayManager;
  context: CommandContext;
  textProcessor: TextProcessor;
  session: DictationSession;
  /** Wait for pending overlay rendering. */
  flush(): Promise<void>;
  dispose(): Promise<void>;
}

export function createRuntime(config: VoxConfig, options: RuntimeOptions): VoxRuntime {
  const events = options.events ?? new EventBus();
  const createSurface = options.createSurface ?? (() => new MemorySurface());

  const parser = new CommandParser({
    numberWordsFile: config.parser.numberWordsFile,
    ignoredWords: config.parser.ignoredWords,
    fuzzyThreshold: config.parser.fuzzyThreshold,
  });

  // Custom commands go first so they win ties with built-ins of equal priority.
  const registry = new CommandRegistry(events);
  for (const command of loadCustomCommands(config.customCommands, parser)) {
    registry.register(command);
  }
  registerBuiltinCommands(registry, {
    parser,
    gridSize: config.grid.defaultSize,
    screenshots: new ScreenshotStore(config.screenshots.directory),
    platform: options.platform,
  });

  const screen = { width: config.screen.width, height: config.screen.height };
  const overlays = new OverlayManager(events);
  overlays.register(new GridOverlay(createSurface('grid'), screen, config.grid.defaultSize));
  overlays.register(
    new ElementOverlay(createSurface('elements'), screen, options.elementSource ?? null, config.overlays.maxElements),
  );
  overlays.register(
    new WindowOverlay(createSurface('windows'), screen, options.windowSource ?? null, config.overlays.maxWindows),
  );
  overlays.register(new HelpOverlay(createSurface('help'), screen, () => registry.getHelpSections()));

  const context: CommandContext = {
    keyboard: options.keyboard,
    mouse: options.mouse,
    overlays,
    events,
    system: options.system,
    screen,
    data: {},
  };

  const textProcessor = new TextProcessor(ConfigStore.from(config));
  const session = new DictationSession({
    registry,
    context,
    parser,
    textProcessor,
    events,
    transcriber: options.transcriber,
    commandOnlyMode: config.textProcessing.commandOnlyMode,
  });

  getLogger().debug(
    { session: session.id, commands: registry.getCommandCount(), screen },
    'Runtime ready',
  );

  return {
    config,
    events,
    parser,
    registry,
    overlays,
    context,
    textProcessor,
    session,
    flush: () => overlays.flush(),
    dispose: async () => {
      overlays.hideCurrent();
      await overlays.flush();
      overlays.dispose();
      events.clear();
    },
  };
}
