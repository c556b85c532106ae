/**
 * voxgrid: voice commands for keyboard, mouse and numbered screen overlays.
 * Public SDK exports for programmatic usage.
 *
 * @example
 * ```typescript
 * import { ConfigManager, createRuntime, RecordingBackend } from 'voxgrid';
 *
 * const config = new ConfigManager(process.cwd()).load();
 * const backend = new RecordingBackend(config.screen);
 * const runtime = createRuntime(config, { keyboard: backend.keyboard, mouse: backend.mouse });
 * runtime.session.processText('grid');
 * await runtime.flush();
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager, ConfigStore } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export {
  VoxError,
  ConfigError,
  CommandExecutionError,
  OverlayError,
  TranscriptionError,
  toError,
} from './core/errors.js';
export {
  VoxConfigSchema,
  CustomCommandConfigSchema,
  CustomCommandActionSchema,
  type VoxConfig,
  type CustomCommandConfig,
  type CustomCommandAction,
  type CommandWordAction,
  type CommandFailureReason,
  type Point,
  type Rect,
  type ScreenSize,
  type VoxEvents,
  type VoxEvent,
  type EventType,
  type EventCallback,
  type EventSink,
} from './core/types.js';

// Commands
export {
  Priority,
  type Command,
  type CommandContext,
  type ProcessResult,
  type KeyboardCapability,
  type MouseCapability,
  type MouseButton,
  type SpecialKey,
  type SystemCapability,
} from './commands/types.js';
export { BaseCommand, stripPunctuation, tap, pressCombo, withModifiers } from './commands/base.js';
export {
  CommandParser,
  similarityRatio,
  loadNumberWords,
  DEFAULT_IGNORED_WORDS,
  DEFAULT_FUZZY_THRESHOLD,
  type ParserOptions,
} from './commands/parser.js';
export { CommandRegistry } from './commands/registry.js';
export { createBuiltinCommands, registerBuiltinCommands, type BuiltinOptions } from './commands/builtin.js';
export {
  CustomCommand,
  loadCustomCommands,
  expandEnvVars,
  describeAction as describeCustomAction,
  type CustomCommandOptions,
} from './commands/handlers/custom.js';
export * from './commands/handlers/keyboard.js';
export * from './commands/handlers/mouse.js';
export * from './commands/handlers/navigation.js';
export * from './commands/handlers/overlay.js';
export * from './commands/handlers/screenshot.js';
export * from './commands/handlers/window.js';

// Overlays
export { OverlayManager } from './overlays/manager.js';
export { QueuedOverlay } from './overlays/base.js';
export { GridOverlay, DEFAULT_GRID_SIZE } from './overlays/grid-overlay.js';
export { ElementOverlay, DEFAULT_MAX_ELEMENTS } from './overlays/element-overlay.js';
export { WindowOverlay, DEFAULT_MAX_WINDOWS } from './overlays/window-overlay.js';
export { HelpOverlay, type HelpProvider } from './overlays/help-overlay.js';
export { MemorySurface } from './overlays/surface.js';
export { RenderQueue, type RenderHandler } from './overlays/render-queue.js';
export {
  REFINED_GRID_SIZE,
  cellCenter,
  cellCount,
  cellRect,
  listCells,
  refineGrid,
  showGrid,
  hideGrid,
  type GridState,
} from './overlays/grid-space.js';
export type {
  Overlay,
  OverlayController,
  OverlayFrame,
  OverlayHost,
  OverlayKind,
  OverlayOptions,
  RenderSurface,
  ElementSource,
  WindowSource,
  UiElement,
  WindowInfo,
  HelpSection,
  NumberedCell,
} from './overlays/types.js';

// Pipeline
export { createRuntime, type RuntimeOptions, type VoxRuntime } from './pipeline/runtime.js';
export {
  DictationSession,
  type DictationSessionOptions,
  type Transcriber,
  type UtteranceOutcome,
} from './pipeline/dictation.js';
export { TextProcessor, type ProcessedText } from './pipeline/text-processor.js';

// Capabilities
export {
  RecordingBackend,
  describeAction,
  type AutomationAction,
  type RecordingOptions,
} from './capabilities/recording.js';

// Version
export { NAME, VERSION } from './version.js';
