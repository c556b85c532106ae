import { z } from 'zod';

// ===== Configuration =====

export const CustomCommandActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('type_text'), text: z.string() }),
  z.object({ type: z.literal('copy_to_clipboard'), text: z.string() }),
  z.object({ type: z.literal('execute_file'), path: z.string() }),
  z.object({ type: z.literal('key_combination'), keys: z.array(z.string()) }),
]);

export const CustomCommandConfigSchema = z.object({
  trigger: z.string().min(1),
  action: CustomCommandActionSchema,
});

export const VoxConfigSchema = z.object({
  screen: z.object({
    width: z.number().int().positive().default(1920),
    height: z.number().int().positive().default(1080),
  }).default({}),
  grid: z.object({
    defaultSize: z.number().int().min(2).max(30).default(9),
  }).default({}),
  overlays: z.object({
    maxElements: z.number().int().min(1).default(50),
    maxWindows: z.number().int().min(1).default(20),
  }).default({}),
  parser: z.object({
    fuzzyThreshold: z.number().min(0).max(1).default(0.8),
    ignoredWords: z.array(z.string()).default(['thank', 'you', 'thanks', 'please']),
    numberWordsFile: z.string().optional(),
  }).default({}),
  textProcessing: z.object({
    punctuationCommands: z.boolean().default(true),
    punctuationMap: z.record(z.string()).default({
      'period': '.',
      'comma': ',',
      'question mark': '?',
      'exclamation point': '!',
      'new line': '\n',
      'new paragraph': '\n\n',
    }),
    customVocabulary: z.record(z.string()).default({}),
    commandWords: z.record(z.enum(['undo_last', 'clear_line'])).default({
      'delete that': 'undo_last',
      'scratch that': 'undo_last',
    }),
    /** When set, unmatched utterances are dropped instead of typed. */
    commandOnlyMode: z.boolean().default(true),
  }).default({}),
  customCommands: z.object({
    enabled: z.boolean().default(false),
    fuzzy: z.boolean().default(false),
    /** Entries are validated one by one when loaded; invalid ones are skipped. */
    commands: z.array(z.unknown()).default([]),
  }).default({}),
  screenshots: z.object({
    directory: z.string().optional(),
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
});

export type VoxConfig = z.infer<typeof VoxConfigSchema>;
export type CustomCommandConfig = z.infer<typeof CustomCommandConfigSchema>;
export type CustomCommandAction = z.infer<typeof CustomCommandActionSchema>;
export type CommandWordAction = VoxConfig['textProcessing']['commandWords'][string];

// ===== Geometry =====

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ScreenSize {
  width: number;
  height: number;
}

// ===== Events =====

export type CommandFailureReason =
  | 'validation_failed'
  | 'validation_error'
  | 'execution_error'
  | 'unexpected_error';

export interface VoxEvents {
  'transcription:started': { audioLength: number; timestamp: number };
  'transcription:completed': { text: string; timestamp: number };
  'transcription:failed': { error: string; timestamp: number };
  'command:detected': { commandName: string; text: string; priority: number };
  'command:executed': { commandName: string; text: string; result: string | null };
  'command:failed': {
    commandName: string;
    text: string;
    reason: CommandFailureReason;
    error?: string;
  };
  /** Detail reported by a command handler about what it actually did. */
  'command:action': { command: string; text: string; [detail: string]: unknown };
  'text:processed': { original: string; processed: string | null; commandAction: string | null };
  'text:typed': { text: string; length: number };
  'overlay:shown': { overlay: string; options: Record<string, unknown> };
  'overlay:hidden': { overlay: string };
  'error': { component: string; error: string; text?: string };
}

export type EventType = keyof VoxEvents;

export interface VoxEvent<K extends EventType = EventType> {
  readonly type: K;
  readonly data: Readonly<VoxEvents[K]>;
}

export type EventCallback<K extends EventType = EventType> = (event: VoxEvent<K>) => void;

/** Anything events can be published to; the bus or a test double. */
export interface EventSink {
  publish<K extends EventType>(event: VoxEvent<K>): void;
}
