/**
 * Dictation Session
 *
 * One utterance at a time: audio → transcription → stop-word filter →
 * text processor → command registry → typed output. A failing utterance is
 * reported on the event bus and never stops the session.
 */

import { nanoid } from 'nanoid';
import { CommandExecutionError, TranscriptionError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { CommandWordAction, EventSink } from '../core/types.js';
import { pressCombo, tap } from '../commands/base.js';
import type { CommandParser } from '../commands/parser.js';
import type { CommandRegistry } from '../commands/registry.js';
import type { CommandContext } from '../commands/types.js';
import type { TextProcessor } from './text-processor.js';

/** Speech-to-text collaborator. May throw; failures are not retried. */
export interface Transcriber {
  transcribe(audio: Uint8Array): string | Promise<string>;
}

export type UtteranceOutcome =
  | { kind: 'ignored' }
  | { kind: 'command_word'; action: CommandWordAction }
  | { kind: 'command'; output: string | null }
  | { kind: 'typed'; text: string }
  | { kind: 'unmatched'; text: string }
  | { kind: 'error'; error: string };

export interface DictationSessionOptions {
  registry: CommandRegistry;
  context: CommandContext;
  parser: CommandParser;
  textProcessor: TextProcessor;
  events: EventSink;
  transcriber?: Transcriber;
  /** Drop unmatched utterances instead of typing them. */
  commandOnlyMode?: boolean;
}

export class DictationSession {
  readonly id = nanoid();
  private readonly registry: CommandRegistry;
  private readonly context: CommandContext;
  private readonly parser: CommandParser;
  private readonly textProcessor: TextProcessor;
  private readonly events: EventSink;
  private readonly transcriber: Transcriber | undefined;
  private readonly commandOnlyMode: boolean;

  constructor(options: DictationSessionOptions) {
    this.registry = options.registry;
    this.context = options.context;
    this.parser = options.parser;
    this.textProcessor = options.textProcessor;
    this.events = options.events;
    this.transcriber = options.transcriber;
    this.commandOnlyMode = options.commandOnlyMode ?? true;
  }

  /** Transcribe and process one recording. */
  async handleAudio(audio: Uint8Array): Promise<UtteranceOutcome> {
    const text = await this.transcribe(audio);
    if (!text) return { kind: 'ignored' };
    return this.processText(text);
  }

  /**
   * Run the transcriber. Returns null for empty audio, a missing
   * transcriber or a failure; failures are published, not thrown.
   */
  async transcribe(audio: Uint8Array): Promise<string | null> {
    const logger = getLogger();
    if (audio.length === 0) {
      logger.warn({ session: this.id }, 'No audio data to transcribe');
      return null;
    }
    if (!this.transcriber) {
      logger.error({ session: this.id }, 'No transcriber configured');
      return null;
    }

    this.events.publish({
      type: 'transcription:started',
      data: { audioLength: audio.length, timestamp: Date.now() },
    });

    try {
      const text = (await this.transcriber.transcribe(audio)).trim();
      this.events.publish({ type: 'transcription:completed', data: { text, timestamp: Date.now() } });
      logger.info({ session: this.id, text }, 'Transcribed');
      return text;
    } catch (err) {
      const error = new TranscriptionError(toError(err).message, toError(err));
      logger.error({ session: this.id, err: error }, 'Transcription failed');
      this.events.publish({
        type: 'transcription:failed',
        data: { error: error.message, timestamp: Date.now() },
      });
      return null;
    }
  }

  processText(text: string): UtteranceOutcome {
    const logger = getLogger();
    const filtered = this.parser.filterIgnoredWords(text);
    if (!filtered) return { kind: 'ignored' };

    try {
      const { processed, commandAction } = this.textProcessor.process(filtered);
      this.events.publish({
        type: 'text:processed',
        data: { original: text, processed, commandAction },
      });

      if (commandAction) {
        this.runCommandWord(commandAction);
        return { kind: 'command_word', action: commandAction };
      }
      if (!processed) return { kind: 'ignored' };

      const result = this.registry.process(processed, this.context);
      if (result.executed) {
        logger.info({ session: this.id, text: processed }, 'Command executed');
        if (result.output) this.type(result.output);
        return { kind: 'command', output: result.output };
      }

      if (!this.commandOnlyMode) {
        this.type(processed);
        return { kind: 'typed', text: processed };
      }
      logger.info({ session: this.id, text: processed }, 'No command matched (command-only mode)');
      return { kind: 'unmatched', text: processed };
    } catch (err) {
      const error = toError(err);
      if (err instanceof CommandExecutionError) {
        logger.warn({ session: this.id, command: err.commandName, err: error }, 'Command failed');
      } else {
        logger.error({ session: this.id, text, err: error }, 'Error processing text');
      }
      this.events.publish({
        type: 'error',
        data: { component: 'text_processing', text, error: error.message },
      });
      return { kind: 'error', error: error.message };
    }
  }

  private runCommandWord(action: CommandWordAction): void {
    const { keyboard } = this.context;
    switch (action) {
      case 'undo_last': {
        const length = this.textProcessor.lastTextLength;
        for (let i = 0; i < length; i++) {
          tap(keyboard, 'backspace');
        }
        this.textProcessor.remember('');
        getLogger().info({ session: this.id, length }, 'Undo last: deleted characters');
        break;
      }
      case 'clear_line':
        tap(keyboard, 'home');
        pressCombo(keyboard, ['shift'], 'end');
        tap(keyboard, 'backspace');
        break;
    }
  }

  private type(text: string): void {
    try {
      this.context.keyboard.type(text);
      this.textProcessor.remember(text);
      this.events.publish({ type: 'text:typed', data: { text, length: text.length } });
    } catch (err) {
      getLogger().error({ session: this.id, err }, 'Failed to type text');
      this.events.publish({
        type: 'error',
        data: { component: 'text_injection', text, error: toError(err).message },
      });
    }
  }
}
