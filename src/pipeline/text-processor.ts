/**
 * Text Processor: dictation clean-up before command matching.
 *
 * Recognizes whole-utterance command words ("scratch that"), replaces
 * spoken punctuation ("period" → ".") and applies custom vocabulary.
 */

import type { ConfigStore } from '../core/config.js';
import type { CommandWordAction } from '../core/types.js';

const COMMAND_WORD_ACTIONS: readonly CommandWordAction[] = ['undo_last', 'clear_line'];

export interface ProcessedText {
  /** Text to hand on, or null when the utterance was a command word. */
  processed: string | null;
  commandAction: CommandWordAction | null;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isCommandWordAction(value: unknown): value is CommandWordAction {
  return COMMAND_WORD_ACTIONS.some((action) => action === value);
}

function stringEntries(record: Record<string, unknown>): Array<[string, string]> {
  return Object.entries(record).flatMap(([key, value]): Array<[string, string]> =>
    typeof value === 'string' ? [[key, value]] : [],
  );
}

export class TextProcessor {
  private readonly punctuationEnabled: boolean;
  private readonly punctuation: Map<string, string>;
  private readonly punctuationPattern: RegExp | null;
  private readonly vocabulary: Array<[RegExp, string]>;
  private readonly commandWords: Map<string, CommandWordAction>;
  private lastText = '';

  constructor(config: ConfigStore) {
    this.punctuationEnabled = config.getBoolean(['textProcessing', 'punctuationCommands'], true);

    const punctuation = stringEntries(config.getRecord(['textProcessing', 'punctuationMap']));
    this.punctuation = new Map(punctuation.map(([word, mark]) => [word.toLowerCase(), mark]));
    // Longest first so "question mark" wins over a shorter overlapping word.
    const words = [...this.punctuation.keys()].sort((a, b) => b.length - a.length);
    this.punctuationPattern = words.length > 0
      ? new RegExp(`\\b(${words.map(escapeRegExp).join('|')})\\b`, 'gi')
      : null;

    this.vocabulary = stringEntries(config.getRecord(['textProcessing', 'customVocabulary'])).map(
      ([phrase, replacement]): [RegExp, string] => [new RegExp(`\\b${escapeRegExp(phrase)}\\b`, 'gi'), replacement],
    );

    this.commandWords = new Map();
    for (const [phrase, action] of Object.entries(config.getRecord(['textProcessing', 'commandWords']))) {
      if (isCommandWordAction(action)) {
        this.commandWords.set(phrase.toLowerCase().trim(), action);
      }
    }
  }

  process(text: string): ProcessedText {
    if (!text) {
      return { processed: null, commandAction: null };
    }

    const commandAction = this.commandWords.get(text.toLowerCase().trim());
    if (commandAction) {
      return { processed: null, commandAction };
    }

    let processed = text;
    if (this.punctuationEnabled) {
      processed = this.applyPunctuation(processed);
    }
    processed = this.applyVocabulary(processed);
    return { processed, commandAction: null };
  }

  /** Record text that was actually typed, for "scratch that". */
  remember(typed: string): void {
    this.lastText = typed;
  }

  /** Characters in the last typed text, counted by code point. */
  get lastTextLength(): number {
    return [...this.lastText].length;
  }

  private applyPunctuation(text: string): string {
    if (!this.punctuationPattern) return text;

    return text
      .replace(this.punctuationPattern, (word) => this.punctuation.get(word.toLowerCase()) ?? word)
      .replace(/[ \t]+([.,!?;:])/g, '$1')
      .replace(/[ \t]+/g, ' ')
      .replace(/[ \t]+\n/g, '\n')
      .replace(/\n[ \t]+/g, '\n')
      .replace(/^[ \t]+|[ \t]+$/g, '');
  }

  private applyVocabulary(text: string): string {
    let result = text;
    for (const [pattern, replacement] of this.vocabulary) {
      result = result.replace(pattern, () => replacement);
    }
    return result;
  }
}
