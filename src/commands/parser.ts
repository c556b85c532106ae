/**
 * Command Parser
 *
 * Text utilities for matching voice commands: number extraction that
 * understands spoken homophones ("to" → 2, "for" → 4), stop-word filtering,
 * normalization and fuzzy comparison. Nothing here throws on odd input;
 * unparsable text yields empty results.
 */

import { z } from 'zod';
import { getLogger } from '../core/logger.js';
import { dataPath, loadYamlTable } from '../utils/data.js';

export const DEFAULT_IGNORED_WORDS = ['thank', 'you', 'thanks', 'please'];
export const DEFAULT_FUZZY_THRESHOLD = 0.8;
export const NUMBER_WORDS_FILE = 'number-words.yaml';

/** Used when the number-word table cannot be read. */
export const FALLBACK_NUMBER_WORDS: Readonly<Record<string, number>> = Object.freeze({
  zero: 0, oh: 0,
  one: 1, won: 1, a: 1, an: 1,
  two: 2, to: 2, too: 2,
  three: 3, tree: 3,
  four: 4, for: 4, fore: 4,
  five: 5,
  six: 6, sicks: 6,
  seven: 7,
  eight: 8, ate: 8,
  nine: 9, nein: 9,
  ten: 10,
});

const NumberWordsFileSchema = z.object({
  numberWords: z.record(z.number().int().nonnegative()),
});

const PUNCTUATION_PATTERN = /[^\p{L}\p{M}\p{N}_\s'-]/gu;
const TRAILING_PUNCTUATION = /^[.,!?;:]+|[.,!?;:]+$/g;

export interface ParserOptions {
  /** Explicit number-word table; skips loading a file. */
  numberWords?: Record<string, number>;
  /** Alternative YAML file with a `numberWords` map. */
  numberWordsFile?: string;
  ignoredWords?: readonly string[];
  fuzzyThreshold?: number;
}

/**
 * Load the number-word table from YAML, falling back to the built-in table
 * when the file is absent or unreadable.
 */
export function loadNumberWords(filePath: string = dataPath(NUMBER_WORDS_FILE)): Record<string, number> {
  const table = loadYamlTable(filePath, NumberWordsFileSchema);
  if (!table) {
    getLogger().debug({ file: filePath }, 'Using built-in number words');
    return { ...FALLBACK_NUMBER_WORDS };
  }
  return table.numberWords;
}

export class CommandParser {
  readonly numberWords: ReadonlyMap<string, number>;
  private readonly ignoredWords: ReadonlySet<string>;
  private readonly threshold: number;

  constructor(options: ParserOptions = {}) {
    const table = options.numberWords ?? loadNumberWords(options.numberWordsFile);
    this.numberWords = new Map(
      Object.entries(table).map(([word, value]) => [word.toLowerCase(), value]),
    );
    this.ignoredWords = new Set(
      (options.ignoredWords ?? DEFAULT_IGNORED_WORDS).map((w) => w.toLowerCase()),
    );
    this.threshold = options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD;
  }

  // ─── Numbers ─────────────────────────────────────────────────

  /**
   * Numbers in `text`. Digit runs win outright; otherwise words are looked up
   * in the number-word table, and a tens word followed by a units word is
   * merged ("sixty nine" → 69).
   */
  extractNumbers(text: string): number[] {
    const digits = text.match(/\d+/g);
    if (digits) {
      return digits.map((run) => Number.parseInt(run, 10));
    }

    const words = tokenize(text);
    const numbers: number[] = [];
    let i = 0;
    while (i < words.length) {
      const value = this.lookup(words[i]);
      if (value === undefined) {
        i++;
        continue;
      }

      if (isTens(value) && i + 1 < words.length) {
        const next = this.lookup(words[i + 1]);
        if (next !== undefined && next >= 1 && next <= 9) {
          numbers.push(value + next);
          i += 2;
          continue;
        }
      }

      numbers.push(value);
      i++;
    }
    return numbers;
  }

  containsNumbers(text: string): boolean {
    if (/\d/.test(text)) return true;
    return tokenize(text).some((word) => this.numberWords.has(word));
  }

  isLoneNumber(text: string): boolean {
    return this.parseNumber(text) !== null;
  }

  /** Value of `text` when it is exactly one digit run or one number word. */
  parseNumber(text: string): number | null {
    const trimmed = text.trim();
    if (/^\d+$/.test(trimmed)) return Number.parseInt(trimmed, 10);
    return this.lookup(trimmed.toLowerCase()) ?? null;
  }

  // ─── Text ────────────────────────────────────────────────────

  /** Drop politeness and filler words such as "please" and "thank you". */
  filterIgnoredWords(text: string): string {
    return text
      .split(/\s+/)
      .filter((word) => word.length > 0)
      .filter((word) => !this.ignoredWords.has(word.replace(TRAILING_PUNCTUATION, '').toLowerCase()))
      .join(' ')
      .trim();
  }

  /** Lowercase, drop punctuation except `-` and `'`, collapse whitespace. */
  normalizeText(text: string): string {
    return text
      .toLowerCase()
      .replace(PUNCTUATION_PATTERN, '')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * Similarity ratio in [0, 1] between two strings (Ratcliff/Obershelp:
   * twice the matched characters over the total length).
   */
  fuzzyMatch(a: string, b: string, normalize = true): number {
    const left = normalize ? this.normalizeText(a) : a;
    const right = normalize ? this.normalizeText(b) : b;
    return similarityRatio(left, right);
  }

  isFuzzyMatch(a: string, b: string, threshold = this.threshold, normalize = true): boolean {
    return this.fuzzyMatch(a, b, normalize) >= threshold;
  }

  /** First case-insensitive match of `pattern` in `text`. */
  extractPattern(text: string, pattern: RegExp | string): RegExpMatchArray | null {
    const source = typeof pattern === 'string' ? pattern : pattern.source;
    return text.match(new RegExp(source, 'i'));
  }

  /** "scroll down fast" → ["scroll", "down fast"] */
  splitCommandAndArgs(text: string): [string, string] {
    const trimmed = text.trim();
    const match = /^(\S+)\s+([\s\S]+)$/.exec(trimmed);
    return match ? [match[1], match[2]] : [trimmed, ''];
  }

  private lookup(word: string): number | undefined {
    return this.numberWords.get(word);
  }
}

function tokenize(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter((word) => word.length > 0);
}

function isTens(value: number): boolean {
  return value >= 20 && value <= 90 && value % 10 === 0;
}

// ─── Ratcliff/Obershelp ─────────────────────────────────────────

interface Block {
  i: number;
  j: number;
  size: number;
}

/**
 * Longest common substring of a[alo:ahi] and b[blo:bhi]. Ties go to the
 * block starting earliest in `a`, then earliest in `b`.
 */
function longestMatch(a: string, b: string, alo: number, ahi: number, blo: number, bhi: number): Block {
  const best: Block = { i: alo, j: blo, size: 0 };
  let previous = new Array<number>(bhi - blo + 1).fill(0);

  for (let i = alo; i < ahi; i++) {
    const current = new Array<number>(bhi - blo + 1).fill(0);
    for (let j = blo; j < bhi; j++) {
      if (a[i] !== b[j]) continue;
      const size = previous[j - blo] + 1;
      current[j - blo + 1] = size;
      if (size > best.size) {
        best.i = i - size + 1;
        best.j = j - size + 1;
        best.size = size;
      }
    }
    previous = current;
  }
  return best;
}

function matchedCharacters(a: string, b: string): number {
  let total = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  for (let range = pending.pop(); range; range = pending.pop()) {
    const [alo, ahi, blo, bhi] = range;
    const { i, j, size } = longestMatch(a, b, alo, ahi, blo, bhi);
    if (size === 0) continue;

    total += size;
    if (alo < i && blo < j) pending.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) pending.push([i + size, ahi, j + size, bhi]);
  }
  return total;
}

export function similarityRatio(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchedCharacters(a, b)) / length;
}
