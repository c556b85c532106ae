import { homedir } from 'os';
import { join } from 'path';
import { CommandExecutionError, toError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { ensureDirSync, listFilesByMtime, type FileEntry } from '../../utils/fs.js';
import { BaseCommand, stripPunctuation } from '../base.js';
import { Priority, type CommandContext } from '../types.js';

const CATEGORY = 'Screenshot';

export const DEFAULT_SCREENSHOT_DIR = join(homedir(), 'Pictures', 'Screenshots');
const SCREENSHOT_FILE = /^screenshot_.*\.png$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Timestamped screenshot files in one directory. */
export class ScreenshotStore {
  constructor(readonly directory: string = DEFAULT_SCREENSHOT_DIR) {}

  /** screenshot_YYYYMMDD_HHMMSS.png in local time. */
  pathFor(date: Date): string {
    const stamp =
      `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
      `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return join(this.directory, `screenshot_${stamp}.png`);
  }

  /** Newest first. */
  list(): FileEntry[] {
    return listFilesByMtime(this.directory, SCREENSHOT_FILE);
  }

  ensureDirectory(): void {
    ensureDirSync(this.directory);
  }
}

const CAPTURE_PHRASES = new Set([
  'screenshot',
  'take screenshot',
  'screen shot',
  'green shot',
  'take green shot',
  'greenshot',
]);

export class ScreenshotCommand extends BaseCommand {
  readonly priority = Priority.MEDIUM;
  readonly description = 'Take a screenshot and save it to the screenshots folder';
  readonly examples = ['screenshot', 'take screenshot', 'green shot'];
  readonly category = CATEGORY;

  constructor(
    private readonly store: ScreenshotStore = new ScreenshotStore(),
    private readonly clock: () => Date = () => new Date(),
  ) {
    super();
  }

  matches(text: string): boolean {
    return CAPTURE_PHRASES.has(stripPunctuation(text));
  }

  validate(context: CommandContext): boolean {
    return context.system !== undefined;
  }

  execute(context: CommandContext, text: string): string | null {
    const path = this.store.pathFor(this.clock());
    try {
      this.store.ensureDirectory();
      context.system?.captureScreen(path);
    } catch (err) {
      throw new CommandExecutionError(this.name, `Failed to take screenshot: ${toError(err).message}`, toError(err));
    }

    getLogger().info({ path }, 'Screenshot saved');
    this.report(context, text, { path });
    return null;
  }
}

const SHOT = '(?:screenshot|screen\\s*shot|green\\s*shot|greenshot)';
const SINGLE_PATTERN = new RegExp(`^(reference|paste|latest)?\\s*${SHOT}\\s*(?:path|file)?\\s*(\\d+)?$`, 'i');
const MULTI_PATTERN = new RegExp(`^(?:reference|paste|latest)?\\s*${SHOT}\\s*(?:path|file)?\\s*last\\s+(\\d+)$`, 'i');

type ScreenshotRequest = { kind: 'single'; index: number } | { kind: 'multiple'; count: number };

function parseRequest(text: string): ScreenshotRequest | null {
  const clean = stripPunctuation(text);

  const multi = MULTI_PATTERN.exec(clean);
  if (multi) {
    return { kind: 'multiple', count: Number.parseInt(multi[1], 10) };
  }

  const single = SINGLE_PATTERN.exec(clean);
  // A bare "screenshot" takes a new one instead.
  if (!single || (single[1] === undefined && single[2] === undefined)) return null;
  return { kind: 'single', index: single[2] !== undefined ? Number.parseInt(single[2], 10) : 1 };
}

/**
 * Returns the path of the Nth newest screenshot ("reference screenshot 2"),
 * or the newest N paths one per line ("screenshot last 3"), for typing.
 */
export class ReferenceScreenshotCommand extends BaseCommand {
  readonly priority = Priority.MEDIUM;
  readonly description = "Paste screenshot path(s) - single: 'screenshot 2', multiple: 'screenshot last 3'";
  readonly examples = ['reference screenshot', 'reference screenshot 2', 'screenshot last 3', 'green shot last 5'];
  readonly category = CATEGORY;

  constructor(private readonly store: ScreenshotStore = new ScreenshotStore()) {
    super();
  }

  matches(text: string): boolean {
    return parseRequest(text) !== null;
  }

  execute(context: CommandContext, text: string): string | null {
    const request = parseRequest(text);
    if (!request) return null;

    const files = this.store.list();
    if (files.length === 0) {
      getLogger().warn({ directory: this.store.directory }, 'No screenshots found');
      this.report(context, text, { error: 'no_screenshots' });
      return null;
    }

    if (request.kind === 'multiple') {
      const selected = files.slice(0, request.count);
      if (selected.length < request.count) {
        getLogger().warn({ requested: request.count, available: selected.length }, 'Fewer screenshots than requested');
      }
      this.report(context, text, { count: selected.length });
      return selected.map((f) => f.path).join('\n');
    }

    const file = files[request.index - 1];
    if (request.index < 1 || !file) {
      getLogger().warn({ index: request.index, available: files.length }, 'Screenshot index out of range');
      this.report(context, text, { index: request.index, error: 'not_found' });
      return null;
    }
    this.report(context, text, { index: request.index, path: file.path });
    return file.path;
  }
}
