/**
 * Recording automation backend.
 *
 * Implements the keyboard, mouse and system capabilities by appending to an
 * action log instead of touching the OS. The CLI's `run` command prints the
 * log; tests assert on it.
 */

import { existsSync } from 'fs';
import type { Point, ScreenSize } from '../core/types.js';
import type {
  KeyboardCapability,
  MouseButton,
  MouseCapability,
  SystemCapability,
} from '../commands/types.js';

export type AutomationAction =
  | { device: 'keyboard'; action: 'press' | 'release'; key: string }
  | { device: 'keyboard'; action: 'type'; text: string }
  | { device: 'mouse'; action: 'move'; x: number; y: number }
  | { device: 'mouse'; action: 'click'; button: MouseButton; count: number }
  | { device: 'mouse'; action: 'press' | 'release'; button: MouseButton }
  | { device: 'mouse'; action: 'scroll'; dx: number; dy: number }
  | { device: 'system'; action: 'clipboard'; text: string }
  | { device: 'system'; action: 'launch' | 'capture'; path: string };

export function describeAction(entry: AutomationAction): string {
  switch (entry.action) {
    case 'press':
    case 'release':
      return entry.device === 'keyboard'
        ? `key ${entry.action} ${entry.key}`
        : `mouse ${entry.action} ${entry.button}`;
    case 'type':
      return `type ${JSON.stringify(entry.text)}`;
    case 'move':
      return `move ${entry.x},${entry.y}`;
    case 'click':
      return `click ${entry.button} x${entry.count}`;
    case 'scroll':
      return `scroll ${entry.dx},${entry.dy}`;
    case 'clipboard':
      return `clipboard ${JSON.stringify(entry.text)}`;
    case 'launch':
    case 'capture':
      return `${entry.action} ${entry.path}`;
  }
}

export interface RecordingOptions {
  /** Paths reported as existing; defaults to asking the filesystem. */
  fileExists?: (path: string) => boolean;
}

export class RecordingBackend {
  readonly actions: AutomationAction[] = [];
  readonly keyboard: KeyboardCapability;
  readonly mouse: MouseCapability;
  readonly system: SystemCapability;
  private pointer: Point;

  constructor(screen: ScreenSize, options: RecordingOptions = {}) {
    this.pointer = { x: Math.floor(screen.width / 2), y: Math.floor(screen.height / 2) };
    const log = (entry: AutomationAction): void => {
      this.actions.push(entry);
    };

    this.keyboard = {
      press: (key) => log({ device: 'keyboard', action: 'press', key }),
      release: (key) => log({ device: 'keyboard', action: 'release', key }),
      type: (text) => log({ device: 'keyboard', action: 'type', text }),
    };

    this.mouse = {
      position: () => ({ ...this.pointer }),
      moveTo: (point) => {
        this.pointer = { x: point.x, y: point.y };
        log({ device: 'mouse', action: 'move', x: point.x, y: point.y });
      },
      click: (button, count) => log({ device: 'mouse', action: 'click', button, count }),
      press: (button) => log({ device: 'mouse', action: 'press', button }),
      release: (button) => log({ device: 'mouse', action: 'release', button }),
      scroll: (dx, dy) => log({ device: 'mouse', action: 'scroll', dx, dy }),
    };

    const fileExists = options.fileExists ?? ((path: string) => existsSync(path));
    this.system = {
      copyToClipboard: (text) => log({ device: 'system', action: 'clipboard', text }),
      launch: (path) => log({ device: 'system', action: 'launch', path }),
      fileExists,
      captureScreen: (path) => log({ device: 'system', action: 'capture', path }),
    };
  }

  describe(): string[] {
    return this.actions.map(describeAction);
  }

  /** Remove and return everything recorded so far. */
  drain(): AutomationAction[] {
    return this.actions.splice(0, this.actions.length);
  }
}
