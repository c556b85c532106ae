import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  ReferenceScreenshotCommand,
  ScreenshotCommand,
  ScreenshotStore,
} from '../../../src/commands/handlers/screenshot.js';
import { CommandExecutionError } from '../../../src/core/errors.js';
import { EventRecorder, createTestContext } from '../../helpers/harness.js';

describe('screenshots', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'voxgrid-shots-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function addFile(name: string, mtimeSeconds: number): string {
    const path = join(root, name);
    writeFileSync(path, 'png');
    utimesSync(path, mtimeSeconds, mtimeSeconds);
    return path;
  }

  describe('ScreenshotStore', () => {
    it('should name files by local timestamp', () => {
      const store = new ScreenshotStore(root);
      expect(store.pathFor(new Date(2024, 0, 2, 3, 4, 5))).toBe(join(root, 'screenshot_20240102_030405.png'));
    });

    it('should list screenshots newest first and skip other files', () => {
      const oldest = addFile('screenshot_a.png', 1000);
      const newest = addFile('screenshot_c.png', 3000);
      const middle = addFile('screenshot_b.png', 2000);
      addFile('notes.txt', 4000);

      expect(new ScreenshotStore(root).list().map((f) => f.path)).toEqual([newest, middle, oldest]);
    });

    it('should list nothing for a missing directory', () => {
      expect(new ScreenshotStore(join(root, 'missing')).list()).toEqual([]);
    });
  });

  describe('ScreenshotCommand', () => {
    const clock = () => new Date(2024, 5, 7, 8, 9, 10);

    it('should match capture phrases including mishearings', () => {
      const command = new ScreenshotCommand(new ScreenshotStore(root), clock);
      expect(command.matches('take screenshot')).toBe(true);
      expect(command.matches('Green shot.')).toBe(true);
      expect(command.matches('screenshot 2')).toBe(false);
    });

    it('should need system capabilities', () => {
      const { context } = createTestContext();
      expect(new ScreenshotCommand(new ScreenshotStore(root), clock).validate(context)).toBe(false);
    });

    it('should create the directory and capture to a timestamped path', () => {
      const directory = join(root, 'nested');
      const events = new EventRecorder();
      const { backend, context } = createTestContext({ withSystem: true, events });

      new ScreenshotCommand(new ScreenshotStore(directory), clock).execute(context, 'screenshot');

      const expected = join(directory, 'screenshot_20240607_080910.png');
      expect(existsSync(directory)).toBe(true);
      expect(backend.describe()).toEqual([`capture ${expected}`]);
      expect(events.ofType('command:action')[0].path).toBe(expected);
    });

    it('should raise an execution error when capture fails', () => {
      const { context } = createTestContext();
      context.system = {
        copyToClipboard: () => {},
        launch: () => {},
        fileExists: () => false,
        captureScreen: () => {
          throw new Error('disk full');
        },
      };
      const command = new ScreenshotCommand(new ScreenshotStore(root), clock);

      expect(() => command.execute(context, 'screenshot')).toThrow(CommandExecutionError);
      expect(() => command.execute(context, 'screenshot')).toThrow(
        'ScreenshotCommand: Failed to take screenshot: disk full',
      );
    });
  });

  describe('ReferenceScreenshotCommand', () => {
    it('should need a prefix or a number', () => {
      const command = new ReferenceScreenshotCommand(new ScreenshotStore(root));
      expect(command.matches('screenshot')).toBe(false);
      expect(command.matches('reference screenshot')).toBe(true);
      expect(command.matches('screenshot 2')).toBe(true);
      expect(command.matches('screenshot last 3')).toBe(true);
      expect(command.matches('paste green shot path')).toBe(true);
    });

    it('should return the requested screenshot path', () => {
      const oldest = addFile('screenshot_a.png', 1000);
      const middle = addFile('screenshot_b.png', 2000);
      const newest = addFile('screenshot_c.png', 3000);
      const command = new ReferenceScreenshotCommand(new ScreenshotStore(root));
      const { context } = createTestContext();

      expect(command.execute(context, 'reference screenshot')).toBe(newest);
      expect(command.execute(context, 'screenshot 2')).toBe(middle);
      expect(command.execute(context, 'latest screenshot 3')).toBe(oldest);
    });

    it('should return several paths one per line', () => {
      const oldest = addFile('screenshot_a.png', 1000);
      const middle = addFile('screenshot_b.png', 2000);
      const newest = addFile('screenshot_c.png', 3000);
      const command = new ReferenceScreenshotCommand(new ScreenshotStore(root));
      const { context } = createTestContext();

      expect(command.execute(context, 'screenshot last 2')).toBe(`${newest}\n${middle}`);
      expect(command.execute(context, 'green shot last 5')).toBe(`${newest}\n${middle}\n${oldest}`);
    });

    it('should report an index past the end', () => {
      addFile('screenshot_a.png', 1000);
      const events = new EventRecorder();
      const { context } = createTestContext({ events });

      const result = new ReferenceScreenshotCommand(new ScreenshotStore(root)).execute(context, 'screenshot 4');

      expect(result).toBeNull();
      expect(events.ofType('command:action')[0]).toEqual({
        index: 4,
        error: 'not_found',
        command: 'ReferenceScreenshotCommand',
        text: 'screenshot 4',
      });
    });

    it('should report an empty directory', () => {
      const events = new EventRecorder();
      const { context } = createTestContext({ events });

      const result = new ReferenceScreenshotCommand(new ScreenshotStore(root)).execute(context, 'reference screenshot');

      expect(result).toBeNull();
      expect(events.ofType('command:action')[0].error).toBe('no_screenshots');
    });
  });
});
