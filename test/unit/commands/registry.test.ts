import { describe, it, expect, vi } from 'vitest';
import { CommandRegistry } from '../../../src/commands/registry.js';
import { ClickCommand, RightClickCommand } from '../../../src/commands/handlers/mouse.js';
import { Priority, type Command } from '../../../src/commands/types.js';
import { CommandExecutionError } from '../../../src/core/errors.js';
import { EventRecorder, createTestContext } from '../../helpers/harness.js';

function phrase(name: string, text: string, priority: number, overrides: Partial<Command> = {}): Command {
  return {
    name,
    priority,
    description: `${name} command`,
    examples: [text],
    category: 'Test',
    enabled: true,
    matches: (input) => input.toLowerCase().trim() === text,
    validate: () => true,
    execute: () => null,
    ...overrides,
  };
}

describe('CommandRegistry', () => {
  describe('ordering', () => {
    it('should sort by descending priority and keep registration order for ties', () => {
      const registry = new CommandRegistry();
      registry.register(phrase('low', 'a', 50));
      registry.register(phrase('high1', 'b', Priority.HIGH));
      registry.register(phrase('normal', 'c', Priority.NORMAL));
      registry.register(phrase('high2', 'd', Priority.HIGH));

      expect(registry.getCommands().map((c) => c.name)).toEqual(['high1', 'high2', 'normal', 'low']);
    });

    it('should resolve overlapping matchers by priority', () => {
      const registry = new CommandRegistry();
      registry.register(phrase('generic', 'go', Priority.NORMAL));
      registry.register(phrase('specific', 'go', Priority.HIGH));

      expect(registry.findMatching('go')?.name).toBe('specific');
    });

    it('should give ties to the command registered first', () => {
      const registry = new CommandRegistry();
      registry.register(phrase('first', 'go', Priority.MEDIUM));
      registry.register(phrase('second', 'go', Priority.MEDIUM));

      expect(registry.findMatching('go')?.name).toBe('first');
    });
  });

  describe('enabled state', () => {
    it('should skip disabled commands unless asked not to', () => {
      const registry = new CommandRegistry();
      registry.register(phrase('off', 'go', Priority.HIGH, { enabled: false }));
      registry.register(phrase('on', 'go', Priority.NORMAL));

      expect(registry.findMatching('go')?.name).toBe('on');
      expect(registry.findMatching('go', false)?.name).toBe('off');
      expect(registry.getCommandCount()).toBe(1);
      expect(registry.getCommandCount(false)).toBe(2);
    });
  });

  it('should unregister and clear', () => {
    const registry = new CommandRegistry();
    const command = phrase('one', 'x', Priority.NORMAL);
    registry.register(command);

    expect(registry.unregister(command)).toBe(true);
    expect(registry.unregister(command)).toBe(false);

    registry.register(command);
    registry.clear();
    expect(registry.getCommandCount(false)).toBe(0);
  });

  it('should treat a throwing matcher as not matching', () => {
    const registry = new CommandRegistry();
    registry.register(phrase('broken', 'go', Priority.HIGH, {
      matches: () => {
        throw new Error('matcher failure');
      },
    }));
    registry.register(phrase('fallback', 'go', Priority.NORMAL));

    expect(registry.findMatching('go')?.name).toBe('fallback');
  });

  describe('process', () => {
    it('should report no match without events', () => {
      const events = new EventRecorder();
      const registry = new CommandRegistry(events);
      const { context } = createTestContext();

      expect(registry.process('nothing here', context)).toEqual({ output: null, executed: false });
      expect(events.events).toHaveLength(0);
    });

    it('should publish detected then executed with the output', () => {
      const events = new EventRecorder();
      const registry = new CommandRegistry(events);
      registry.register(phrase('echo', 'echo', Priority.NORMAL, { execute: () => 'echoed' }));
      const { context } = createTestContext();

      const result = registry.process('echo', context);

      expect(result).toEqual({ output: 'echoed', executed: true });
      expect(events.types()).toEqual(['command:detected', 'command:executed']);
      expect(events.ofType('command:detected')[0]).toEqual({ commandName: 'echo', text: 'echo', priority: Priority.NORMAL });
      expect(events.ofType('command:executed')[0]).toEqual({ commandName: 'echo', text: 'echo', result: 'echoed' });
    });

    it('should not execute when validation fails', () => {
      const events = new EventRecorder();
      const registry = new CommandRegistry(events);
      const execute = vi.fn(() => null);
      registry.register(phrase('guarded', 'go', Priority.NORMAL, { validate: () => false, execute }));
      const { context } = createTestContext();

      expect(registry.process('go', context)).toEqual({ output: null, executed: false });
      expect(execute).not.toHaveBeenCalled();
      expect(events.types()).toEqual(['command:detected', 'command:failed']);
      expect(events.ofType('command:failed')[0]).toEqual({ commandName: 'guarded', text: 'go', reason: 'validation_failed' });
    });

    it('should report a throwing validator as a validation error', () => {
      const events = new EventRecorder();
      const registry = new CommandRegistry(events);
      registry.register(phrase('shaky', 'go', Priority.NORMAL, {
        validate: () => {
          throw new Error('no screen');
        },
      }));
      const { context } = createTestContext();

      expect(registry.process('go', context)).toEqual({ output: null, executed: false });
      expect(events.ofType('command:failed')[0]).toEqual({
        commandName: 'shaky',
        text: 'go',
        reason: 'validation_error',
        error: 'no screen',
      });
    });

    it('should rethrow execution errors unchanged', () => {
      const events = new EventRecorder();
      const registry = new CommandRegistry(events);
      const failure = new CommandExecutionError('failing', 'disk full');
      registry.register(phrase('failing', 'go', Priority.NORMAL, {
        execute: () => {
          throw failure;
        },
      }));
      const { context } = createTestContext();

      expect(() => registry.process('go', context)).toThrow(failure);
      expect(events.ofType('command:failed')[0]).toEqual({
        commandName: 'failing',
        text: 'go',
        reason: 'execution_error',
        error: 'failing: disk full',
      });
    });

    it('should wrap unexpected errors with the command name', () => {
      const events = new EventRecorder();
      const registry = new CommandRegistry(events);
      const cause = new Error('boom');
      registry.register(phrase('exploding', 'go', Priority.NORMAL, {
        execute: () => {
          throw cause;
        },
      }));
      const { context } = createTestContext();

      let caught: unknown;
      try {
        registry.process('go', context);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(CommandExecutionError);
      if (caught instanceof CommandExecutionError) {
        expect(caught.message).toBe('exploding: boom');
        expect(caught.commandName).toBe('exploding');
        expect(caught.cause).toBe(cause);
      }
      expect(events.ofType('command:failed')[0].reason).toBe('unexpected_error');
    });

    it('should publish to the context sink when the registry has none', () => {
      const events = new EventRecorder();
      const registry = new CommandRegistry();
      registry.register(phrase('echo', 'echo', Priority.NORMAL));
      const { context } = createTestContext({ events });

      registry.process('echo', context);

      expect(events.types()).toEqual(['command:detected', 'command:executed']);
    });

    it('should route "right click" and "click" to their own commands', () => {
      const registry = new CommandRegistry();
      registry.register(new ClickCommand());
      registry.register(new RightClickCommand());
      const { backend, context } = createTestContext();

      registry.process('right click', context);
      registry.process('Click.', context);

      expect(backend.describe()).toEqual(['click right x1', 'click left x1']);
      expect(registry.getCommands().map((c) => c.name)).toEqual(['RightClickCommand', 'ClickCommand']);
    });
  });

  describe('help', () => {
    it('should say so when nothing is registered', () => {
      expect(new CommandRegistry().getHelpText()).toBe('No commands registered.');
    });

    it('should list description, examples and priority', () => {
      const registry = new CommandRegistry();
      registry.register(phrase('alpha', 'alpha', Priority.NORMAL));

      expect(registry.getHelpText()).toBe(
        'Available Commands:\n\n• alpha command\n  Examples: "alpha"\n  Priority: 100\n',
      );
    });

    it('should group sections by category in order of first appearance', () => {
      const registry = new CommandRegistry();
      registry.register(phrase('one', 'one', Priority.HIGH, { category: 'Mouse' }));
      registry.register(phrase('two', 'two', Priority.MEDIUM, { category: 'Keyboard' }));
      registry.register(phrase('three', 'three', 50, { category: 'Mouse' }));

      expect(registry.getHelpSections()).toEqual([
        {
          title: 'Mouse',
          entries: [
            { description: 'one command', examples: ['one'] },
            { description: 'three command', examples: ['three'] },
          ],
        },
        { title: 'Keyboard', entries: [{ description: 'two command', examples: ['two'] }] },
      ]);
    });
  });
});
