import { describe, it, expect } from 'vitest';
import {
  CustomCommand,
  describeAction,
  expandEnvVars,
  loadCustomCommands,
} from '../../../src/commands/handlers/custom.js';
import { CommandParser } from '../../../src/commands/parser.js';
import { Priority } from '../../../src/commands/types.js';
import { CommandExecutionError } from '../../../src/core/errors.js';
import { EventRecorder, createTestContext } from '../../helpers/harness.js';

describe('describeAction', () => {
  it('should describe each action type', () => {
    expect(describeAction({ type: 'type_text', text: 'Best regards' })).toBe('Type: Best regards');
    expect(describeAction({ type: 'copy_to_clipboard', text: 'test-secret' })).toBe('Copy: test-secret');
    expect(describeAction({ type: 'execute_file', path: 'C:\\Tools\\build.cmd' })).toBe('Run: build.cmd');
    expect(describeAction({ type: 'execute_file', path: '/usr/local/bin/deploy' })).toBe('Run: deploy');
    expect(describeAction({ type: 'key_combination', keys: ['ctrl', 'shift', 'p'] })).toBe('Press: ctrl+shift+p');
  });

  it('should truncate long text', () => {
    const text = 'abcdefghijklmnopqrstuvwxyz0123456789';
    expect(describeAction({ type: 'type_text', text })).toBe('Type: abcdefghijklmnopqrstuvwxyz0...');
  });
});

describe('expandEnvVars', () => {
  const env = { HOME: '/home/tester', APPDATA: 'C:\\Data' };

  it('should expand all three variable forms', () => {
    expect(expandEnvVars('$HOME/bin/run.sh', env)).toBe('/home/tester/bin/run.sh');
    expect(expandEnvVars('${HOME}/run.sh', env)).toBe('/home/tester/run.sh');
    expect(expandEnvVars('%APPDATA%\\run.cmd', env)).toBe('C:\\Data\\run.cmd');
  });

  it('should leave unknown variables as written', () => {
    expect(expandEnvVars('$MISSING/run.sh', env)).toBe('$MISSING/run.sh');
  });
});

describe('CustomCommand', () => {
  it('should match its trigger exactly at high priority', () => {
    const command = new CustomCommand({ trigger: 'Sign Off', action: { type: 'type_text', text: 'Best regards' } });

    expect(command.matches('sign off.')).toBe(true);
    expect(command.matches('sign of')).toBe(false);
    expect(command.priority).toBe(Priority.HIGH);
    expect(command.category).toBe('Custom');
    expect(command.examples).toEqual(['sign off']);
    expect(command.description).toBe('Type: Best regards');
  });

  it('should match near misses when given a parser', () => {
    const command = new CustomCommand(
      { trigger: 'sign off', action: { type: 'type_text', text: 'Best regards' } },
      { parser: new CommandParser() },
    );
    expect(command.matches('sign of')).toBe(true);
    expect(command.matches('open browser')).toBe(false);
  });

  it('should type text', () => {
    const events = new EventRecorder();
    const { backend, context } = createTestContext({ events });
    const command = new CustomCommand({ trigger: 'sign off', action: { type: 'type_text', text: 'Best regards' } });

    expect(command.execute(context, 'sign off')).toBeNull();
    expect(backend.describe()).toEqual(['type "Best regards"']);
    expect(events.ofType('command:action')[0]).toEqual({
      trigger: 'sign off',
      action: 'type_text',
      command: 'CustomCommand',
      text: 'sign off',
    });
  });

  it('should copy to the clipboard only with system capabilities', () => {
    const command = new CustomCommand({ trigger: 'token', action: { type: 'copy_to_clipboard', text: 'test-secret' } });
    const bare = createTestContext();
    expect(command.validate(bare.context)).toBe(false);

    const { backend, context } = createTestContext({ withSystem: true });
    expect(command.validate(context)).toBe(true);
    command.execute(context, 'token');
    expect(backend.describe()).toEqual(['clipboard "test-secret"']);
  });

  it('should hold a key combination', () => {
    const { backend, context } = createTestContext();
    const command = new CustomCommand({
      trigger: 'palette',
      action: { type: 'key_combination', keys: ['ctrl', 'shift', 'p'] },
    });

    command.execute(context, 'palette');

    expect(backend.describe()).toEqual([
      'key press ctrl',
      'key press shift',
      'key press p',
      'key release p',
      'key release shift',
      'key release ctrl',
    ]);
  });

  it('should launch an existing file after expanding variables', () => {
    const previous = process.env.VOXGRID_TEST_TOOLS;
    process.env.VOXGRID_TEST_TOOLS = '/opt/tools';
    try {
      const { backend, context } = createTestContext({
        withSystem: true,
        fileExists: (path) => path === '/opt/tools/deploy.sh',
      });
      const command = new CustomCommand({
        trigger: 'deploy',
        action: { type: 'execute_file', path: '$VOXGRID_TEST_TOOLS/deploy.sh' },
      });

      command.execute(context, 'deploy');

      expect(backend.describe()).toEqual(['launch /opt/tools/deploy.sh']);
    } finally {
      if (previous === undefined) {
        delete process.env.VOXGRID_TEST_TOOLS;
      } else {
        process.env.VOXGRID_TEST_TOOLS = previous;
      }
    }
  });

  it('should fail for a missing file', () => {
    const { backend, context } = createTestContext({ withSystem: true });
    const command = new CustomCommand({ trigger: 'run it', action: { type: 'execute_file', path: '/opt/missing.sh' } });

    expect(() => command.execute(context, 'run it')).toThrow(CommandExecutionError);
    expect(() => command.execute(context, 'run it')).toThrow('CustomCommand: File not found: /opt/missing.sh');
    expect(backend.actions).toHaveLength(0);
  });
});

describe('loadCustomCommands', () => {
  const entries = [
    { trigger: 'sign off', action: { type: 'type_text', text: 'Best regards' } },
    { trigger: 'broken' },
    { trigger: 'palette', action: { type: 'key_combination', keys: ['ctrl', 'p'] } },
  ];

  it('should load nothing when disabled', () => {
    expect(loadCustomCommands({ enabled: false, fuzzy: false, commands: entries })).toEqual([]);
  });

  it('should skip invalid entries', () => {
    const commands = loadCustomCommands({ enabled: true, fuzzy: false, commands: entries });
    expect(commands.map((c) => c.trigger)).toEqual(['sign off', 'palette']);
  });

  it('should enable fuzzy matching only when configured and a parser is given', () => {
    const parser = new CommandParser();
    const [strict] = loadCustomCommands({ enabled: true, fuzzy: false, commands: entries }, parser);
    const [fuzzy] = loadCustomCommands({ enabled: true, fuzzy: true, commands: entries }, parser);

    expect(strict.matches('sign of')).toBe(false);
    expect(fuzzy.matches('sign of')).toBe(true);
  });
});
