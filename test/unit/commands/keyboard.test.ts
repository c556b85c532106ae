import { describe, it, expect } from 'vitest';
import {
  BackspaceCommand,
  ClipboardCommand,
  DeleteLineCommand,
  DeleteWordCommand,
  EnterCommand,
  EscapeCommand,
  SaveCommand,
  SelectAllCommand,
  TypeSymbolCommand,
  TypeTextCommand,
  UndoCommand,
  loadSymbols,
} from '../../../src/commands/handlers/keyboard.js';
import { Priority } from '../../../src/commands/types.js';
import { EventRecorder, createTestContext } from '../../helpers/harness.js';

describe('single key commands', () => {
  it('should match their trigger with speech punctuation attached', () => {
    const enter = new EnterCommand();
    expect(enter.matches('Enter.')).toBe(true);
    expect(enter.matches('enter key')).toBe(false);
    expect(enter.priority).toBe(Priority.NORMAL);
  });

  it('should tap the key', () => {
    const { backend, context } = createTestContext();
    new EnterCommand().execute(context);
    expect(backend.describe()).toEqual(['key press enter', 'key release enter']);
  });

  it('should accept every alias', () => {
    expect(new EscapeCommand().matches('cancel')).toBe(true);
    expect(new BackspaceCommand().matches('delete')).toBe(true);
    expect(new BackspaceCommand().examples).toEqual(['delete', 'backspace']);
  });

  it('should press esc for escape', () => {
    const { backend, context } = createTestContext();
    new EscapeCommand().execute(context);
    expect(backend.describe()).toEqual(['key press esc', 'key release esc']);
  });
});

describe('editing commands', () => {
  it('should delete the previous word with ctrl+backspace', () => {
    const { backend, context } = createTestContext();
    const command = new DeleteWordCommand();

    expect(command.matches('Delete word!')).toBe(true);
    command.execute(context);

    expect(backend.describe()).toEqual([
      'key press ctrl',
      'key press backspace',
      'key release backspace',
      'key release ctrl',
    ]);
  });

  it('should select to the end of the line before deleting it', () => {
    const { backend, context } = createTestContext();
    new DeleteLineCommand().execute(context);

    expect(backend.describe()).toEqual([
      'key press home',
      'key release home',
      'key press shift',
      'key press end',
      'key release end',
      'key release shift',
      'key press delete',
      'key release delete',
    ]);
  });

  it('should map clipboard words to ctrl shortcuts and report the operation', () => {
    const events = new EventRecorder();
    const { backend, context } = createTestContext({ events });
    const command = new ClipboardCommand();

    expect(command.matches('Copy!')).toBe(true);
    expect(command.matches('copy that')).toBe(false);
    command.execute(context, 'Copy!');

    expect(backend.describe()).toEqual(['key press ctrl', 'key press c', 'key release c', 'key release ctrl']);
    expect(events.ofType('command:action')[0]).toEqual({ operation: 'copy', command: 'ClipboardCommand', text: 'Copy!' });
  });

  it('should press ctrl shortcuts for fixed phrases', () => {
    const { backend, context } = createTestContext();
    new SelectAllCommand().execute(context);
    new UndoCommand().execute(context);

    expect(backend.describe()).toEqual([
      'key press ctrl', 'key press a', 'key release a', 'key release ctrl',
      'key press ctrl', 'key press z', 'key release z', 'key release ctrl',
    ]);
    expect(new SaveCommand().matches('save')).toBe(true);
    expect(new SelectAllCommand().name).toBe('SelectAllCommand');
  });
});

describe('typing commands', () => {
  const symbols = loadSymbols();
  const typeSymbol = new TypeSymbolCommand(symbols);
  const typeText = new TypeTextCommand((name) => typeSymbol.isSymbol(name));

  it('should load the bundled symbol table', () => {
    expect(symbols.get('slash')).toBe('/');
    expect(symbols.get('open paren')).toBe('(');
    expect(symbols.get('backslash')).toBe('\\');
    expect(symbols.get('quote')).toBe('"');
  });

  it('should return an empty table for a missing file', () => {
    expect(loadSymbols('/nonexistent/symbols.yaml').size).toBe(0);
  });

  it('should type symbols with or without the type prefix', () => {
    const { context } = createTestContext();
    expect(typeSymbol.matches('slash')).toBe(true);
    expect(typeSymbol.matches('Type open paren.')).toBe(true);
    expect(typeSymbol.execute(context, 'type open paren')).toBe('(');
    expect(typeSymbol.execute(context, 'equals')).toBe('=');
  });

  it('should leave symbol names to the symbol command', () => {
    expect(typeText.matches('type slash')).toBe(false);
    expect(typeText.matches('type hello world')).toBe(true);
    expect(typeText.matches('type')).toBe(false);
    expect(typeText.priority).toBeGreaterThan(typeSymbol.priority);
  });

  it('should return the text after the prefix', () => {
    const { backend, context } = createTestContext();
    expect(typeText.execute(context, 'Type hello, world')).toBe('hello world');
    expect(typeText.execute(context, 'type hello')).toBe('hello');
    expect(backend.actions).toHaveLength(0);
  });
});
