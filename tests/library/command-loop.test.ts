/**
 * Tests for the interactive library command loop
 */

import {
  INVALID_COMMAND_MESSAGE,
  parseCommand,
  PROMPTS,
  runCommandLoop,
} from '../../src/library/command-loop';
import { InMemoryLibrary } from '../../src/library/in-memory-library';
import { LibraryManager } from '../../src/library/library-manager';
import { configureLogger, logger } from '../../src/utils/logger';
import { captureLogs, resetLogger, ScriptedPrompt, type RecordingSink } from '../test-utils';

describe('parseCommand', () => {
  it('should trim and lowercase recognised commands', () => {
    expect(parseCommand('  ADD ')).toBe('add');
    expect(parseCommand('Show')).toBe('show');
    expect(parseCommand('exit')).toBe('exit');
    expect(parseCommand('remove\t')).toBe('remove');
  });

  it('should return null for anything else', () => {
    expect(parseCommand('list')).toBeNull();
    expect(parseCommand('')).toBeNull();
    expect(parseCommand('add book')).toBeNull();
  });
});

describe('runCommandLoop', () => {
  let sink: RecordingSink;
  let library: InMemoryLibrary;
  let manager: LibraryManager;

  beforeEach(() => {
    sink = captureLogs();
    library = new InMemoryLibrary();
    manager = new LibraryManager(library);
  });

  afterEach(() => {
    resetLogger();
  });

  it('should add, show, remove and exit', async () => {
    const prompt = new ScriptedPrompt([
      'add', '  Dune ', 'Frank Herbert', ' 1965',
      'show',
      'remove', 'Dune',
      'SHOW',
      'exit',
      'add',
    ]);

    const result = await runCommandLoop(manager, prompt);

    expect(result).toEqual({ reason: 'exit', commands: 5, invalid: 0 });
    expect(sink.messages('info')).toEqual([
      'Title: Dune, Author: Frank Herbert, Year: 1965',
      'No books in the library.',
    ]);
    expect(prompt.remaining).toBe(1);
  });

  it('should ask the add questions in order', async () => {
    const prompt = new ScriptedPrompt(['add', 'Emma', 'Jane Austen', '1815', 'exit']);

    await runCommandLoop(manager, prompt);

    expect(prompt.questions).toEqual([
      PROMPTS.command,
      PROMPTS.title,
      PROMPTS.author,
      PROMPTS.year,
      PROMPTS.command,
    ]);
    expect(library.listBooks()).toEqual([{ title: 'Emma', author: 'Jane Austen', year: '1815' }]);
  });

  it('should warn on unknown commands without touching the library', async () => {
    library.addBook({ title: 'Dune', author: 'Frank Herbert', year: '1965' });
    const prompt = new ScriptedPrompt(['list', 'delete', 'exit']);

    const result = await runCommandLoop(manager, prompt);

    expect(result).toEqual({ reason: 'exit', commands: 1, invalid: 2 });
    expect(sink.messages('warn')).toEqual([INVALID_COMMAND_MESSAGE, INVALID_COMMAND_MESSAGE]);
    expect(library.listBooks()).toEqual([{ title: 'Dune', author: 'Frank Herbert', year: '1965' }]);
  });

  it('should ignore removing a title that is not there', async () => {
    const prompt = new ScriptedPrompt(['add', 'Dune', 'Frank Herbert', '1965', 'remove', 'Emma', 'exit']);

    await runCommandLoop(manager, prompt);

    expect(library.listBooks()).toHaveLength(1);
    expect(sink.messages('warn')).toEqual([]);
  });

  it('should stop at end of input', async () => {
    const result = await runCommandLoop(manager, new ScriptedPrompt(['show']));

    expect(result).toEqual({ reason: 'eof', commands: 1, invalid: 0 });
  });

  it('should drop a partial add when input ends mid-prompt', async () => {
    const prompt = new ScriptedPrompt(['add', 'Dune', 'Frank Herbert']);

    const result = await runCommandLoop(manager, prompt);

    expect(result.reason).toBe('eof');
    expect(library.listBooks()).toEqual([]);
    expect(prompt.questions).toEqual([PROMPTS.command, PROMPTS.title, PROMPTS.author, PROMPTS.year]);
  });

  it('should drop a partial remove when input ends mid-prompt', async () => {
    library.addBook({ title: 'Dune', author: 'Frank Herbert', year: '1965' });

    await runCommandLoop(manager, new ScriptedPrompt(['remove']));

    expect(library.listBooks()).toHaveLength(1);
  });

  it('should write debug lines through the given logger', async () => {
    configureLogger({ level: 'debug' });

    await runCommandLoop(manager, new ScriptedPrompt(['exit']), logger.child('custom'));

    expect(sink.entries.map(e => `${e.scope}:${e.message}`)).toEqual(['pattern-drills.custom:Command: exit']);
  });
});
