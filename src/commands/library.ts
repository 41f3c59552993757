/**
 * `pattern-drills library` CLI command
 *
 * Interactive library manager over standard input.
 */

import { Command } from 'commander';
import { runCommandLoop } from '../library/command-loop.js';
import { InMemoryLibrary } from '../library/in-memory-library.js';
import type { LibraryInterface } from '../library/library-interface.js';
import { LibraryManager } from '../library/library-manager.js';
import { ReadlinePrompt, type Prompt } from '../library/prompt.js';
import { logger } from '../utils/logger.js';

export interface LibraryCommandDeps {
  createLibrary?: () => LibraryInterface;
  createPrompt?: () => Prompt;
}

export function createLibraryCommand(deps: LibraryCommandDeps = {}): Command {
  const createLibrary = deps.createLibrary ?? (() => new InMemoryLibrary());
  const createPrompt = deps.createPrompt ?? (() => new ReadlinePrompt());

  const cmd = new Command('library');

  cmd
    .description('Manage an in-memory book list interactively (add, remove, show, exit)')
    .action(async () => {
      const manager = new LibraryManager(createLibrary());
      const prompt = createPrompt();
      try {
        const result = await runCommandLoop(manager, prompt);
        logger.debug('Library session ended', { ...result });
      } finally {
        prompt.close();
      }
    });

  return cmd;
}
