/**
 * Interactive library command loop
 *
 * Reads a command, dispatches it to the LibraryManager and repeats until
 * `exit` or the end of input. Never exits the process itself.
 */

import { logger, type Logger } from '../utils/logger.js';
import type { LibraryManager } from './library-manager.js';
import type { Prompt } from './prompt.js';

export type LibraryCommand = 'add' | 'remove' | 'show' | 'exit';

export const LIBRARY_COMMANDS: readonly LibraryCommand[] = ['add', 'remove', 'show', 'exit'];

export const PROMPTS = {
  command: 'Enter command (add, remove, show, exit): ',
  title: 'Enter book title: ',
  author: 'Enter book author: ',
  year: 'Enter book year: ',
  removeTitle: 'Enter book title to remove: ',
} as const;

export const INVALID_COMMAND_MESSAGE = 'Invalid command. Please try again.';

export interface CommandLoopResult {
  reason: 'exit' | 'eof';
  /** Recognised commands handled, `exit` included */
  commands: number;
  invalid: number;
}

export function isLibraryCommand(value: string): value is LibraryCommand {
  return (LIBRARY_COMMANDS as readonly string[]).includes(value);
}

export function parseCommand(raw: string): LibraryCommand | null {
  const normalized = raw.trim().toLowerCase();
  return isLibraryCommand(normalized) ? normalized : null;
}

async function askTrimmed(prompt: Prompt, question: string): Promise<string | null> {
  const answer = await prompt.ask(question);
  return answer === null ? null : answer.trim();
}

export async function runCommandLoop(
  manager: LibraryManager,
  prompt: Prompt,
  log: Logger = logger.child('library')
): Promise<CommandLoopResult> {
  const result: CommandLoopResult = { reason: 'eof', commands: 0, invalid: 0 };

  for (;;) {
    const raw = await prompt.ask(PROMPTS.command);
    if (raw === null) break;

    const command = parseCommand(raw);
    if (command === null) {
      result.invalid++;
      log.warn(INVALID_COMMAND_MESSAGE);
      continue;
    }

    result.commands++;
    log.debug(`Command: ${command}`);

    switch (command) {
      case 'add': {
        const title = await askTrimmed(prompt, PROMPTS.title);
        if (title === null) return result;
        const author = await askTrimmed(prompt, PROMPTS.author);
        if (author === null) return result;
        const year = await askTrimmed(prompt, PROMPTS.year);
        if (year === null) return result;
        manager.addBook(title, author, year);
        break;
      }
      case 'remove': {
        const title = await askTrimmed(prompt, PROMPTS.removeTitle);
        if (title === null) return result;
        manager.removeBook(title);
        break;
      }
      case 'show':
        manager.showBooks();
        break;
      case 'exit':
        result.reason = 'exit';
        return result;
    }
  }

  return result;
}
