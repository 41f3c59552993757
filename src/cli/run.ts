import { getErrorMessage, PatternDrillsError } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { createProgram, type ProgramOptions } from './program.js';

/**
 * Parse `argv` and run the selected command. Resolves with the process exit
 * code: 0 on normal completion, 1 when the command threw.
 */
export async function run(argv: string[], options: ProgramOptions = {}): Promise<number> {
  try {
    await createProgram(options).parseAsync(argv);
    return 0;
  } catch (error) {
    const context = error instanceof PatternDrillsError
      ? { code: error.code, ...error.context }
      : undefined;
    logger.error(getErrorMessage(error), context);
    return 1;
  }
}
