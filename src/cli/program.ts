/**
 * Root commander program
 */

import { Command } from 'commander';
import { createEnvCommand } from '../commands/env.js';
import { createLibraryCommand, type LibraryCommandDeps } from '../commands/library.js';
import { createVehiclesCommand } from '../commands/vehicles.js';
import { resolveLoggingConfig, type Env } from '../config/env-schema.js';
import { configureLogger, logger } from '../utils/logger.js';

export const VERSION = '1.0.0';

export interface ProgramOptions {
  env?: Env;
  library?: LibraryCommandDeps;
}

/**
 * Apply logging configuration from the environment and report any
 * malformed values.
 */
export function applyEnvConfig(env: Env = process.env): void {
  const { config, warnings } = resolveLoggingConfig(env);
  configureLogger(config);
  for (const warning of warnings) {
    logger.warn(warning);
  }
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command('pattern-drills');

  program
    .description('Object-oriented design drills: regional vehicle factories and a SOLID library manager')
    .version(VERSION)
    .hook('preAction', () => {
      applyEnvConfig(options.env);
    });

  program.addCommand(createVehiclesCommand());
  program.addCommand(createLibraryCommand(options.library));
  program.addCommand(createEnvCommand(options.env));

  return program;
}
