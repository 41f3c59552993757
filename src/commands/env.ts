import { Command } from 'commander';
import { getEnvSummary, type Env } from '../config/env-schema.js';

export function createEnvCommand(env: Env = process.env): Command {
  return new Command('env')
    .description('Show the environment variables the CLI reads and their current values')
    .action(() => {
      console.log(getEnvSummary(env));
    });
}
