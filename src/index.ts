#!/usr/bin/env node
import { run } from './cli/run.js';

void run(process.argv).then(code => {
  process.exitCode = code;
});
