#!/usr/bin/env node

import { CommanderError } from 'commander';
import chalk from 'chalk';
import { createProgram } from './program.js';

try {
  await createProgram().parseAsync(process.argv);
} catch (error) {
  // commander has already printed its own usage errors and help
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  console.error(chalk.red(`dnsweep: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
}
