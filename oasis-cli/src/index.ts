#!/usr/bin/env node

import chalk from 'chalk';
import { buildProgram, defaultDeps } from './cli.js';

buildProgram(defaultDeps())
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
