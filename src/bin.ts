#!/usr/bin/env node
import chalk from 'chalk';
import { runCLI } from './cli.js';
import { extractErrorMessage } from './utils/error-handler.js';

runCLI().catch((error: unknown) => {
  console.error(chalk.red(extractErrorMessage(error)));
  process.exitCode = 1;
});
