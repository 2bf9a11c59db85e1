/**
 * CLI Factory
 *
 * Builds the `polystring` program. Kept separate from the bin entry so tests
 * can drive commands without spawning a process.
 */

import { Command } from 'commander';
import { createRequire } from 'module';

import { createGetCommand, createListCommand } from './commands/lookup.js';
import {
  createCleanCommand,
  createPruneCommand,
  createRemoveCommand,
  createStatusCommand,
} from './commands/maintenance.js';
import { createTranslateCommand } from './commands/translate.js';

export interface CLIFactoryOptions {
  /** Optional version override */
  version?: string;
}

function packageVersion(): string {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require('../package.json');
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export function createProgram(options: CLIFactoryOptions = {}): Command {
  const program = new Command('polystring')
    .description('Per-language translation tables with atomic on-disk bundles')
    .version(options.version ?? packageVersion())
    .option('--cwd <path>', 'Project directory (default: current directory)')
    .option('-d, --dir <path>', 'Bundle directory (default: .polystring/bundles)')
    .option('--languages <list>', 'Comma separated supported languages')
    .option('--table <name>', 'Table name')
    .option('--locale <identifier>', 'Locale used for lookups, e.g. sv-SE')
    .option('-v, --verbose', 'Print debug logging to stderr');

  program.addCommand(createTranslateCommand());
  program.addCommand(createGetCommand());
  program.addCommand(createListCommand());
  program.addCommand(createRemoveCommand());
  program.addCommand(createCleanCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createPruneCommand());

  return program;
}

export async function runCLI(argv: string[] = process.argv, options: CLIFactoryOptions = {}): Promise<void> {
  await createProgram(options).parseAsync(argv);
}
