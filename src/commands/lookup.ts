/**
 * get / list commands - read strings from the store
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { TableRecord } from '../types/index.js';
import { ErrorCategory } from '../utils/error-handler.js';
import { runWithStore } from './context.js';

interface GetOptions {
  language?: string;
  fallback?: string;
  json?: boolean;
}

interface ListOptions {
  language?: string;
  json?: boolean;
}

export function createGetCommand(): Command {
  return new Command('get')
    .description('Resolve a string: app resource, then stored translation, then fallback, then the key')
    .argument('<key>', 'Key or source text')
    .option('-l, --language <language>', 'Language (default: the locale language)')
    .option('--fallback <value>', 'Value returned when nothing is stored')
    .option('--json', 'Output in JSON format')
    .action(async (key: string, options: GetOptions, command: Command) => {
      await runWithStore(command, ErrorCategory.FILE_OPERATION, 'Lookup', async (store) => {
        const language = options.language ?? store.language;
        const resolution = await store.resolver.resolveWithSource(key, language, options.fallback);

        if (options.json) {
          console.log(JSON.stringify({ key, language, ...resolution }, null, 2));
          return;
        }
        console.log(resolution.value);
      });
    });
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List stored translations')
    .option('-l, --language <language>', 'Only this language')
    .option('--json', 'Output in JSON format')
    .action(async (options: ListOptions, command: Command) => {
      await runWithStore(command, ErrorCategory.FILE_OPERATION, 'List', async (store) => {
        const languages = options.language ? [options.language] : store.supportedLanguages;
        const table = await store.translations(languages);

        if (options.json) {
          const record: TableRecord = table.toRecord();
          console.log(JSON.stringify(record, null, 2));
          return;
        }

        for (const language of table.languages()) {
          const entries = table.entries(language).sort(([a], [b]) => a.localeCompare(b));
          console.log(chalk.bold(`${language} (${entries.length})`));
          for (const [key, value] of entries) {
            console.log(`  ${key} = ${value}`);
          }
        }
      });
    });
}
