/**
 * remove / clean / status / prune commands
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { ErrorCategory } from '../utils/error-handler.js';
import { runWithStore } from './context.js';

interface StatusReport {
  root: string;
  tableName: string;
  locale: string;
  languages: string[];
  entries: Record<string, number>;
  staleRoots: number;
}

export function createRemoveCommand(): Command {
  return new Command('remove')
    .description('Remove keys from every supported language')
    .argument('<keys...>', 'Keys to remove')
    .action(async (keys: string[], _options: unknown, command: Command) => {
      await runWithStore(command, ErrorCategory.FILE_OPERATION, 'Remove', async (store) => {
        await store.remove(keys);
        console.log(chalk.green(`✓ Removed ${keys.length} key(s)`));
      });
    });
}

export function createCleanCommand(): Command {
  return new Command('clean')
    .description('Delete every stored translation')
    .action(async (_options: unknown, command: Command) => {
      await runWithStore(command, ErrorCategory.FILE_OPERATION, 'Clean', async (store) => {
        await store.clean();
        console.log(chalk.green('✓ Bundle cleaned'));
      });
    });
}

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show the current bundle and entry counts')
    .option('--json', 'Output in JSON format')
    .action(async (options: { json?: boolean }, command: Command) => {
      await runWithStore(command, ErrorCategory.FILE_OPERATION, 'Status', async (store) => {
        const table = await store.translations();
        const roots = await store.bundles.listRoots();
        const report: StatusReport = {
          root: store.bundles.currentRootName,
          tableName: store.bundles.tableName,
          locale: store.locale,
          languages: [...store.supportedLanguages],
          entries: Object.fromEntries(store.supportedLanguages.map(language => [language, table.size(language)])),
          staleRoots: roots.filter(root => root !== store.bundles.currentRoot).length,
        };

        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
          return;
        }

        console.log(`${chalk.bold('Bundle:')}    ${report.root}`);
        console.log(`${chalk.bold('Table:')}     ${report.tableName}`);
        console.log(`${chalk.bold('Locale:')}    ${report.locale}`);
        for (const language of report.languages) {
          console.log(`  ${language}: ${report.entries[language]} entr${report.entries[language] === 1 ? 'y' : 'ies'}`);
        }
        if (report.staleRoots > 0) {
          console.log(chalk.yellow(`${report.staleRoots} stale bundle(s); run "polystring prune" to remove them`));
        }
      });
    });
}

export function createPruneCommand(): Command {
  return new Command('prune')
    .description('Delete bundle directories left behind by interrupted writes')
    .action(async (_options: unknown, command: Command) => {
      await runWithStore(command, ErrorCategory.FILE_OPERATION, 'Prune', async (store) => {
        const removed = await store.bundles.pruneStaleRoots();
        console.log(chalk.green(`✓ Removed ${removed} stale bundle(s)`));
      });
    });
}
