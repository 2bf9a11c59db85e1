/**
 * translate command - fill the store from a glossary
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';

import { DictionaryTranslator } from '../services/dictionary-translator.js';
import { ErrorCategory } from '../utils/error-handler.js';
import { parseLanguageList, runWithStore } from './context.js';

interface TranslateOptions {
  from: string;
  to?: string;
  glossary?: string;
  fillMissing?: boolean;
}

export function createTranslateCommand(): Command {
  return new Command('translate')
    .description('Translate texts with a glossary and store the results')
    .argument('<texts...>', 'Source texts to translate')
    .requiredOption('-f, --from <language>', 'Source language')
    .option('-t, --to <languages>', 'Comma separated target languages (default: all other supported languages)')
    .option('-g, --glossary <file>', 'Glossary file (.json, .yaml or .yml)')
    .option('--fill-missing', 'Store the source text when the glossary has no entry')
    .action(async (texts: string[], options: TranslateOptions, command: Command) => {
      await runWithStore(
        command,
        ErrorCategory.TRANSLATION_SERVICE,
        'Translate',
        async (store) => {
          const to = options.to ? parseLanguageList(options.to) : undefined;
          const request = await store.translate(texts, options.from, to);
          console.log(chalk.green(
            `✓ Translated ${request.texts.length} text(s) from ${request.from} into ${request.to.join(', ')}`
          ));
        },
        async (context) => {
          const glossary = options.glossary ?? context.project.glossary;
          if (!glossary) {
            return undefined;
          }
          return DictionaryTranslator.fromFile(path.resolve(context.cwd, glossary), {
            fillMissing: options.fillMissing ? 'source' : 'skip',
          });
        }
      );
    });
}
