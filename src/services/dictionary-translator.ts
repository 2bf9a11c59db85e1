/**
 * Dictionary Translator - a local TranslationService backed by a glossary
 *
 * Glossary shape (JSON or YAML):
 *
 * ```yaml
 * en:
 *   hej: hello
 * de:
 *   hej: hallo
 * ```
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import yaml from 'js-yaml';

import { LOG_SOURCES } from '../constants.js';
import { GlossarySchema, type Glossary } from '../schemas/yaml-schemas.js';
import { getUnifiedLogger } from '../sdk/unified-logger.js';
import type { TranslationTable } from '../table/translation-table.js';
import type {
  CallbackTranslationProvider,
  LanguageKey,
  TranslationKey,
  TranslationService,
} from '../types/index.js';
import { extractErrorMessage } from '../utils/error-handler.js';

export interface DictionaryTranslatorOptions {
  /**
   * What to store for a text missing from the glossary:
   * `skip` leaves it untranslated, `source` stores the source text.
   */
  fillMissing?: 'skip' | 'source';
}

export class DictionaryTranslator implements TranslationService {
  private readonly glossary: Glossary;
  private readonly fillMissing: 'skip' | 'source';

  constructor(glossary: Glossary, options: DictionaryTranslatorOptions = {}) {
    this.glossary = GlossarySchema.parse(glossary);
    this.fillMissing = options.fillMissing ?? 'skip';
  }

  /**
   * Load a glossary from a `.json`, `.yaml` or `.yml` file
   */
  static async fromFile(filePath: string, options?: DictionaryTranslatorOptions): Promise<DictionaryTranslator> {
    let contents: string;
    try {
      contents = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new Error(`Failed to read glossary ${filePath}: ${extractErrorMessage(error)}`);
    }

    let data: unknown;
    try {
      data = extname(filePath).toLowerCase() === '.json' ? JSON.parse(contents) : yaml.load(contents);
    } catch (error) {
      throw new Error(`Failed to parse glossary ${filePath}: ${extractErrorMessage(error)}`);
    }

    const result = GlossarySchema.safeParse(data ?? {});
    if (!result.success) {
      throw new Error(`Invalid glossary ${filePath}: ${result.error.message}`);
    }
    return new DictionaryTranslator(result.data, options);
  }

  lookup(text: TranslationKey, language: LanguageKey): string | undefined {
    const entries = this.glossary[language];
    if (!entries || !Object.prototype.hasOwnProperty.call(entries, text)) {
      return undefined;
    }
    return entries[text];
  }

  async translate(
    texts: TranslationKey[],
    from: LanguageKey,
    to: LanguageKey[],
    seed: TranslationTable
  ): Promise<TranslationTable> {
    let missing = 0;
    for (const language of to) {
      seed.ensureLanguage(language);
      for (const text of texts) {
        const translated = this.lookup(text, language);
        if (translated !== undefined) {
          seed.set(language, text, translated);
        } else {
          missing++;
          if (this.fillMissing === 'source') {
            seed.set(language, text, text);
          }
        }
      }
    }

    if (missing > 0) {
      getUnifiedLogger().debug(LOG_SOURCES.TRANSLATOR, 'Glossary has no entry for some texts', {
        from,
        missing,
      });
    }
    return seed;
  }
}

/**
 * Adapt a callback-style provider to the promise interface. Only the first
 * `done` call settles the result; later calls are logged and ignored.
 */
export function fromCallbackService(provider: CallbackTranslationProvider): TranslationService {
  return {
    translate(texts, from, to, seed) {
      return new Promise<TranslationTable>((resolve, reject) => {
        let settled = false;
        const done = (error: Error | null, table?: TranslationTable): void => {
          if (settled) {
            getUnifiedLogger().warn(LOG_SOURCES.TRANSLATOR, 'Translation provider completed more than once; ignoring', {
              from,
              to,
            });
            return;
          }
          settled = true;
          if (error) {
            reject(error);
          } else if (table) {
            resolve(table);
          } else {
            reject(new Error('Translation provider completed without a table'));
          }
        };

        try {
          provider(texts, from, to, seed, done);
        } catch (error) {
          done(error instanceof Error ? error : new Error(String(error)));
        }
      });
    },
  };
}
