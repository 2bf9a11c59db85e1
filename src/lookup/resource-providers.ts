/**
 * Resource providers consulted by the lookup resolver.
 *
 * Every provider follows the platform-bundle contract: when it has no entry
 * for a key it returns the caller's `defaultValue` unchanged.
 */

import * as path from 'path';

import { isLanguageKey, type BundleStore } from '../bundle/bundle-store.js';
import { nodeFileSystem, type BundleFileSystem } from '../bundle/file-system.js';
import { LOG_SOURCES, STORE_DEFAULTS } from '../constants.js';
import { getUnifiedLogger } from '../sdk/unified-logger.js';
import { parseTable } from '../table/strings-format.js';
import type { LanguageKey, TableRecord, TranslationKey } from '../types/index.js';
import { extractErrorMessage } from '../utils/error-handler.js';

export interface ResourceProvider {
  localizedString(key: TranslationKey, language: LanguageKey, defaultValue: string): string | Promise<string>;
}

/**
 * In-memory resources, typically strings compiled into the application
 */
export class MapResourceProvider implements ResourceProvider {
  private readonly tables = new Map<LanguageKey, Map<TranslationKey, string>>();

  constructor(record: TableRecord = {}) {
    for (const [language, entries] of Object.entries(record)) {
      this.tables.set(language, new Map(Object.entries(entries)));
    }
  }

  set(language: LanguageKey, key: TranslationKey, value: string): void {
    let table = this.tables.get(language);
    if (!table) {
      table = new Map();
      this.tables.set(language, table);
    }
    table.set(key, value);
  }

  localizedString(key: TranslationKey, language: LanguageKey, defaultValue: string): string {
    return this.tables.get(language)?.get(key) ?? defaultValue;
  }
}

/**
 * Read-only resources shipped as a directory in the table file layout:
 * `<dir>/<language>.lang/<table>.table`. Files are read once per language.
 */
export class DirectoryResourceProvider implements ResourceProvider {
  private readonly dir: string;
  private readonly tableName: string;
  private readonly fs: BundleFileSystem;
  private readonly cache = new Map<LanguageKey, Promise<Map<TranslationKey, string>>>();

  constructor(dir: string, tableName: string = STORE_DEFAULTS.TABLE_NAME, fileSystem: BundleFileSystem = nodeFileSystem) {
    this.dir = path.resolve(dir);
    this.tableName = tableName;
    this.fs = fileSystem;
  }

  private readLanguage(language: LanguageKey): Promise<Map<TranslationKey, string>> {
    if (!isLanguageKey(language)) {
      return Promise.resolve(new Map());
    }
    let pending = this.cache.get(language);
    if (!pending) {
      const filePath = path.join(
        this.dir,
        `${language}${STORE_DEFAULTS.LANGUAGE_DIR_SUFFIX}`,
        `${this.tableName}${STORE_DEFAULTS.TABLE_EXTENSION}`
      );
      pending = this.fs.readFile(filePath).then(parseTable, () => new Map<TranslationKey, string>());
      this.cache.set(language, pending);
    }
    return pending;
  }

  async localizedString(key: TranslationKey, language: LanguageKey, defaultValue: string): Promise<string> {
    const table = await this.readLanguage(language);
    return table.get(key) ?? defaultValue;
  }

  /** Drop cached files so the next lookup re-reads the directory */
  reload(): void {
    this.cache.clear();
  }
}

/**
 * Reads through the bundle store's current root. Roots are immutable, so
 * parsed files are cached per root and dropped when the root changes.
 * A read only enters the cache if its root was still current when it
 * finished.
 */
export class BundleTableReader implements ResourceProvider {
  private cachedRoot: string | null = null;
  private cache = new Map<LanguageKey, Map<TranslationKey, string>>();

  constructor(private readonly store: BundleStore) {}

  private async readLanguage(language: LanguageKey): Promise<Map<TranslationKey, string>> {
    await this.store.initialize();
    if (this.cachedRoot === this.store.currentRoot) {
      const cached = this.cache.get(language);
      if (cached) return cached;
    }

    const { root, table } = await this.store.loadSnapshot([language]);
    const entries = table.db.get(language) ?? new Map<TranslationKey, string>();
    if (root === this.store.currentRoot) {
      if (root !== this.cachedRoot) {
        this.cachedRoot = root;
        this.cache = new Map();
      }
      this.cache.set(language, entries);
    }
    return entries;
  }

  async localizedString(key: TranslationKey, language: LanguageKey, defaultValue: string): Promise<string> {
    try {
      const table = await this.readLanguage(language);
      return table.get(key) ?? defaultValue;
    } catch (error) {
      getUnifiedLogger().warn(LOG_SOURCES.LOOKUP, 'Stored table unavailable', {
        language,
        error: extractErrorMessage(error),
      });
      return defaultValue;
    }
  }
}
