/**
 * Translation Table - In-memory nested mapping language → key → value
 *
 * Tables are values for a single read/translate/write cycle. They are read
 * fresh from the bundle store for every operation and never shared between
 * requests.
 *
 * @packageDocumentation
 */

import type {
  LanguageKey,
  TableRecord,
  TranslatedValue,
  TranslationKey,
} from '../types/index.js';

export class TranslationTable {
  readonly db = new Map<LanguageKey, Map<TranslationKey, TranslatedValue>>();

  /**
   * Build a table from its plain-object form
   */
  static fromRecord(record: TableRecord): TranslationTable {
    const table = new TranslationTable();
    for (const [language, entries] of Object.entries(record)) {
      const map = table.ensureLanguage(language);
      for (const [key, value] of Object.entries(entries)) {
        map.set(key, value);
      }
    }
    return table;
  }

  get(language: LanguageKey, key: TranslationKey): TranslatedValue | undefined {
    return this.db.get(language)?.get(key);
  }

  has(language: LanguageKey, key: TranslationKey): boolean {
    return this.db.get(language)?.has(key) ?? false;
  }

  set(language: LanguageKey, key: TranslationKey, value: TranslatedValue): this {
    this.ensureLanguage(language).set(key, value);
    return this;
  }

  /**
   * Get the entry map for a language, creating an empty one if absent
   */
  ensureLanguage(language: LanguageKey): Map<TranslationKey, TranslatedValue> {
    let map = this.db.get(language);
    if (!map) {
      map = new Map();
      this.db.set(language, map);
    }
    return map;
  }

  /**
   * Overwrite every entry of `other` into this table. Last writer wins.
   */
  merge(other: TranslationTable): this {
    for (const [language, entries] of other.db) {
      const target = this.ensureLanguage(language);
      for (const [key, value] of entries) {
        target.set(key, value);
      }
    }
    return this;
  }

  /**
   * Delete the given keys from every language
   */
  remove(keys: Iterable<TranslationKey>): this {
    const doomed = new Set(keys);
    for (const entries of this.db.values()) {
      for (const key of doomed) {
        entries.delete(key);
      }
    }
    return this;
  }

  languages(): LanguageKey[] {
    return [...this.db.keys()];
  }

  entries(language: LanguageKey): Array<[TranslationKey, TranslatedValue]> {
    return [...(this.db.get(language) ?? [])];
  }

  /**
   * Number of entries in one language, or across all languages
   */
  size(language?: LanguageKey): number {
    if (language !== undefined) {
      return this.db.get(language)?.size ?? 0;
    }
    let total = 0;
    for (const entries of this.db.values()) {
      total += entries.size;
    }
    return total;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  clone(): TranslationTable {
    const copy = new TranslationTable();
    for (const [language, entries] of this.db) {
      copy.db.set(language, new Map(entries));
    }
    return copy;
  }

  /**
   * Copy of this table scoped to the given languages. Every requested
   * language is present in the result, possibly empty.
   */
  pick(languages: Iterable<LanguageKey>): TranslationTable {
    const copy = new TranslationTable();
    for (const language of languages) {
      copy.db.set(language, new Map(this.db.get(language) ?? []));
    }
    return copy;
  }

  /**
   * Same key/value pairs per language. Empty and absent languages are equal.
   */
  equals(other: TranslationTable): boolean {
    const languages = new Set([...this.languages(), ...other.languages()]);
    for (const language of languages) {
      if (this.size(language) !== other.size(language)) {
        return false;
      }
      for (const [key, value] of this.db.get(language) ?? []) {
        if (other.get(language, key) !== value) {
          return false;
        }
      }
    }
    return true;
  }

  toRecord(): TableRecord {
    const record: TableRecord = {};
    for (const [language, entries] of this.db) {
      record[language] = Object.fromEntries(entries);
    }
    return record;
  }
}
