/**
 * Shared type definitions for the localization store
 */

import type { TranslationTable } from '../table/translation-table.js';

/** Short language code such as `en` or `sv` */
export type LanguageKey = string;

/** Source text or explicit key used to look up a translation */
export type TranslationKey = string;

/** A translated string as stored in a table */
export type TranslatedValue = string;

/** Plain-object form of a translation table: language → key → value */
export type TableRecord = Record<LanguageKey, Record<TranslationKey, TranslatedValue>>;

/**
 * Result type for store operations that report failure as data
 */
export type StoreResult<T = void> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * External machine-translation capability.
 *
 * Receives a seed table already holding the current stored entries for
 * every involved language and resolves with the filled table. The seed is
 * a private copy, so implementations may mutate and return it.
 */
export interface TranslationService {
  translate(
    texts: TranslationKey[],
    from: LanguageKey,
    to: LanguageKey[],
    seed: TranslationTable
  ): Promise<TranslationTable>;
}

/**
 * Callback-style translation provider, adapted with `fromCallbackService`
 */
export type CallbackTranslationProvider = (
  texts: TranslationKey[],
  from: LanguageKey,
  to: LanguageKey[],
  seed: TranslationTable,
  done: (error: Error | null, table?: TranslationTable) => void
) => void;

/** Unsubscribe handle returned by every subscription method */
export type Unsubscribe = () => void;
