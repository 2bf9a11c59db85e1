/**
 * polystring - per-language translation tables with atomic on-disk bundles
 *
 * @packageDocumentation
 */

export { LocalizationStore } from './store/localization-store.js';
export type { LocalizationStoreOptions, StringOptions } from './store/localization-store.js';

export { TranslationTable } from './table/translation-table.js';
export { parseTable, serializeTable, escapeValue, unescapeValue } from './table/strings-format.js';

export { BundleStore, assertLanguageKey, isLanguageKey, uniqueLanguages } from './bundle/bundle-store.js';
export type {
  BundleStoreOptions,
  BundleSnapshot,
  BundleStoreEvent,
  BundleStoreEventType,
  BundleStoreEventCallback,
} from './bundle/bundle-store.js';
export { nodeFileSystem } from './bundle/file-system.js';
export type { BundleFileSystem } from './bundle/file-system.js';
export { FileKeyValueSlot, MemoryKeyValueSlot } from './bundle/pointer-store.js';
export type { KeyValueSlot } from './bundle/pointer-store.js';

export { TranslationCoordinator, resolveTargets } from './coordinator/translation-coordinator.js';
export type {
  TranslationRequest,
  TranslationState,
  StateChangeEvent,
  StateTransition,
  TranslationCoordinatorOptions,
} from './coordinator/translation-coordinator.js';

export { LookupResolver, languageCode } from './lookup/lookup-resolver.js';
export type { Resolution, ResolutionSource, LookupResolverOptions } from './lookup/lookup-resolver.js';
export {
  MapResourceProvider,
  DirectoryResourceProvider,
  BundleTableReader,
} from './lookup/resource-providers.js';
export type { ResourceProvider } from './lookup/resource-providers.js';

export { DictionaryTranslator, fromCallbackService } from './services/dictionary-translator.js';
export type { DictionaryTranslatorOptions } from './services/dictionary-translator.js';

export { LocalizationError, isLocalizationError } from './errors.js';
export type { LocalizationErrorKind } from './errors.js';

export { UnifiedLogger, getUnifiedLogger, LogLevel, parseLogLevel } from './sdk/unified-logger.js';
export type { LogEntry, LogFilter } from './sdk/unified-logger.js';

export type {
  LanguageKey,
  TranslationKey,
  TranslatedValue,
  TableRecord,
  TranslationService,
  CallbackTranslationProvider,
  StoreResult,
  Unsubscribe,
} from './types/index.js';
