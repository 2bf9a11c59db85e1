/**
 * Localization Store - the object applications hold
 *
 * Ties the bundle store, translation coordinator and lookup resolver
 * together, tracks the current locale and the enabled flag, and exposes the
 * `changed` / `failed` / `cleaned` notification streams.
 *
 * @example
 * ```typescript
 * const store = await LocalizationStore.create({
 *   baseDir: '.polystring/bundles',
 *   locale: 'sv-SE',
 *   supportedLanguages: ['sv', 'en'],
 *   translationService: new DictionaryTranslator(glossary),
 * });
 *
 * await store.translate(['hej'], 'sv', ['en']);
 * await store.string('hej', { language: 'en' }); // 'hello'
 * ```
 */

import { EventEmitter } from 'events';

import { BundleStore } from '../bundle/bundle-store.js';
import type { BundleFileSystem } from '../bundle/file-system.js';
import { MemoryKeyValueSlot, type KeyValueSlot } from '../bundle/pointer-store.js';
import { LOG_SOURCES } from '../constants.js';
import { TranslationCoordinator, type TranslationRequest } from '../coordinator/translation-coordinator.js';
import { LookupResolver, languageCode } from '../lookup/lookup-resolver.js';
import { BundleTableReader, type ResourceProvider } from '../lookup/resource-providers.js';
import { getUnifiedLogger } from '../sdk/unified-logger.js';
import type { TranslationTable } from '../table/translation-table.js';
import type {
  LanguageKey,
  TranslationKey,
  TranslationService,
  Unsubscribe,
} from '../types/index.js';
import { toError } from '../utils/error-handler.js';

export interface LocalizationStoreOptions {
  /** Parent directory of the bundle roots */
  baseDir: string;
  /** Locale identifier such as `sv-SE`; lookups use its language code */
  locale: string;
  supportedLanguages: LanguageKey[];
  tableName?: string;
  translationService?: TranslationService;
  /** Persisted pointer slot; defaults to an in-memory slot */
  pointer?: KeyValueSlot;
  /** Resources bundled with the application */
  appResources?: ResourceProvider;
  fileSystem?: BundleFileSystem;
  disabled?: boolean;
}

export interface StringOptions {
  /** Defaults to the current locale's language */
  language?: LanguageKey;
  /** Returned when neither app resources nor the store have an entry */
  fallback?: string;
}

export class LocalizationStore {
  readonly bundles: BundleStore;
  readonly coordinator: TranslationCoordinator;
  readonly resolver: LookupResolver;

  private currentLocale: string;
  private readonly emitter = new EventEmitter();
  private readonly logger = getUnifiedLogger();
  private readonly detach: Unsubscribe[] = [];

  private constructor(options: LocalizationStoreOptions) {
    this.currentLocale = options.locale;
    this.bundles = new BundleStore({
      baseDir: options.baseDir,
      tableName: options.tableName,
      languages: options.supportedLanguages,
      pointer: options.pointer ?? new MemoryKeyValueSlot(),
      fileSystem: options.fileSystem,
    });
    this.coordinator = new TranslationCoordinator({
      store: this.bundles,
      translationService: options.translationService,
      disabled: options.disabled,
    });
    this.resolver = new LookupResolver({
      appResources: options.appResources,
      stored: new BundleTableReader(this.bundles),
    });
    this.emitter.setMaxListeners(100);

    // Requests driven by the coordinator feed the store-level streams
    this.detach.push(
      this.coordinator.onChange(() => this.emitter.emit('changed')),
      this.coordinator.onFailure(error => this.emitter.emit('failed', error))
    );
  }

  /**
   * Create a store and open (or create) its current bundle
   */
  static async create(options: LocalizationStoreOptions): Promise<LocalizationStore> {
    const store = new LocalizationStore(options);
    await store.bundles.initialize();
    return store;
  }

  // ── Properties ───────────────────────────────────────────────────────────

  get disabled(): boolean {
    return this.coordinator.disabled;
  }

  set disabled(value: boolean) {
    this.coordinator.disabled = value;
  }

  get locale(): string {
    return this.currentLocale;
  }

  set locale(identifier: string) {
    if (identifier === this.currentLocale) return;
    this.currentLocale = identifier;
    this.logger.debug(LOG_SOURCES.STORE, 'Locale changed', { locale: identifier });
    this.emitter.emit('locale-changed', identifier);
  }

  /** Language code of the current locale */
  get language(): LanguageKey {
    return languageCode(this.currentLocale);
  }

  get supportedLanguages(): readonly LanguageKey[] {
    return this.bundles.languages;
  }

  get translationService(): TranslationService | undefined {
    return this.coordinator.translationService;
  }

  set translationService(service: TranslationService | undefined) {
    this.coordinator.translationService = service;
  }

  // ── Mutations ────────────────────────────────────────────────────────────

  translate(texts: readonly TranslationKey[], from: LanguageKey, to?: readonly LanguageKey[]): Promise<TranslationRequest> {
    return this.coordinator.translate(texts, from, to);
  }

  /**
   * Persist `table` as the new current bundle. Does nothing while disabled.
   */
  async write(table: TranslationTable): Promise<void> {
    if (this.disabled) {
      return;
    }
    try {
      await this.bundles.writeAtomic(table);
    } catch (error) {
      this.reportFailure('Write failed', error);
      throw error;
    }
    this.emitter.emit('changed');
  }

  /**
   * Remove keys from every language (or the given ones) and persist
   */
  async remove(keys: readonly TranslationKey[], languages: readonly LanguageKey[] = this.bundles.languages): Promise<void> {
    if (this.disabled) {
      return;
    }
    const table = await this.bundles.load(languages);
    await this.write(table.remove(keys));
  }

  /**
   * Delete the current bundle and start over with an empty one
   */
  async clean(): Promise<void> {
    try {
      await this.bundles.clean();
    } catch (error) {
      this.reportFailure('Clean failed', error);
      throw error;
    }
    this.emitter.emit('cleaned');
  }

  private reportFailure(message: string, error: unknown): void {
    this.logger.error(LOG_SOURCES.STORE, message, toError(error));
    this.emitter.emit('failed', error);
  }

  // ── Reading ──────────────────────────────────────────────────────────────

  translations(languages: readonly LanguageKey[] = this.bundles.languages): Promise<TranslationTable> {
    return this.bundles.load(languages);
  }

  string(key: TranslationKey, options: StringOptions = {}): Promise<string> {
    return this.resolver.resolve(key, options.language ?? this.language, options.fallback);
  }

  isTranslated(text: TranslationKey, languages: readonly LanguageKey[] = this.bundles.languages): Promise<boolean> {
    return this.resolver.isTranslated(text, languages);
  }

  /**
   * Call `callback` with the value of `key` now and again after every
   * committed write, clean or locale change.
   */
  watch(key: TranslationKey, callback: (value: string) => void, language?: LanguageKey): Unsubscribe {
    let active = true;
    let generation = 0;

    const refresh = (): void => {
      const current = ++generation;
      this.string(key, { language }).then(
        value => {
          // Drop results overtaken by a newer refresh
          if (active && current === generation) {
            callback(value);
          }
        },
        error => {
          this.logger.warn(LOG_SOURCES.STORE, 'Watched key could not be resolved', {
            key,
            error: toError(error).message,
          });
        }
      );
    };

    const offs = [
      this.onChange(refresh),
      this.onCleaned(refresh),
      this.subscribe('locale-changed', refresh),
    ];
    refresh();

    return () => {
      active = false;
      for (const off of offs) off();
    };
  }

  // ── Notifications ────────────────────────────────────────────────────────

  private subscribe<A extends unknown[]>(event: string, callback: (...args: A) => void): Unsubscribe {
    const guarded = (...args: A): void => {
      try {
        callback(...args);
      } catch (error) {
        this.logger.error(LOG_SOURCES.STORE, `Observer threw on "${event}"`, toError(error));
      }
    };
    this.emitter.on(event, guarded);
    return () => {
      this.emitter.off(event, guarded);
    };
  }

  /** Fires once per committed write */
  onChange(callback: () => void): Unsubscribe {
    return this.subscribe('changed', callback);
  }

  /** Fires with the cause of every unrecovered failure */
  onFailure(callback: (error: unknown) => void): Unsubscribe {
    return this.subscribe('failed', callback);
  }

  onCleaned(callback: () => void): Unsubscribe {
    return this.subscribe('cleaned', callback);
  }

  onLocaleChange(callback: (locale: string) => void): Unsubscribe {
    return this.subscribe('locale-changed', callback);
  }

  /**
   * Detach every observer. In-flight requests still run to completion.
   */
  close(): void {
    for (const off of this.detach) off();
    this.detach.length = 0;
    this.emitter.removeAllListeners();
    this.coordinator.removeAllListeners();
    this.bundles.removeAllListeners();
  }
}
