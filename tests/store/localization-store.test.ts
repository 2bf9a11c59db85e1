/**
 * Tests for store/localization-store.ts
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import { FileKeyValueSlot } from '../../src/bundle/pointer-store.js';
import { MapResourceProvider } from '../../src/lookup/resource-providers.js';
import { DictionaryTranslator } from '../../src/services/dictionary-translator.js';
import { LocalizationStore, type LocalizationStoreOptions } from '../../src/store/localization-store.js';
import { UnifiedLogger } from '../../src/sdk/unified-logger.js';
import { TranslationTable } from '../../src/table/translation-table.js';
import { makeTempDir, removeTempDir } from '../helpers/temp-dir.js';

const GLOSSARY = { en: { hej: 'hello', tack: 'thanks' } };

describe('LocalizationStore', () => {
  let tmp: string;
  let store: LocalizationStore;

  const open = (overrides: Partial<LocalizationStoreOptions> = {}): Promise<LocalizationStore> =>
    LocalizationStore.create({
      baseDir: join(tmp, 'bundles'),
      locale: 'sv-SE',
      supportedLanguages: ['sv', 'en'],
      translationService: new DictionaryTranslator(GLOSSARY),
      ...overrides,
    });

  beforeEach(async () => {
    UnifiedLogger.reset();
    tmp = await makeTempDir();
    store = await open();
  });

  afterEach(async () => {
    store.close();
    UnifiedLogger.reset();
    await removeTempDir(tmp);
  });

  describe('create', () => {
    it('should open a bundle right away', () => {
      expect(store.bundles.isInitialized).toBe(true);
      expect(store.supportedLanguages).toEqual(['sv', 'en']);
      expect(store.language).toBe('sv');
    });
  });

  describe('translate and lookup', () => {
    it('should make translated strings available', async () => {
      const changed = vi.fn();
      store.onChange(changed);

      await store.translate(['hej'], 'sv', ['en']);

      expect(changed).toHaveBeenCalledTimes(1);
      expect(await store.string('hej', { language: 'en' })).toBe('hello');
      // Nothing was stored for the source language
      expect(await store.string('hej')).toBe('hej');
      expect(await store.string('okänd', { language: 'en', fallback: 'unknown' })).toBe('unknown');
    });

    it('should report whether a text is translated everywhere', async () => {
      await store.translate(['hej'], 'sv', ['en']);

      expect(await store.isTranslated('hej', ['en'])).toBe(true);
      expect(await store.isTranslated('hej')).toBe(false);
      expect(await store.isTranslated('tack', ['en'])).toBe(false);
    });

    it('should prefer application resources', async () => {
      store.close();
      store = await open({ appResources: new MapResourceProvider({ en: { hej: 'Hi from the app' } }) });
      await store.translate(['hej'], 'sv', ['en']);

      expect(await store.string('hej', { language: 'en' })).toBe('Hi from the app');
    });

    it('should fail when no translation service is configured', async () => {
      store.translationService = undefined;
      const failed = vi.fn();
      store.onFailure(failed);

      await expect(store.translate(['hej'], 'sv', ['en'])).rejects.toMatchObject({ kind: 'no-translation-service' });
      expect(failed).toHaveBeenCalledTimes(1);
    });
  });

  describe('remove', () => {
    it('should delete keys from every language and persist', async () => {
      await store.translate(['hej', 'tack'], 'sv', ['en']);
      const changed = vi.fn();
      store.onChange(changed);

      await store.remove(['hej']);

      expect((await store.translations()).toRecord()).toEqual({ sv: {}, en: { tack: 'thanks' } });
      expect(changed).toHaveBeenCalledTimes(1);
      expect(await store.string('hej', { language: 'en' })).toBe('hej');
    });
  });

  describe('write', () => {
    it('should replace the stored table', async () => {
      await store.write(TranslationTable.fromRecord({ sv: { a: 'ä' }, en: { a: 'a' } }));

      expect(await store.string('a')).toBe('ä');
    });

    it('should report encoding failures and keep the previous bundle', async () => {
      await store.write(TranslationTable.fromRecord({ en: { a: 'a' } }));
      const root = store.bundles.currentRoot;
      const failed = vi.fn();
      store.onFailure(failed);

      await expect(store.write(TranslationTable.fromRecord({ en: { a: '\uD800' } }))).rejects.toMatchObject({
        kind: 'serialization-failure',
      });

      expect(failed).toHaveBeenCalledTimes(1);
      expect(store.bundles.currentRoot).toBe(root);
      expect(await store.string('a', { language: 'en' })).toBe('a');
    });
  });

  describe('disabled', () => {
    it('should ignore writes and removals', async () => {
      await store.write(TranslationTable.fromRecord({ en: { a: 'a' } }));
      const root = store.bundles.currentRoot;
      store.disabled = true;
      const changed = vi.fn();
      store.onChange(changed);

      await store.write(TranslationTable.fromRecord({ en: { a: 'b' } }));
      await store.remove(['a']);

      expect(store.bundles.currentRoot).toBe(root);
      expect(changed).not.toHaveBeenCalled();
      expect(await store.string('a', { language: 'en' })).toBe('a');
    });

    it('should reject translations without a failure event', async () => {
      store.disabled = true;
      const failed = vi.fn();
      store.onFailure(failed);

      await expect(store.translate(['hej'], 'sv', ['en'])).rejects.toMatchObject({ kind: 'disabled' });
      expect(failed).not.toHaveBeenCalled();
    });
  });

  describe('clean', () => {
    it('should empty the store and notify', async () => {
      await store.translate(['hej'], 'sv', ['en']);
      const cleaned = vi.fn();
      store.onCleaned(cleaned);

      await store.clean();

      expect(cleaned).toHaveBeenCalledTimes(1);
      expect((await store.translations()).isEmpty()).toBe(true);
      expect(await store.string('hej', { language: 'en' })).toBe('hej');
    });
  });

  describe('locale', () => {
    it('should notify only on an actual change', () => {
      const changes: string[] = [];
      store.onLocaleChange(locale => changes.push(locale));

      store.locale = 'sv-SE';
      store.locale = 'en-GB';

      expect(changes).toEqual(['en-GB']);
      expect(store.language).toBe('en');
    });
  });

  describe('watch', () => {
    it('should deliver the current value and every update until unsubscribed', async () => {
      const values: string[] = [];
      const stop = store.watch('hej', value => values.push(value), 'en');
      await vi.waitFor(() => expect(values).toEqual(['hej']));

      await store.translate(['hej'], 'sv', ['en']);
      await vi.waitFor(() => expect(values).toEqual(['hej', 'hello']));

      stop();
      await store.clean();
      await new Promise(resolve => setTimeout(resolve, 20));
      expect(values).toEqual(['hej', 'hello']);
    });

    it('should follow locale changes', async () => {
      await store.translate(['hej'], 'sv', ['en']);
      const values: string[] = [];
      const stop = store.watch('hej', value => values.push(value));
      await vi.waitFor(() => expect(values).toEqual(['hej']));

      store.locale = 'en-US';
      await vi.waitFor(() => expect(values).toEqual(['hej', 'hello']));
      stop();
    });
  });

  describe('persistence', () => {
    it('should reopen the same bundle through a file pointer', async () => {
      store.close();
      const statePath = join(tmp, 'bundles', 'state.json');
      store = await open({ pointer: new FileKeyValueSlot(statePath) });
      await store.translate(['tack'], 'sv', ['en']);
      const root = store.bundles.currentRoot;
      store.close();

      store = await open({ pointer: new FileKeyValueSlot(statePath), translationService: undefined });

      expect(store.bundles.currentRoot).toBe(root);
      expect(await store.string('tack', { language: 'en' })).toBe('thanks');
    });
  });
});
