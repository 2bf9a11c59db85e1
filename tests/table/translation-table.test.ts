/**
 * Tests for table/translation-table.ts
 */
import { describe, it, expect } from 'vitest';
import { TranslationTable } from '../../src/table/translation-table.js';

describe('TranslationTable', () => {
  describe('get / set / has', () => {
    it('should store values per language', () => {
      const table = new TranslationTable().set('en', 'hej', 'hello').set('de', 'hej', 'hallo');

      expect(table.get('en', 'hej')).toBe('hello');
      expect(table.get('de', 'hej')).toBe('hallo');
      expect(table.get('fr', 'hej')).toBeUndefined();
      expect(table.has('en', 'hej')).toBe(true);
      expect(table.has('en', 'tack')).toBe(false);
    });

    it('should keep an explicitly ensured language even when empty', () => {
      const table = new TranslationTable();
      table.ensureLanguage('sv');

      expect(table.languages()).toEqual(['sv']);
      expect(table.isEmpty()).toBe(true);
    });
  });

  describe('fromRecord / toRecord', () => {
    it('should convert between record and table forms', () => {
      const record = { en: { hej: 'hello', tack: 'thanks' }, sv: {} };
      const table = TranslationTable.fromRecord(record);

      expect(table.size()).toBe(2);
      expect(table.size('en')).toBe(2);
      expect(table.size('sv')).toBe(0);
      expect(table.toRecord()).toEqual(record);
    });
  });

  describe('merge', () => {
    it('should overwrite existing keys and add new ones', () => {
      const table = TranslationTable.fromRecord({ en: { a: '1', b: '2' } });
      const other = TranslationTable.fromRecord({ en: { a: 'one', c: '3' }, sv: { a: 'ett' } });

      table.merge(other);

      expect(table.toRecord()).toEqual({
        en: { a: 'one', b: '2', c: '3' },
        sv: { a: 'ett' },
      });
    });

    it('should leave a table unchanged when merged with itself or an empty table', () => {
      const table = TranslationTable.fromRecord({ en: { a: '1' }, sv: { a: 'ett' } });

      expect(table.clone().merge(table).equals(table)).toBe(true);
      expect(table.clone().merge(new TranslationTable()).equals(table)).toBe(true);
    });

    it('should be idempotent', () => {
      const other = TranslationTable.fromRecord({ en: { a: 'one' }, sv: { a: 'ett' } });
      const once = TranslationTable.fromRecord({ en: { b: '2' } }).merge(other);
      const twice = once.clone().merge(other);

      expect(twice.equals(once)).toBe(true);
    });

    it('should not alias the other table', () => {
      const other = TranslationTable.fromRecord({ en: { a: 'one' } });
      const table = new TranslationTable().merge(other);

      other.set('en', 'a', 'changed');

      expect(table.get('en', 'a')).toBe('one');
    });
  });

  describe('remove', () => {
    it('should delete keys from every language', () => {
      const table = TranslationTable.fromRecord({
        en: { hej: 'hello', tack: 'thanks' },
        de: { hej: 'hallo', tack: 'danke' },
      });

      table.remove(['hej', 'missing']);

      expect(table.toRecord()).toEqual({ en: { tack: 'thanks' }, de: { tack: 'danke' } });
    });
  });

  describe('pick', () => {
    it('should keep only the requested languages and include absent ones empty', () => {
      const table = TranslationTable.fromRecord({ en: { a: '1' }, de: { a: '2' } });

      expect(table.pick(['en', 'fr']).toRecord()).toEqual({ en: { a: '1' }, fr: {} });
    });
  });

  describe('clone', () => {
    it('should produce an independent copy', () => {
      const table = TranslationTable.fromRecord({ en: { a: '1' } });
      const copy = table.clone();

      copy.set('en', 'a', '2').set('en', 'b', '3');

      expect(table.toRecord()).toEqual({ en: { a: '1' } });
    });
  });

  describe('equals', () => {
    it('should treat empty and absent languages as equal', () => {
      const a = TranslationTable.fromRecord({ en: { x: '1' }, sv: {} });
      const b = TranslationTable.fromRecord({ en: { x: '1' } });

      expect(a.equals(b)).toBe(true);
      expect(b.equals(a)).toBe(true);
    });

    it('should detect differing values', () => {
      const a = TranslationTable.fromRecord({ en: { x: '1' } });
      const b = TranslationTable.fromRecord({ en: { x: '2' } });

      expect(a.equals(b)).toBe(false);
    });
  });

  describe('entries', () => {
    it('should return key/value pairs in insertion order', () => {
      const table = new TranslationTable().set('en', 'b', '2').set('en', 'a', '1');

      expect(table.entries('en')).toEqual([['b', '2'], ['a', '1']]);
      expect(table.entries('de')).toEqual([]);
    });
  });
});
