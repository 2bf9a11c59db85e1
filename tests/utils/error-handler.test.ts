/**
 * Tests for utils/error-handler.ts and errors.ts
 */
import { describe, it, expect } from 'vitest';
import {
  ErrorCategory,
  categorizeError,
  createErrorMessage,
  errorCode,
  extractErrorMessage,
  safeJsonParse,
  toError,
} from '../../src/utils/error-handler.js';
import { LocalizationError, isLocalizationError } from '../../src/errors.js';

describe('error-handler', () => {
  describe('createErrorMessage', () => {
    it('should add the suggestion for a missing translation service', () => {
      expect(createErrorMessage(ErrorCategory.TRANSLATION_SERVICE, 'Translate', LocalizationError.noTranslationService()))
        .toBe(
          '[Translation Service] Translate failed: No translation service is configured\n' +
          '💡 Suggestion: Pass a glossary with --glossary or configure a translation service.'
        );
    });

    it('should suggest a fix for missing files', () => {
      expect(createErrorMessage(ErrorCategory.FILE_OPERATION, 'Read', new Error('ENOENT: no such file')))
        .toBe(
          '[File Operation] Read failed: ENOENT: no such file\n' +
          '💡 Suggestion: Check that the bundle directory exists and the path is correct.'
        );
    });

    it('should include details and omit unknown suggestions', () => {
      expect(createErrorMessage(ErrorCategory.VALIDATION, 'Parse', 'bad input', { details: 'line 3' }))
        .toBe('[Validation] Parse failed: bad input\nline 3');
    });
  });

  describe('categorizeError', () => {
    it('should give encoding and language code failures their own category', () => {
      const encoding = LocalizationError.serialization('en', new TypeError('bad value'));
      const language = LocalizationError.invalidLanguage('../x', 'not a name');

      expect(categorizeError(encoding, ErrorCategory.TRANSLATION_SERVICE)).toBe(ErrorCategory.SERIALIZATION);
      expect(categorizeError(language, ErrorCategory.FILE_OPERATION)).toBe(ErrorCategory.VALIDATION);
      expect(language.message).toBe('Invalid language code "../x": not a name');
      expect(language.language).toBe('../x');
    });

    it('should keep the fallback for everything else', () => {
      expect(categorizeError(LocalizationError.disabled(), ErrorCategory.TRANSLATION_SERVICE))
        .toBe(ErrorCategory.TRANSLATION_SERVICE);
      expect(categorizeError(new Error('ENOENT'), ErrorCategory.FILE_OPERATION)).toBe(ErrorCategory.FILE_OPERATION);
    });
  });

  describe('helpers', () => {
    it('should extract messages from anything thrown', () => {
      expect(extractErrorMessage(new Error('x'))).toBe('x');
      expect(extractErrorMessage(42)).toBe('42');
    });

    it('should convert thrown values to errors', () => {
      const err = new Error('kept');
      expect(toError(err)).toBe(err);
      expect(toError('plain').message).toBe('plain');
    });

    it('should read errno codes', () => {
      expect(errorCode(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe('ENOENT');
      expect(errorCode(new Error('no code'))).toBeUndefined();
      expect(errorCode('ENOENT')).toBeUndefined();
    });

    it('should parse JSON into a result', () => {
      expect(safeJsonParse('{"a":1}')).toEqual({ success: true, data: { a: 1 } });
      expect(safeJsonParse('{').success).toBe(false);
    });
  });
});

describe('LocalizationError', () => {
  it('should describe I/O failures with their path and cause', () => {
    const cause = new Error('EACCES: permission denied');
    const error = LocalizationError.io('Write table file', '/data/en.lang/Localizable.table', cause);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('LocalizationError');
    expect(error.kind).toBe('io-failure');
    expect(error.message).toBe('Write table file failed for /data/en.lang/Localizable.table: EACCES: permission denied');
    expect(error.path).toBe('/data/en.lang/Localizable.table');
    expect(error.cause).toBe(cause);
    expect(error.stack).toContain('Caused by:');
  });

  it('should narrow by kind', () => {
    const error = LocalizationError.disabled();

    expect(isLocalizationError(error)).toBe(true);
    expect(isLocalizationError(error, 'disabled')).toBe(true);
    expect(isLocalizationError(error, 'io-failure')).toBe(false);
    expect(isLocalizationError(new Error('other'))).toBe(false);
  });

  it('should serialize to JSON', () => {
    const json = LocalizationError.serialization('sv', new TypeError('bad value')).toJSON();

    expect(json).toMatchObject({
      name: 'LocalizationError',
      kind: 'serialization-failure',
      message: 'Could not encode table for language "sv": bad value',
      language: 'sv',
    });
    expect(typeof json.timestamp).toBe('string');
  });
});
