/**
 * Table file format
 *
 * One file per language per table, UTF-8, one entry per line:
 *
 * ```text
 * "greeting" = "Hej \"du\"";
 * ```
 *
 * Lines that don't match the entry pattern (blank lines, `//` or `/* *\/`
 * comments, garbage) contribute no entries.
 */

import { LocalizationError } from '../errors.js';
import type { LanguageKey, TranslatedValue, TranslationKey } from '../types/index.js';

const ENTRY_PATTERN = /^\s*"((?:[^"\\]|\\.)*)"\s*=\s*"((?:[^"\\]|\\.)*)"\s*;\s*$/;

// A high surrogate not followed by a low one, or a low one not preceded by a high one
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

const UNESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
};

export function escapeValue(value: string): string {
  return value.replace(/[\\"\n\r\t]/g, (ch) => ESCAPES[ch] ?? ch);
}

export function unescapeValue(value: string): string {
  return value.replace(/\\(.)/g, (_, ch: string) => UNESCAPES[ch] ?? ch);
}

function assertEncodable(text: unknown, what: string): string {
  if (typeof text !== 'string') {
    throw new TypeError(`${what} must be a string, got ${typeof text}`);
  }
  if (LONE_SURROGATE.test(text)) {
    throw new TypeError(`${what} contains an unpaired UTF-16 surrogate`);
  }
  return text;
}

/**
 * Encode one language's entries. Each line ends with a newline.
 *
 * @throws LocalizationError (`serialization-failure`) for values that cannot be encoded
 */
export function serializeTable(
  entries: Iterable<[TranslationKey, TranslatedValue]>,
  language: LanguageKey = 'unknown'
): string {
  let out = '';
  for (const [key, value] of entries) {
    try {
      const k = assertEncodable(key, 'key');
      const v = assertEncodable(value, `value for "${k}"`);
      out += `"${escapeValue(k)}" = "${escapeValue(v)}";\n`;
    } catch (error) {
      throw LocalizationError.serialization(language, error);
    }
  }
  return out;
}

/**
 * Decode a table file. Never throws; unmatched lines are skipped and a
 * repeated key keeps its last value.
 */
export function parseTable(text: string): Map<TranslationKey, TranslatedValue> {
  const entries = new Map<TranslationKey, TranslatedValue>();
  // Strip a UTF-8 byte order mark
  const body = text.startsWith('\uFEFF') ? text.slice(1) : text;

  for (const line of body.split(/\r?\n/)) {
    const match = ENTRY_PATTERN.exec(line);
    if (!match) {
      continue;
    }
    entries.set(unescapeValue(match[1]), unescapeValue(match[2]));
  }

  return entries;
}
