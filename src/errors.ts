/**
 * Localization Error - Structured errors for store and sync failures
 *
 * Preserves the underlying cause (including its stack) so failures surfaced
 * through the `failed` stream keep their diagnostics.
 */

import type { LanguageKey } from './types/index.js';

export type LocalizationErrorKind =
  | 'disabled'
  | 'no-translation-service'
  | 'io-failure'
  | 'serialization-failure'
  | 'invalid-language';

export interface LocalizationErrorOptions {
  cause?: unknown;
  path?: string;
  language?: LanguageKey;
}

export class LocalizationError extends Error {
  public readonly name = 'LocalizationError';
  public readonly timestamp: Date;
  public readonly path?: string;
  public readonly language?: LanguageKey;

  constructor(
    public readonly kind: LocalizationErrorKind,
    message: string,
    options: LocalizationErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.timestamp = new Date();
    this.path = options.path;
    this.language = options.language;

    // Keep the original stack reachable from the wrapper
    if (options.cause instanceof Error && options.cause.stack) {
      this.stack = `${this.stack}\n\nCaused by:\n${options.cause.stack}`;
    }

    Object.setPrototypeOf(this, LocalizationError.prototype);
  }

  static disabled(): LocalizationError {
    return new LocalizationError('disabled', 'Localization store is disabled');
  }

  static noTranslationService(): LocalizationError {
    return new LocalizationError('no-translation-service', 'No translation service is configured');
  }

  static io(operation: string, path: string, cause: unknown): LocalizationError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new LocalizationError('io-failure', `${operation} failed for ${path}: ${reason}`, { cause, path });
  }

  static serialization(language: LanguageKey, cause: unknown): LocalizationError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new LocalizationError(
      'serialization-failure',
      `Could not encode table for language "${language}": ${reason}`,
      { cause, language }
    );
  }

  static invalidLanguage(language: string, reason: string): LocalizationError {
    return new LocalizationError('invalid-language', `Invalid language code "${language}": ${reason}`, { language });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      path: this.path,
      language: this.language,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Narrow an unknown value to a LocalizationError, optionally of one kind
 */
export function isLocalizationError(
  value: unknown,
  kind?: LocalizationErrorKind
): value is LocalizationError {
  if (!(value instanceof LocalizationError)) {
    return false;
  }
  return kind === undefined || value.kind === kind;
}
