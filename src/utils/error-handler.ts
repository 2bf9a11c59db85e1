/**
 * Centralized error handling utilities
 * Provides consistent error messages for the store, sync engine and CLI
 */

import { isLocalizationError } from '../errors.js';
import type { StoreResult } from '../types/index.js';

/**
 * Standard error categories
 */
export enum ErrorCategory {
  FILE_OPERATION = 'File Operation',
  SERIALIZATION = 'Serialization',
  CONFIGURATION = 'Configuration',
  TRANSLATION_SERVICE = 'Translation Service',
  VALIDATION = 'Validation',
}

/**
 * Get actionable suggestion based on error type
 */
function getErrorSuggestion(category: ErrorCategory, error: unknown): string | null {
  if (isLocalizationError(error, 'disabled')) {
    return '💡 Suggestion: The store is disabled. Re-enable it before translating or writing.';
  }
  if (isLocalizationError(error, 'no-translation-service')) {
    return '💡 Suggestion: Pass a glossary with --glossary or configure a translation service.';
  }

  const lowerError = extractErrorMessage(error).toLowerCase();

  if (category === ErrorCategory.FILE_OPERATION) {
    if (lowerError.includes('enoent') || lowerError.includes('no such file')) {
      return '💡 Suggestion: Check that the bundle directory exists and the path is correct.';
    }
    if (lowerError.includes('eacces') || lowerError.includes('permission denied')) {
      return '💡 Suggestion: Check permissions on the bundle directory.';
    }
    if (lowerError.includes('enospc')) {
      return '💡 Suggestion: The disk is full. Free some space and retry; the previous bundle is still current.';
    }
  }

  if (category === ErrorCategory.CONFIGURATION) {
    return '💡 Suggestion: Check .polystring/config.yaml against the documented settings.';
  }

  return null;
}

/**
 * Pick the category a failure is reported under: encoding and language code
 * failures have their own, everything else keeps the command's category.
 */
export function categorizeError(error: unknown, fallback: ErrorCategory): ErrorCategory {
  if (isLocalizationError(error, 'serialization-failure')) {
    return ErrorCategory.SERIALIZATION;
  }
  if (isLocalizationError(error, 'invalid-language')) {
    return ErrorCategory.VALIDATION;
  }
  return fallback;
}

/**
 * Create a standardized error message
 */
export function createErrorMessage(
  category: ErrorCategory,
  operation: string,
  error: unknown,
  options?: { details?: string }
): string {
  const errorMsg = extractErrorMessage(error);
  let message = `[${category}] ${operation} failed: ${errorMsg}`;

  if (options?.details) {
    message += `\n${options.details}`;
  }

  const suggestion = getErrorSuggestion(category, error);
  if (suggestion) {
    message += `\n${suggestion}`;
  }

  return message;
}

/**
 * Extract error message from unknown error type
 * Consolidates the common pattern: error instanceof Error ? error.message : String(error)
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert an unknown thrown value to an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Read the errno code from a Node.js file-system error
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Safely parse JSON with error handling
 */
export function safeJsonParse(json: string): StoreResult<unknown> {
  try {
    const data: unknown = JSON.parse(json);
    return { success: true, data };
  } catch (error) {
    return {
      success: false,
      error: extractErrorMessage(error),
    };
  }
}
