/**
 * Error creation helpers.
 *
 * Provides factory functions for creating structured errors with
 * consistent formatting across all error categories.
 */

import { TierlineError, type ErrorLocation } from './types.js';
import { getErrorCategory, getErrorSeverity } from './codes.js';

/**
 * Options for creating a tierline error.
 */
export interface CreateErrorOptions {
  /** Error code (e.g., 'D001', 'M002') */
  code: string;
  message: string;
  location?: ErrorLocation;
  /** Suggested fix */
  suggestion?: string;
  /** Original error that caused this error */
  cause?: unknown;
}

/**
 * Options shared by the category-specific factories.
 */
export interface ErrorDetails {
  filePath?: string;
  context?: string;
  suggestion?: string;
  cause?: unknown;
}

/**
 * Creates a TierlineError with the given options.
 *
 * The category and severity are inferred from the error code.
 */
export function createTierlineError(options: CreateErrorOptions): TierlineError {
  const { code, message, location, suggestion, cause } = options;
  return new TierlineError(
    {
      code,
      message,
      category: getErrorCategory(code),
      severity: getErrorSeverity(code),
      location,
      suggestion,
    },
    cause === undefined ? undefined : { cause },
  );
}

function fromDetails(code: string, message: string, details: ErrorDetails): TierlineError {
  const location =
    details.filePath !== undefined || details.context !== undefined
      ? { filePath: details.filePath, context: details.context }
      : undefined;
  return createTierlineError({
    code,
    message,
    location,
    suggestion: details.suggestion,
    cause: details.cause,
  });
}

/**
 * Creates a document error (D-code).
 */
export function createDocumentError(
  code: string,
  message: string,
  details: ErrorDetails = {},
): TierlineError {
  return fromDetails(code, message, details);
}

/**
 * Creates an input error (I-code).
 */
export function createInputError(
  code: string,
  message: string,
  details: ErrorDetails = {},
): TierlineError {
  return fromDetails(code, message, details);
}

/**
 * Creates a media error (M-code).
 */
export function createMediaError(
  code: string,
  message: string,
  details: ErrorDetails = {},
): TierlineError {
  return fromDetails(code, message, details);
}

/**
 * Formats a TierlineError for display.
 */
export function formatError(error: TierlineError): string {
  const parts: string[] = [];

  parts.push(`[${error.code}] ${error.message}`);

  if (error.location) {
    const loc = error.location;
    if (loc.filePath) {
      parts.push(`  File: ${loc.filePath}`);
    }
    if (loc.context) {
      parts.push(`  Context: ${loc.context}`);
    }
  }

  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }

  return parts.join('\n');
}

/**
 * Extracts a printable message from anything thrown.
 */
export function describeError(error: unknown): string {
  if (error instanceof TierlineError) {
    return formatError(error);
  }
  return error instanceof Error ? error.message : String(error);
}
