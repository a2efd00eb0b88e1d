/**
 * Shared error types for tierline.
 *
 * - D (Document): annotation document structure and file errors
 * - I (Input): missing inputs and configuration errors
 * - M (Media): ffmpeg, ffprobe and audio data errors
 * - W (Warnings): soft warnings that never stop processing
 */

/**
 * Error categories.
 */
export type ErrorCategory = 'document' | 'input' | 'media';

/**
 * Severity level for issues.
 */
export type ErrorSeverity = 'error' | 'warning';

/**
 * Location information for an error.
 */
export interface ErrorLocation {
  /** File path where the error occurred */
  filePath?: string;
  /** Element context (e.g., "tier 'Original'", "annotation a12") */
  context?: string;
}

/**
 * Base class for all tierline errors.
 */
export class TierlineError extends Error {
  /** Unique error code (e.g., 'D001', 'I003', 'M002') */
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly location?: ErrorLocation;
  /** Suggested fix (optional) */
  readonly suggestion?: string;

  constructor(
    init: {
      code: string;
      message: string;
      category: ErrorCategory;
      severity: ErrorSeverity;
      location?: ErrorLocation;
      suggestion?: string;
    },
    options?: { cause?: unknown },
  ) {
    super(init.message, options);
    this.name = 'TierlineError';
    this.code = init.code;
    this.category = init.category;
    this.severity = init.severity;
    this.location = init.location;
    this.suggestion = init.suggestion;
  }
}

/**
 * Type guard to check if an error is a TierlineError.
 */
export function isTierlineError(error: unknown): error is TierlineError {
  return error instanceof TierlineError;
}
