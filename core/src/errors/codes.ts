/**
 * Unified error code constants for tierline.
 *
 * Code format: {Category}{Number}
 * - D: Document errors (D001-D099)
 * - I: Input errors (I001-I099)
 * - M: Media errors (M001-M099)
 * - W: Warnings (W001-W099)
 */

// =============================================================================
// Document Error Codes (D001-D099)
// =============================================================================

export const DocumentErrorCode = {
  // D001-D009: Structure
  INVALID_XML: 'D001',
  NOT_AN_ANNOTATION_DOCUMENT: 'D002',
  DUPLICATE_TIER: 'D003',
  DUPLICATE_TIME_SLOT: 'D004',
  MIXED_ANNOTATION_KINDS: 'D005',
  DUPLICATE_ANNOTATION: 'D006',

  // D010-D019: References
  UNKNOWN_TIME_SLOT: 'D010',
  UNKNOWN_PARENT_ANNOTATION: 'D011',
  UNKNOWN_PARENT_TIER: 'D012',
  REFERENCE_CYCLE: 'D013',
  MISSING_ANNOTATION_ID: 'D014',

  // D020-D029: Files
  FILE_LOAD_FAILED: 'D020',
  FILE_WRITE_FAILED: 'D021',
  RENDER_FAILED: 'D022',
} as const;

export type DocumentErrorCodeValue = (typeof DocumentErrorCode)[keyof typeof DocumentErrorCode];

// =============================================================================
// Input Error Codes (I001-I099)
// =============================================================================

export const InputErrorCode = {
  // I001-I009: Missing inputs
  MISSING_MEDIA: 'I001',
  MISSING_ORAL_ANNOTATION_DIR: 'I002',
  MISSING_ORIGINAL_CLIP: 'I003',
  MISSING_TIER: 'I004',

  // I010-I019: Configuration
  INVALID_CONFIG: 'I010',
  CONFIG_LOAD_FAILED: 'I011',
  INVALID_ARGUMENT: 'I012',
} as const;

export type InputErrorCodeValue = (typeof InputErrorCode)[keyof typeof InputErrorCode];

// =============================================================================
// Media Error Codes (M001-M099)
// =============================================================================

export const MediaErrorCode = {
  // M001-M009: External tools
  FFMPEG_NOT_FOUND: 'M001',
  TRANSCODE_FAILED: 'M002',
  PROBE_FAILED: 'M003',

  // M010-M019: Audio data
  INVALID_WAV: 'M010',
  UNSUPPORTED_AUDIO_FORMAT: 'M011',
  SAMPLE_RATE_MISMATCH: 'M012',

  // M020-M029: Filter programs
  INVALID_INTERVAL: 'M020',
} as const;

export type MediaErrorCodeValue = (typeof MediaErrorCode)[keyof typeof MediaErrorCode];

// =============================================================================
// Warning Codes (W001-W099)
// =============================================================================

export const WarningCode = {
  INTERVAL_TIER_MISSING: 'W001',
  DURATION_UNAVAILABLE: 'W002',
  MISSING_ORAL_CLIP: 'W003',
} as const;

export type WarningCodeValue = (typeof WarningCode)[keyof typeof WarningCode];

// =============================================================================
// Combined Types
// =============================================================================

/**
 * All error codes in the system.
 */
export type ErrorCode =
  | DocumentErrorCodeValue
  | InputErrorCodeValue
  | MediaErrorCodeValue
  | WarningCodeValue;

/**
 * Maps error code prefixes to their categories.
 */
export const ERROR_CODE_CATEGORIES = {
  D: 'document',
  I: 'input',
  M: 'media',
  W: 'input',
} as const;

export type ErrorCodePrefix = keyof typeof ERROR_CODE_CATEGORIES;

function isErrorCodePrefix(value: string): value is ErrorCodePrefix {
  return value in ERROR_CODE_CATEGORIES;
}

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: string): 'document' | 'input' | 'media' {
  const prefix = code.charAt(0);
  return isErrorCodePrefix(prefix) ? ERROR_CODE_CATEGORIES[prefix] : 'input';
}

/**
 * Gets the severity for an error code.
 */
export function getErrorSeverity(code: string): 'error' | 'warning' {
  return code.startsWith('W') ? 'warning' : 'error';
}
