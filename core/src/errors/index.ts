/**
 * tierline error system
 *
 * - D (Document): annotation document errors
 * - I (Input): missing inputs and configuration errors
 * - M (Media): external tool and audio data errors
 * - W (Warnings): soft warnings across all layers
 */

// Types
export type { ErrorCategory, ErrorLocation, ErrorSeverity } from './types.js';
export { TierlineError, isTierlineError } from './types.js';

// Error Codes
export {
  DocumentErrorCode,
  InputErrorCode,
  MediaErrorCode,
  WarningCode,
  ERROR_CODE_CATEGORIES,
  getErrorCategory,
  getErrorSeverity,
} from './codes.js';
export type {
  DocumentErrorCodeValue,
  InputErrorCodeValue,
  MediaErrorCodeValue,
  WarningCodeValue,
  ErrorCode,
} from './codes.js';

// Helpers
export type { CreateErrorOptions, ErrorDetails } from './helpers.js';
export {
  createTierlineError,
  createDocumentError,
  createInputError,
  createMediaError,
  formatError,
  describeError,
} from './helpers.js';
