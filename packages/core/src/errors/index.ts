/**
 * streamkv error system
 *
 * - Unique error codes (STREAMKV_A100, STREAMKV_S300, etc.)
 * - Suggestions for resolution
 * - Error categorization
 * - Error chaining through `cause`
 *
 * @example
 * ```typescript
 * import { StreamKvError } from '@streamkv/core';
 *
 * try {
 *   await store.getKeys().set(new Set(['a']));
 * } catch (error) {
 *   if (StreamKvError.isCode(error, 'STREAMKV_A100')) {
 *     console.log('The key listing is read-only');
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  PreconditionError,
  StreamKvError,
  ensureStreamKvError,
  type SerializedStreamKvError,
  type StreamKvErrorOptions,
} from './streamkv-error.js';
