/**
 * streamkv error codes
 *
 * Error codes are structured as STREAMKV_[CATEGORY][NUMBER]:
 * - A: Precondition errors (A100-A199)
 * - V: Value errors (V200-V299)
 * - S: Storage errors (S300-S399)
 * - D: Diagnostics (D400-D499)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Precondition errors (A100-A199)
  STREAMKV_A100: {
    code: 'STREAMKV_A100',
    message: 'The aggregate key view is read-only',
    suggestion:
      'getKeys() lists the existing keys and cannot be written. Call set() or clear() on a keyed value, or clear() on the store.',
  },
  STREAMKV_A101: {
    code: 'STREAMKV_A101',
    message: 'Value adapter is missing',
    suggestion: 'Pass an adapter, for example JsonAdapter or one of the primitive adapters.',
  },
  STREAMKV_A102: {
    code: 'STREAMKV_A102',
    message: 'Default value is missing',
    suggestion: 'Every stored value needs a non-null defaultValue to emit while the key is absent.',
  },
  STREAMKV_A103: {
    code: 'STREAMKV_A103',
    message: 'Key is missing',
    suggestion: 'Keyed values and keyed writes need a string key. Use getKeys() for the aggregate view.',
  },

  // Value errors (V200-V299)
  STREAMKV_V200: {
    code: 'STREAMKV_V200',
    message: 'Stored value could not be decoded',
    suggestion: 'The persisted representation does not match the adapter. Clear the key or fix the adapter.',
  },
  STREAMKV_V201: {
    code: 'STREAMKV_V201',
    message: 'Value failed schema validation',
    suggestion: 'Check the value against the schema passed to JsonAdapter.',
  },

  // Storage errors (S300-S399)
  STREAMKV_S300: {
    code: 'STREAMKV_S300',
    message: 'Store write failed',
    suggestion: 'The backing store rejected the write. Retry policy belongs to the store.',
  },
  STREAMKV_S301: {
    code: 'STREAMKV_S301',
    message: 'Store file could not be read',
    suggestion: 'The store file exists but is not a valid store document. Restore it or delete it.',
  },
  STREAMKV_S302: {
    code: 'STREAMKV_S302',
    message: 'Session initialization failed',
    suggestion: 'The backing store could not be opened. The next getStreamingStore() call retries.',
  },

  // Diagnostics (D400-D499)
  STREAMKV_D400: {
    code: 'STREAMKV_D400',
    message: 'Stored value subscribed suspiciously often',
    suggestion:
      'A new StoredValue is probably created and subscribed on every render. Create it once and reuse it.',
  },

  // Internal errors (X900-X999)
  STREAMKV_X900: {
    code: 'STREAMKV_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'precondition' | 'value' | 'storage' | 'diagnostic' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(9);
  switch (letter) {
    case 'A':
      return 'precondition';
    case 'V':
      return 'value';
    case 'S':
      return 'storage';
    case 'D':
      return 'diagnostic';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
