/**
 * Seriate Error Codes
 *
 * Error codes are structured as SERIATE_[CATEGORY][NUMBER]:
 * - C: Construction errors (C100-C199)
 * - A: Argument errors (A200-A299)
 * - D: Codec errors (D300-D399)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Construction errors (C100-C199)
  SERIATE_C100: {
    code: 'SERIATE_C100',
    message: 'Key and value sequences differ in length',
    suggestion: 'Pass one value for every key when pairing parallel sequences.',
  },
  SERIATE_C101: {
    code: 'SERIATE_C101',
    message: 'Keys are not in ascending order',
    suggestion: 'Sort the points first, or build the series with collectChecked which re-sorts.',
  },
  SERIATE_C102: {
    code: 'SERIATE_C102',
    message: 'Duplicate key',
    suggestion:
      "Remove repeated keys, or collect with onDuplicate: 'keep-first' | 'keep-last' to resolve them.",
  },

  // Argument errors (A200-A299)
  SERIATE_A200: {
    code: 'SERIATE_A200',
    message: 'Invalid argument',
    suggestion: 'Window sizes and spans must be positive integers; offsets must be integers.',
  },
  SERIATE_A201: {
    code: 'SERIATE_A201',
    message: 'Incompatible as-of join options',
    suggestion: "A tolerance matcher only applies to 'roll-prior' and 'roll-next' modes.",
  },
  SERIATE_A202: {
    code: 'SERIATE_A202',
    message: 'Key type has no natural order',
    suggestion: 'Use number, bigint, string or Date keys, or pass a KeyOrder for custom keys.',
  },
  SERIATE_A203: {
    code: 'SERIATE_A203',
    message: 'Invalid engine configuration',
    suggestion: 'Check the listed configuration fields.',
  },

  // Codec errors (D300-D399)
  SERIATE_D300: {
    code: 'SERIATE_D300',
    message: 'Malformed encoded input',
    suggestion: 'Check that the input was produced by the matching encoder and is not truncated.',
  },
  SERIATE_D301: {
    code: 'SERIATE_D301',
    message: 'Decoded record does not match its schema',
    suggestion: 'Check the listed record fields against the value schema.',
  },
  SERIATE_D302: {
    code: 'SERIATE_D302',
    message: 'Unsupported format or version',
    suggestion: 'Decode with the codec that wrote the data.',
  },

  // Internal errors (X900-X999)
  SERIATE_X900: {
    code: 'SERIATE_X900',
    message: 'Internal error',
    suggestion: 'This is unexpected. Please report it with the error context.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'construction' | 'argument' | 'codec' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(8);
  switch (letter) {
    case 'C':
      return 'construction';
    case 'A':
      return 'argument';
    case 'D':
      return 'codec';
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
