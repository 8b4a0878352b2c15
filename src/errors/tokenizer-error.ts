/**
 * Tokenizer Errors
 *
 * Every failure raised by the library carries a stable `code` from
 * ERROR_CODES. Usage errors also name the offending argument.
 *
 * @module errors/tokenizer-error
 */

export const ERROR_CODES = {
  USAGE_INVALID_INPUT: 'TOKENIZER_USAGE_INVALID_INPUT',
  USAGE_PAIR_WITH_SPECIAL_TOKENS: 'TOKENIZER_USAGE_PAIR_WITH_SPECIAL_TOKENS',
  USAGE_TOKEN_TYPE_IDS_WITHOUT_SPECIAL_TOKENS: 'TOKENIZER_USAGE_TOKEN_TYPE_IDS_WITHOUT_SPECIAL_TOKENS',
  USAGE_INVALID_MAX_LENGTH: 'TOKENIZER_USAGE_INVALID_MAX_LENGTH',
  USAGE_MISSING_PAD_TOKEN: 'TOKENIZER_USAGE_MISSING_PAD_TOKEN',
  USAGE_UNKNOWN_TOKEN: 'TOKENIZER_USAGE_UNKNOWN_TOKEN',
  USAGE_UNKNOWN_ID: 'TOKENIZER_USAGE_UNKNOWN_ID',
  USAGE_INVALID_VOCAB: 'TOKENIZER_USAGE_INVALID_VOCAB',
  USAGE_MISSING_SPECIAL_TOKEN: 'TOKENIZER_USAGE_MISSING_SPECIAL_TOKEN',
  INVALID_TOKEN_TYPE: 'TOKENIZER_INVALID_TOKEN_TYPE',
  ALIGNMENT_FAILED: 'TOKENIZER_ALIGNMENT_FAILED',
  INVALID_NORMALIZATION_TABLE: 'TOKENIZER_INVALID_NORMALIZATION_TABLE',
} as const;

export type TokenizerErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface TokenizerError extends Error {
  code: TokenizerErrorCode;
  /** Name of the argument that violated a precondition */
  argument?: string;
}

export interface TokenizerErrorOptions {
  argument?: string;
}

const TYPE_ERROR_CODES: ReadonlySet<TokenizerErrorCode> = new Set([ERROR_CODES.INVALID_TOKEN_TYPE]);

/**
 * Create an error carrying `code`. Type-kind codes produce a TypeError.
 */
export function createTokenizerError(
  code: TokenizerErrorCode,
  message: string,
  options: TokenizerErrorOptions = {}
): TokenizerError {
  const base = TYPE_ERROR_CODES.has(code) ? new TypeError(message) : new Error(message);
  const error: TokenizerError = Object.assign(base, { code });
  if (options.argument !== undefined) {
    error.argument = options.argument;
  }
  return error;
}

/**
 * Narrow an unknown thrown value to a TokenizerError, optionally of one code.
 */
export function isTokenizerError(value: unknown, code?: TokenizerErrorCode): value is TokenizerError {
  if (!(value instanceof Error) || !('code' in value)) return false;
  const actual = value.code;
  if (typeof actual !== 'string' || !actual.startsWith('TOKENIZER_')) return false;
  return code === undefined || actual === code;
}
