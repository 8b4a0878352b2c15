import { expect } from 'vitest';

import {
  isTokenizerError,
  type TokenizerError,
  type TokenizerErrorCode,
} from '../../src/errors/tokenizer-error.js';
import { createWordPieceTokenizer } from '../../src/tokenizers/index.js';
import type { PretrainedTokenizer } from '../../src/tokenizers/base.js';

/**
 * Ids: [PAD]=0 [UNK]=1 [CLS]=2 [SEP]=3 [MASK]=4 hello=5 world=6 un=7
 * ##aff=8 ##able=9 ,=10 !=11 the=12 cafe=13 中=14 国=15 οδοσ=16 οδος=17 .=18
 */
export const WORDPIECE_TOKENS = [
  '[PAD]', '[UNK]', '[CLS]', '[SEP]', '[MASK]',
  'hello', 'world', 'un', '##aff', '##able',
  ',', '!', 'the', 'cafe', '中', '国', 'οδοσ', 'οδος', '.',
];

export function createTestTokenizer(doLowerCase = true): PretrainedTokenizer {
  return createWordPieceTokenizer({ vocab: WORDPIECE_TOKENS, doLowerCase });
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

export function expectTokenizerError(fn: () => unknown, code: TokenizerErrorCode): TokenizerError {
  const error = catchError(fn);
  expect(isTokenizerError(error, code)).toBe(true);
  if (!isTokenizerError(error)) {
    throw new Error('Expected a tokenizer error');
  }
  return error;
}
