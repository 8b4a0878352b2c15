import { describe, expect, it } from 'vitest';

import { ERROR_CODES } from '../../src/errors/tokenizer-error.js';
import { padBatch } from '../../src/tokenizers/padding.js';
import { expectTokenizerError } from './helpers.js';

describe('tokenizers/padding', () => {
  it('pads to the longest example with attention masks', () => {
    const padded = padBatch(
      { inputIds: [[1, 2], [1, 2, 3, 4]] },
      { strategy: 'longest', returnAttentionMask: true, padTokenId: 0 }
    );
    expect(padded.inputIds).toEqual([[1, 2, 0, 0], [1, 2, 3, 4]]);
    expect(padded.attentionMask).toEqual([[1, 1, 0, 0], [1, 1, 1, 1]]);
  });

  it('pads on the left', () => {
    const padded = padBatch(
      { inputIds: [[1, 2], [1, 2, 3, 4]] },
      { strategy: 'longest', returnAttentionMask: true, padTokenId: 9, side: 'left' }
    );
    expect(padded.inputIds).toEqual([[9, 9, 1, 2], [1, 2, 3, 4]]);
    expect(padded.attentionMask).toEqual([[0, 0, 1, 1], [1, 1, 1, 1]]);
  });

  it('pads every per-token field with its own value', () => {
    const padded = padBatch(
      {
        inputIds: [[5]],
        tokenTypeIds: [[1]],
        specialTokensMask: [[0]],
        offsetMapping: [[[0, 3]]],
        positionIds: [[0]],
        length: [1],
      },
      { strategy: 'maxLength', maxLength: 3, padTokenId: 0, padTokenTypeId: 2 }
    );
    expect(padded).toEqual({
      inputIds: [[5, 0, 0]],
      tokenTypeIds: [[1, 2, 2]],
      specialTokensMask: [[0, 1, 1]],
      offsetMapping: [[[0, 3], [0, 0], [0, 0]]],
      positionIds: [[0, 0, 0]],
      length: [1],
    });
  });

  it('rounds the target up to a multiple', () => {
    const padded = padBatch(
      { inputIds: [[1, 2, 3, 4]] },
      { strategy: 'longest', padToMultipleOf: 3, padTokenId: 0 }
    );
    expect(padded.inputIds).toEqual([[1, 2, 3, 4, 0, 0]]);
  });

  it('leaves examples past the target unchanged', () => {
    const padded = padBatch({ inputIds: [[1, 2, 3, 4]] }, { strategy: 'maxLength', maxLength: 3, padTokenId: 0 });
    expect(padded.inputIds).toEqual([[1, 2, 3, 4]]);
  });

  it('does nothing without a strategy, even without a pad token', () => {
    const padded = padBatch({ inputIds: [[1], [1, 2]] }, { strategy: 'doNotPad' });
    expect(padded.inputIds).toEqual([[1], [1, 2]]);
    expect(padded.attentionMask).toBeUndefined();
  });

  it('needs a pad token to pad', () => {
    expectTokenizerError(
      () => padBatch({ inputIds: [[1]] }, { strategy: 'longest' }),
      ERROR_CODES.USAGE_MISSING_PAD_TOKEN
    );
  });

  it('needs maxLength for the maxLength strategy', () => {
    expectTokenizerError(
      () => padBatch({ inputIds: [[1]] }, { strategy: 'maxLength', padTokenId: 0 }),
      ERROR_CODES.USAGE_INVALID_MAX_LENGTH
    );
  });
});
