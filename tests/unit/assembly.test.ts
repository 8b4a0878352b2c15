import { describe, expect, it } from 'vitest';

import { ERROR_CODES } from '../../src/errors/tokenizer-error.js';
import { BertAssembler, BosEosAssembler, PlainAssembler } from '../../src/tokenizers/assembly.js';
import { expectTokenizerError } from './helpers.js';

describe('tokenizers/assembly', () => {
  describe('BertAssembler', () => {
    const assembler = new BertAssembler(101, 102);

    it('wraps one sequence', () => {
      expect(assembler.buildInputsWithSpecialTokens([7, 8])).toEqual([101, 7, 8, 102]);
      expect(assembler.createTokenTypeIdsFromSequences([7, 8])).toEqual([0, 0, 0, 0]);
      expect(assembler.getSpecialTokensMask([7, 8])).toEqual([1, 0, 0, 1]);
    });

    it('wraps a pair with types 0 then 1', () => {
      expect(assembler.buildInputsWithSpecialTokens([7], [9, 10])).toEqual([101, 7, 102, 9, 10, 102]);
      expect(assembler.createTokenTypeIdsFromSequences([7], [9, 10])).toEqual([0, 0, 0, 1, 1, 1]);
      expect(assembler.getSpecialTokensMask([7], [9, 10])).toEqual([1, 0, 1, 0, 0, 1]);
      expect(assembler.numSpecialTokensToAdd(true)).toBe(3);
      expect(assembler.numSpecialTokensToAdd(false)).toBe(2);
    });

    it('gives special positions empty offsets', () => {
      expect(assembler.buildOffsetMappingWithSpecialTokens([[0, 3]], [[4, 6]])).toEqual([
        [0, 0], [0, 3], [0, 0], [4, 6], [0, 0],
      ]);
    });

    it('needs cls and sep ids', () => {
      const error = expectTokenizerError(
        () => BertAssembler.factory()({ clsToken: 1 }),
        ERROR_CODES.USAGE_MISSING_SPECIAL_TOKEN
      );
      expect(error.argument).toBe('sepToken');
    });
  });

  describe('BosEosAssembler', () => {
    it('wraps a pair as bos A eos B eos', () => {
      const assembler = BosEosAssembler.factory()({ bosToken: 0, eosToken: 2 });
      expect(assembler.buildInputsWithSpecialTokens([5, 6], [7])).toEqual([0, 5, 6, 2, 7, 2]);
      expect(assembler.createTokenTypeIdsFromSequences([5, 6], [7])).toEqual([0, 0, 0, 0, 0, 0]);
      expect(assembler.getSpecialTokensMask([5, 6], [7])).toEqual([1, 0, 0, 1, 0, 1]);
      expect(assembler.numSpecialTokensToAdd(true)).toBe(3);
    });

    it('omits a disabled marker', () => {
      const assembler = BosEosAssembler.factory({ addBosToken: false })({ eosToken: 2 });
      expect(assembler.buildInputsWithSpecialTokens([5, 6], [7])).toEqual([5, 6, 2, 7, 2]);
      expect(assembler.buildOffsetMappingWithSpecialTokens([[0, 1]])).toEqual([[0, 1], [0, 0]]);
      expect(assembler.numSpecialTokensToAdd(false)).toBe(1);
    });
  });

  describe('PlainAssembler', () => {
    it('concatenates without special tokens', () => {
      const assembler = new PlainAssembler();
      expect(assembler.buildInputsWithSpecialTokens([1], [2, 3])).toEqual([1, 2, 3]);
      expect(assembler.getSpecialTokensMask([1], [2, 3])).toEqual([0, 0, 0]);
      expect(assembler.numSpecialTokensToAdd()).toBe(0);
    });
  });
});
