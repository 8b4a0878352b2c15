import { describe, expect, it } from 'vitest';

import { ERROR_CODES } from '../../src/errors/tokenizer-error.js';
import { createBpeTokenizer, createWordPieceTokenizer } from '../../src/tokenizers/index.js';
import { createAddedToken } from '../../src/tokenizers/types.js';
import { Vocab } from '../../src/tokenizers/vocab.js';
import { WORDPIECE_TOKENS, createTestTokenizer, expectTokenizerError } from './helpers.js';

describe('tokenizers/base', () => {
  describe('tokenize', () => {
    it('lower-cases, splits punctuation and applies WordPiece', () => {
      const tokenizer = createTestTokenizer();
      expect(tokenizer.tokenize('Hello, world!')).toEqual(['hello', ',', 'world', '!']);
      expect(tokenizer.tokenize('unaffable')).toEqual(['un', '##aff', '##able']);
    });

    it('keeps special tokens whole and strips the spaces around them', () => {
      const tokenizer = createTestTokenizer();
      expect(tokenizer.tokenize('[CLS] Hello [SEP]')).toEqual(['[CLS]', 'hello', '[SEP]']);
    });

    it('cuts text around an added special token', () => {
      const tokenizer = createTestTokenizer();
      expect(tokenizer.addSpecialTokens({ additionalSpecialTokens: ['<SEP>'] })).toBe(1);
      expect(tokenizer.fragment('Hello<SEP>World')).toEqual([
        { text: 'hello', special: false },
        { text: '<SEP>', special: true },
        { text: 'world', special: false },
      ]);
      expect(tokenizer.tokenize('Hello<SEP>World')).toEqual(['hello', '<SEP>', 'world']);
      expect(tokenizer.convertTokensToIds('<SEP>')).toBe(19);
    });

    it('does not lower-case special tokens', () => {
      const tokenizer = createTestTokenizer();
      tokenizer.addSpecialTokens({ additionalSpecialTokens: ['<Sp>'] });
      expect(tokenizer.tokenize('HELLO <Sp>')).toEqual(['hello', '<Sp>']);
    });

    it('stores ordinary added tokens lower-cased and matches them in any case', () => {
      const tokenizer = createTestTokenizer();
      expect(tokenizer.addTokens('<ENT>')).toBe(1);
      expect(tokenizer.getAddedVocab()).toEqual({ '<ent>': 19 });
      expect(tokenizer.tokenize('hello <ENT> world')).toEqual(['hello', '<ent>', 'world']);
    });

    it('keeps a single-word token special only where it stands alone', () => {
      const tokenizer = createTestTokenizer();
      tokenizer.addTokens(createAddedToken('ent', { singleWord: true }));
      expect(tokenizer.fragment('went ent')).toEqual([
        { text: 'went ', special: false },
        { text: 'ent', special: true },
      ]);
    });

    it('strips only the sides a token asks for', () => {
      const tokenizer = createTestTokenizer();
      tokenizer.addSpecialTokens({ additionalSpecialTokens: [createAddedToken('<m>', { lstrip: true })] });
      expect(tokenizer.fragment('hello <m> world')).toEqual([
        { text: 'hello', special: false },
        { text: '<m>', special: true },
        { text: ' world', special: false },
      ]);
    });

    it('runs character normalization and the pre-tokenize hook first', () => {
      const normalizing = createWordPieceTokenizer({
        vocab: [...WORDPIECE_TOKENS, '1'],
        doLowerCase: true,
        normalizeChars: true,
      });
      expect(normalizing.tokenize('①')).toEqual(['1']);

      const hooked = createWordPieceTokenizer({
        vocab: WORDPIECE_TOKENS,
        doLowerCase: true,
        preTokenize: (text) => text.replace(/_/g, ' '),
      });
      expect(hooked.tokenize('hello_world')).toEqual(['hello', 'world']);
    });

    it('returns nothing for empty text', () => {
      expect(createTestTokenizer().tokenize('')).toEqual([]);
    });
  });

  describe('vocabulary and special tokens', () => {
    it('reports sizes with and without added tokens', () => {
      const tokenizer = createTestTokenizer();
      expect(tokenizer.vocabSize).toBe(19);
      expect(tokenizer.size()).toBe(19);
      tokenizer.addTokens(['<a>', '<b>']);
      expect(tokenizer.vocabSize).toBe(19);
      expect(tokenizer.size()).toBe(21);
    });

    it('exposes the special tokens and their ids', () => {
      const tokenizer = createTestTokenizer();
      expect(tokenizer.getSpecialToken('clsToken')).toBe('[CLS]');
      expect(tokenizer.getSpecialToken('bosToken')).toBeUndefined();
      expect(tokenizer.getSpecialTokenId('sepToken')).toBe(3);
      expect(tokenizer.padTokenId).toBe(0);
      expect(tokenizer.allSpecialTokens).toEqual(['[UNK]', '[SEP]', '[PAD]', '[CLS]', '[MASK]']);
      expect(tokenizer.allSpecialIds).toEqual([1, 3, 0, 2, 4]);
      expect(tokenizer.noSplitTokens).toEqual(['[CLS]', '[MASK]', '[PAD]', '[SEP]', '[UNK]']);
    });

    it('rejects an unknown token that differs from the vocabulary', () => {
      const vocab = Vocab.fromTokens(WORDPIECE_TOKENS, { unkToken: '[UNK]' });
      const error = expectTokenizerError(
        () => createWordPieceTokenizer({ vocab, specialTokens: { unkToken: '[PAD]' } }),
        ERROR_CODES.USAGE_INVALID_VOCAB
      );
      expect(error.argument).toBe('unkToken');
    });
  });

  describe('conversion', () => {
    const tokenizer = createTestTokenizer();

    it('maps unknown tokens to the unknown id', () => {
      expect(tokenizer.convertTokensToIds(['hello', 'nope'])).toEqual([5, 1]);
    });

    it('maps ids back to tokens, optionally without special tokens', () => {
      expect(tokenizer.convertIdsToTokens(6)).toBe('world');
      expect(tokenizer.convertIdsToTokens([2, 5, 3])).toEqual(['[CLS]', 'hello', '[SEP]']);
      expect(tokenizer.convertIdsToTokens([2, 5, 3], true)).toEqual(['hello']);
    });

    it('rejects ids outside the vocabulary', () => {
      expectTokenizerError(() => tokenizer.convertIdsToTokens(999), ERROR_CODES.USAGE_UNKNOWN_ID);
    });

    it('joins continuation pieces', () => {
      expect(tokenizer.convertTokensToString(['un', '##aff', '##able', 'world'])).toBe('unaffable world');
    });
  });

  describe('decode', () => {
    it('joins tokens and cleans up spaces before punctuation', () => {
      const tokenizer = createTestTokenizer();
      expect(tokenizer.decode([2, 5, 10, 6, 11, 3])).toBe('[CLS] hello, world! [SEP]');
      expect(tokenizer.decode([2, 5, 10, 6, 11, 3], { skipSpecialTokens: true })).toBe('hello, world!');
      expect(tokenizer.decode([5, 10, 6], { cleanUpTokenizationSpaces: false })).toBe('hello , world');
    });

    it('emits added tokens verbatim', () => {
      const tokenizer = createTestTokenizer();
      tokenizer.addTokens('<ent>');
      expect(tokenizer.decode([5, 19, 6])).toBe('hello <ent> world');
      expect(tokenizer.decode([5, 19, 6], { spacesBetweenSpecialTokens: false })).toBe('hello<ent>world');
    });
  });

  describe('special tokens mask', () => {
    const tokenizer = createTestTokenizer();

    it('describes the assembled sequence', () => {
      expect(tokenizer.getSpecialTokensMask([5], [6])).toEqual([1, 0, 1, 0, 1]);
      expect(tokenizer.numSpecialTokensToAdd()).toBe(2);
      expect(tokenizer.numSpecialTokensToAdd(true)).toBe(3);
    });

    it('marks special ids in an already assembled sequence', () => {
      expect(tokenizer.getSpecialTokensMask([2, 5, 3], undefined, true)).toEqual([1, 0, 1]);
    });

    it('refuses a pair when the ids already carry special tokens', () => {
      expectTokenizerError(
        () => tokenizer.getSpecialTokensMask([2, 5, 3], [6], true),
        ERROR_CODES.USAGE_PAIR_WITH_SPECIAL_TOKENS
      );
    });
  });
});

describe('createBpeTokenizer', () => {
  const tokenizer = createBpeTokenizer({
    vocab: ['<unk>', '<s>', '</s>', '<pad>', '▁', 'l', 'o', 'w', 'e', 'r', '▁l', '▁lo', '▁low', 'er', '▁lower'],
    merges: ['▁ l', '▁l o', '▁lo w', 'e r', '▁low er'],
  });

  it('wraps sequences in bos and eos', () => {
    expect(tokenizer.tokenize('lower low')).toEqual(['▁lower', '▁low']);
    expect(tokenizer.encode('lower')).toEqual({
      inputIds: [1, 14, 2],
      tokenTypeIds: [0, 0, 0],
      attentionMask: [1, 1, 1],
    });
    expect(tokenizer.encode('lower', 'low').inputIds).toEqual([1, 14, 2, 12, 2]);
  });

  it('decodes word markers to spaces', () => {
    expect(tokenizer.decode([1, 14, 12, 2], { skipSpecialTokens: true })).toBe('lower low');
  });

  it('maps offsets without the word marker', () => {
    expect(tokenizer.getOffsetMapping('lower low')).toEqual([[0, 5], [6, 9]]);
  });
});
