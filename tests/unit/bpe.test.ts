import { describe, expect, it } from 'vitest';

import { BpeSubTokenizer } from '../../src/tokenizers/bpe.js';
import { Vocab } from '../../src/tokenizers/vocab.js';

const vocab = Vocab.fromTokens(
  ['<unk>', '▁', 'l', 'o', 'w', 'e', 'r', '▁l', '▁lo', '▁low', 'er', '▁lower'],
  { unkToken: '<unk>' }
);
const merges = ['▁ l', '▁l o', '▁lo w', 'e r', '▁low er'];

describe('tokenizers/bpe', () => {
  const bpe = new BpeSubTokenizer(vocab, merges, { unkToken: '<unk>' });

  it('applies merges lowest rank first', () => {
    expect(bpe.tokenizeWord('lower')).toEqual(['▁lower']);
    expect(bpe.tokenizeWord('low lower')).toEqual(['▁low', '▁lower']);
  });

  it('stops when no adjacent pair has a rank', () => {
    expect(bpe.alignmentTokens('lowest')).toEqual(['▁low', 'e', 's', 't']);
  });

  it('replaces pieces outside the vocabulary with the unknown token', () => {
    expect(bpe.tokenizeWord('lowest')).toEqual(['▁low', 'e', '<unk>', '<unk>']);
  });

  it('keeps unknown pieces without an unknown token', () => {
    const bare = new BpeSubTokenizer(vocab, merges);
    expect(bare.tokenizeWord('lowest')).toEqual(['▁low', 'e', 's', 't']);
  });

  it('exposes the space prefix as the word marker', () => {
    expect(bpe.continuationPrefix).toBe('▁');
    expect(new BpeSubTokenizer(vocab, merges, { spacePrefixChar: 'Ġ' }).continuationPrefix).toBe('Ġ');
  });

  it('turns word markers back into spaces', () => {
    expect(bpe.detokenize(['▁lower', '▁low', 'e'])).toBe('lower lowe');
  });
});
