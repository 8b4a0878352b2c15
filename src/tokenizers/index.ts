/**
 * Tokenizers
 *
 * Factories wiring a vocabulary, a sub-word scheme and a special-token
 * layout into a PretrainedTokenizer.
 *
 * @module tokenizers
 */

import { BertAssembler, BosEosAssembler } from './assembly.js';
import { PretrainedTokenizer } from './base.js';
import { BasicTokenizer } from './basic.js';
import { BpeSubTokenizer } from './bpe.js';
import { tokenContent, type SpecialTokensConfig, type TokenizerOptions } from './types.js';
import { Vocab } from './vocab.js';
import { WordPieceSubTokenizer } from './wordpiece.js';

/** A ready Vocab, a token -> id mapping, or tokens in id order */
export type VocabSource = Vocab | Record<string, number> | readonly string[];

type SharedOptions = Omit<TokenizerOptions, 'vocab' | 'subTokenizer' | 'assembler' | 'specialTokens'>;

export interface WordPieceTokenizerOptions extends SharedOptions {
  vocab: VocabSource;
  /** Merged over [UNK] [SEP] [PAD] [CLS] [MASK] */
  specialTokens?: SpecialTokensConfig;
  /** Whitespace/punctuation pre-split before WordPiece (default: true) */
  doBasicTokenize?: boolean;
  tokenizeCjkChars?: boolean;
  neverSplit?: string[];
  continuationPrefix?: string;
  maxInputCharsPerWord?: number;
}

export interface BpeTokenizerOptions extends SharedOptions {
  vocab: VocabSource;
  /** "a b" merge rules in rank order */
  merges: readonly string[];
  /** Merged over <unk> <s> </s> <pad> */
  specialTokens?: SpecialTokensConfig;
  spacePrefixChar?: string;
  addBosToken?: boolean;
  addEosToken?: boolean;
}

const WORDPIECE_SPECIAL_TOKENS: SpecialTokensConfig = {
  unkToken: '[UNK]',
  sepToken: '[SEP]',
  padToken: '[PAD]',
  clsToken: '[CLS]',
  maskToken: '[MASK]',
};

const BPE_SPECIAL_TOKENS: SpecialTokensConfig = {
  unkToken: '<unk>',
  bosToken: '<s>',
  eosToken: '</s>',
  padToken: '<pad>',
};

function toVocab(source: VocabSource, unkToken: string | undefined): Vocab {
  if (source instanceof Vocab) {
    return source;
  }
  if (isTokenList(source)) {
    return Vocab.fromTokens(source, { unkToken });
  }
  return Vocab.fromDict(source, { unkToken });
}

function isTokenList(source: readonly string[] | Record<string, number>): source is readonly string[] {
  return Array.isArray(source);
}

/**
 * BERT-style tokenizer: basic pre-split, WordPiece, `[CLS] A [SEP] B [SEP]`.
 *
 * @example
 * ```typescript
 * const tokenizer = createWordPieceTokenizer({
 *   vocab: await loadVocabulary('vocab.txt', { unkToken: '[UNK]' }),
 *   doLowerCase: true,
 * });
 * tokenizer.encode('Hello world', 'Second sentence', { maxLength: 32, truncation: true });
 * ```
 */
export function createWordPieceTokenizer(options: WordPieceTokenizerOptions): PretrainedTokenizer {
  const {
    vocab: source,
    specialTokens: overrides,
    doBasicTokenize = true,
    tokenizeCjkChars,
    neverSplit,
    continuationPrefix,
    maxInputCharsPerWord,
    ...shared
  } = options;
  const specialTokens = { ...WORDPIECE_SPECIAL_TOKENS, ...overrides };
  const unkToken = specialTokens.unkToken === undefined ? undefined : tokenContent(specialTokens.unkToken);
  const vocab = toVocab(source, unkToken);

  const basic = doBasicTokenize
    ? new BasicTokenizer({
        doLowerCase: shared.doLowerCase,
        stripAccents: shared.stripAccents,
        tokenizeCjkChars,
        neverSplit,
      })
    : undefined;

  return new PretrainedTokenizer({
    ...shared,
    vocab,
    specialTokens,
    subTokenizer: new WordPieceSubTokenizer(vocab, {
      unkToken: unkToken ?? '[UNK]',
      continuationPrefix,
      maxInputCharsPerWord,
      basic,
    }),
    assembler: BertAssembler.factory(),
  });
}

/**
 * SentencePiece-style BPE tokenizer: `▁`-prefixed words, ranked merges,
 * `<s> A </s> B </s>`. Accents are kept for offset mapping unless
 * stripAccents is set.
 */
export function createBpeTokenizer(options: BpeTokenizerOptions): PretrainedTokenizer {
  const {
    vocab: source,
    merges,
    specialTokens: overrides,
    spacePrefixChar,
    addBosToken,
    addEosToken,
    ...shared
  } = options;
  const specialTokens = { ...BPE_SPECIAL_TOKENS, ...overrides };
  const unkToken = specialTokens.unkToken === undefined ? undefined : tokenContent(specialTokens.unkToken);
  const vocab = toVocab(source, unkToken);

  return new PretrainedTokenizer({
    ...shared,
    stripAccents: shared.stripAccents ?? false,
    vocab,
    specialTokens,
    subTokenizer: new BpeSubTokenizer(vocab, merges, { spacePrefixChar, unkToken }),
    assembler: BosEosAssembler.factory({ addBosToken, addEosToken }),
  });
}

export { PretrainedTokenizer } from './base.js';
export { AddedVocabulary, type AddedVocabularyOptions } from './added-tokens.js';
export { BasicTokenizer, type BasicTokenizerOptions } from './basic.js';
export { WordPieceSubTokenizer, type WordPieceOptions } from './wordpiece.js';
export { BpeSubTokenizer, type BpeOptions } from './bpe.js';
export { PlainAssembler, BertAssembler, BosEosAssembler, type BosEosOptions } from './assembly.js';
export { truncateSequences, type TruncationResult } from './truncation.js';
export { padBatch, type PaddingOptions } from './padding.js';
export { cleanUpTokenization } from './cleanup.js';
export { OffsetMapper } from './offsets.js';
export { BatchEncoder } from './encoder.js';
export { Trie } from './trie.js';
export { Vocab, loadVocabulary, saveVocabulary, type VocabOptions } from './vocab.js';
export * from './types.js';
