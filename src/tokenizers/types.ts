/**
 * Tokenizer Types and Interfaces
 *
 * @module tokenizers/types
 */

import type { ModelInputName, SequenceSide } from '../config/schema/index.js';
import type { Vocab } from './vocab.js';

export type { ModelInputName, SequenceSide };

// ============================================================================
// Tokens
// ============================================================================

/**
 * A token with whitespace-handling metadata, used for special and added
 * tokens that are matched inside raw text.
 */
export interface AddedToken {
  content: string;
  /** Absorb whitespace on the left (strips the end of the preceding text) */
  lstrip: boolean;
  /** Absorb whitespace on the right (strips the start of the following text) */
  rstrip: boolean;
  /** Only match when the token stands as a whole word */
  singleWord: boolean;
  /** Token content is subject to lower-casing */
  normalized: boolean;
}

/** A token given either as plain content or with metadata */
export type TokenLike = string | AddedToken;

export function createAddedToken(
  content: string,
  flags: Partial<Omit<AddedToken, 'content'>> = {}
): AddedToken {
  return {
    content,
    lstrip: flags.lstrip ?? false,
    rstrip: flags.rstrip ?? false,
    singleWord: flags.singleWord ?? false,
    normalized: flags.normalized ?? true,
  };
}

export function tokenContent(token: TokenLike): string {
  return typeof token === 'string' ? token : token.content;
}

/** Special Token Configuration */
export interface SpecialTokensConfig {
  unkToken?: TokenLike;
  sepToken?: TokenLike;
  padToken?: TokenLike;
  clsToken?: TokenLike;
  maskToken?: TokenLike;
  bosToken?: TokenLike;
  eosToken?: TokenLike;
  additionalSpecialTokens?: TokenLike[];
}

/** Named special-token slots */
export type SpecialTokenRole = Exclude<keyof SpecialTokensConfig, 'additionalSpecialTokens'>;

export const SPECIAL_TOKEN_ROLES: readonly SpecialTokenRole[] = [
  'bosToken',
  'eosToken',
  'unkToken',
  'sepToken',
  'padToken',
  'clsToken',
  'maskToken',
];

/** Ids of the named special tokens that resolve in the vocabulary */
export type SpecialTokenIds = Partial<Record<SpecialTokenRole, number>>;

// ============================================================================
// Encoding
// ============================================================================

/** Half-open [start, end) character span into the original text */
export type OffsetSpan = readonly [start: number, end: number];

export type PaddingStrategy = 'doNotPad' | 'longest' | 'maxLength';

export type TruncationStrategy = 'doNotTruncate' | 'longestFirst' | 'onlyFirst' | 'onlySecond';

/** Text, pre-split tokens (or words) or ids */
export type TextInput = string | string[] | number[];

export interface SequencePair {
  text: TextInput;
  textPair: TextInput;
}

export type EncodeInput = TextInput | SequencePair;

/** Encoding Options */
export interface EncodeOptions {
  /** Insert special tokens via the sequence assembler (default: true) */
  addSpecialTokens?: boolean;
  /** true means 'longest' */
  padding?: boolean | PaddingStrategy;
  /** true means 'longestFirst' */
  truncation?: boolean | TruncationStrategy;
  maxLength?: number;
  /** Overlap between consecutive windows, or overflow kept on truncation (default: 0) */
  stride?: number;
  padToMultipleOf?: number;
  /** String arrays are words to tokenize rather than tokens */
  isSplitIntoWords?: boolean;
  returnTokenTypeIds?: boolean;
  returnAttentionMask?: boolean;
  returnOverflowingTokens?: boolean;
  returnSpecialTokensMask?: boolean;
  returnOffsetsMapping?: boolean;
  returnPositionIds?: boolean;
  returnLength?: boolean;
  /** Warn about sequences longer than the model accepts (default: true) */
  verbose?: boolean;
}

/** Encoding of one example (or one window of it) */
export interface EncodingRecord {
  inputIds: number[];
  tokenTypeIds?: number[];
  attentionMask?: number[];
  specialTokensMask?: number[];
  offsetMapping?: OffsetSpan[];
  positionIds?: number[];
  /** Unpadded sequence length */
  length?: number;
  overflowingTokens?: number[];
  numTruncatedTokens?: number;
  /** Index of the input example a window was cut from */
  overflowToSample?: number;
}

/** Field-wise batch of EncodingRecords, one entry per produced example */
export interface BatchEncodingRecord {
  inputIds: number[][];
  tokenTypeIds?: number[][];
  attentionMask?: number[][];
  specialTokensMask?: number[][];
  offsetMapping?: OffsetSpan[][];
  positionIds?: number[][];
  length?: number[];
  overflowingTokens?: number[][];
  numTruncatedTokens?: number[];
  overflowToSample?: number[];
}

// ============================================================================
// Pluggable Stages
// ============================================================================

/**
 * Sub-word scheme applied to every plain fragment of text.
 */
export interface SubTokenizer {
  /** Marker starting tokens that continue (or, for BPE, start) a word; null if none */
  readonly continuationPrefix: string | null;
  /** Split a fragment into sub-word tokens */
  tokenizeWord(text: string): string[];
  /**
   * Same split as tokenizeWord, with unknown-token outputs replaced by the
   * surface text that produced them.
   */
  alignmentTokens(text: string): string[];
  /** Join tokens back into text */
  detokenize(tokens: string[]): string;
}

/**
 * Model-specific layout of special tokens around one or two sequences.
 */
export interface SequenceAssembler {
  buildInputsWithSpecialTokens(ids: number[], pairIds?: number[]): number[];
  createTokenTypeIdsFromSequences(ids: number[], pairIds?: number[]): number[];
  buildOffsetMappingWithSpecialTokens(mapping: OffsetSpan[], pairMapping?: OffsetSpan[]): OffsetSpan[];
  /** 1 at the positions buildInputsWithSpecialTokens would insert */
  getSpecialTokensMask(ids: number[], pairIds?: number[]): number[];
  numSpecialTokensToAdd(pair: boolean): number;
}

/** Builds an assembler once the tokenizer's special token ids are known */
export type SequenceAssemblerFactory = (ids: SpecialTokenIds) => SequenceAssembler;

/** Tokenizer Options */
export interface TokenizerOptions {
  /** Base vocabulary */
  vocab: Vocab;
  subTokenizer: SubTokenizer;
  specialTokens?: SpecialTokensConfig;
  /** Default: no special tokens are inserted */
  assembler?: SequenceAssemblerFactory;
  /** Lower-case everything except no-split and special tokens (default: false) */
  doLowerCase?: boolean;
  /** Accent stripping for offset mapping; undefined follows doLowerCase */
  stripAccents?: boolean;
  /** Run normalizeChars before any other step (default: false) */
  normalizeChars?: boolean;
  /** Model-specific rewrite applied to raw text before splitting */
  preTokenize?: (text: string) => string;
  modelMaxLength?: number;
  paddingSide?: SequenceSide;
  truncationSide?: SequenceSide;
  padTokenTypeId?: number;
  cleanUpTokenizationSpaces?: boolean;
  modelInputNames?: ModelInputName[];
}

/** A piece of text after no-split matching */
export interface Fragment {
  text: string;
  /** Fragment is a no-split token */
  special: boolean;
}

/** Decoding Options */
export interface DecodeOptions {
  skipSpecialTokens?: boolean;
  cleanUpTokenizationSpaces?: boolean;
  spacesBetweenSpecialTokens?: boolean;
}
