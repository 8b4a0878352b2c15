/**
 * Tokenizer Defaults Config Schema
 *
 * Default values the tokenizer falls back to when an option is not given
 * at construction or call time.
 *
 * @module config/schema/tokenizer
 */

/** Side on which padding or truncation is applied */
export type SequenceSide = 'left' | 'right';

/** Encoding fields a model consumes, in order (the first is the primary input) */
export type ModelInputName =
  | 'inputIds'
  | 'tokenTypeIds'
  | 'attentionMask'
  | 'specialTokensMask'
  | 'positionIds';

/**
 * Tokenizer defaults.
 */
export interface TokenizerDefaultsSchema {
  /** Maximum sequence length assumed when a call does not pass one (default: 512) */
  modelMaxLength: number;

  /** Where padding goes (default: 'right') */
  paddingSide: SequenceSide;

  /** Which end truncation removes from (default: 'right') */
  truncationSide: SequenceSide;

  /** Token type id written into padded positions (default: 0) */
  padTokenTypeId: number;

  /** WordPiece: words longer than this become the unknown token (default: 100) */
  maxInputCharsPerWord: number;

  /** WordPiece continuation marker (default: '##') */
  continuationPrefix: string;

  /** BPE word-start marker replacing spaces (default: '▁') */
  spacePrefixChar: string;

  /** Run the clean-up pass on decoded text (default: true) */
  cleanUpTokenizationSpaces: boolean;

  /** Fields returned by default when a call leaves them unspecified */
  modelInputNames: ModelInputName[];
}

/** Default tokenizer configuration */
export const DEFAULT_TOKENIZER_DEFAULTS: TokenizerDefaultsSchema = {
  modelMaxLength: 512,
  paddingSide: 'right',
  truncationSide: 'right',
  padTokenTypeId: 0,
  maxInputCharsPerWord: 100,
  continuationPrefix: '##',
  spacePrefixChar: '▁',
  cleanUpTokenizationSpaces: true,
  modelInputNames: ['inputIds', 'tokenTypeIds', 'attentionMask'],
};
