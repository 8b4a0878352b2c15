/**
 * Pretrained Tokenizer
 *
 * Tokenize pipeline shared by every sub-word scheme: optional character
 * normalization and pre-tokenization, case folding outside protected
 * tokens, no-split matching, whitespace stripping around special tokens,
 * then the pluggable sub-tokenizer on what remains. Owns the added-token
 * overlay and delegates encoding and offset mapping.
 *
 * Instances are single-writer: addTokens() and addSpecialTokens() must not
 * run concurrently with each other or with any other call on the same
 * instance. Once no more tokens are added, every method is read-only.
 *
 * @module tokenizers/base
 */

import { getRuntimeConfig } from '../config/runtime.js';
import { log } from '../debug/index.js';
import { createTokenizerError, ERROR_CODES } from '../errors/tokenizer-error.js';
import { isEndOfWord, isStartOfWord, normalizeChars } from '../text/index.js';
import { AddedVocabulary } from './added-tokens.js';
import { PlainAssembler } from './assembly.js';
import { cleanUpTokenization } from './cleanup.js';
import { BatchEncoder } from './encoder.js';
import { OffsetMapper } from './offsets.js';
import {
  SPECIAL_TOKEN_ROLES,
  tokenContent,
  type BatchEncodingRecord,
  type DecodeOptions,
  type EncodeInput,
  type EncodeOptions,
  type EncodingRecord,
  type Fragment,
  type ModelInputName,
  type OffsetSpan,
  type SequenceAssembler,
  type SequenceAssemblerFactory,
  type SequenceSide,
  type SpecialTokenIds,
  type SpecialTokenRole,
  type SpecialTokensConfig,
  type SubTokenizer,
  type TextInput,
  type TokenizerOptions,
  type TokenLike,
} from './types.js';
import type { Vocab } from './vocab.js';

const REGEX_SYNTAX = /[.*+?^${}()|[\]\\/]/g;

function escapeRegExp(text: string): string {
  return text.replace(REGEX_SYNTAX, '\\$&');
}

export class PretrainedTokenizer {
  readonly vocab: Vocab;
  readonly subTokenizer: SubTokenizer;
  readonly doLowerCase: boolean;
  readonly stripAccents: boolean | undefined;
  readonly normalizesChars: boolean;
  readonly modelMaxLength: number;
  readonly paddingSide: SequenceSide;
  readonly truncationSide: SequenceSide;
  readonly padTokenTypeId: number;
  readonly cleanUpTokenizationSpaces: boolean;
  readonly modelInputNames: readonly ModelInputName[];

  private added: AddedVocabulary;
  private specialTokens = new Map<SpecialTokenRole, TokenLike>();
  private additionalSpecialTokens: TokenLike[] = [];
  private preTokenizeHook: ((text: string) => string) | undefined;
  private assemblerFactory: SequenceAssemblerFactory;
  private sequenceAssembler: SequenceAssembler;
  private offsetMapper: OffsetMapper;
  private batchEncoder: BatchEncoder;

  constructor(options: TokenizerOptions) {
    const defaults = getRuntimeConfig().tokenizer;
    this.vocab = options.vocab;
    this.subTokenizer = options.subTokenizer;
    this.doLowerCase = options.doLowerCase ?? false;
    this.stripAccents = options.stripAccents;
    this.normalizesChars = options.normalizeChars ?? false;
    this.preTokenizeHook = options.preTokenize;
    this.modelMaxLength = options.modelMaxLength ?? defaults.modelMaxLength;
    this.paddingSide = options.paddingSide ?? defaults.paddingSide;
    this.truncationSide = options.truncationSide ?? defaults.truncationSide;
    this.padTokenTypeId = options.padTokenTypeId ?? defaults.padTokenTypeId;
    this.cleanUpTokenizationSpaces = options.cleanUpTokenizationSpaces ?? defaults.cleanUpTokenizationSpaces;
    this.modelInputNames = [...(options.modelInputNames ?? defaults.modelInputNames)];

    this.added = new AddedVocabulary(this.vocab, { doLowerCase: this.doLowerCase });

    const specialTokens: SpecialTokensConfig = { ...options.specialTokens };
    if (specialTokens.unkToken === undefined && this.vocab.unkToken !== undefined) {
      specialTokens.unkToken = this.vocab.unkToken;
    }
    this.assignSpecialTokens(specialTokens);
    this.added.add(this.allSpecialTokensExtended, true);

    this.assemblerFactory = options.assembler ?? (() => new PlainAssembler());
    this.sequenceAssembler = this.assemblerFactory(this.specialTokenIds());
    this.offsetMapper = new OffsetMapper(this);
    this.batchEncoder = new BatchEncoder(this);

    log.debug(
      'Tokenizer',
      `Created: ${this.vocab.size} base tokens, ${this.added.size} added, ` +
      `${this.added.noSplitTokens.length} no-split, lowerCase=${this.doLowerCase}`
    );
  }

  // ==========================================================================
  // Vocabulary
  // ==========================================================================

  /** Size of the base vocabulary (without added tokens) */
  get vocabSize(): number {
    return this.vocab.size;
  }

  /** Size of the full vocabulary with added tokens */
  size(): number {
    return this.vocab.size + this.added.size;
  }

  /** Added tokens as token -> id */
  getAddedVocab(): Record<string, number> {
    return Object.fromEntries(this.added.encoder);
  }

  /** Sorted tokens that are never split */
  get noSplitTokens(): readonly string[] {
    return this.added.noSplitTokens;
  }

  get assembler(): SequenceAssembler {
    return this.sequenceAssembler;
  }

  /**
   * Add tokens to the vocabulary. Tokens already known (or equal to the
   * unknown token) are skipped.
   *
   * @returns Number of tokens that received a new id
   */
  addTokens(tokens: TokenLike | readonly TokenLike[], special = false): number {
    const list: readonly unknown[] = Array.isArray(tokens) ? tokens : [tokens];
    return this.added.add(list, special);
  }

  /**
   * Fill special-token slots and add their tokens. Slots not given keep
   * their current token.
   *
   * @returns Number of tokens that received a new id
   */
  addSpecialTokens(config: SpecialTokensConfig): number {
    this.assignSpecialTokens(config);
    const given: TokenLike[] = [];
    for (const role of SPECIAL_TOKEN_ROLES) {
      const token = config[role];
      if (token !== undefined) given.push(token);
    }
    given.push(...(config.additionalSpecialTokens ?? []));

    const added = this.added.add(given, true);
    this.sequenceAssembler = this.assemblerFactory(this.specialTokenIds());
    return added;
  }

  private assignSpecialTokens(config: SpecialTokensConfig): void {
    const unk = config.unkToken;
    if (unk !== undefined && tokenContent(unk) !== this.vocab.unkToken) {
      throw createTokenizerError(
        ERROR_CODES.USAGE_INVALID_VOCAB,
        `[Tokenizer] unkToken "${tokenContent(unk)}" does not match the vocabulary's unknown token`,
        { argument: 'unkToken' }
      );
    }
    for (const role of SPECIAL_TOKEN_ROLES) {
      const token = config[role];
      if (token !== undefined) {
        this.specialTokens.set(role, token);
      }
    }
    if (config.additionalSpecialTokens) {
      this.additionalSpecialTokens = [...config.additionalSpecialTokens];
    }
  }

  // ==========================================================================
  // Special Tokens
  // ==========================================================================

  getSpecialToken(role: SpecialTokenRole): string | undefined {
    const token = this.specialTokens.get(role);
    return token === undefined ? undefined : tokenContent(token);
  }

  getSpecialTokenId(role: SpecialTokenRole): number | undefined {
    const token = this.getSpecialToken(role);
    return token === undefined ? undefined : this.added.tokenToId(token);
  }

  get padTokenId(): number | undefined {
    return this.getSpecialTokenId('padToken');
  }

  /** Slot tokens then additional special tokens, first occurrence of each content */
  get allSpecialTokensExtended(): TokenLike[] {
    const seen = new Set<string>();
    const output: TokenLike[] = [];
    const candidates = [...SPECIAL_TOKEN_ROLES.map((role) => this.specialTokens.get(role)), ...this.additionalSpecialTokens];
    for (const token of candidates) {
      if (token === undefined || seen.has(tokenContent(token))) continue;
      seen.add(tokenContent(token));
      output.push(token);
    }
    return output;
  }

  get allSpecialTokens(): string[] {
    return this.allSpecialTokensExtended.map(tokenContent);
  }

  get allSpecialIds(): number[] {
    const ids: number[] = [];
    for (const token of this.allSpecialTokens) {
      const id = this.added.tokenToId(token);
      if (id !== undefined) ids.push(id);
    }
    return ids;
  }

  private specialTokenIds(): SpecialTokenIds {
    const ids: SpecialTokenIds = {};
    for (const role of SPECIAL_TOKEN_ROLES) {
      const id = this.getSpecialTokenId(role);
      if (id !== undefined) ids[role] = id;
    }
    return ids;
  }

  // ==========================================================================
  // Tokenization
  // ==========================================================================

  /**
   * Converts a string into a sequence of tokens. Added and special tokens
   * are never split.
   */
  tokenize(text: string): string[] {
    const tokens: string[] = [];
    for (const fragment of this.fragment(text)) {
      if (fragment.special) {
        tokens.push(fragment.text);
      } else {
        tokens.push(...this.subTokenizer.tokenizeWord(fragment.text));
      }
    }
    return tokens;
  }

  /**
   * Character normalization (when enabled) followed by the pre-tokenize hook.
   */
  prepareForTokenization(text: string): string {
    const normalized = this.normalizesChars ? normalizeChars(text) : text;
    return this.preTokenizeHook ? this.preTokenizeHook(normalized) : normalized;
  }

  /**
   * Split text into no-split fragments and plain runs, with whitespace next
   * to special fragments stripped and empty fragments dropped.
   */
  fragment(text: string): Fragment[] {
    let prepared = this.prepareForTokenization(text);
    if (this.doLowerCase) {
      prepared = this.lowerCaseOutsideProtected(prepared);
    }

    const noSplit = new Set(this.added.noSplitTokens);
    const fragments = this.demoteBrokenSingleWords(
      this.added.trie.split(prepared).map((piece) => ({ text: piece, special: noSplit.has(piece) }))
    );

    // ["This is something", "<special>", "  else"] -> ["This is something", "<special>", "else"]
    for (let i = 0; i < fragments.length; i++) {
      if (!fragments[i].special) continue;
      const meta = this.added.metadata.get(fragments[i].text);
      const left = i > 0 ? fragments[i - 1] : undefined;
      const right = i < fragments.length - 1 ? fragments[i + 1] : undefined;
      if (right && (meta === undefined || meta.rstrip)) {
        right.text = right.text.trimStart();
      }
      if (left && (meta === undefined || meta.lstrip)) {
        left.text = left.text.trimEnd();
      }
    }

    return fragments.filter((fragment) => fragment.text !== '');
  }

  /**
   * Lower-case every character except inside no-split and special tokens.
   */
  private lowerCaseOutsideProtected(text: string): string {
    // Longest first so a token is never shadowed by one of its prefixes.
    const protectedTokens = [...this.added.noSplitTokens, ...this.allSpecialTokens]
      .filter((t) => t !== '')
      .sort((a, b) => b.length - a.length);
    if (protectedTokens.length === 0) {
      return Array.from(text, (ch) => ch.toLowerCase()).join('');
    }
    const pattern = new RegExp(`(${protectedTokens.map(escapeRegExp).join('|')})|(.)`, 'gsu');
    return text.replace(pattern, (match: string, kept: string | undefined) =>
      kept !== undefined ? kept : match.toLowerCase()
    );
  }

  /**
   * A singleWord token stays special only where it stands as a whole word;
   * elsewhere it becomes plain text and joins its plain neighbours.
   */
  private demoteBrokenSingleWords(fragments: Fragment[]): Fragment[] {
    const output: Fragment[] = [];
    fragments.forEach((fragment, i) => {
      let special = fragment.special;
      if (special && this.added.metadata.get(fragment.text)?.singleWord) {
        const left = fragments[i - 1];
        const right = fragments[i + 1];
        special = (left === undefined || isEndOfWord(left.text)) &&
          (right === undefined || isStartOfWord(right.text));
      }
      const previous = output[output.length - 1];
      if (!special && previous !== undefined && !previous.special) {
        previous.text += fragment.text;
      } else {
        output.push({ text: fragment.text, special });
      }
    });
    return output;
  }

  // ==========================================================================
  // Conversion
  // ==========================================================================

  /**
   * Token(s) to id(s), checking added tokens first. Unknown tokens map to
   * the unknown token's id, or undefined without one.
   */
  convertTokensToIds(tokens: string): number | undefined;
  convertTokensToIds(tokens: readonly string[]): Array<number | undefined>;
  convertTokensToIds(tokens: string | readonly string[]): number | undefined | Array<number | undefined> {
    if (typeof tokens === 'string') {
      return this.added.tokenToId(tokens);
    }
    return tokens.map((token) => this.added.tokenToId(token));
  }

  /**
   * Id(s) to token(s), checking added tokens first.
   */
  convertIdsToTokens(ids: number): string;
  convertIdsToTokens(ids: readonly number[], skipSpecialTokens?: boolean): string[];
  convertIdsToTokens(ids: number | readonly number[], skipSpecialTokens = false): string | string[] {
    if (typeof ids === 'number') {
      return this.idToToken(ids);
    }
    const specialIds = skipSpecialTokens ? new Set(this.allSpecialIds) : null;
    const tokens: string[] = [];
    for (const id of ids) {
      if (specialIds?.has(id)) continue;
      tokens.push(this.idToToken(id));
    }
    return tokens;
  }

  private idToToken(id: number): string {
    const token = this.added.idToToken(id);
    if (token === undefined) {
      throw createTokenizerError(
        ERROR_CODES.USAGE_UNKNOWN_ID,
        `[Tokenizer] Id ${id} is not in the vocabulary (size ${this.size()})`,
        { argument: 'ids' }
      );
    }
    return token;
  }

  /**
   * Join tokens back into text with the sub-tokenizer's rules.
   */
  convertTokensToString(tokens: string[]): string {
    return this.subTokenizer.detokenize(tokens);
  }

  // ==========================================================================
  // Encoding and Decoding
  // ==========================================================================

  /**
   * Character span of every token of tokenize(text) in the original text.
   */
  getOffsetMapping(text: string): OffsetSpan[] {
    return this.offsetMapper.map(text);
  }

  encode(text: TextInput, textPair?: TextInput, options: EncodeOptions = {}): EncodingRecord {
    return this.batchEncoder.encode(text, textPair, options);
  }

  encodeBatch(inputs: readonly EncodeInput[], options: EncodeOptions = {}): BatchEncodingRecord {
    return this.batchEncoder.encodeBatch(inputs, options);
  }

  /**
   * Ids back to text. Added tokens are emitted verbatim; runs of ordinary
   * tokens are joined by the sub-tokenizer.
   */
  decode(ids: readonly number[], options: DecodeOptions = {}): string {
    const tokens = this.convertIdsToTokens(ids, options.skipSpecialTokens ?? false);

    const subTexts: string[] = [];
    let current: string[] = [];
    for (const token of tokens) {
      if (this.added.encoder.has(token)) {
        if (current.length > 0) {
          subTexts.push(this.convertTokensToString(current));
          current = [];
        }
        subTexts.push(token);
      } else {
        current.push(token);
      }
    }
    if (current.length > 0) {
      subTexts.push(this.convertTokensToString(current));
    }

    const text = subTexts.join((options.spacesBetweenSpecialTokens ?? true) ? ' ' : '');
    return (options.cleanUpTokenizationSpaces ?? this.cleanUpTokenizationSpaces)
      ? cleanUpTokenization(text)
      : text;
  }

  /**
   * 1 for special tokens, 0 for sequence tokens. Without
   * `alreadyHasSpecialTokens` the mask describes the sequence the assembler
   * would build from `ids` and `pairIds`.
   */
  getSpecialTokensMask(ids: number[], pairIds?: number[], alreadyHasSpecialTokens = false): number[] {
    if (alreadyHasSpecialTokens) {
      if (pairIds !== undefined) {
        throw createTokenizerError(
          ERROR_CODES.USAGE_PAIR_WITH_SPECIAL_TOKENS,
          '[Tokenizer] Do not pass pairIds when the ids already contain special tokens',
          { argument: 'pairIds' }
        );
      }
      const specialIds = new Set(this.allSpecialIds);
      return ids.map((id) => (specialIds.has(id) ? 1 : 0));
    }
    return this.sequenceAssembler.getSpecialTokensMask(ids, pairIds);
  }

  /**
   * Number of special tokens the assembler adds around one sequence or a pair.
   */
  numSpecialTokensToAdd(pair = false): number {
    return this.sequenceAssembler.numSpecialTokensToAdd(pair);
  }
}
