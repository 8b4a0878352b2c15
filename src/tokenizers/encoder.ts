/**
 * Batch Encoder
 *
 * Turns text, tokens or ids (alone or paired) into model inputs: special
 * tokens, truncation, sliding windows over long second sequences, padding
 * and the optional per-token fields.
 *
 * @module tokenizers/encoder
 */

import { log } from '../debug/index.js';
import { createTokenizerError, ERROR_CODES } from '../errors/tokenizer-error.js';
import { padBatch } from './padding.js';
import { truncateSequences } from './truncation.js';
import type { PretrainedTokenizer } from './base.js';
import type {
  BatchEncodingRecord,
  EncodeInput,
  EncodeOptions,
  EncodingRecord,
  OffsetSpan,
  PaddingStrategy,
  SequencePair,
  TextInput,
  TruncationStrategy,
} from './types.js';

/** EncodeOptions with every default applied */
interface ResolvedEncodeOptions {
  addSpecialTokens: boolean;
  padding: PaddingStrategy;
  truncation: TruncationStrategy;
  maxLength: number | undefined;
  stride: number;
  padToMultipleOf: number | undefined;
  isSplitIntoWords: boolean;
  returnTokenTypeIds: boolean;
  returnAttentionMask: boolean;
  returnOverflowingTokens: boolean;
  returnSpecialTokensMask: boolean;
  returnOffsetsMapping: boolean;
  returnPositionIds: boolean;
  returnLength: boolean;
  verbose: boolean;
}

/** One example resolved to ids, with offsets when requested */
interface PreparedExample {
  ids: number[];
  pairIds: number[] | undefined;
  mapping: OffsetSpan[] | undefined;
  pairMapping: OffsetSpan[] | undefined;
}

function isSequencePair(input: EncodeInput): input is SequencePair {
  return typeof input === 'object' && !Array.isArray(input);
}

function isStringArray(value: readonly unknown[]): value is string[] {
  return value.every((item) => typeof item === 'string');
}

function isIdArray(value: readonly unknown[]): value is number[] {
  return value.every((item) => typeof item === 'number' && Number.isInteger(item) && item >= 0);
}

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

export class BatchEncoder {
  private tokenizer: PretrainedTokenizer;
  private warnedTooLong = false;

  constructor(tokenizer: PretrainedTokenizer) {
    this.tokenizer = tokenizer;
  }

  /**
   * Encode one sequence or pair. Overflow beyond maxLength is truncated
   * (and reported with returnOverflowingTokens), never windowed.
   */
  encode(text: TextInput, textPair: TextInput | undefined, options: EncodeOptions = {}): EncodingRecord {
    const resolved = this.resolveOptions(options);
    const example = this.prepareExample(text, textPair, resolved);
    const record = this.prepareForModel(example, resolved);
    return firstRecord(this.pad([record], resolved));
  }

  /**
   * Encode every input and pad them as one batch. With a stride, pairs whose
   * second sequence does not fit are split into overlapping windows, each
   * becoming its own example tagged with overflowToSample.
   */
  encodeBatch(inputs: readonly EncodeInput[], options: EncodeOptions = {}): BatchEncodingRecord {
    const resolved = this.resolveOptions(options);
    const records: EncodingRecord[] = [];

    inputs.forEach((input, exampleIndex) => {
      const example = isSequencePair(input)
        ? this.prepareExample(input.text, input.textPair, resolved)
        : this.prepareExample(input, undefined, resolved);

      if (resolved.stride > 0 && example.pairIds !== undefined && example.pairIds.length > 0) {
        records.push(...this.slideWindows(example, exampleIndex, resolved));
        return;
      }

      const record = this.prepareForModel(example, resolved);
      if (resolved.stride > 0) {
        record.overflowToSample = exampleIndex;
      }
      records.push(record);
    });

    return this.pad(records, resolved);
  }

  private resolveOptions(options: EncodeOptions): ResolvedEncodeOptions {
    const tokenizer = this.tokenizer;
    const padding: PaddingStrategy = options.padding === true
      ? 'longest'
      : options.padding === false || options.padding === undefined ? 'doNotPad' : options.padding;
    const truncation: TruncationStrategy = options.truncation === true
      ? 'longestFirst'
      : options.truncation === false || options.truncation === undefined ? 'doNotTruncate' : options.truncation;

    let maxLength = options.maxLength;
    if (maxLength === undefined && (truncation !== 'doNotTruncate' || padding === 'maxLength')) {
      maxLength = tokenizer.modelMaxLength;
    }
    if (maxLength !== undefined && (!Number.isInteger(maxLength) || maxLength < 0)) {
      throw createTokenizerError(
        ERROR_CODES.USAGE_INVALID_MAX_LENGTH,
        `[Tokenizer] maxLength must be a non-negative integer, got ${maxLength}`,
        { argument: 'maxLength' }
      );
    }

    const addSpecialTokens = options.addSpecialTokens ?? true;
    if (options.returnTokenTypeIds && !addSpecialTokens) {
      throw createTokenizerError(
        ERROR_CODES.USAGE_TOKEN_TYPE_IDS_WITHOUT_SPECIAL_TOKENS,
        '[Tokenizer] returnTokenTypeIds needs addSpecialTokens; ' +
        'set addSpecialTokens to true or leave returnTokenTypeIds unset',
        { argument: 'returnTokenTypeIds' }
      );
    }

    return {
      addSpecialTokens,
      padding,
      truncation,
      maxLength,
      stride: options.stride ?? 0,
      padToMultipleOf: options.padToMultipleOf,
      isSplitIntoWords: options.isSplitIntoWords ?? false,
      returnTokenTypeIds: options.returnTokenTypeIds ?? tokenizer.modelInputNames.includes('tokenTypeIds'),
      returnAttentionMask: options.returnAttentionMask ?? tokenizer.modelInputNames.includes('attentionMask'),
      returnOverflowingTokens: options.returnOverflowingTokens ?? false,
      returnSpecialTokensMask: options.returnSpecialTokensMask ?? false,
      returnOffsetsMapping: options.returnOffsetsMapping ?? false,
      returnPositionIds: options.returnPositionIds ?? false,
      returnLength: options.returnLength ?? false,
      verbose: options.verbose ?? true,
    };
  }

  // ==========================================================================
  // Input Resolution
  // ==========================================================================

  private prepareExample(
    text: TextInput,
    textPair: TextInput | undefined,
    options: ResolvedEncodeOptions
  ): PreparedExample {
    return {
      ids: this.toIds(text, 'text', options),
      pairIds: textPair === undefined ? undefined : this.toIds(textPair, 'textPair', options),
      mapping: options.returnOffsetsMapping ? this.toOffsets(text, 'text') : undefined,
      pairMapping: options.returnOffsetsMapping && textPair !== undefined
        ? this.toOffsets(textPair, 'textPair')
        : undefined,
    };
  }

  private toIds(input: TextInput, argument: string, options: ResolvedEncodeOptions): number[] {
    if (typeof input === 'string') {
      return this.tokensToIds(this.tokenizer.tokenize(input));
    }
    if (Array.isArray(input) && input.length > 0) {
      if (isStringArray(input)) {
        const tokens = options.isSplitIntoWords
          ? input.flatMap((word) => this.tokenizer.tokenize(word))
          : input;
        return this.tokensToIds(tokens);
      }
      if (isIdArray(input) && !options.isSplitIntoWords) {
        return [...input];
      }
    }
    throw createTokenizerError(
      ERROR_CODES.USAGE_INVALID_INPUT,
      options.isSplitIntoWords
        ? `[Tokenizer] ${argument} must be a string or a non-empty array of strings when isSplitIntoWords is set`
        : `[Tokenizer] ${argument} must be a string, a non-empty array of strings or a non-empty array of ids`,
      { argument }
    );
  }

  private toOffsets(input: TextInput, argument: string): OffsetSpan[] {
    if (typeof input !== 'string') {
      throw createTokenizerError(
        ERROR_CODES.USAGE_INVALID_INPUT,
        `[Tokenizer] returnOffsetsMapping needs ${argument} as raw text`,
        { argument }
      );
    }
    return this.tokenizer.getOffsetMapping(input);
  }

  private tokensToIds(tokens: readonly string[]): number[] {
    return tokens.map((token) => {
      const id = this.tokenizer.convertTokensToIds(token);
      if (id === undefined) {
        throw createTokenizerError(
          ERROR_CODES.USAGE_UNKNOWN_TOKEN,
          `[Tokenizer] Token "${token}" is not in the vocabulary and no unknown token is configured`,
          { argument: 'text' }
        );
      }
      return id;
    });
  }

  // ==========================================================================
  // Assembly
  // ==========================================================================

  /**
   * Truncate (when asked and needed), insert special tokens and build the
   * requested fields. Attention masks and padding are added by pad().
   */
  private prepareForModel(example: PreparedExample, options: ResolvedEncodeOptions): EncodingRecord {
    let { ids, pairIds, mapping, pairMapping } = example;
    const pair = pairIds !== undefined;
    const overhead = options.addSpecialTokens ? this.tokenizer.numSpecialTokensToAdd(pair) : 0;
    const totalLength = ids.length + (pairIds?.length ?? 0) + overhead;

    let overflowing: number[] = [];
    let numTruncated = 0;
    if (options.truncation !== 'doNotTruncate' && options.maxLength !== undefined && totalLength > options.maxLength) {
      numTruncated = totalLength - options.maxLength;
      const side = this.tokenizer.truncationSide;
      const truncated = truncateSequences(ids, pairIds, numTruncated, options.truncation, options.stride, side);
      ids = truncated.ids;
      pairIds = truncated.pairIds;
      overflowing = truncated.overflowing;
      if (mapping) {
        const cut = truncateSequences(mapping, pairMapping, numTruncated, options.truncation, options.stride, side);
        mapping = cut.ids;
        pairMapping = cut.pairIds;
      }
    }

    const record = this.assemble(ids, pairIds, mapping, pairMapping, options);
    if (options.returnOverflowingTokens) {
      record.overflowingTokens = overflowing;
      record.numTruncatedTokens = numTruncated;
    }
    return record;
  }

  /**
   * One record per window of the second sequence. Windows are as wide as
   * the room left beside the first sequence and advance by the stride.
   */
  private slideWindows(
    example: PreparedExample,
    exampleIndex: number,
    options: ResolvedEncodeOptions
  ): EncodingRecord[] {
    const { ids, mapping } = example;
    const second = example.pairIds ?? [];
    const secondMapping = example.pairMapping;

    if (options.maxLength === undefined) {
      throw createTokenizerError(
        ERROR_CODES.USAGE_INVALID_MAX_LENGTH,
        '[Tokenizer] A stride over sequence pairs needs maxLength',
        { argument: 'maxLength' }
      );
    }
    const overhead = options.addSpecialTokens ? this.tokenizer.numSpecialTokensToAdd(true) : 0;
    const maxLenForPair = options.maxLength - ids.length - overhead;
    if (maxLenForPair <= 0) {
      throw createTokenizerError(
        ERROR_CODES.USAGE_INVALID_MAX_LENGTH,
        `[Tokenizer] maxLength ${options.maxLength} leaves no room for the second sequence ` +
        `(first sequence ${ids.length}, special tokens ${overhead})`,
        { argument: 'maxLength' }
      );
    }

    const records: EncodingRecord[] = [];
    let offset = 0;
    while (offset < second.length) {
      const length = Math.min(second.length - offset, maxLenForPair);
      const record = this.assemble(
        ids,
        second.slice(offset, offset + length),
        mapping,
        secondMapping?.slice(offset, offset + length),
        options
      );
      if (options.returnOverflowingTokens) {
        record.overflowingTokens = [];
        record.numTruncatedTokens = 0;
      }
      record.overflowToSample = exampleIndex;
      records.push(record);

      if (offset + length === second.length) break;
      offset += Math.min(length, options.stride);
    }
    return records;
  }

  private assemble(
    ids: number[],
    pairIds: number[] | undefined,
    mapping: OffsetSpan[] | undefined,
    pairMapping: OffsetSpan[] | undefined,
    options: ResolvedEncodeOptions
  ): EncodingRecord {
    const assembler = this.tokenizer.assembler;
    const concat = <T>(first: T[], second: T[] | undefined): T[] => (second ? [...first, ...second] : [...first]);

    const record: EncodingRecord = {
      inputIds: options.addSpecialTokens
        ? assembler.buildInputsWithSpecialTokens(ids, pairIds)
        : concat(ids, pairIds),
    };
    if (options.returnTokenTypeIds) {
      record.tokenTypeIds = options.addSpecialTokens
        ? assembler.createTokenTypeIdsFromSequences(ids, pairIds)
        : new Array<number>(record.inputIds.length).fill(0);
    }
    if (options.returnSpecialTokensMask) {
      record.specialTokensMask = options.addSpecialTokens
        ? assembler.getSpecialTokensMask(ids, pairIds)
        : new Array<number>(record.inputIds.length).fill(0);
    }
    if (mapping) {
      record.offsetMapping = options.addSpecialTokens
        ? assembler.buildOffsetMappingWithSpecialTokens(mapping, pairMapping)
        : concat(mapping, pairMapping);
    }

    this.warnIfTooLong(record.inputIds.length, options);
    if (options.returnPositionIds) {
      record.positionIds = range(record.inputIds.length);
    }
    if (options.returnLength) {
      record.length = record.inputIds.length;
    }
    return record;
  }

  private warnIfTooLong(length: number, options: ResolvedEncodeOptions): void {
    if (options.maxLength !== undefined || !options.verbose || this.warnedTooLong) return;
    if (length > this.tokenizer.modelMaxLength) {
      log.warn(
        'Tokenizer',
        `Sequence length ${length} exceeds the model maximum (${this.tokenizer.modelMaxLength}); ` +
        'running it through the model will fail'
      );
      this.warnedTooLong = true;
    }
  }

  // ==========================================================================
  // Padding
  // ==========================================================================

  private pad(records: EncodingRecord[], options: ResolvedEncodeOptions): BatchEncodingRecord {
    return padBatch(collectBatch(records), {
      strategy: options.padding,
      maxLength: options.maxLength,
      padToMultipleOf: options.padToMultipleOf,
      returnAttentionMask: options.returnAttentionMask,
      padTokenId: this.tokenizer.padTokenId,
      padTokenTypeId: this.tokenizer.padTokenTypeId,
      side: this.tokenizer.paddingSide,
    });
  }
}

/**
 * Field-wise collection of records that share the same fields.
 */
function collectBatch(records: readonly EncodingRecord[]): BatchEncodingRecord {
  const batch: BatchEncodingRecord = { inputIds: [] };
  const push = <T>(rows: T[] | undefined, value: T | undefined): T[] | undefined => {
    if (value === undefined) return rows;
    const target = rows ?? [];
    target.push(value);
    return target;
  };
  for (const record of records) {
    batch.inputIds.push(record.inputIds);
    batch.tokenTypeIds = push(batch.tokenTypeIds, record.tokenTypeIds);
    batch.attentionMask = push(batch.attentionMask, record.attentionMask);
    batch.specialTokensMask = push(batch.specialTokensMask, record.specialTokensMask);
    batch.offsetMapping = push(batch.offsetMapping, record.offsetMapping);
    batch.positionIds = push(batch.positionIds, record.positionIds);
    batch.length = push(batch.length, record.length);
    batch.overflowingTokens = push(batch.overflowingTokens, record.overflowingTokens);
    batch.numTruncatedTokens = push(batch.numTruncatedTokens, record.numTruncatedTokens);
    batch.overflowToSample = push(batch.overflowToSample, record.overflowToSample);
  }
  return batch;
}

/**
 * The single example of a batch of one.
 */
function firstRecord(batch: BatchEncodingRecord): EncodingRecord {
  const record: EncodingRecord = { inputIds: batch.inputIds[0] ?? [] };
  if (batch.tokenTypeIds) record.tokenTypeIds = batch.tokenTypeIds[0];
  if (batch.attentionMask) record.attentionMask = batch.attentionMask[0];
  if (batch.specialTokensMask) record.specialTokensMask = batch.specialTokensMask[0];
  if (batch.offsetMapping) record.offsetMapping = batch.offsetMapping[0];
  if (batch.positionIds) record.positionIds = batch.positionIds[0];
  if (batch.length) record.length = batch.length[0];
  if (batch.overflowingTokens) record.overflowingTokens = batch.overflowingTokens[0];
  if (batch.numTruncatedTokens) record.numTruncatedTokens = batch.numTruncatedTokens[0];
  if (batch.overflowToSample) record.overflowToSample = batch.overflowToSample[0];
  return record;
}
