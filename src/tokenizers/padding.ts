/**
 * Batch Padding
 *
 * Final barrier step of batch encoding: every per-token field of every
 * example is padded to one common length.
 *
 * @module tokenizers/padding
 */

import { createTokenizerError, ERROR_CODES } from '../errors/tokenizer-error.js';
import type { BatchEncodingRecord, OffsetSpan, PaddingStrategy, SequenceSide } from './types.js';

export interface PaddingOptions {
  strategy: PaddingStrategy;
  /** Target for 'maxLength' */
  maxLength?: number;
  /** Round the target up to a multiple of this */
  padToMultipleOf?: number;
  /** Generate attention masks when the batch has none */
  returnAttentionMask?: boolean;
  padTokenId?: number;
  padTokenTypeId?: number;
  side?: SequenceSide;
}

const PAD_SPAN: OffsetSpan = [0, 0];

/**
 * Pad a batch. Pad values: the pad token id for input ids, the pad token
 * type id for token types, 0 for attention masks and position ids, 1 for
 * special-token masks and [0, 0] for offsets. Examples already at or past
 * the target are left as they are.
 */
export function padBatch(batch: BatchEncodingRecord, options: PaddingOptions): BatchEncodingRecord {
  const lengths = batch.inputIds.map((ids) => ids.length);
  const target = paddingTarget(lengths, options);
  const side = options.side ?? 'right';

  let padTokenId = 0;
  if (target !== undefined) {
    if (options.padTokenId === undefined) {
      throw createTokenizerError(
        ERROR_CODES.USAGE_MISSING_PAD_TOKEN,
        '[Tokenizer] Padding was requested but the tokenizer has no pad token',
        { argument: 'padding' }
      );
    }
    padTokenId = options.padTokenId;
  }

  const pad = <T>(rows: T[][], value: T): T[][] =>
    rows.map((row) => padRow(row, target, value, side));

  const attentionMask = batch.attentionMask ??
    (options.returnAttentionMask ? lengths.map((n) => new Array<number>(n).fill(1)) : undefined);

  const padded: BatchEncodingRecord = { inputIds: pad(batch.inputIds, padTokenId) };
  if (batch.tokenTypeIds) padded.tokenTypeIds = pad(batch.tokenTypeIds, options.padTokenTypeId ?? 0);
  if (attentionMask) padded.attentionMask = pad(attentionMask, 0);
  if (batch.specialTokensMask) padded.specialTokensMask = pad(batch.specialTokensMask, 1);
  if (batch.offsetMapping) padded.offsetMapping = pad(batch.offsetMapping, PAD_SPAN);
  if (batch.positionIds) padded.positionIds = pad(batch.positionIds, 0);
  if (batch.length) padded.length = [...batch.length];
  if (batch.overflowingTokens) padded.overflowingTokens = batch.overflowingTokens.map((row) => [...row]);
  if (batch.numTruncatedTokens) padded.numTruncatedTokens = [...batch.numTruncatedTokens];
  if (batch.overflowToSample) padded.overflowToSample = [...batch.overflowToSample];
  return padded;
}

/**
 * Common length to pad to, or undefined when nothing is padded.
 */
function paddingTarget(lengths: number[], options: PaddingOptions): number | undefined {
  let target: number;
  if (options.strategy === 'longest') {
    target = Math.max(0, ...lengths);
  } else if (options.strategy === 'maxLength') {
    if (options.maxLength === undefined) {
      throw createTokenizerError(
        ERROR_CODES.USAGE_INVALID_MAX_LENGTH,
        "[Tokenizer] Padding strategy 'maxLength' needs a maxLength",
        { argument: 'maxLength' }
      );
    }
    target = options.maxLength;
  } else {
    return undefined;
  }

  const multiple = options.padToMultipleOf;
  if (multiple !== undefined && multiple > 0 && target % multiple !== 0) {
    target = (Math.floor(target / multiple) + 1) * multiple;
  }
  return target;
}

function padRow<T>(row: T[], target: number | undefined, value: T, side: SequenceSide): T[] {
  if (target === undefined || row.length >= target) {
    return [...row];
  }
  const fill = new Array<T>(target - row.length).fill(value);
  return side === 'right' ? [...row, ...fill] : [...fill, ...row];
}
