/**
 * Sequence Truncation
 *
 * Works on any element type so that ids and their offset spans are cut
 * identically.
 *
 * @module tokenizers/truncation
 */

import { log } from '../debug/index.js';
import type { SequenceSide, TruncationStrategy } from './types.js';

export interface TruncationResult<T> {
  ids: T[];
  pairIds: T[] | undefined;
  /** Removed elements plus `stride` kept context, in sequence order */
  overflowing: T[];
}

/**
 * Remove `numTokensToRemove` elements following `strategy`.
 *
 * `onlyFirst` (and `longestFirst` on a single sequence) and `onlySecond`
 * cut one sequence and report the `stride + n` elements nearest the cut as
 * overflow. `longestFirst` on a pair removes one element at a time from the
 * longer sequence, the second one on ties, and reports no overflow.
 */
export function truncateSequences<T>(
  ids: T[],
  pairIds: T[] | undefined,
  numTokensToRemove: number,
  strategy: TruncationStrategy = 'longestFirst',
  stride = 0,
  side: SequenceSide = 'right'
): TruncationResult<T> {
  if (numTokensToRemove <= 0 || strategy === 'doNotTruncate') {
    return { ids, pairIds, overflowing: [] };
  }

  if (strategy === 'onlyFirst' || (strategy === 'longestFirst' && pairIds === undefined)) {
    const cut = cutOne(ids, numTokensToRemove, stride, side);
    if (!cut) {
      warnTooShort('first', ids.length, numTokensToRemove, strategy);
      return { ids, pairIds, overflowing: [] };
    }
    return { ids: cut.kept, pairIds, overflowing: cut.overflowing };
  }

  if (strategy === 'longestFirst' && pairIds !== undefined) {
    let first = ids;
    let second = pairIds;
    for (let i = 0; i < numTokensToRemove; i++) {
      if (first.length > second.length) {
        first = side === 'right' ? first.slice(0, -1) : first.slice(1);
      } else {
        second = side === 'right' ? second.slice(0, -1) : second.slice(1);
      }
    }
    return { ids: first, pairIds: second, overflowing: [] };
  }

  if (strategy === 'onlySecond' && pairIds !== undefined) {
    const cut = cutOne(pairIds, numTokensToRemove, stride, side);
    if (!cut) {
      warnTooShort('second', pairIds.length, numTokensToRemove, strategy);
      return { ids, pairIds, overflowing: [] };
    }
    return { ids, pairIds: cut.kept, overflowing: cut.overflowing };
  }

  log.warn('Tokenizer', `Truncation strategy '${strategy}' needs a second sequence; nothing was truncated`);
  return { ids, pairIds, overflowing: [] };
}

function cutOne<T>(
  sequence: T[],
  n: number,
  stride: number,
  side: SequenceSide
): { kept: T[]; overflowing: T[] } | null {
  if (sequence.length <= n) {
    return null;
  }
  const windowLen = Math.min(sequence.length, stride + n);
  if (side === 'right') {
    return {
      kept: sequence.slice(0, sequence.length - n),
      overflowing: sequence.slice(sequence.length - windowLen),
    };
  }
  return {
    kept: sequence.slice(n),
    overflowing: sequence.slice(0, windowLen),
  };
}

function warnTooShort(which: string, length: number, n: number, strategy: TruncationStrategy): void {
  log.warn(
    'Tokenizer',
    `Cannot remove ${n} tokens from the ${which} sequence of length ${length} with strategy '${strategy}'; ` +
    `try 'longestFirst' or a larger maxLength`
  );
}
