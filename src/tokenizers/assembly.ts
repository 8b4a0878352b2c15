/**
 * Sequence Assembly
 *
 * Model-specific layouts of special tokens around one sequence or a pair.
 *
 * @module tokenizers/assembly
 */

import { createTokenizerError, ERROR_CODES } from '../errors/tokenizer-error.js';
import type {
  OffsetSpan,
  SequenceAssembler,
  SequenceAssemblerFactory,
  SpecialTokenIds,
  SpecialTokenRole,
} from './types.js';

const SPECIAL_SPAN: OffsetSpan = [0, 0];

function requireId(ids: SpecialTokenIds, role: SpecialTokenRole, layout: string): number {
  const id = ids[role];
  if (id === undefined) {
    throw createTokenizerError(
      ERROR_CODES.USAGE_MISSING_SPECIAL_TOKEN,
      `[Tokenizer] ${layout} layout needs a ${role} that resolves to an id`,
      { argument: role }
    );
  }
  return id;
}

/**
 * Concatenation without special tokens.
 */
export class PlainAssembler implements SequenceAssembler {
  buildInputsWithSpecialTokens(ids: number[], pairIds?: number[]): number[] {
    return pairIds ? [...ids, ...pairIds] : [...ids];
  }

  createTokenTypeIdsFromSequences(ids: number[], pairIds?: number[]): number[] {
    return new Array<number>(ids.length + (pairIds?.length ?? 0)).fill(0);
  }

  buildOffsetMappingWithSpecialTokens(mapping: OffsetSpan[], pairMapping?: OffsetSpan[]): OffsetSpan[] {
    return pairMapping ? [...mapping, ...pairMapping] : [...mapping];
  }

  getSpecialTokensMask(ids: number[], pairIds?: number[]): number[] {
    return new Array<number>(ids.length + (pairIds?.length ?? 0)).fill(0);
  }

  numSpecialTokensToAdd(): number {
    return 0;
  }
}

/**
 * `[CLS] A [SEP]` and `[CLS] A [SEP] B [SEP]`. Token types are 0 up to and
 * including the first separator, 1 after it.
 */
export class BertAssembler implements SequenceAssembler {
  readonly clsTokenId: number;
  readonly sepTokenId: number;

  constructor(clsTokenId: number, sepTokenId: number) {
    this.clsTokenId = clsTokenId;
    this.sepTokenId = sepTokenId;
  }

  static factory(): SequenceAssemblerFactory {
    return (ids) => new BertAssembler(requireId(ids, 'clsToken', 'BERT'), requireId(ids, 'sepToken', 'BERT'));
  }

  buildInputsWithSpecialTokens(ids: number[], pairIds?: number[]): number[] {
    const first = [this.clsTokenId, ...ids, this.sepTokenId];
    return pairIds ? [...first, ...pairIds, this.sepTokenId] : first;
  }

  createTokenTypeIdsFromSequences(ids: number[], pairIds?: number[]): number[] {
    const first = new Array<number>(ids.length + 2).fill(0);
    return pairIds ? [...first, ...new Array<number>(pairIds.length + 1).fill(1)] : first;
  }

  buildOffsetMappingWithSpecialTokens(mapping: OffsetSpan[], pairMapping?: OffsetSpan[]): OffsetSpan[] {
    const first = [SPECIAL_SPAN, ...mapping, SPECIAL_SPAN];
    return pairMapping ? [...first, ...pairMapping, SPECIAL_SPAN] : first;
  }

  getSpecialTokensMask(ids: number[], pairIds?: number[]): number[] {
    const first = [1, ...new Array<number>(ids.length).fill(0), 1];
    return pairIds ? [...first, ...new Array<number>(pairIds.length).fill(0), 1] : first;
  }

  numSpecialTokensToAdd(pair: boolean): number {
    return pair ? 3 : 2;
  }
}

export interface BosEosOptions {
  addBosToken?: boolean;
  addEosToken?: boolean;
}

/**
 * `<s> A </s>` and `<s> A </s> B </s>`, with either marker optional. Token
 * types are all 0.
 */
export class BosEosAssembler implements SequenceAssembler {
  readonly bosTokenId: number | null;
  readonly eosTokenId: number | null;

  constructor(bosTokenId: number | null, eosTokenId: number | null) {
    this.bosTokenId = bosTokenId;
    this.eosTokenId = eosTokenId;
  }

  static factory(options: BosEosOptions = {}): SequenceAssemblerFactory {
    return (ids) => new BosEosAssembler(
      (options.addBosToken ?? true) ? requireId(ids, 'bosToken', 'BOS/EOS') : null,
      (options.addEosToken ?? true) ? requireId(ids, 'eosToken', 'BOS/EOS') : null
    );
  }

  buildInputsWithSpecialTokens(ids: number[], pairIds?: number[]): number[] {
    const output: number[] = [];
    if (this.bosTokenId !== null) {
      output.push(this.bosTokenId);
    }
    output.push(...ids);
    if (this.eosTokenId !== null) {
      output.push(this.eosTokenId);
    }
    if (pairIds) {
      output.push(...pairIds);
      if (this.eosTokenId !== null) {
        output.push(this.eosTokenId);
      }
    }
    return output;
  }

  createTokenTypeIdsFromSequences(ids: number[], pairIds?: number[]): number[] {
    return new Array<number>(this.buildInputsWithSpecialTokens(ids, pairIds).length).fill(0);
  }

  buildOffsetMappingWithSpecialTokens(mapping: OffsetSpan[], pairMapping?: OffsetSpan[]): OffsetSpan[] {
    return this.layout(mapping, pairMapping, SPECIAL_SPAN);
  }

  getSpecialTokensMask(ids: number[], pairIds?: number[]): number[] {
    return this.layout(ids.map(() => 0), pairIds?.map(() => 0), 1);
  }

  numSpecialTokensToAdd(pair: boolean): number {
    const eos = this.eosTokenId !== null ? 1 : 0;
    const bos = this.bosTokenId !== null ? 1 : 0;
    return bos + eos + (pair ? eos : 0);
  }

  private layout<T>(first: T[], second: T[] | undefined, marker: T): T[] {
    const output: T[] = [];
    if (this.bosTokenId !== null) output.push(marker);
    output.push(...first);
    if (this.eosTokenId !== null) output.push(marker);
    if (second) {
      output.push(...second);
      if (this.eosTokenId !== null) output.push(marker);
    }
    return output;
  }
}
