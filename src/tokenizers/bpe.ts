/**
 * BPE Sub-Tokenizer
 *
 * For vocabularies with a merges list ("a b" per rule, in rank order).
 * Every word is prefixed with the space-prefix character and merged pair by
 * pair, lowest rank first.
 *
 * @module tokenizers/bpe
 */

import { getRuntimeConfig } from '../config/runtime.js';
import { whitespaceTokenize } from '../text/index.js';
import type { SubTokenizer } from './types.js';
import type { Vocab } from './vocab.js';

export interface BpeOptions {
  /** Space prefix character: '▁' for SentencePiece-style, 'Ġ' for GPT-style */
  spacePrefixChar?: string;
  /** Replaces pieces missing from the vocabulary */
  unkToken?: string;
}

export class BpeSubTokenizer implements SubTokenizer {
  readonly spacePrefixChar: string;
  readonly unkToken: string | undefined;
  private vocab: Vocab;
  private mergeRanks: Map<string, number> = new Map();

  constructor(vocab: Vocab, merges: readonly string[], options: BpeOptions = {}) {
    this.vocab = vocab;
    this.spacePrefixChar = options.spacePrefixChar ?? getRuntimeConfig().tokenizer.spacePrefixChar;
    this.unkToken = options.unkToken;
    for (let i = 0; i < merges.length; i++) {
      // First occurrence keeps its rank
      if (!this.mergeRanks.has(merges[i])) {
        this.mergeRanks.set(merges[i], i);
      }
    }
  }

  get continuationPrefix(): string {
    return this.spacePrefixChar;
  }

  tokenizeWord(text: string): string[] {
    return this.alignmentTokens(text).map((piece) =>
      this.unkToken !== undefined && !this.vocab.has(piece) ? this.unkToken : piece
    );
  }

  alignmentTokens(text: string): string[] {
    return whitespaceTokenize(text).flatMap((word) => this.bpe(this.spacePrefixChar + word));
  }

  detokenize(tokens: string[]): string {
    return tokens.join('').split(this.spacePrefixChar).join(' ').trim();
  }

  /**
   * Get pairs of adjacent symbols in word
   */
  private getPairs(word: string[]): string[] {
    const pairs: string[] = [];
    for (let i = 0; i < word.length - 1; i++) {
      pairs.push(`${word[i]} ${word[i + 1]}`);
    }
    return pairs;
  }

  /**
   * Apply BPE to a single word
   */
  private bpe(word: string): string[] {
    let tokens = Array.from(word);

    while (tokens.length > 1) {
      // Find the pair with lowest rank
      let minPair: [string, string] | null = null;
      let minRank = Infinity;

      for (const [i, pair] of this.getPairs(tokens).entries()) {
        const rank = this.mergeRanks.get(pair);
        if (rank !== undefined && rank < minRank) {
          minRank = rank;
          minPair = [tokens[i], tokens[i + 1]];
        }
      }

      if (minPair === null) break;

      // Merge every occurrence of the pair
      const [first, second] = minPair;
      const merged: string[] = [];
      let i = 0;
      while (i < tokens.length) {
        if (i < tokens.length - 1 && tokens[i] === first && tokens[i + 1] === second) {
          merged.push(first + second);
          i += 2;
        } else {
          merged.push(tokens[i]);
          i += 1;
        }
      }

      tokens = merged;
    }

    return tokens;
  }
}
