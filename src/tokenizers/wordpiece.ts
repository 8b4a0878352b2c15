/**
 * WordPiece Sub-Tokenizer
 *
 * Greedy longest-match-first split of each word against the vocabulary.
 * Pieces after the first carry the continuation prefix ('##').
 *
 * @module tokenizers/wordpiece
 */

import { getRuntimeConfig } from '../config/runtime.js';
import { whitespaceTokenize } from '../text/index.js';
import type { BasicTokenizer } from './basic.js';
import type { SubTokenizer } from './types.js';
import type { Vocab } from './vocab.js';

export interface WordPieceOptions {
  unkToken: string;
  continuationPrefix?: string;
  maxInputCharsPerWord?: number;
  /** Pre-split applied before WordPiece; without it, text is split on whitespace only */
  basic?: BasicTokenizer;
}

export class WordPieceSubTokenizer implements SubTokenizer {
  readonly continuationPrefix: string;
  readonly unkToken: string;
  readonly maxInputCharsPerWord: number;
  readonly basic: BasicTokenizer | undefined;
  private vocab: Vocab;

  constructor(vocab: Vocab, options: WordPieceOptions) {
    const defaults = getRuntimeConfig().tokenizer;
    this.vocab = vocab;
    this.unkToken = options.unkToken;
    this.continuationPrefix = options.continuationPrefix ?? defaults.continuationPrefix;
    this.maxInputCharsPerWord = options.maxInputCharsPerWord ?? defaults.maxInputCharsPerWord;
    this.basic = options.basic;
  }

  tokenizeWord(text: string): string[] {
    return this.words(text).flatMap((word) => this.wordPieces(word));
  }

  alignmentTokens(text: string): string[] {
    const output: string[] = [];
    for (const word of this.words(text)) {
      if (this.basic?.neverSplit.has(word)) {
        output.push(word);
        continue;
      }
      for (const piece of this.wordPieces(word)) {
        output.push(piece === this.unkToken ? word : piece);
      }
    }
    return output;
  }

  detokenize(tokens: string[]): string {
    return tokens.join(' ').split(` ${this.continuationPrefix}`).join('').trim();
  }

  private words(text: string): string[] {
    return this.basic ? this.basic.tokenize(text) : whitespaceTokenize(text);
  }

  /**
   * Split one word. A word that is too long or cannot be covered by
   * vocabulary pieces becomes the unknown token.
   */
  private wordPieces(word: string): string[] {
    if (this.basic?.neverSplit.has(word)) {
      return [word];
    }

    const chars = Array.from(word);
    if (chars.length > this.maxInputCharsPerWord) {
      return [this.unkToken];
    }

    const pieces: string[] = [];
    let start = 0;
    while (start < chars.length) {
      let end = chars.length;
      let current: string | null = null;
      while (start < end) {
        let substr = chars.slice(start, end).join('');
        if (start > 0) {
          substr = this.continuationPrefix + substr;
        }
        if (this.vocab.has(substr)) {
          current = substr;
          break;
        }
        end--;
      }
      if (current === null) {
        return [this.unkToken];
      }
      pieces.push(current);
      start = end;
    }
    return pieces;
  }
}
