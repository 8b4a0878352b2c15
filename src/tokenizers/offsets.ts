/**
 * Offset Mapping
 *
 * Aligns the tokens of tokenize(text) with the original text. A normalized
 * working copy is built character by character (lower-casing, accent
 * stripping and invalid-character removal, as configured), remembering for
 * each normalized code unit the span of the original character behind it.
 * Tokens are then located in order in that copy.
 *
 * Offsets are UTF-16 code-unit indices. A span touching a character outside
 * the BMP always covers both of its code units.
 *
 * @module tokenizers/offsets
 */

import { createTokenizerError, ERROR_CODES } from '../errors/tokenizer-error.js';
import { isInvalidChar, isWhitespace, normalizeChars, stripAccents } from '../text/index.js';
import type { PretrainedTokenizer } from './base.js';
import type { OffsetSpan } from './types.js';

/** Greek final sigma is searched as the medial form */
const FINAL_SIGMA = /ς/g;
const MEDIAL_SIGMA = 'σ';

interface NormalizedText {
  text: string;
  /** Original start index per normalized code unit */
  starts: number[];
  /** Original end index per normalized code unit */
  ends: number[];
}

export class OffsetMapper {
  private tokenizer: PretrainedTokenizer;

  constructor(tokenizer: PretrainedTokenizer) {
    this.tokenizer = tokenizer;
  }

  /**
   * Spans for every token of tokenize(text), in order. A token with nothing
   * left to match after marker stripping takes the whitespace before the
   * next word, or the next character when there is none.
   */
  map(text: string): OffsetSpan[] {
    const normalized = this.normalize(text);
    const searchable = normalized.text.replace(FINAL_SIGMA, MEDIAL_SIGMA);
    const spans: OffsetSpan[] = [];
    let offset = 0;

    for (const token of this.splitTokens(text)) {
      const needle = this.normalizeToken(token);
      if (needle === '') {
        const [index, consumed] = this.locateBareMarker(normalized.text, offset, token);
        spans.push([normalized.starts[index], normalized.ends[index]]);
        offset = consumed;
        continue;
      }

      const hasSigma = needle.includes(MEDIAL_SIGMA) || needle.includes('ς');
      const start = hasSigma
        ? searchable.indexOf(needle.replace(FINAL_SIGMA, MEDIAL_SIGMA), offset)
        : normalized.text.indexOf(needle, offset);
      if (start < 0) {
        throw createTokenizerError(
          ERROR_CODES.ALIGNMENT_FAILED,
          `[Tokenizer] Cannot align token "${token}" at or after position ${offset} of the normalized text`,
          { argument: 'text' }
        );
      }

      const end = start + needle.length;
      spans.push([normalized.starts[start], normalized.ends[end - 1]]);
      offset = end;
    }

    return spans;
  }

  /**
   * Normalized index a marker-only token stands for, and the search offset
   * after it. Skipped whitespace is consumed; a following word is not.
   */
  private locateBareMarker(normalized: string, offset: number, token: string): [number, number] {
    let end = offset;
    while (end < normalized.length && isWhitespace(normalized[end])) {
      end++;
    }
    if (end > offset) {
      return [end - 1, end];
    }
    if (offset < normalized.length) {
      return [offset, offset];
    }
    if (normalized.length > 0) {
      return [normalized.length - 1, offset];
    }
    throw createTokenizerError(
      ERROR_CODES.ALIGNMENT_FAILED,
      `[Tokenizer] Cannot align token "${token}": the normalized text is empty`,
      { argument: 'text' }
    );
  }

  /**
   * Tokens of tokenize(text) with unknown-token outputs replaced by the
   * words that produced them.
   */
  private splitTokens(text: string): string[] {
    const tokens: string[] = [];
    for (const fragment of this.tokenizer.fragment(text)) {
      if (fragment.special) {
        tokens.push(fragment.text);
      } else {
        tokens.push(...this.tokenizer.subTokenizer.alignmentTokens(fragment.text));
      }
    }
    return tokens;
  }

  private normalize(text: string): NormalizedText {
    let normalized = '';
    const starts: number[] = [];
    const ends: number[] = [];
    let index = 0;
    for (const ch of text) {
      const out = this.normalizeChar(ch);
      normalized += out;
      for (let k = 0; k < out.length; k++) {
        starts.push(index);
        ends.push(index + ch.length);
      }
      index += ch.length;
    }
    return { text: normalized, starts, ends };
  }

  private normalizeToken(token: string): string {
    const prefix = this.tokenizer.subTokenizer.continuationPrefix;
    const bare = prefix && token.startsWith(prefix) ? token.slice(prefix.length) : token;
    return Array.from(bare, (ch) => this.normalizeChar(ch)).join('');
  }

  /**
   * The per-character rewrite tokenization applies, so that tokens can be
   * found verbatim in the working copy.
   */
  private normalizeChar(ch: string): string {
    const { doLowerCase, stripAccents: strip } = this.tokenizer;
    let out = this.tokenizer.normalizesChars ? normalizeChars(ch) : ch;
    if (doLowerCase) {
      out = out.toLowerCase();
      if (strip !== false) {
        out = stripAccents(out);
      }
    } else if (strip) {
      out = stripAccents(out);
    }
    return Array.from(out).filter((c) => !isInvalidChar(c)).join('');
  }
}
