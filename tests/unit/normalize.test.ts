import { describe, expect, it } from 'vitest';

import { ERROR_CODES } from '../../src/errors/tokenizer-error.js';
import {
  isNonNormalizedChar,
  isNonNormalizedNumeric,
  normalizeChars,
  parseNormalizationTable,
} from '../../src/text/index.js';
import { expectTokenizerError } from './helpers.js';

describe('text/normalize', () => {
  describe('normalizeChars', () => {
    it('spells out enclosed and roman-numeral numbers', () => {
      expect(normalizeChars('①')).toBe(' 1 ');
      expect(normalizeChars('Ⅻ')).toBe(' 12 ');
    });

    it('applies substitutions', () => {
      expect(normalizeChars('\uF979')).toBe('\u51C9');
    });

    it('expands fullwidth forms', () => {
      expect(normalizeChars('Ａb')).toBe('Ab');
    });

    it('passes other characters through', () => {
      expect(normalizeChars('plain text')).toBe('plain text');
    });
  });

  it('classifies table ranges', () => {
    expect(isNonNormalizedChar('Ａ')).toBe(true);
    expect(isNonNormalizedChar('A')).toBe(false);
    expect(isNonNormalizedNumeric('①')).toBe(true);
    expect(isNonNormalizedNumeric('1')).toBe(false);
  });

  describe('parseNormalizationTable', () => {
    it('normalizes with a custom table', () => {
      const table = parseNormalizationTable({
        nonNormalizedRanges: [],
        numericRanges: [{ start: '0x41', end: '0x42' }],
        numericValues: [{ start: '0x41', end: '0x42', firstValue: 7 }],
        substitutions: [{ codepoint: '0x63', replacement: 'z' }],
      });
      expect(normalizeChars('ABc', table)).toBe(' 7  8 z');
    });

    it('rejects a non-object root', () => {
      expectTokenizerError(() => parseNormalizationTable([]), ERROR_CODES.INVALID_NORMALIZATION_TABLE);
    });

    it('rejects numeric code points without a value', () => {
      const error = expectTokenizerError(
        () =>
          parseNormalizationTable({
            nonNormalizedRanges: [],
            numericRanges: [{ start: '0x10', end: '0x11' }],
            numericValues: [{ start: '0x10', end: '0x10', firstValue: 1 }],
            substitutions: [],
          }),
        ERROR_CODES.INVALID_NORMALIZATION_TABLE
      );
      expect(error.message).toBe(
        '[Normalize] Invalid normalization table: numeric code point 0x11 has no value'
      );
    });

    it('rejects malformed code points', () => {
      expectTokenizerError(
        () =>
          parseNormalizationTable({
            nonNormalizedRanges: [{ start: 'FF00', end: '0xFFEF' }],
            numericRanges: [],
            numericValues: [],
            substitutions: [],
          }),
        ERROR_CODES.INVALID_NORMALIZATION_TABLE
      );
    });
  });
});
