import { describe, expect, it } from 'vitest';

import {
  cleanText,
  insertOneTokenToOrderedList,
  insertSpacesAroundScripts,
  isCjk,
  isControl,
  isEndOfWord,
  isPunctuation,
  isStartOfWord,
  isSymbol,
  isWhitespace,
  padCjkChars,
  splitOnCjk,
  stripAccents,
  whitespaceTokenize,
} from '../../src/text/index.js';

describe('text/char-classes', () => {
  describe('predicates', () => {
    it('classifies whitespace', () => {
      expect(isWhitespace(' ')).toBe(true);
      expect(isWhitespace('\t')).toBe(true);
      expect(isWhitespace('\u00A0')).toBe(true);
      expect(isWhitespace('A')).toBe(false);
      expect(isWhitespace('-')).toBe(false);
    });

    it('excludes tab, newline and carriage return from control', () => {
      expect(isControl('\u0005')).toBe(true);
      expect(isControl('\t')).toBe(false);
      expect(isControl('\n')).toBe(false);
      expect(isControl('\r')).toBe(false);
      expect(isControl('A')).toBe(false);
    });

    it('treats every non-alphanumeric ASCII character as punctuation', () => {
      expect(isPunctuation('-')).toBe(true);
      expect(isPunctuation('$')).toBe(true);
      expect(isPunctuation('^')).toBe(true);
      expect(isPunctuation('`')).toBe(true);
      expect(isPunctuation('「')).toBe(true);
      expect(isPunctuation('A')).toBe(false);
      expect(isPunctuation('7')).toBe(false);
    });

    it('recognizes symbols and legacy exceptions', () => {
      expect(isSymbol('€')).toBe(true);
      expect(isSymbol('µ')).toBe(true);
      expect(isSymbol('a')).toBe(false);
    });

    it('matches CJK block boundaries', () => {
      expect(isCjk(0x4e00)).toBe(true);
      expect(isCjk(0x4dff)).toBe(false);
      expect(isCjk(0x9fff)).toBe(true);
      expect(isCjk(0xa000)).toBe(false);
      expect(isCjk(0x20000)).toBe(true);
      expect(isCjk(0x3042)).toBe(false);
    });

    it('checks word boundaries at either end', () => {
      expect(isStartOfWord(' x')).toBe(true);
      expect(isStartOfWord('x')).toBe(false);
      expect(isEndOfWord('x!')).toBe(true);
      expect(isEndOfWord('ab')).toBe(false);
      expect(isEndOfWord('')).toBe(false);
    });
  });

  describe('string helpers', () => {
    it('splits every CJK character into its own fragment', () => {
      expect(splitOnCjk('ab中c国')).toEqual(['ab', '中', 'c', '国']);
      expect(splitOnCjk('ab中c国').join('')).toBe('ab中c国');
    });

    it('pads kana and symbols with spaces', () => {
      expect(insertSpacesAroundScripts('aあb')).toBe('a あ b');
      expect(insertSpacesAroundScripts('x€')).toBe('x € ');
    });

    it('pads CJK characters with spaces', () => {
      expect(padCjkChars('a中')).toBe('a 中 ');
    });

    it('splits on whitespace runs', () => {
      expect(whitespaceTokenize('  a \n b  ')).toEqual(['a', 'b']);
      expect(whitespaceTokenize('   ')).toEqual([]);
    });

    it('strips accents', () => {
      expect(stripAccents('café naïve')).toBe('cafe naive');
    });

    it('drops invalid characters and maps whitespace to spaces', () => {
      expect(cleanText('a\u0000b\tc\uFFFD')).toBe('ab c');
    });

    it('inserts into a sorted list once', () => {
      const tokens = ['a', 'c'];
      insertOneTokenToOrderedList(tokens, 'b');
      insertOneTokenToOrderedList(tokens, 'c');
      expect(tokens).toEqual(['a', 'b', 'c']);
    });
  });
});
