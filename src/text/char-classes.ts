/**
 * Character Classes
 *
 * Stateless predicates over a single character (one code point, which may
 * span two UTF-16 code units) plus a few whole-string helpers built on them.
 *
 * @module text/char-classes
 */

// ============================================================================
// Unicode Categories
// ============================================================================

const SPACE_SEPARATOR = /^\p{Zs}$/u;
const OTHER = /^\p{C}$/u;
const PUNCTUATION = /^\p{P}$/u;
const SYMBOL = /^\p{S}$/u;
const NONSPACING_MARK = /\p{Mn}/gu;

/** Code points treated as symbols although their category says otherwise */
const LEGACY_SYMBOLS: ReadonlySet<number> = new Set([
  0x00ad, 0x00b2, 0x00ba, 0x3007, 0x00b5, 0x00d8, 0x014b, 0x01b1,
]);

/** CJK Unified Ideograph blocks, inclusive */
const CJK_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x4e00, 0x9fff],
  [0x3400, 0x4dbf],
  [0x20000, 0x2a6df],
  [0x2a700, 0x2b73f],
  [0x2b740, 0x2b81f],
  [0x2b820, 0x2ceaf],
  [0xf900, 0xfaff],
  [0x2f800, 0x2fa1f],
];

/** Scripts that get spaces inserted around each character */
const SPACED_SCRIPT_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x3040, 0x30ff], // Japanese kana
  [0x0370, 0x04ff], // Greek/Coptic and Cyrillic
  [0x0250, 0x02af], // IPA
];

function codePointOf(ch: string): number {
  return ch.codePointAt(0) ?? 0;
}

function inRanges(cp: number, ranges: ReadonlyArray<readonly [number, number]>): boolean {
  for (const [lo, hi] of ranges) {
    if (cp >= lo && cp <= hi) return true;
  }
  return false;
}

// ============================================================================
// Predicates
// ============================================================================

/**
 * Space, tab, newline, carriage return, or any `Zs` character.
 */
export function isWhitespace(ch: string): boolean {
  if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
    return true;
  }
  return SPACE_SEPARATOR.test(ch);
}

/**
 * Any `C*` character except tab, newline and carriage return.
 */
export function isControl(ch: string): boolean {
  if (ch === '\t' || ch === '\n' || ch === '\r') {
    return false;
  }
  return OTHER.test(ch);
}

/**
 * Every non-alphanumeric printable ASCII character, or any `P*` character.
 */
export function isPunctuation(ch: string): boolean {
  const cp = codePointOf(ch);
  if ((cp >= 33 && cp <= 47) || (cp >= 58 && cp <= 64) ||
      (cp >= 91 && cp <= 96) || (cp >= 123 && cp <= 126)) {
    return true;
  }
  return PUNCTUATION.test(ch);
}

/**
 * Any `S*` character or one of the legacy symbol exceptions.
 */
export function isSymbol(ch: string): boolean {
  return SYMBOL.test(ch) || LEGACY_SYMBOLS.has(codePointOf(ch));
}

/**
 * Whether a code point lies in a CJK Unified Ideograph block. Hangul and
 * kana are not included.
 */
export function isCjk(cp: number): boolean {
  return inRanges(cp, CJK_RANGES);
}

/**
 * First character is control, punctuation or whitespace.
 */
export function isStartOfWord(text: string): boolean {
  const first = String.fromCodePoint(codePointOf(text));
  return isControl(first) || isPunctuation(first) || isWhitespace(first);
}

/**
 * Last character is control, punctuation or whitespace.
 */
export function isEndOfWord(text: string): boolean {
  const chars = Array.from(text);
  const last = chars[chars.length - 1] ?? '';
  return isControl(last) || isPunctuation(last) || isWhitespace(last);
}

// ============================================================================
// String Helpers
// ============================================================================

/**
 * Every CJK character becomes its own fragment; everything between is kept
 * as one run. Concatenating the result gives back `text`.
 */
export function splitOnCjk(text: string): string[] {
  const output: string[] = [];
  let buffer = '';
  for (const ch of text) {
    if (isCjk(codePointOf(ch))) {
      if (buffer !== '') {
        output.push(buffer);
        buffer = '';
      }
      output.push(ch);
    } else {
      buffer += ch;
    }
  }
  if (buffer !== '') {
    output.push(buffer);
  }
  return output;
}

/**
 * Surround kana, Greek/Cyrillic, IPA and symbol characters with spaces.
 */
export function insertSpacesAroundScripts(text: string): string {
  let output = '';
  for (const ch of text) {
    if (inRanges(codePointOf(ch), SPACED_SCRIPT_RANGES) || isSymbol(ch)) {
      output += ` ${ch} `;
    } else {
      output += ch;
    }
  }
  return output;
}

/**
 * Surround every CJK character with spaces.
 */
export function padCjkChars(text: string): string {
  let output = '';
  for (const ch of text) {
    output += isCjk(codePointOf(ch)) ? ` ${ch} ` : ch;
  }
  return output;
}

/**
 * Trim and split on whitespace runs.
 */
export function whitespaceTokenize(text: string): string[] {
  const trimmed = text.trim();
  if (!trimmed) {
    return [];
  }
  return trimmed.split(/\s+/u);
}

/**
 * NFD then drop nonspacing marks.
 */
export function stripAccents(text: string): string {
  return text.normalize('NFD').replace(NONSPACING_MARK, '');
}

/**
 * Whether a character is dropped by normalization: NUL, U+FFFD or control.
 */
export function isInvalidChar(ch: string): boolean {
  const cp = codePointOf(ch);
  return cp === 0 || cp === 0xfffd || isControl(ch);
}

/**
 * Drop invalid characters and map every whitespace character to a space.
 */
export function cleanText(text: string): string {
  let output = '';
  for (const ch of text) {
    if (isInvalidChar(ch)) continue;
    output += isWhitespace(ch) ? ' ' : ch;
  }
  return output;
}

/**
 * Insert into a sorted list unless already present. The list must be sorted.
 */
export function insertOneTokenToOrderedList(tokens: string[], token: string): void {
  let lo = 0;
  let hi = tokens.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (tokens[mid] < token) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  if (tokens[lo] === token) return;
  tokens.splice(lo, 0, token);
}
