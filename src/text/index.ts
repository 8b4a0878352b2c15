/**
 * Text Utilities
 *
 * @module text
 */

export {
  isWhitespace,
  isControl,
  isPunctuation,
  isSymbol,
  isCjk,
  isStartOfWord,
  isEndOfWord,
  isInvalidChar,
  splitOnCjk,
  insertSpacesAroundScripts,
  padCjkChars,
  whitespaceTokenize,
  stripAccents,
  cleanText,
  insertOneTokenToOrderedList,
} from './char-classes.js';

export {
  type NormalizationTable,
  parseNormalizationTable,
  getNormalizationTable,
  isNonNormalizedChar,
  isNonNormalizedNumeric,
  normalizeChars,
} from './normalize.js';
