/**
 * Basic Tokenizer
 *
 * Whitespace and punctuation pre-split run ahead of WordPiece: cleans the
 * text, isolates CJK characters, optionally lower-cases and strips accents,
 * then splits every punctuation character into its own word.
 *
 * @module tokenizers/basic
 */

import {
  cleanText,
  isPunctuation,
  padCjkChars,
  stripAccents as removeAccents,
  whitespaceTokenize,
} from '../text/index.js';

export interface BasicTokenizerOptions {
  doLowerCase?: boolean;
  /** undefined follows doLowerCase */
  stripAccents?: boolean;
  /** Surround CJK characters with spaces (default: true) */
  tokenizeCjkChars?: boolean;
  /** Words passed through untouched */
  neverSplit?: Iterable<string>;
}

export class BasicTokenizer {
  readonly doLowerCase: boolean;
  readonly stripAccents: boolean | undefined;
  readonly tokenizeCjkChars: boolean;
  readonly neverSplit: ReadonlySet<string>;

  constructor(options: BasicTokenizerOptions = {}) {
    this.doLowerCase = options.doLowerCase ?? false;
    this.stripAccents = options.stripAccents;
    this.tokenizeCjkChars = options.tokenizeCjkChars ?? true;
    this.neverSplit = new Set(options.neverSplit ?? []);
  }

  tokenize(text: string, neverSplit: Iterable<string> = []): string[] {
    const keep = new Set([...this.neverSplit, ...neverSplit]);
    let cleaned = cleanText(text);
    if (this.tokenizeCjkChars) {
      cleaned = padCjkChars(cleaned);
    }

    const splitTokens: string[] = [];
    for (let token of whitespaceTokenize(cleaned)) {
      if (!keep.has(token)) {
        if (this.doLowerCase) {
          token = token.toLowerCase();
          if (this.stripAccents !== false) {
            token = removeAccents(token);
          }
        } else if (this.stripAccents) {
          token = removeAccents(token);
        }
      }
      splitTokens.push(...splitOnPunctuation(token, keep));
    }

    return whitespaceTokenize(splitTokens.join(' '));
  }
}

function splitOnPunctuation(text: string, keep: ReadonlySet<string>): string[] {
  if (keep.has(text)) {
    return [text];
  }
  const output: string[] = [];
  let startNewWord = true;
  for (const ch of text) {
    if (isPunctuation(ch)) {
      output.push(ch);
      startNewWord = true;
    } else {
      if (startNewWord) {
        output.push('');
      }
      startNewWord = false;
      output[output.length - 1] += ch;
    }
  }
  return output;
}
