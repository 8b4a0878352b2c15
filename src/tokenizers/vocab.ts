/**
 * Base Vocabulary
 *
 * Dense token <-> id table fixed at construction, with an optional unknown
 * token that absorbs lookups of absent tokens. Vocabulary files hold one
 * token per line; a token's id is its 0-based line number.
 *
 * @module tokenizers/vocab
 */

import { readFile, writeFile } from 'fs/promises';
import { log } from '../debug/index.js';
import { createTokenizerError, ERROR_CODES } from '../errors/tokenizer-error.js';

export interface VocabOptions {
  /** Token that absent tokens resolve to; must be in the table */
  unkToken?: string;
}

export class Vocab {
  private tokenToIdx: Map<string, number>;
  private idxToToken: string[];
  readonly unkToken: string | undefined;

  private constructor(tokenToIdx: Map<string, number>, idxToToken: string[], unkToken: string | undefined) {
    this.tokenToIdx = tokenToIdx;
    this.idxToToken = idxToToken;
    this.unkToken = unkToken;
  }

  /**
   * Build from a token -> id mapping. Ids must be exactly 0..n-1.
   */
  static fromDict(tokenToIdx: Record<string, number> | Map<string, number>, options: VocabOptions = {}): Vocab {
    const entries = tokenToIdx instanceof Map ? [...tokenToIdx] : Object.entries(tokenToIdx);
    const idxToToken: Array<string | undefined> = new Array(entries.length).fill(undefined);

    for (const [token, id] of entries) {
      if (!Number.isInteger(id) || id < 0 || id >= entries.length) {
        throw createTokenizerError(
          ERROR_CODES.USAGE_INVALID_VOCAB,
          `[Vocab] Id ${id} of "${token}" is outside the dense range [0, ${entries.length})`,
          { argument: 'tokenToIdx' }
        );
      }
      if (idxToToken[id] !== undefined) {
        throw createTokenizerError(
          ERROR_CODES.USAGE_INVALID_VOCAB,
          `[Vocab] Id ${id} is assigned to both "${idxToToken[id]}" and "${token}"`,
          { argument: 'tokenToIdx' }
        );
      }
      idxToToken[id] = token;
    }

    const dense = idxToToken.filter((t): t is string => t !== undefined);
    const map = new Map(entries);
    if (options.unkToken !== undefined && !map.has(options.unkToken)) {
      throw createTokenizerError(
        ERROR_CODES.USAGE_INVALID_VOCAB,
        `[Vocab] Unknown token "${options.unkToken}" is not in the vocabulary`,
        { argument: 'unkToken' }
      );
    }
    return new Vocab(map, dense, options.unkToken);
  }

  /**
   * Build from tokens listed in id order. Later duplicates are rejected.
   */
  static fromTokens(tokens: readonly string[], options: VocabOptions = {}): Vocab {
    const map = new Map<string, number>();
    tokens.forEach((token, id) => {
      if (map.has(token)) {
        throw createTokenizerError(
          ERROR_CODES.USAGE_INVALID_VOCAB,
          `[Vocab] Duplicate token "${token}" at line ${id}`,
          { argument: 'tokens' }
        );
      }
      map.set(token, id);
    });
    return Vocab.fromDict(map, options);
  }

  get size(): number {
    return this.idxToToken.length;
  }

  /** Id of the unknown token, if one is configured */
  get unkId(): number | undefined {
    return this.unkToken === undefined ? undefined : this.tokenToIdx.get(this.unkToken);
  }

  has(token: string): boolean {
    return this.tokenToIdx.has(token);
  }

  /**
   * Id of `token`, else the unknown token's id, else undefined.
   */
  tokenToId(token: string): number | undefined {
    return this.tokenToIdx.get(token) ?? this.unkId;
  }

  idToToken(id: number): string | undefined {
    return this.idxToToken[id];
  }

  /** Tokens in ascending id order */
  tokens(): readonly string[] {
    return this.idxToToken;
  }

  toDict(): Record<string, number> {
    return Object.fromEntries(this.tokenToIdx);
  }
}

/**
 * Read a one-token-per-line vocabulary file.
 */
export async function loadVocabulary(filePath: string, options: VocabOptions = {}): Promise<Vocab> {
  const content = await readFile(filePath, 'utf8');
  const lines = content.split('\n');
  // A trailing newline ends the last line rather than starting an empty one.
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  const vocab = Vocab.fromTokens(lines, options);
  log.info('Tokenizer', `Loaded ${vocab.size} tokens from ${filePath}`);
  return vocab;
}

/**
 * Write tokens in ascending id order, one per line.
 */
export async function saveVocabulary(filePath: string, vocab: Vocab | Record<string, number>): Promise<void> {
  const tokens = vocab instanceof Vocab
    ? vocab.tokens()
    : Object.keys(vocab).sort((a, b) => vocab[a] - vocab[b]);
  await writeFile(filePath, tokens.map((t) => `${t}\n`).join(''), 'utf8');
  log.info('Tokenizer', `Saved ${tokens.length} tokens to ${filePath}`);
}
