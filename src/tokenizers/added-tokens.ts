/**
 * Added-Token Overlay
 *
 * Tokens registered after the base vocabulary was fixed, with ids appended
 * past the base range, plus the sorted no-split set and the trie mirroring
 * it. Mutation through add() is single-writer: do not call it concurrently
 * with itself or with tokenization on the same instance.
 *
 * @module tokenizers/added-tokens
 */

import { log } from '../debug/index.js';
import { createTokenizerError, ERROR_CODES } from '../errors/tokenizer-error.js';
import { insertOneTokenToOrderedList } from '../text/index.js';
import { Trie } from './trie.js';
import type { AddedToken } from './types.js';
import type { Vocab } from './vocab.js';

export interface AddedVocabularyOptions {
  /** Lower-case normalized non-special additions */
  doLowerCase: boolean;
}

export class AddedVocabulary {
  /** token -> overlay id */
  readonly encoder = new Map<string, number>();
  /** overlay id -> token */
  readonly decoder = new Map<number, string>();
  /** Stripping metadata for tokens given as AddedToken */
  readonly metadata = new Map<string, AddedToken>();

  private base: Vocab;
  private options: AddedVocabularyOptions;
  private noSplit: string[] = [];
  private matcher = new Trie();

  constructor(base: Vocab, options: AddedVocabularyOptions) {
    this.base = base;
    this.options = options;
  }

  /** Number of overlay entries */
  get size(): number {
    return this.encoder.size;
  }

  /** Sorted, deduplicated no-split tokens */
  get noSplitTokens(): readonly string[] {
    return this.noSplit;
  }

  get trie(): Trie {
    return this.matcher;
  }

  /**
   * Overlay id, else base id, else the unknown token's id.
   */
  tokenToId(token: string): number | undefined {
    return this.encoder.get(token) ?? this.base.tokenToId(token);
  }

  idToToken(id: number): string | undefined {
    return this.decoder.get(id) ?? this.base.idToToken(id);
  }

  /**
   * Register tokens and return how many received a new id.
   *
   * A token is skipped when it is the unknown token, already resolves to a
   * non-unknown id, or repeats an earlier token of the same call. Special
   * additions put every given token into the no-split set; otherwise only
   * the newly added ones go in.
   */
  add(tokens: readonly unknown[], special: boolean): number {
    const given: string[] = [];
    const toAdd: string[] = [];
    const unkToken = this.base.unkToken;
    const unkId = unkToken === undefined ? undefined : this.tokenToId(unkToken);

    const candidates = tokens.map(toAddedCandidate);

    for (const { content, meta } of candidates) {
      given.push(content);
      let token = content;
      if (!special && meta?.normalized !== false && this.options.doLowerCase) {
        token = token.toLowerCase();
      }
      if (meta) {
        this.metadata.set(token, meta);
      }
      if (token !== unkToken && this.tokenToId(token) === unkId && !toAdd.includes(token)) {
        toAdd.push(token);
        log.verbose('Tokenizer', `Adding ${token} to the vocabulary`);
      }
    }

    const firstId = this.base.size + this.encoder.size;
    toAdd.forEach((token, i) => {
      this.encoder.set(token, firstId + i);
      this.decoder.set(firstId + i, token);
    });

    const noSplitAdditions = special ? given : toAdd;
    if (noSplitAdditions.length === 1) {
      insertOneTokenToOrderedList(this.noSplit, noSplitAdditions[0]);
    } else {
      this.noSplit = [...new Set([...this.noSplit, ...noSplitAdditions])].sort();
    }
    this.rebuildTrie();

    return toAdd.length;
  }

  /**
   * Non-special additions are stored already lower-cased where needed, so
   * trie entries are the no-split tokens exactly as stored.
   */
  private rebuildTrie(): void {
    this.matcher = Trie.from(this.noSplit);
  }
}

/** Rejects the whole call before anything is registered */
function toAddedCandidate(candidate: unknown): { content: string; meta?: AddedToken } {
  if (typeof candidate === 'string') {
    return { content: candidate };
  }
  if (isAddedToken(candidate)) {
    return { content: candidate.content, meta: candidate };
  }
  throw createTokenizerError(
    ERROR_CODES.INVALID_TOKEN_TYPE,
    `Token ${String(candidate)} is not a string but a ${typeof candidate}`,
    { argument: 'tokens' }
  );
}

function isAddedToken(value: unknown): value is AddedToken {
  return typeof value === 'object' && value !== null &&
    'content' in value && typeof value.content === 'string';
}
