/**
 * No-Split Trie
 *
 * Prefix tree over the markers the tokenizer must never split. `split()`
 * cuts text so that every marker occurrence becomes its own fragment in a
 * single left-to-right pass.
 *
 * @module tokenizers/trie
 */

import { log } from '../debug/index.js';

interface TrieNode {
  children: Map<string, TrieNode>;
  /** A marker ends at this node */
  terminal: boolean;
}

/** A partial match anchored at `start` that has consumed text[start, end) */
interface PartialMatch {
  start: number;
  end: number;
  node: TrieNode;
}

function createNode(): TrieNode {
  return { children: new Map(), terminal: false };
}

export class Trie {
  private root: TrieNode = createNode();
  private count = 0;

  /**
   * Build a trie holding every word in `words`.
   */
  static from(words: Iterable<string>): Trie {
    const trie = new Trie();
    for (const word of words) {
      trie.add(word);
    }
    return trie;
  }

  /** Number of distinct markers */
  get size(): number {
    return this.count;
  }

  /**
   * Add a marker. The empty string is ignored.
   */
  add(word: string): void {
    if (!word) return;

    // Keyed by UTF-16 code unit, matching how split() walks the text.
    let node = this.root;
    for (let i = 0; i < word.length; i++) {
      let next = node.children.get(word[i]);
      if (!next) {
        next = createNode();
        node.children.set(word[i], next);
      }
      node = next;
    }
    if (!node.terminal) {
      node.terminal = true;
      this.count++;
    }
  }

  /**
   * Cut `text` so that every marker occurrence is isolated. Concatenating
   * the result always gives back `text`.
   *
   * When several partial matches are live, the earliest-starting one that
   * can complete a marker wins and takes its longest completion. Scanning
   * then resumes right after it.
   *
   * @example
   * ```typescript
   * Trie.from(['[CLS]', 'extra_id_1', 'extra_id_100'])
   *   .split('[CLS] This is a extra_id_100');
   * // ['[CLS]', ' This is a ', 'extra_id_100']
   * ```
   */
  split(text: string): string[] {
    const offsets: number[] = [0];
    let active: PartialMatch[] = [];
    let skip = 0;

    for (let current = 0; current < text.length; current++) {
      if (current < skip) continue;

      const unit = text[current];
      const advanced: PartialMatch[] = [];
      let committed = false;

      for (const match of active) {
        if (match.node.terminal) {
          const [start, end] = this.longestFrom(text, [...advanced, match]);
          offsets.push(start, end);
          skip = end;
          committed = true;
          break;
        }
        const next = match.node.children.get(unit);
        if (next) {
          advanced.push({ start: match.start, end: current + 1, node: next });
        }
      }

      active = committed ? [] : advanced;

      if (current >= skip) {
        const first = this.root.children.get(unit);
        if (first) {
          active.push({ start: current, end: current + 1, node: first });
        }
      }
    }

    for (const match of active) {
      if (match.node.terminal) {
        offsets.push(match.start, text.length);
        break;
      }
    }

    return cutText(text, offsets);
  }

  /**
   * Among candidates ordered by start, return the span of the first one that
   * completes a marker, extended as far as the trie allows.
   */
  private longestFrom(text: string, candidates: PartialMatch[]): [number, number] {
    for (const candidate of candidates) {
      let node = candidate.node;
      let pos = candidate.end;
      let best: [number, number] | null = node.terminal ? [candidate.start, pos] : null;

      while (pos < text.length) {
        const next = node.children.get(text[pos]);
        if (!next) break;
        node = next;
        pos++;
        if (node.terminal) {
          best = [candidate.start, pos];
        }
      }

      if (best) return best;
    }
    // The triggering match is terminal, so the loop always returns.
    const last = candidates[candidates.length - 1];
    return [last.start, last.end];
  }
}

function cutText(text: string, offsets: number[]): string[] {
  offsets.push(text.length);
  const fragments: string[] = [];
  let start = 0;
  for (const end of offsets) {
    if (start > end) {
      log.error('Trie', `Overlapping split offsets (${start} > ${end}); skipping`);
      continue;
    }
    if (start === end) continue;
    fragments.push(text.slice(start, end));
    start = end;
  }
  return fragments;
}
