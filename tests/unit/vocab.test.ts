import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ERROR_CODES } from '../../src/errors/tokenizer-error.js';
import { Vocab, loadVocabulary, saveVocabulary } from '../../src/tokenizers/vocab.js';
import { expectTokenizerError } from './helpers.js';

describe('tokenizers/vocab', () => {
  describe('Vocab', () => {
    it('maps tokens and ids both ways', () => {
      const vocab = Vocab.fromTokens(['[UNK]', 'a', 'b'], { unkToken: '[UNK]' });
      expect(vocab.size).toBe(3);
      expect(vocab.tokenToId('b')).toBe(2);
      expect(vocab.idToToken(1)).toBe('a');
      expect(vocab.idToToken(3)).toBeUndefined();
      expect(vocab.has('a')).toBe(true);
      expect(vocab.toDict()).toEqual({ '[UNK]': 0, a: 1, b: 2 });
    });

    it('resolves absent tokens to the unknown token', () => {
      const vocab = Vocab.fromDict({ a: 1, '[UNK]': 0 }, { unkToken: '[UNK]' });
      expect(vocab.unkId).toBe(0);
      expect(vocab.tokenToId('zzz')).toBe(0);
      expect(vocab.tokens()).toEqual(['[UNK]', 'a']);
    });

    it('returns undefined for absent tokens without an unknown token', () => {
      const vocab = Vocab.fromTokens(['a']);
      expect(vocab.unkId).toBeUndefined();
      expect(vocab.tokenToId('zzz')).toBeUndefined();
    });

    it('rejects ids outside the dense range', () => {
      expectTokenizerError(() => Vocab.fromDict({ a: 0, b: 2 }), ERROR_CODES.USAGE_INVALID_VOCAB);
    });

    it('rejects two tokens sharing an id', () => {
      expectTokenizerError(() => Vocab.fromDict({ a: 0, b: 0 }), ERROR_CODES.USAGE_INVALID_VOCAB);
    });

    it('rejects duplicate tokens in a list', () => {
      const error = expectTokenizerError(() => Vocab.fromTokens(['a', 'a']), ERROR_CODES.USAGE_INVALID_VOCAB);
      expect(error.argument).toBe('tokens');
    });

    it('rejects an unknown token missing from the table', () => {
      const error = expectTokenizerError(
        () => Vocab.fromTokens(['a'], { unkToken: '[UNK]' }),
        ERROR_CODES.USAGE_INVALID_VOCAB
      );
      expect(error.argument).toBe('unkToken');
    });
  });

  describe('vocabulary files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'spanpiece-vocab-'));
      vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(async () => {
      vi.restoreAllMocks();
      await rm(dir, { recursive: true, force: true });
    });

    it('assigns ids by line number', async () => {
      const path = join(dir, 'vocab.txt');
      await writeFile(path, '[UNK]\nhello\n##s\n', 'utf8');
      const vocab = await loadVocabulary(path, { unkToken: '[UNK]' });
      expect(vocab.tokens()).toEqual(['[UNK]', 'hello', '##s']);
      expect(vocab.tokenToId('##s')).toBe(2);
    });

    it('reads a file without a trailing newline', async () => {
      const path = join(dir, 'vocab.txt');
      await writeFile(path, 'a\nb', 'utf8');
      expect((await loadVocabulary(path)).size).toBe(2);
    });

    it('writes tokens in id order', async () => {
      const path = join(dir, 'out.txt');
      await saveVocabulary(path, { b: 1, a: 0, c: 2 });
      expect(await readFile(path, 'utf8')).toBe('a\nb\nc\n');
    });

    it('reads back what it writes', async () => {
      const path = join(dir, 'round.txt');
      const vocab = Vocab.fromTokens(['[UNK]', 'x', 'y'], { unkToken: '[UNK]' });
      await saveVocabulary(path, vocab);
      const loaded = await loadVocabulary(path, { unkToken: '[UNK]' });
      expect(loaded.toDict()).toEqual(vocab.toDict());
    });
  });
});
