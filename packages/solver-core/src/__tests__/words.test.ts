// packages/solver-core/src/__tests__/words.test.ts
//
// Word list parsing and loading.

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DictionaryLoadError, loadWordList, parseWordList } from '../index.js';

describe('parseWordList', () => {
  it('keeps trimmed, lowercased five-letter lines only', () => {
    const text = 'Crane\n  slate  \r\ncat\nplants\ndon\'t\n\nfjord\n';
    expect(parseWordList(text)).toEqual(['crane', 'slate', 'fjord']);
  });

  it('keeps duplicates in file order', () => {
    expect(parseWordList('crane\ncrane\n')).toEqual(['crane', 'crane']);
  });
});

describe('loadWordList', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'wordhint-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the words into a candidate set', async () => {
    const path = join(dir, 'words.txt');
    await writeFile(path, 'crane\nslate\nab\n');
    const set = await loadWordList(path);
    expect(set.list()).toEqual(['crane', 'slate']);
  });

  it('fails when the file is missing', async () => {
    await expect(loadWordList(join(dir, 'missing.txt'))).rejects.toBeInstanceOf(DictionaryLoadError);
  });

  it('fails rather than returning an empty dictionary', async () => {
    const path = join(dir, 'short.txt');
    await writeFile(path, 'cat\ndog\n');
    await expect(loadWordList(path)).rejects.toThrow('no 5-letter words found');
  });
});
