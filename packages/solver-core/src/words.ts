// packages/solver-core/src/words.ts
//
// Word list loading.
//
// A word list is plain text, one word per line. Lines are trimmed and
// lowercased; only lines of exactly WORD_LENGTH letters a–z become
// candidates, everything else is skipped. Duplicates are kept as they appear.

import { readFile } from 'node:fs/promises';
import { CandidateSet } from './candidateSet.js';
import { WORD_LENGTH } from './constants.js';
import { DictionaryLoadError } from './errors.js';

const WORD_RE = new RegExp(`^[a-z]{${WORD_LENGTH}}$`);

export function parseWordList(text: string): string[] {
  const words: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const word = line.trim().toLowerCase();
    if (WORD_RE.test(word)) words.push(word);
  }
  return words;
}

/**
 * loadWordList reads a word list from disk into a fresh candidate set.
 *
 * @throws DictionaryLoadError if the file cannot be read or yields no words.
 *         An empty dictionary is never returned.
 */
export async function loadWordList(path: string): Promise<CandidateSet> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new DictionaryLoadError(path, 'file could not be read', { cause: err });
  }

  const words = parseWordList(text);
  if (words.length === 0) {
    throw new DictionaryLoadError(path, `no ${WORD_LENGTH}-letter words found`);
  }
  return new CandidateSet(words);
}
