// packages/solver-core/src/candidateSet.ts
//
// An ordered collection of candidate words plus the letters already pinned
// down by fully resolved clues. Sessions own their sets exclusively; clone()
// is how one set seeds another.

import { isFullyResolved, type Clue } from './clue.js';
import { WORD_LENGTH } from './constants.js';
import { satisfies, scoreWord, type LetterFrequency } from './word.js';

export class CandidateSet {
  private words: string[];
  private readonly resolved: Set<string>;

  constructor(words: Iterable<string> = [], resolvedLetters: Iterable<string> = []) {
    this.words = [...words];
    this.resolved = new Set(resolvedLetters);
  }

  get size(): number {
    return this.words.length;
  }

  /** Current words, in their current order. */
  list(): readonly string[] {
    return this.words;
  }

  has(word: string): boolean {
    return this.words.includes(word);
  }

  /** Letters whose clues left no open position; they no longer count toward scoring. */
  get resolvedLetters(): ReadonlySet<string> {
    return this.resolved;
  }

  clone(): CandidateSet {
    return new CandidateSet(this.words, this.resolved);
  }

  /**
   * filter drops every word that violates the clue, in place, and marks the
   * clue's letter as resolved when the clue leaves no position open.
   */
  filter(clue: Clue): void {
    if (isFullyResolved(clue)) this.resolved.add(clue.letter);
    this.words = this.words.filter((w) => satisfies(w, clue));
  }

  /**
   * charFrequency counts, for every letter, how many remaining words carry it
   * at each position. Rows for resolved letters are zeroed.
   */
  charFrequency(): LetterFrequency {
    const freq: LetterFrequency = new Map();

    for (const word of this.words) {
      for (let i = 0; i < word.length; i++) {
        const c = word[i];
        let row = freq.get(c);
        if (!row) {
          row = Array<number>(WORD_LENGTH).fill(0);
          freq.set(c, row);
        }
        row[i]++;
      }
    }

    for (const c of this.resolved) {
      if (freq.has(c)) freq.set(c, Array<number>(WORD_LENGTH).fill(0));
    }

    return freq;
  }

  /**
   * rankBest sorts the words by descending score and returns the first one.
   *
   * The sort happens in place and is stable, so ties keep whatever order the
   * set already had (load order on the first call). Membership is unchanged.
   */
  rankBest(freq: LetterFrequency): string | undefined {
    const scored = this.words.map((word) => ({ word, score: scoreWord(word, freq) }));
    scored.sort((a, b) => b.score - a.score);
    this.words = scored.map((s) => s.word);
    return this.words[0];
  }
}
