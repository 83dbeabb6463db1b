// packages/solver-core/src/word.ts
//
// Per-word predicates: whether a candidate is consistent with a clue, and
// how informative it would be as the next guess.

import type { Clue } from './clue.js';
import { POSITION_WEIGHT } from './constants.js';

/** Letter → per-position counts over a candidate set. */
export type LetterFrequency = Map<string, number[]>;

/**
 * satisfies checks a candidate word against one clue.
 *
 * @returns false when a "match" position holds another letter, an "absent"
 *          position holds the clue letter, or the letter occurs fewer than
 *          `clue.minOccurrences` times.
 *
 * Example:
 *   satisfies('crane', { letter: 'a', minOccurrences: 1,
 *     verdicts: ['allowed', 'allowed', 'match', 'allowed', 'allowed'] }) → true
 */
export function satisfies(word: string, clue: Clue): boolean {
  let occur = 0;
  for (let i = 0; i < word.length; i++) {
    const c = word[i];
    if (c === clue.letter) occur++;

    const verdict = clue.verdicts[i];
    if (verdict === 'match' && c !== clue.letter) return false;
    if (verdict === 'absent' && c === clue.letter) return false;
  }
  return occur >= clue.minOccurrences;
}

/**
 * scoreWord rates a word as a guess against a frequency table.
 *
 * Each distinct letter contributes its whole count row; the count at a
 * position where the word itself places that letter is weighted by
 * POSITION_WEIGHT. Letters missing from the table contribute nothing.
 */
export function scoreWord(word: string, freq: LetterFrequency): number {
  let score = 0;
  for (const c of new Set(word)) {
    const row = freq.get(c);
    if (!row) continue;
    row.forEach((count, i) => {
      score += word[i] === c ? count * POSITION_WEIGHT : count;
    });
  }
  return score;
}
