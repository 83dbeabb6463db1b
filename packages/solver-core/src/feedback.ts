// packages/solver-core/src/feedback.ts
//
// Renders the feedback string a person would type for a guess when they know
// the answer. Used to drive simulated solves and to check the solver against
// itself.
//
// Codes:
//   - "c": correct letter, correct position
//   - "w": letter occurs elsewhere in the answer (outside its exact matches)
//   - "x": letter not available anywhere else
//
// Unlike tile colouring, "w" copies are not rationed: the clue decoder reads a
// single "x" as ruling a letter out entirely, so every non-matching copy of a
// letter that still has unmatched occurrences in the answer is reported "w".

import { WORD_LENGTH } from './constants.js';

/**
 * feedbackFor compares a guess against the answer.
 *
 * @param answer - the hidden word (WORD_LENGTH letters, a–z)
 * @param guess  - the word that was played (WORD_LENGTH letters, a–z)
 *
 * Example:
 *   feedbackFor('apple', 'alley') → 'cwwwx'
 */
export function feedbackFor(answer: string, guess: string): string {
  const A = answer.toLowerCase();
  const G = guess.toLowerCase();

  if (A.length !== WORD_LENGTH || G.length !== WORD_LENGTH)
    throw new Error(`Words must be ${WORD_LENGTH} letters`);
  if (!/^[a-z]+$/.test(A) || !/^[a-z]+$/.test(G)) {
    throw new Error('Only a–z letters allowed');
  }

  const codes: string[] = Array(WORD_LENGTH).fill('x');
  const unmatched: Record<string, number> = {};

  // Pass 1: exact matches, and count the answer letters they leave over
  for (let i = 0; i < WORD_LENGTH; i++) {
    if (G[i] === A[i]) {
      codes[i] = 'c';
    } else {
      unmatched[A[i]] = (unmatched[A[i]] ?? 0) + 1;
    }
  }

  // Pass 2: anything still unmatched in the answer is present elsewhere
  for (let i = 0; i < WORD_LENGTH; i++) {
    if (codes[i] === 'c') continue;
    if ((unmatched[G[i]] ?? 0) > 0) codes[i] = 'w';
  }

  return codes.join('');
}
