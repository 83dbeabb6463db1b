// packages/solver-core/src/clue.ts
//
// Clues and the feedback codec.
//
// A clue records everything one feedback report says about a single letter:
// a lower bound on how often it occurs, and a per-position verdict.
//
// Verdict legend:
//   - "match":   the letter sits at this position
//   - "absent":  the letter is not at this position (it may still occur elsewhere)
//   - "allowed": nothing known yet, the position does not exclude anything
//
// Feedback codes, one per guess position:
//   - "c"  correct letter, correct position
//   - "w"  letter present, wrong position
//   - any other letter, or one of "x", "-", ".", "_" → letter absent here

import { WORD_LENGTH } from './constants.js';

export type Verdict = 'match' | 'absent' | 'allowed';

/** Verdicts while a clue is being assembled; "unresolved" never leaves this module. */
type DraftVerdict = Verdict | 'unresolved';

export interface Clue {
  letter: string;
  minOccurrences: number;
  verdicts: readonly Verdict[];
}

export type InputErrorCode = 'input-length-mismatch' | 'invalid-character';

export interface InputError {
  code: InputErrorCode;
  message: string;
}

export type FeedbackResult =
  | { ok: true; guess: string; clues: Clue[] }
  | { ok: false; error: InputError };

const WORD_RE = /^[a-z]+$/;
const FEEDBACK_RE = /^[a-z._-]+$/;

/**
 * isFullyResolved reports whether a clue pins down its letter everywhere,
 * i.e. every position holds a definite "match" or "absent".
 */
export function isFullyResolved(clue: Clue): boolean {
  return clue.verdicts.every((v) => v !== 'allowed');
}

/**
 * seedClue builds the clue used to anchor a session: `letter` at position 0,
 * every other position left open.
 */
export function seedClue(letter: string): Clue {
  const verdicts: Verdict[] = Array(WORD_LENGTH).fill('allowed');
  verdicts[0] = 'match';
  return { letter, minOccurrences: 1, verdicts };
}

/**
 * decodeFeedback turns a guess and its feedback string into one clue per
 * distinct guessed letter, in ascending letter order.
 *
 * Both inputs must already be lowercase and WORD_LENGTH long (see readFeedback).
 *
 * minOccurrences is `correct + (wrongPlace > 0 ? 1 : 0)`. It is a lower
 * bound only: a letter reported "w" twice still only requires one extra copy.
 *
 * Example:
 *   decodeFeedback('crane', 'wacwa')[1]
 *   → { letter: 'c', minOccurrences: 1,
 *       verdicts: ['absent', 'allowed', 'allowed', 'allowed', 'allowed'] }
 */
export function decodeFeedback(guess: string, feedback: string): Clue[] {
  const letters = [...new Set(guess)].sort();

  return letters.map((letter) => {
    const draft: DraftVerdict[] = Array(WORD_LENGTH).fill('unresolved');
    let correct = 0;
    let wrongPlace = 0;
    let wrong = 0;

    for (let i = 0; i < WORD_LENGTH; i++) {
      if (guess[i] !== letter) continue;
      const code = feedback[i];
      if (code === 'c') {
        correct++;
        draft[i] = 'match';
      } else if (code === 'w') {
        wrongPlace++;
        draft[i] = 'absent';
      } else {
        wrong++;
        draft[i] = 'absent';
      }
    }

    // One confirmed miss rules out every other copy of the letter.
    const fill: Verdict = wrong > 0 ? 'absent' : 'allowed';
    const verdicts = draft.map((v): Verdict => (v === 'unresolved' ? fill : v));

    return {
      letter,
      minOccurrences: correct + (wrongPlace > 0 ? 1 : 0),
      verdicts,
    };
  });
}

/**
 * validateWord normalizes a word to lowercase and checks its length and alphabet.
 */
export function validateWord(
  raw: string,
  length: number = WORD_LENGTH,
): { ok: true; value: string } | { ok: false; error: InputError } {
  const value = raw.trim().toLowerCase();
  if (value.length !== length) {
    return {
      ok: false,
      error: {
        code: 'input-length-mismatch',
        message: `Expected ${length} letter(s), got ${value.length}`,
      },
    };
  }
  if (!WORD_RE.test(value)) {
    return {
      ok: false,
      error: { code: 'invalid-character', message: `Only a–z letters allowed: "${raw}"` },
    };
  }
  return { ok: true, value };
}

/**
 * readFeedback validates a guess/feedback pair and decodes it.
 * Nothing is decoded unless both strings pass validation.
 */
export function readFeedback(rawGuess: string, rawFeedback: string): FeedbackResult {
  const guess = validateWord(rawGuess);
  if (!guess.ok) return guess;

  const feedback = rawFeedback.trim().toLowerCase();
  if (feedback.length !== WORD_LENGTH) {
    return {
      ok: false,
      error: {
        code: 'input-length-mismatch',
        message: `Feedback must be ${WORD_LENGTH} codes, got ${feedback.length}`,
      },
    };
  }
  if (!FEEDBACK_RE.test(feedback)) {
    return {
      ok: false,
      error: {
        code: 'invalid-character',
        message: `Unrecognized feedback code in "${rawFeedback}"`,
      },
    };
  }

  return { ok: true, guess: guess.value, clues: decodeFeedback(guess.value, feedback) };
}
