// packages/solver-core/src/session.ts
//
// A solving session: the fixed source dictionary, the candidates that could
// still be the answer, and the pool guesses are drawn from.
//
// Lifecycle:
//   reset(letter)          → anchor on a known first letter, suggest a guess
//   submitFeedback(g, fb)  → narrow the answers, suggest the next guess
//   ...until the outcome is "solved" or "no-candidates".
//
// The guess pool is seeded at reset and, by default, never narrowed. It can
// therefore suggest a word the answers have already ruled out; the wider pool
// keeps probing letters the remaining answers disagree on. Set
// `narrowGuessPool` to filter it alongside the answers instead.
//
// Every method runs to completion synchronously, so a session sees at most
// one mutation at a time.

import { readFeedback, seedClue, validateWord, type InputError } from './clue.js';
import { CandidateSet } from './candidateSet.js';

export type GuessOutcome =
  | { status: 'guess'; word: string; remaining: number }
  | { status: 'solved'; word: string }
  | { status: 'no-candidates' };

export type SolverResult =
  | { ok: true; outcome: GuessOutcome }
  | { ok: false; error: InputError };

export interface SessionOptions {
  /** Filter the guess pool with every clue as well (default: false). */
  narrowGuessPool?: boolean;
}

export class SolverSession {
  private answerSet = new CandidateSet();
  private pool = new CandidateSet();
  private readonly narrowGuessPool: boolean;

  constructor(
    readonly source: CandidateSet,
    options: SessionOptions = {},
  ) {
    this.narrowGuessPool = options.narrowGuessPool ?? false;
  }

  /** Words that could still be the answer. */
  get answers(): CandidateSet {
    return this.answerSet;
  }

  /** Words eligible as suggestions. */
  get guessPool(): CandidateSet {
    return this.pool;
  }

  /**
   * reset starts over with every source word whose first letter is `letter`.
   */
  reset(letter: string): SolverResult {
    const checked = validateWord(letter, 1);
    if (!checked.ok) return checked;

    const words = this.source.clone();
    words.filter(seedClue(checked.value));

    this.answerSet = words;
    this.pool = words.clone();

    return { ok: true, outcome: this.nextGuess() };
  }

  /**
   * submitFeedback applies the report for `guess` and returns the next suggestion.
   * Invalid input leaves the session untouched.
   */
  submitFeedback(guess: string, feedback: string): SolverResult {
    const decoded = readFeedback(guess, feedback);
    if (!decoded.ok) return decoded;

    for (const clue of decoded.clues) {
      this.answerSet.filter(clue);
      if (this.narrowGuessPool) this.pool.filter(clue);
    }

    return { ok: true, outcome: this.nextGuess() };
  }

  nextGuess(): GuessOutcome {
    const remaining = this.answerSet.size;
    if (remaining === 0) return { status: 'no-candidates' };

    const candidates = this.answerSet.list();
    if (remaining === 1) return { status: 'solved', word: candidates[0] };

    const word = this.pool.rankBest(this.answerSet.charFrequency());
    if (word === undefined) return { status: 'no-candidates' };
    return { status: 'guess', word, remaining };
  }
}
