// packages/solver-core/src/simulate.ts
//
// Plays a whole session against a known answer, feeding back what an honest
// player would report after each suggestion.

import { CandidateSet } from './candidateSet.js';
import { feedbackFor } from './feedback.js';
import { SolverSession, type GuessOutcome, type SessionOptions } from './session.js';

export interface SimulateOptions extends SessionOptions {
  /** Stop after this many feedback rounds (default 20). */
  maxRounds?: number;
}

export interface SimulationResult {
  solved: boolean;
  /** Every word the solver put forward, the final answer included. */
  guesses: string[];
  outcome: GuessOutcome;
}

export function simulateSolve(
  source: CandidateSet,
  target: string,
  options: SimulateOptions = {},
): SimulationResult {
  const { maxRounds = 20, ...sessionOptions } = options;
  const answer = target.toLowerCase();
  const session = new SolverSession(source, sessionOptions);

  const started = session.reset(answer[0] ?? '');
  if (!started.ok) throw new Error(started.error.message);

  let outcome = started.outcome;
  const guesses: string[] = [];

  for (let round = 0; outcome.status === 'guess' && round < maxRounds; round++) {
    guesses.push(outcome.word);
    const next = session.submitFeedback(outcome.word, feedbackFor(answer, outcome.word));
    if (!next.ok) throw new Error(next.error.message);
    outcome = next.outcome;
  }

  if (outcome.status === 'solved') guesses.push(outcome.word);
  return { solved: outcome.status === 'solved' && outcome.word === answer, guesses, outcome };
}
