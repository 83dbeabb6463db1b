// packages/solver-core/src/__tests__/simulate.test.ts
//
// End-to-end solves against known answers. Honest feedback must never
// eliminate the answer, so every solve has to end on the target word.

import { CandidateSet, SolverSession, feedbackFor, simulateSolve } from '../index.js';

const DICT = ['crane', 'crate', 'cried', 'cloud', 'chart', 'sling'];

describe('simulateSolve', () => {
  it('solves "cloud" in two suggestions', () => {
    expect(simulateSolve(new CandidateSet(DICT), 'cloud')).toEqual({
      solved: true,
      guesses: ['crate', 'cloud'],
      outcome: { status: 'solved', word: 'cloud' },
    });
  });

  it('solves a single-candidate start without any feedback', () => {
    expect(simulateSolve(new CandidateSet(DICT), 'sling')).toEqual({
      solved: true,
      guesses: ['sling'],
      outcome: { status: 'solved', word: 'sling' },
    });
  });

  it.each(DICT)('ends on the target word for %s', (target) => {
    const result = simulateSolve(new CandidateSet(DICT), target);
    expect(result.solved).toBe(true);
    expect(result.guesses.at(-1)).toBe(target);
  });

  it('reports an answer outside the dictionary as unsolved', () => {
    const result = simulateSolve(new CandidateSet(DICT), 'zebra');
    expect(result).toEqual({ solved: false, guesses: [], outcome: { status: 'no-candidates' } });
  });
});

describe('honest feedback', () => {
  it('keeps the target among the answers after every round', () => {
    const session = new SolverSession(new CandidateSet(DICT));
    const target = 'chart';
    let res = session.reset('c');
    let previous = session.answers.size;

    while (res.ok && res.outcome.status === 'guess') {
      res = session.submitFeedback(res.outcome.word, feedbackFor(target, res.outcome.word));
      expect(session.answers.has(target)).toBe(true);
      expect(session.answers.size).toBeLessThanOrEqual(previous);
      previous = session.answers.size;
    }
    expect(res).toEqual({ ok: true, outcome: { status: 'solved', word: 'chart' } });
  });
});
