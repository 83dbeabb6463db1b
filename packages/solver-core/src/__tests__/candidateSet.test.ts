// packages/solver-core/src/__tests__/candidateSet.test.ts
//
// Unit tests for CandidateSet: filtering, resolved-letter bookkeeping,
// letter frequencies and ranking.

import { CandidateSet, decodeFeedback, type Clue } from '../index.js';

const cFirstOnly: Clue = {
  letter: 'c',
  minOccurrences: 1,
  verdicts: ['match', 'absent', 'absent', 'absent', 'absent'],
};

describe('CandidateSet.filter', () => {
  it('keeps only words satisfying the clue', () => {
    const set = new CandidateSet(['crane', 'slate', 'chart']);
    set.filter({ letter: 'c', minOccurrences: 1, verdicts: ['match', 'allowed', 'allowed', 'allowed', 'allowed'] });
    expect(set.list()).toEqual(['crane', 'chart']);
  });

  it('never grows the set', () => {
    const set = new CandidateSet(['crane', 'crate', 'cried', 'cloud', 'chart']);
    const sizes = [set.size];
    for (const clue of decodeFeedback('crate', 'ccxxx')) {
      set.filter(clue);
      sizes.push(set.size);
    }
    for (let i = 1; i < sizes.length; i++) {
      expect(sizes[i]).toBeLessThanOrEqual(sizes[i - 1]);
    }
    expect(set.list()).toEqual([]);
  });

  it('registers the letter only when the clue leaves no position open', () => {
    const set = new CandidateSet(['crane', 'chart']);
    set.filter({ letter: 'c', minOccurrences: 1, verdicts: ['match', 'allowed', 'allowed', 'allowed', 'allowed'] });
    expect([...set.resolvedLetters]).toEqual([]);
    set.filter(cFirstOnly);
    expect([...set.resolvedLetters]).toEqual(['c']);
  });
});

describe('CandidateSet.charFrequency', () => {
  it('counts letters per position', () => {
    const freq = new CandidateSet(['crane', 'cross']).charFrequency();
    expect(freq.get('c')).toEqual([2, 0, 0, 0, 0]);
    expect(freq.get('r')).toEqual([0, 2, 0, 0, 0]);
    expect(freq.get('s')).toEqual([0, 0, 0, 1, 1]);
    expect(freq.get('e')).toEqual([0, 0, 0, 0, 1]);
    expect(freq.has('z')).toBe(false);
  });

  it('zeroes resolved letters even when every word still contains them', () => {
    const set = new CandidateSet(['crane', 'cross', 'chart']);
    set.filter(cFirstOnly);
    expect(set.size).toBe(3);

    const freq = set.charFrequency();
    expect(freq.get('c')).toEqual([0, 0, 0, 0, 0]);
    expect(freq.get('r')).toEqual([0, 2, 0, 1, 0]);
  });
});

describe('CandidateSet.clone', () => {
  it('copies words and resolved letters independently', () => {
    const original = new CandidateSet(['crane', 'slate']);
    const copy = original.clone();
    copy.filter(cFirstOnly);

    expect(copy.list()).toEqual(['crane']);
    expect(original.list()).toEqual(['crane', 'slate']);
    expect(original.resolvedLetters.has('c')).toBe(false);
  });
});

describe('CandidateSet.rankBest', () => {
  it('returns undefined for an empty set', () => {
    expect(new CandidateSet().rankBest(new Map())).toBeUndefined();
  });

  it('keeps the current order on ties', () => {
    const set = new CandidateSet(['bumpy', 'fjord', 'glyph']);
    expect(set.rankBest(new Map())).toBe('bumpy');
    expect(set.list()).toEqual(['bumpy', 'fjord', 'glyph']);
  });

  it('orders by descending score without changing membership', () => {
    const set = new CandidateSet(['bumpy', 'fjord', 'glyph']);
    const freq = new Map([
      ['o', [0, 0, 2, 0, 0]],
      ['y', [0, 0, 1, 0, 0]],
    ]);
    // fjord: 2×4 = 8, glyph: 1×4 = 4, bumpy: 1
    expect(set.rankBest(freq)).toBe('fjord');
    expect(set.list()).toEqual(['fjord', 'glyph', 'bumpy']);
  });
});
