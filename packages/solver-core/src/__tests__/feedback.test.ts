// packages/solver-core/src/__tests__/feedback.test.ts
//
// Unit tests for feedbackFor(), the honest-player report generator.

import { feedbackFor } from '../index.js';

describe('feedbackFor', () => {
  it('marks exact matches as correct', () => {
    expect(feedbackFor('crane', 'crane')).toBe('ccccc');
  });

  it('marks absent letters with x', () => {
    expect(feedbackFor('crane', 'bolts')).toBe('xxxxx');
  });

  it('marks letters left over in the answer as wrong-place', () => {
    // c matches; both a's are present elsewhere; the second c has no copy left
    expect(feedbackFor('crane', 'cacao')).toBe('cwxwx');
  });

  it('reports every copy of a repeated letter that still has a match', () => {
    // "apple" has one l, and both l's of the guess are reported present
    expect(feedbackFor('apple', 'alley')).toBe('cwwwx');
  });

  it('normalizes case', () => {
    expect(feedbackFor('CRANE', 'Crate')).toBe('cccxc');
  });

  it('throws on malformed words', () => {
    expect(() => feedbackFor('crane', 'cran')).toThrow('Words must be 5 letters');
    expect(() => feedbackFor('crane', 'cr4ne')).toThrow('Only a–z letters allowed');
  });
});
