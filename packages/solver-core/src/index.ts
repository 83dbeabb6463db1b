// packages/solver-core/src/index.ts
//
// Entry point for the solver-core package.
//
// Includes:
//   • clue.ts         → clues, feedback decoding and input validation
//   • word.ts         → per-word matching and scoring
//   • candidateSet.ts → filtering, letter frequencies, ranking
//   • session.ts      → reset / submitFeedback / nextGuess
//   • words.ts        → word list parsing and loading
//   • feedback.ts     → feedback an honest player would give
//   • simulate.ts     → full solves against a known answer
//
// Example usage:
//   import { loadWordList, SolverSession } from '@wordhint/solver-core';

export * from './constants.js';
export * from './clue.js';
export * from './word.js';
export * from './candidateSet.js';
export * from './session.js';
export * from './errors.js';
export * from './words.js';
export * from './feedback.js';
export * from './simulate.js';
