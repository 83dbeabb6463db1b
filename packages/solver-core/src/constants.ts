// packages/solver-core/src/constants.ts
//
// System-wide constants. Every word and every feedback string is exactly
// WORD_LENGTH characters long.

export const WORD_LENGTH = 5;

/** Weight applied to a letter's count at the position the word actually uses it. */
export const POSITION_WEIGHT = 4;
