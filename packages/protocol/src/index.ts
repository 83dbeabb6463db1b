// packages/protocol/src/index.ts
//
// Shared protocol definitions for the hint server and its clients.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - Outcome: what the solver suggests next ("guess", "solved", "no-candidates").
//   - Request/response shapes for sessions, feedback and simulated solves.
//
// Requests are only shape-checked here; word length and alphabet are
// validated by the solver so its error codes reach the client unchanged.

import { z } from 'zod';

/**
 * Outcome schema:
 *  - "guess"         → next suggestion plus the number of possible answers left
 *  - "solved"        → exactly one answer remains
 *  - "no-candidates" → the reports so far contradict every dictionary word
 */
export const outcomeSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('guess'),
    word: z.string(),
    remaining: z.number().int().min(2),
  }),
  z.object({ status: z.literal('solved'), word: z.string() }),
  z.object({ status: z.literal('no-candidates') }),
]);
export type Outcome = z.infer<typeof outcomeSchema>;

export const errorCodeSchema = z.enum([
  'input-length-mismatch',
  'invalid-character',
  'session-not-found',
]);

export const errorRes = z.object({
  error: z.object({ code: errorCodeSchema, message: z.string() }),
});
export type ErrorRes = z.infer<typeof errorRes>;

/* -------------------------------------------------------------------------- */
/*                              /api/sessions                                 */
/* -------------------------------------------------------------------------- */

/**
 * Request to start a session.
 *  - letter: the known first letter of the answer
 */
export const newSessionReq = z.object({
  letter: z.string().min(1).max(8),
});

export const newSessionRes = z.object({
  sessionId: z.string(),
  outcome: outcomeSchema,
});

/* -------------------------------------------------------------------------- */
/*                        /api/sessions/:id/feedback                          */
/* -------------------------------------------------------------------------- */

/**
 * Request to report feedback.
 *  - guess:    the word that was played
 *  - feedback: one code per letter ("c" correct, "w" wrong place, "x" absent)
 */
export const feedbackReq = z.object({
  guess: z.string().max(32),
  feedback: z.string().max(32),
});

export const feedbackRes = z.object({
  outcome: outcomeSchema,
});

/** Snapshot of a session for debugging clients. */
export const sessionStatusRes = z.object({
  sessionId: z.string(),
  remaining: z.number().int().min(0),
  guessPool: z.number().int().min(0),
  resolvedLetters: z.array(z.string()),
  sample: z.array(z.string()).max(20),
});

/* -------------------------------------------------------------------------- */
/*                              /api/simulate                                 */
/* -------------------------------------------------------------------------- */

export const simulateReq = z.object({
  target: z.string().regex(/^[A-Za-z]{5}$/),
  maxRounds: z.number().int().min(1).max(50).default(20),
});

export const simulateRes = z.object({
  solved: z.boolean(),
  guesses: z.array(z.string()),
  outcome: outcomeSchema,
});
