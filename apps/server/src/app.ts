// apps/server/src/app.ts
//
// HTTP surface of the solver.
//
// Routes:
//   GET    /reset/:letter              shared session, plain-text reply
//   GET    /hint/:word/:hint           shared session, plain-text reply
//   POST   /api/sessions               { letter }            → { sessionId, outcome }
//   POST   /api/sessions/:id/feedback  { guess, feedback }   → { outcome }
//   GET    /api/sessions/:id           session snapshot
//   DELETE /api/sessions/:id
//   POST   /api/simulate               { target, maxRounds } → { solved, guesses, outcome }
//   GET    /health
//
// Bodies are shape-checked with the protocol schemas; the solver validates
// words and feedback codes before touching any session.

import express, { type ErrorRequestHandler, type Response } from 'express';
import cors from 'cors';
import type { Logger } from 'pino';
import { simulateSolve, type GuessOutcome, type InputError } from '@wordhint/solver-core';
import {
  feedbackReq,
  feedbackRes,
  newSessionReq,
  newSessionRes,
  sessionStatusRes,
  simulateReq,
  simulateRes,
  type ErrorRes,
} from '@wordhint/protocol';
import type { SessionStore } from './sessions.js';

export const NO_WORDS_TEXT = 'No possible words!';

/** Plain-text rendering used by the /reset and /hint routes. */
export function describeOutcome(outcome: GuessOutcome): string {
  return outcome.status === 'no-candidates' ? NO_WORDS_TEXT : outcome.word;
}

function sendInputError(res: Response, error: InputError) {
  const body: ErrorRes = { error };
  return res.status(400).json(body);
}

function sendNotFound(res: Response, id: string) {
  const body: ErrorRes = {
    error: { code: 'session-not-found', message: `No session ${id}` },
  };
  return res.status(404).json(body);
}

export function createApp(store: SessionStore, log: Logger) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  /* ------------------------------------------------------------------------ */
  /*                          Plain-text shared session                       */
  /* ------------------------------------------------------------------------ */
  app.get('/reset/:letter', (req, res) => {
    const result = store.shared.reset(req.params.letter);
    if (!result.ok) return res.status(400).type('text').send(result.error.message);
    log.info({ letter: req.params.letter, outcome: result.outcome }, 'shared session reset');
    res.type('text').send(describeOutcome(result.outcome));
  });

  app.get('/hint/:word/:hint', (req, res) => {
    const { word, hint } = req.params;
    const result = store.shared.submitFeedback(word, hint);
    if (!result.ok) return res.status(400).type('text').send(result.error.message);
    log.info({ guess: word, feedback: hint, outcome: result.outcome }, 'shared session hint');
    res.type('text').send(describeOutcome(result.outcome));
  });

  /* ------------------------------------------------------------------------ */
  /*                                JSON sessions                             */
  /* ------------------------------------------------------------------------ */
  app.post('/api/sessions', (req, res) => {
    const parsed = newSessionReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());

    const { id, session } = store.create();
    const result = session.reset(parsed.data.letter);
    if (!result.ok) {
      store.delete(id);
      return sendInputError(res, result.error);
    }

    log.info({ sessionId: id, remaining: session.answers.size }, 'session created');
    res.status(201).json(newSessionRes.parse({ sessionId: id, outcome: result.outcome }));
  });

  app.post('/api/sessions/:id/feedback', (req, res) => {
    const parsed = feedbackReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());

    const { id } = req.params;
    const session = store.get(id);
    if (!session) return sendNotFound(res, id);

    const before = session.answers.size;
    const result = session.submitFeedback(parsed.data.guess, parsed.data.feedback);
    if (!result.ok) return sendInputError(res, result.error);

    log.info(
      { sessionId: id, before, after: session.answers.size, status: result.outcome.status },
      'feedback applied',
    );
    res.json(feedbackRes.parse({ outcome: result.outcome }));
  });

  app.get('/api/sessions/:id', (req, res) => {
    const { id } = req.params;
    const session = store.get(id);
    if (!session) return sendNotFound(res, id);

    res.json(
      sessionStatusRes.parse({
        sessionId: id,
        remaining: session.answers.size,
        guessPool: session.guessPool.size,
        resolvedLetters: [...session.answers.resolvedLetters].sort(),
        sample: session.answers.list().slice(0, 20),
      }),
    );
  });

  app.delete('/api/sessions/:id', (req, res) => {
    const { id } = req.params;
    if (!store.delete(id)) return sendNotFound(res, id);
    res.status(204).end();
  });

  /* ------------------------------------------------------------------------ */
  /*                                  Utilities                               */
  /* ------------------------------------------------------------------------ */
  app.post('/api/simulate', (req, res) => {
    const parsed = simulateReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());

    const result = simulateSolve(store.source, parsed.data.target, {
      maxRounds: parsed.data.maxRounds,
      narrowGuessPool: store.narrowGuessPool,
    });
    log.debug({ target: parsed.data.target, guesses: result.guesses.length }, 'simulated');
    res.json(simulateRes.parse(result));
  });

  app.get('/health', (_req, res) => {
    res.json({ ok: true, words: store.source.size, sessions: store.size });
  });

  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: { code: 'invalid-json', message: err.message } });
    }
    log.error({ err }, 'request failed');
    res.status(500).json({ error: { code: 'internal', message: 'Internal server error' } });
  };
  app.use(onError);

  return app;
}
