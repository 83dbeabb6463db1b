// apps/server/src/sessions.ts
//
// In-memory session store.
//
// One shared session backs the plain-text /reset and /hint routes. The JSON
// API hands out independent sessions keyed by nanoid; once `maxSessions` is
// reached the oldest one is evicted. Nothing survives a restart.

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { SolverSession, type CandidateSet, type SessionOptions } from '@wordhint/solver-core';

export interface StoreOptions extends SessionOptions {
  maxSessions: number;
}

export class SessionStore {
  readonly shared: SolverSession;
  private readonly sessions = new Map<string, SolverSession>();

  constructor(
    readonly source: CandidateSet,
    private readonly options: StoreOptions,
    private readonly log: Logger,
  ) {
    this.shared = new SolverSession(source, options);
  }

  get narrowGuessPool(): boolean {
    return this.options.narrowGuessPool ?? false;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): { id: string; session: SolverSession } {
    while (this.sessions.size >= this.options.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
      this.log.info({ sessionId: oldest.value }, 'session evicted');
    }

    const id = nanoid();
    const session = new SolverSession(this.source, this.options);
    this.sessions.set(id, session);
    return { id, session };
  }

  get(id: string): SolverSession | undefined {
    return this.sessions.get(id);
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }
}
