import { randomUUID } from 'crypto';
import { NotFoundError } from '../errors';
import { createSession, SessionContext } from './machine';

export const DEFAULT_SESSION_IDLE_TTL_MS = 30 * 60 * 1000;

export interface SessionRegistryOptions {
  idleTtlMs?: number;
  now?: () => number;
}

interface Entry {
  session: SessionContext;
  touchedAt: number;
}

// Sessions live in memory only; a restart or an idle timeout starts the user over, paywall included.
export class SessionRegistry {
  private sessions: Map<string, Entry> = new Map();
  private idleTtlMs: number;
  private now: () => number;

  constructor(options: SessionRegistryOptions = {}) {
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_SESSION_IDLE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): SessionContext {
    this.sweep();
    const session = createSession(randomUUID());
    return this.save(session);
  }

  get(id: string): SessionContext {
    const entry = this.sessions.get(id);
    if (!entry || this.isExpired(entry)) {
      this.sessions.delete(id);
      throw new NotFoundError('Session not found');
    }
    entry.touchedAt = this.now();
    return entry.session;
  }

  save(session: SessionContext): SessionContext {
    this.sessions.set(session.id, { session, touchedAt: this.now() });
    return session;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  /** Drops every session idle for longer than the TTL; returns how many went. */
  sweep(): number {
    let removed = 0;
    for (const [id, entry] of this.sessions) {
      if (this.isExpired(entry)) {
        this.sessions.delete(id);
        removed += 1;
      }
    }
    if (removed > 0) console.log(`Expired ${removed} idle session(s)`);
    return removed;
  }

  private isExpired(entry: Entry): boolean {
    return this.now() - entry.touchedAt > this.idleTtlMs;
  }
}
