/**
 * Query Session Registry
 *
 * In-memory sessions keyed by session id. Each session owns its pagination
 * cursor. Sessions idle longer than the TTL are dropped lazily on access.
 */

import { getConfig } from '../../config';
import { PaginationCursor } from './pagination';

export class QuerySession {
  readonly cursor = new PaginationCursor();
  lastSeen: number;

  constructor(readonly id: string, now: number = Date.now()) {
    this.lastSeen = now;
  }
}

export class SessionRegistry {
  private sessions = new Map<string, QuerySession>();

  constructor(
    private readonly ttlMs: number = getConfig().sessionTtlMs,
    private readonly clock: () => number = Date.now
  ) {}

  /**
   * Session for an id, created on first use. Touches the session.
   */
  get(sessionId: string): QuerySession {
    const now = this.clock();
    this.evictExpired(now);
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = new QuerySession(sessionId, now);
      this.sessions.set(sessionId, session);
    }
    session.lastSeen = now;
    return session;
  }

  has(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    if (this.clock() - session.lastSeen > this.ttlMs) {
      this.sessions.delete(sessionId);
      return false;
    }
    return true;
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  clearAll(): void {
    this.sessions.clear();
  }

  size(): number {
    return this.sessions.size;
  }

  private evictExpired(now: number): void {
    for (const [id, session] of this.sessions) {
      if (now - session.lastSeen > this.ttlMs) this.sessions.delete(id);
    }
  }
}
