import type { SessionMetrics } from '@live-relay/shared';

export interface RegisteredSession {
  readonly sessionId: string;
  getMetrics(): SessionMetrics;
}

/**
 * Live sessions keyed by id. The only structure shared across sessions.
 */
export class SessionRegistry<T extends RegisteredSession = RegisteredSession> {
  private readonly sessions = new Map<string, T>();

  register(session: T): void {
    if (this.sessions.has(session.sessionId)) {
      throw new Error(`Session already registered: ${session.sessionId}`);
    }
    this.sessions.set(session.sessionId, session);
  }

  /**
   * Removes the session. When `session` is given, only that instance is
   * removed.
   */
  unregister(sessionId: string, session?: T): boolean {
    const existing = this.sessions.get(sessionId);
    if (!existing || (session && existing !== session)) {
      return false;
    }
    return this.sessions.delete(sessionId);
  }

  get(sessionId: string): T | undefined {
    return this.sessions.get(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  list(): T[] {
    return Array.from(this.sessions.values());
  }

  /**
   * Metrics of every registered session. Callers get fresh records and may
   * modify them freely.
   */
  snapshotMetrics(): SessionMetrics[] {
    return this.list().map((session) => ({ ...session.getMetrics() }));
  }
}
