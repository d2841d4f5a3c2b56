import type { SessionState } from './state.types.js';

function fresh(sessionId: string, now: Date): SessionState {
  return { sessionId, state: 'greeting.welcome', turn: 0, updatedAt: now.toISOString() };
}

/**
 * Session state keyed by session id. Values are replaced whole on save so a
 * half-applied turn is never visible.
 */
export class ConversationStateStore {
  private readonly sessions = new Map<string, SessionState>();

  get(sessionId: string): SessionState | null {
    return this.sessions.get(sessionId) ?? null;
  }

  getOrCreate(sessionId: string, now: Date): SessionState {
    return this.get(sessionId) ?? fresh(sessionId, now);
  }

  save(session: SessionState): void {
    this.sessions.set(session.sessionId, session);
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /** Drops sessions last touched before `cutoff`; returns their ids. */
  expireIdle(cutoff: Date): string[] {
    const expired: string[] = [];
    for (const [id, session] of this.sessions) {
      if (Date.parse(session.updatedAt) < cutoff.getTime()) {
        this.sessions.delete(id);
        expired.push(id);
      }
    }
    return expired;
  }

  get size(): number {
    return this.sessions.size;
  }
}
