import type { DraftField, ReservationDraft } from '@core/interfaces/reservation.types.js';

import type { SessionState } from './state.types.js';

/**
 * Staging area for the reservation a session is building. Every method
 * returns a new session value; the store decides when it is kept.
 * Nothing here validates: that happens on confirmation.
 */
export class DraftManager {
  getOrCreate(session: SessionState): ReservationDraft {
    return { ...(session.draft ?? {}) };
  }

  start(session: SessionState): SessionState {
    return { ...session, draft: {} };
  }

  set<F extends DraftField>(
    session: SessionState,
    field: F,
    value: ReservationDraft[F],
  ): SessionState {
    const draft: ReservationDraft = { ...this.getOrCreate(session), [field]: value };
    return { ...session, draft };
  }

  unset(session: SessionState, field: DraftField): SessionState {
    const draft = this.getOrCreate(session);
    delete draft[field];
    return { ...session, draft };
  }

  clear(session: SessionState): SessionState {
    const { draft: _dropped, ...rest } = session;
    return rest;
  }
}
