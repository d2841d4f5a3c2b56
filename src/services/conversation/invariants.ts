import type { ValidationService } from '../booking/validation.service.js';

import type { SessionState } from './state.types.js';

/** Soft checks on a session after a turn; returned issues are logged, not thrown. */
export function assertInvariants(session: SessionState, validation: ValidationService): string[] {
  const issues: string[] = [];
  switch (session.state) {
    case 'greeting.welcome':
    case 'greeting.ready':
      if (session.draft) issues.push('stale_draft');
      break;
    case 'new_reservation.collect':
      if (!session.draft) issues.push('draft_required');
      if (session.foundReservationId) issues.push('stale_lookup_pointer');
      break;
    case 'confirmation.confirm':
      if (!session.draft) issues.push('draft_required');
      else if (validation.missingFields(session.draft).length) issues.push('draft_incomplete');
      break;
    case 'manage.found':
      if (!session.foundReservationId) issues.push('lookup_pointer_required');
      break;
  }
  return issues;
}
