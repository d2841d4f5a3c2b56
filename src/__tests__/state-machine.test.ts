import { describe, it, expect, beforeEach } from 'vitest';

import { buildReservationSettings } from '@services/booking/config.defaults.js';
import { ReservationRepository } from '@core/repositories/reservation.repo.js';
import { ReservationService } from '@services/booking/reservation.service.js';
import { SlotLedger } from '@services/booking/slot-ledger.js';
import { DraftManager } from '@services/conversation/draft-manager.js';
import { ConversationStateMachine } from '@services/conversation/state-machine.js';
import type { Intent, SessionState, StateKey } from '@services/conversation/state.types.js';
import { KeyedMutex } from '@utils/locks.js';

import { draft, manualClock, sequenceRandom } from '@test/utils/fixtures.js';

const NOW = '2025-06-01T12:00:00.000Z';

function session(state: StateKey, extra: Partial<SessionState> = {}): SessionState {
  return { sessionId: 's1', state, turn: 0, updatedAt: NOW, ...extra };
}

let service: ReservationService;
let machine: ConversationStateMachine;

beforeEach(() => {
  const settings = buildReservationSettings({ maxPerSlot: 2, maxPartySize: 8 });
  const { clock } = manualClock(NOW);
  service = new ReservationService(
    settings,
    new SlotLedger(settings),
    new ReservationRepository(),
    new KeyedMutex(),
    clock,
    sequenceRandom(),
  );
  machine = new ConversationStateMachine(service, new DraftManager(), clock);
});

async function run(from: SessionState, ...intents: Intent[]) {
  let current = from;
  let last = await machine.handle(current, intents[0] ?? { name: 'proceed' });
  current = last.session;
  for (const intent of intents.slice(1)) {
    last = await machine.handle(current, intent);
    current = last.session;
  }
  return last;
}

describe('ConversationStateMachine: greeting', () => {
  it('moves from welcome to the menu', async () => {
    const t = await machine.handle(session('greeting.welcome'), { name: 'proceed' });
    expect(t.session.state).toBe('greeting.ready');
    expect(t.responseText).toBe('How can I help you today?');
  });

  it('starts a fresh draft and drops any lookup pointer', async () => {
    const t = await machine.handle(session('greeting.ready', { foundReservationId: '100001' }), {
      name: 'start_new_reservation',
    });
    expect(t.session).toEqual(session('new_reservation.collect', { draft: {} }));
  });

  it('turns away intents the state does not accept, leaving it untouched', async () => {
    const from = session('greeting.ready');
    const t = await machine.handle(from, { name: 'confirm_reservation' });
    expect(t.session).toEqual(from);
    expect(t.events).toEqual([]);
    expect(t.responseText).toBe(
      "I can't do that right now. At this point you can make a new reservation, look up an existing reservation.",
    );
  });
});

describe('ConversationStateMachine: collecting a reservation', () => {
  const collect = () => session('new_reservation.collect', { draft: {} });

  it('walks through every field into the confirmation summary', async () => {
    const t = await run(
      collect(),
      { name: 'set_name', guestName: 'Ada' },
      { name: 'set_party_size', partySize: 2 },
      { name: 'set_date', date: '2025-06-15' },
      { name: 'set_time', time: '19:00' },
      { name: 'set_phone', phone: '555-0101' },
      { name: 'set_requests', requests: 'birthday' },
    );

    expect(t.session.state).toBe('confirmation.confirm');
    expect(t.session.draft).toEqual(draft({ name: 'Ada', partySize: 2, specialRequests: 'birthday' }));
    expect(t.responseText).toBe(
      'Let me confirm your reservation: Ada, party of 2, on 2025-06-15 at 19:00. Phone: 555-0101. Special requests: birthday. Is this correct?',
    );
  });

  it('stays in collect and names what is missing', async () => {
    const t = await run(
      collect(),
      { name: 'set_name', guestName: 'Ada' },
      { name: 'set_requests', requests: '' },
    );
    expect(t.session.state).toBe('new_reservation.collect');
    expect(t.responseText).toBe(
      "I'm missing some information: party size, date, time, phone number. Let's go back and complete those.",
    );
  });

  it('rejects party sizes outside the limits', async () => {
    const big = await machine.handle(collect(), { name: 'set_party_size', partySize: 9 });
    expect(big.responseText).toBe(
      "I'm sorry, we can only accommodate parties up to 8. For larger groups, please call us directly.",
    );
    expect(big.session.draft).toEqual({});

    const none = await machine.handle(collect(), { name: 'set_party_size', partySize: 0 });
    expect(none.session.draft).toEqual({});
  });

  it('answers a date with its open times', async () => {
    await service.confirm(draft({ time: '17:00' }));
    await service.confirm(draft({ time: '17:00', name: 'Grace' }));

    const t = await machine.handle(collect(), { name: 'set_date', date: '2025-06-15' });
    expect(t.responseText).toBe(
      'We have availability on 2025-06-15. Available times are: 18:00, 19:00, 20:00, 21:00. What time would you prefer?',
    );
    expect(t.session.draft).toEqual({ date: '2025-06-15' });
  });

  it('refuses a malformed date', async () => {
    const t = await machine.handle(collect(), { name: 'set_date', date: 'next friday' });
    expect(t.responseText).toBe('I need the date as year, month and day. Which date would you like?');
    expect(t.session.draft).toEqual({});
  });

  it('needs a date before a time', async () => {
    const t = await machine.handle(collect(), { name: 'set_time', time: '19:00' });
    expect(t.responseText).toBe('What date would you like? I need the date before I can check times.');
  });

  it('lists the grid for a time outside it', async () => {
    const from = session('new_reservation.collect', { draft: { date: '2025-06-15' } });
    const t = await machine.handle(from, { name: 'set_time', time: '18:30' });
    expect(t.responseText).toBe(
      "I'm sorry, that's not a valid time slot. We have openings at: 17:00, 18:00, 19:00, 20:00, 21:00.",
    );
    expect(t.session.draft).toEqual({ date: '2025-06-15' });
  });

  it('offers alternatives for a full slot and does not store it', async () => {
    await service.confirm(draft());
    await service.confirm(draft({ name: 'Grace' }));

    const from = session('new_reservation.collect', { draft: { date: '2025-06-15' } });
    const t = await machine.handle(from, { name: 'set_time', time: '19:00' });
    expect(t.responseText).toBe(
      "I'm sorry, 19:00 is fully booked. We have availability at: 17:00, 18:00, 20:00, 21:00. Would you like one of those?",
    );
    expect(t.session.draft).toEqual({ date: '2025-06-15' });
  });

  it('reports availability for one slot or the whole day', async () => {
    await service.confirm(draft());
    const from = session('new_reservation.collect', { draft: { date: '2025-06-15' } });

    const one = await machine.handle(from, { name: 'check_availability', time: '19:00' });
    expect(one.responseText).toBe('Yes, 19:00 on 2025-06-15 is available with 1 spots remaining.');

    const day = await machine.handle(from, { name: 'check_availability', date: '2025-06-16' });
    expect(day.responseText).toBe(
      'On 2025-06-16, we have availability at: 17:00 (2 spots), 18:00 (2 spots), 19:00 (2 spots), 20:00 (2 spots), 21:00 (2 spots).',
    );
  });

  it('aborts back to welcome and forgets the draft', async () => {
    const from = session('new_reservation.collect', { draft: { name: 'Ada' } });
    const t = await machine.handle(from, { name: 'cancel_flow' });
    expect(t.session).toEqual(session('greeting.welcome'));
    expect(t.responseText).toBe('No problem! Is there anything else I can help you with?');
  });
});

describe('ConversationStateMachine: confirmation', () => {
  it('commits the draft and emits a confirmation event', async () => {
    const t = await machine.handle(session('confirmation.confirm', { draft: draft() }), {
      name: 'confirm_reservation',
    });

    expect(t.session).toEqual(session('greeting.welcome'));
    expect(t.responseText).toBe(
      'Your reservation is confirmed! Ada Lovelace, party of 4, on 2025-06-15 at 19:00. Your confirmation number is 100001. We look forward to seeing you!',
    );
    expect(t.events).toEqual([
      { type: 'reservation_confirmed', reservation: service.getById('100001'), occurredAt: NOW },
    ]);
  });

  it('sends the caller back to pick another time when the slot was taken meanwhile', async () => {
    await service.confirm(draft({ name: 'Grace' }));
    await service.confirm(draft({ name: 'Linus' }));

    const t = await machine.handle(session('confirmation.confirm', { draft: draft() }), {
      name: 'confirm_reservation',
    });

    expect(t.session.state).toBe('new_reservation.collect');
    expect(t.session.draft).toEqual(draft({ time: undefined }));
    expect(t.session.draft).not.toHaveProperty('time');
    expect(t.responseText).toBe(
      "I'm sorry, that time slot was just taken. We still have: 17:00, 18:00, 20:00, 21:00. Which time would you like?",
    );
    expect(t.events).toEqual([]);
  });

  it('goes back to collect when fields are missing', async () => {
    const t = await machine.handle(
      session('confirmation.confirm', { draft: draft({ phone: undefined }) }),
      { name: 'confirm_reservation' },
    );
    expect(t.session.state).toBe('new_reservation.collect');
    expect(t.responseText).toBe(
      "I'm missing some information: phone number. Let's go back and complete those.",
    );
  });
});

describe('ConversationStateMachine: managing a reservation', () => {
  it('prompts when the lookup carries no criteria', async () => {
    const from = session('greeting.ready');
    const t = await machine.handle(from, { name: 'lookup_reservation' });
    expect(t.session).toEqual(from);
    expect(t.responseText).toBe(
      'I can look up your reservation by phone number or name. Which would you like to provide?',
    );
  });

  it('stays put when nothing matches', async () => {
    const t = await machine.handle(session('greeting.ready'), {
      name: 'lookup_reservation',
      phone: '000',
    });
    expect(t.session.state).toBe('greeting.ready');
    expect(t.session.foundReservationId).toBeUndefined();
  });

  it('asks for more detail on several matches', async () => {
    await service.confirm(draft({ name: 'Alice Smith', time: '17:00' }));
    await service.confirm(draft({ name: 'Alice Jones', date: '2025-06-16', time: '20:00' }));

    const t = await machine.handle(session('greeting.ready'), {
      name: 'lookup_reservation',
      guestName: 'alice',
    });
    expect(t.session.state).toBe('greeting.ready');
    expect(t.responseText).toBe(
      'I found 2 reservations: Alice Smith on 2025-06-15 at 17:00; Alice Jones on 2025-06-16 at 20:00. Could you provide more details to help me find the right one?',
    );
  });

  it('remembers a single match and lets the caller change it', async () => {
    const created = await service.confirm(draft({ phone: '15551234567' }));

    const found = await machine.handle(session('greeting.welcome'), {
      name: 'lookup_reservation',
      phone: '5551234',
    });
    expect(found.session).toEqual(
      session('manage.found', { foundReservationId: created.id }),
    );

    const modified = await machine.handle(found.session, {
      name: 'modify_reservation',
      changes: { time: '20:00' },
    });
    expect(modified.session.state).toBe('manage.found');
    expect(modified.responseText).toBe(
      'Your reservation has been updated: Ada Lovelace, party of 4, on 2025-06-15 at 20:00. Is there anything else?',
    );
    expect(modified.events).toEqual([
      {
        type: 'reservation_modified',
        reservation: { ...created, time: '20:00' },
        occurredAt: NOW,
      },
    ]);
  });

  it('asks what to change when a modify carries nothing', async () => {
    const from = session('manage.found', { foundReservationId: '100001' });
    const t = await machine.handle(from, { name: 'modify_reservation', changes: {} });
    expect(t.session).toEqual(from);
    expect(t.responseText).toBe(
      'What would you like to change: the date, the time, the party size, or the special requests?',
    );
  });

  it('keeps the reservation where it was when the move target is full', async () => {
    const mine = await service.confirm(draft());
    await service.confirm(draft({ name: 'Grace', time: '20:00' }));
    await service.confirm(draft({ name: 'Linus', time: '20:00' }));

    const from = session('manage.found', { foundReservationId: mine.id });
    const t = await machine.handle(from, { name: 'modify_reservation', changes: { time: '20:00' } });

    expect(t.session).toEqual(from);
    expect(t.responseText).toBe(
      "I'm sorry, 20:00 on 2025-06-15 is not available. We have openings at: 17:00, 18:00, 19:00, 21:00. Would you like one of those?",
    );
    expect(service.getById(mine.id).time).toBe('19:00');
  });

  it('cancels and returns to welcome with an event', async () => {
    const created = await service.confirm(draft());
    const t = await machine.handle(session('manage.found', { foundReservationId: created.id }), {
      name: 'cancel_existing_reservation',
    });

    expect(t.session).toEqual(session('greeting.welcome'));
    expect(t.events).toEqual([
      {
        type: 'reservation_cancelled',
        reservationId: created.id,
        reservation: { ...created, status: 'cancelled' },
        occurredAt: NOW,
      },
    ]);
  });

  it('asks the caller to re-identify when the reservation was cancelled elsewhere', async () => {
    const created = await service.confirm(draft());
    await service.cancel(created.id);

    const t = await machine.handle(session('manage.found', { foundReservationId: created.id }), {
      name: 'cancel_existing_reservation',
    });
    expect(t.session).toEqual(session('greeting.ready'));
    expect(t.responseText).toBe(
      "I can't find that reservation anymore. Could you give me your phone number or name again?",
    );
    expect(t.events).toEqual([]);
  });

  it('sends the caller to look up first when there is no pointer', async () => {
    const t = await machine.handle(session('manage.found'), { name: 'cancel_existing_reservation' });
    expect(t.session.state).toBe('greeting.ready');
    expect(t.responseText).toBe(
      'I need to look up your reservation first. Can you provide your phone number or name?',
    );
  });
});
