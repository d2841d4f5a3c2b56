import { ConfigurationError } from '@core/errors/configuration.error.js';
import { NotFoundError } from '@core/errors/not-found.error.js';
import { SlotUnavailableError } from '@core/errors/slot-unavailable.error.js';
import { ValidationError } from '@core/errors/validation.error.js';
import type { Reservation, ReservationEvent } from '@core/interfaces/reservation.types.js';

import { isDateKey, systemClock, toIso, type Clock } from '@utils/time.js';

import type { ReservationService } from '../booking/reservation.service.js';

import { DraftManager } from './draft-manager.js';
import { replies } from './replies.js';
import {
  ALLOWED_INTENTS,
  type Intent,
  type IntentName,
  type IntentOf,
  type SessionState,
  type StateKey,
  type Transition,
} from './state.types.js';

/**
 * One turn of the reservation dialogue. Each handler takes the current
 * session and a typed intent and returns the next session, the text to
 * speak and any reservation events. Sessions are never mutated in place.
 */
export class ConversationStateMachine {
  constructor(
    private readonly reservations: ReservationService,
    private readonly drafts = new DraftManager(),
    private readonly clock: Clock = systemClock,
  ) {}

  allowedIntents(state: StateKey): readonly IntentName[] {
    return ALLOWED_INTENTS[state];
  }

  isAllowed(state: StateKey, name: IntentName): boolean {
    return this.allowedIntents(state).includes(name);
  }

  async handle(session: SessionState, intent: Intent): Promise<Transition> {
    if (!this.isAllowed(session.state, intent.name)) {
      return this.stay(session, replies.notNow(this.allowedIntents(session.state)));
    }

    switch (intent.name) {
      case 'proceed':
        return this.moveTo(session, 'greeting.ready', replies.menu());
      case 'start_new_reservation':
        return this.startNew(session);
      case 'lookup_reservation':
        return this.lookup(session, intent);
      case 'set_name':
        return this.stay(
          this.drafts.set(session, 'name', intent.guestName),
          replies.nameSet(intent.guestName),
        );
      case 'set_party_size':
        return this.setPartySize(session, intent);
      case 'set_date':
        return this.setDate(session, intent);
      case 'set_time':
        return this.setTime(session, intent);
      case 'set_phone':
        return this.stay(this.drafts.set(session, 'phone', intent.phone), replies.phoneSet());
      case 'set_requests':
        return this.setRequests(session, intent);
      case 'check_availability':
        return this.checkAvailability(session, intent);
      case 'confirm_reservation':
        return this.confirm(session);
      case 'modify_reservation':
        return this.modify(session, intent);
      case 'cancel_existing_reservation':
        return this.cancelExisting(session);
      case 'cancel_flow':
        return this.moveTo(this.reset(session), 'greeting.welcome', replies.aborted());
    }
  }

  private startNew(session: SessionState): Transition {
    const { foundReservationId: _pointer, ...rest } = session;
    return this.moveTo(this.drafts.start(rest), 'new_reservation.collect', replies.startNew());
  }

  private setPartySize(session: SessionState, intent: IntentOf<'set_party_size'>): Transition {
    const max = this.reservations.settings.maxPartySize;
    if (intent.partySize > max) return this.stay(session, replies.partyTooLarge(max));
    if (intent.partySize < 1) return this.stay(session, replies.partyTooSmall());
    return this.stay(
      this.drafts.set(session, 'partySize', intent.partySize),
      replies.partySizeSet(intent.partySize),
    );
  }

  private setDate(session: SessionState, intent: IntentOf<'set_date'>): Transition {
    if (!isDateKey(intent.date)) return this.stay(session, replies.badDate());

    const next = this.drafts.set(session, 'date', intent.date);
    const open = this.reservations.availability.openSlots(intent.date);
    if (open.length === 0) return this.stay(next, replies.dayFull(intent.date));
    return this.stay(next, replies.dateOpen(intent.date, open));
  }

  private setTime(session: SessionState, intent: IntentOf<'set_time'>): Transition {
    const { date } = this.drafts.getOrCreate(session);
    if (!date) return this.stay(session, replies.dateFirst());

    const { availability } = this.reservations;
    if (!availability.timeSlots.includes(intent.time)) {
      return this.stay(session, replies.badSlot(availability.timeSlots));
    }

    if (!availability.checkSlot(date, intent.time).available) {
      const alternatives = availability.suggestAlternatives(date, intent.time);
      return this.stay(
        session,
        alternatives.length ? replies.slotFull(intent.time, alternatives) : replies.dayFull(date),
      );
    }

    return this.stay(this.drafts.set(session, 'time', intent.time), replies.timeSet(intent.time));
  }

  private setRequests(session: SessionState, intent: IntentOf<'set_requests'>): Transition {
    const next = this.drafts.set(session, 'specialRequests', intent.requests);
    const draft = this.drafts.getOrCreate(next);
    const missing = this.reservations.validation.missingFields(draft);
    if (missing.length) return this.stay(next, replies.missing(missing));
    return this.moveTo(next, 'confirmation.confirm', replies.summary(draft));
  }

  private checkAvailability(
    session: SessionState,
    intent: IntentOf<'check_availability'>,
  ): Transition {
    const date = intent.date ?? this.drafts.getOrCreate(session).date;
    if (!date) return this.stay(session, replies.dateFirst());
    if (!isDateKey(date)) return this.stay(session, replies.badDate());

    const { availability } = this.reservations;
    if (intent.time) {
      if (!availability.timeSlots.includes(intent.time)) {
        return this.stay(session, replies.badSlot(availability.timeSlots));
      }
      const { remaining } = availability.checkSlot(date, intent.time);
      return this.stay(session, replies.slotCheck(date, intent.time, remaining));
    }
    return this.stay(session, replies.dayCheck(date, availability.openSlots(date)));
  }

  private async confirm(session: SessionState): Promise<Transition> {
    const draft = this.drafts.getOrCreate(session);
    const missing = this.reservations.validation.missingFields(draft);
    if (missing.length) {
      return this.moveTo(session, 'new_reservation.collect', replies.missing(missing));
    }

    try {
      const reservation = await this.reservations.confirm(draft);
      return this.moveTo(this.reset(session), 'greeting.welcome', replies.confirmed(reservation), [
        this.event('reservation_confirmed', reservation),
      ]);
    } catch (err) {
      if (err instanceof SlotUnavailableError) {
        return this.moveTo(
          this.drafts.unset(session, 'time'),
          'new_reservation.collect',
          replies.slotTaken(err.alternatives),
        );
      }
      if (err instanceof ValidationError || err instanceof ConfigurationError) {
        return this.moveTo(session, 'new_reservation.collect', replies.invalid(err.message));
      }
      throw err;
    }
  }

  private lookup(session: SessionState, intent: IntentOf<'lookup_reservation'>): Transition {
    if (!intent.phone && !intent.guestName) return this.stay(session, replies.lookupPrompt());

    const matches = this.reservations.lookup({ phone: intent.phone, name: intent.guestName });
    const [only] = matches;
    if (matches.length === 1 && only) {
      return this.moveTo(
        { ...session, foundReservationId: only.id },
        'manage.found',
        replies.lookupOne(only),
      );
    }
    if (matches.length === 0) return this.stay(session, replies.lookupNone());
    return this.stay(session, replies.lookupMany(matches));
  }

  private async modify(
    session: SessionState,
    intent: IntentOf<'modify_reservation'>,
  ): Promise<Transition> {
    const id = session.foundReservationId;
    if (!id) return this.moveTo(session, 'greeting.ready', replies.lookupFirst());
    if (Object.keys(intent.changes).length === 0) {
      return this.stay(session, replies.nothingToChange());
    }

    try {
      const reservation = await this.reservations.modify(id, intent.changes);
      return this.stay(session, replies.modified(reservation), [
        this.event('reservation_modified', reservation),
      ]);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return this.moveTo(this.reset(session), 'greeting.ready', replies.reidentify());
      }
      if (err instanceof SlotUnavailableError) {
        return this.stay(session, replies.moveUnavailable(err.date, err.time, err.alternatives));
      }
      if (err instanceof ConfigurationError) {
        return this.stay(session, replies.badSlot(this.reservations.availability.timeSlots));
      }
      if (err instanceof ValidationError) {
        return this.stay(session, replies.invalid(err.message));
      }
      throw err;
    }
  }

  private async cancelExisting(session: SessionState): Promise<Transition> {
    const id = session.foundReservationId;
    if (!id) return this.moveTo(session, 'greeting.ready', replies.lookupFirst());

    try {
      const reservation = await this.reservations.cancel(id);
      return this.moveTo(this.reset(session), 'greeting.welcome', replies.cancelled(reservation), [
        this.event('reservation_cancelled', reservation),
      ]);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return this.moveTo(this.reset(session), 'greeting.ready', replies.reidentify());
      }
      throw err;
    }
  }

  /** Drops the draft and the lookup pointer. */
  private reset(session: SessionState): SessionState {
    const { foundReservationId: _pointer, ...rest } = this.drafts.clear(session);
    return rest;
  }

  private event(type: ReservationEvent['type'], reservation: Reservation): ReservationEvent {
    const occurredAt = toIso(this.clock);
    if (type === 'reservation_cancelled') {
      return { type, reservationId: reservation.id, reservation, occurredAt };
    }
    return { type, reservation, occurredAt };
  }

  private stay(session: SessionState, responseText: string, events: ReservationEvent[] = []) {
    return this.moveTo(session, session.state, responseText, events);
  }

  private moveTo(
    session: SessionState,
    state: StateKey,
    responseText: string,
    events: ReservationEvent[] = [],
  ): Transition {
    return { session: { ...session, state }, responseText, events };
  }
}
