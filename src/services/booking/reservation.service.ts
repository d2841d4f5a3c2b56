import { InvariantViolationError } from '@core/errors/invariant-violation.error.js';
import { NotFoundError } from '@core/errors/not-found.error.js';
import { SlotUnavailableError } from '@core/errors/slot-unavailable.error.js';
import { ValidationError } from '@core/errors/validation.error.js';
import type {
  DateKey,
  LookupQuery,
  Reservation,
  ReservationChanges,
  ReservationDraft,
  ReservationSettings,
  ReservationsByDate,
  TimeSlot,
} from '@core/interfaces/reservation.types.js';
import { ReservationRepository } from '@core/repositories/reservation.repo.js';

import { KeyedMutex, reservationLockKey, slotLockKey } from '@utils/locks.js';
import { logger, maskPhone } from '@utils/logger.js';
import { systemClock, toIso, type Clock } from '@utils/time.js';

import { AvailabilityService } from './availability.service.js';
import { readReservationSettings } from './config.defaults.js';
import { cryptoRandomInt, generateUniqueCode, type RandomInt } from './confirmation-code.js';
import { SlotLedger } from './slot-ledger.js';
import { ValidationService } from './validation.service.js';

export class ReservationService {
  readonly validation: ValidationService;
  readonly availability: AvailabilityService;

  constructor(
    readonly settings: ReservationSettings = readReservationSettings(),
    readonly ledger = new SlotLedger(settings),
    private readonly repo = new ReservationRepository(),
    private readonly locks = new KeyedMutex(),
    private readonly clock: Clock = systemClock,
    private readonly random: RandomInt = cryptoRandomInt,
  ) {
    this.validation = new ValidationService(settings);
    this.availability = new AvailabilityService(ledger, this.validation);
  }

  async confirm(draft: ReservationDraft): Promise<Reservation> {
    const complete = this.validation.validateDraft(draft);
    const { date, time } = complete;

    const created = await this.locks.runExclusive(slotLockKey(date, time), () => {
      // the draft's last availability answer may be stale by now
      if (!this.ledger.check(date, time).available) {
        throw this.unavailable(date, time);
      }

      const id = generateUniqueCode(
        (code) => this.repo.has(code),
        this.settings.confirmationMaxAttempts,
        this.random,
      );
      if (!this.ledger.book(date, time, id)) {
        throw this.unavailable(date, time);
      }

      return this.repo.insert({
        id,
        name: complete.name,
        partySize: complete.partySize,
        date,
        time,
        phone: complete.phone,
        specialRequests: complete.specialRequests ?? '',
        status: 'confirmed',
        createdAt: toIso(this.clock),
      });
    });

    logger.info('[reservation] confirmed', {
      id: created.id,
      date,
      time,
      partySize: created.partySize,
      phone: maskPhone(created.phone),
    });
    return created;
  }

  async modify(id: string, changes: ReservationChanges): Promise<Reservation> {
    this.validation.validateChanges(changes);

    const updated = await this.locks.runExclusive(reservationLockKey(id), async () => {
      const current = this.mustGetConfirmed(id);
      const target = { date: changes.date ?? current.date, time: changes.time ?? current.time };
      const moving = target.date !== current.date || target.time !== current.time;

      return this.locks.runExclusive(
        [slotLockKey(current.date, current.time), slotLockKey(target.date, target.time)],
        () => {
          if (moving) {
            if (!this.ledger.check(target.date, target.time).available) {
              throw this.unavailable(target.date, target.time);
            }
            // book first: a failed swap leaves the original slot untouched
            if (!this.ledger.book(target.date, target.time, id)) {
              throw this.unavailable(target.date, target.time);
            }
            this.ledger.release(current.date, current.time, id);
          }

          const patch: Partial<Reservation> = {};
          if (moving) {
            patch.date = target.date;
            patch.time = target.time;
          }
          if (changes.partySize !== undefined) patch.partySize = changes.partySize;
          if (changes.specialRequests !== undefined) {
            patch.specialRequests = changes.specialRequests.trim();
          }

          const next = this.repo.update(id, patch);
          if (!next) throw new InvariantViolationError(`Reservation ${id} vanished mid-update`);
          return { next, moving };
        },
      );
    });

    logger.info('[reservation] modified', {
      id,
      date: updated.next.date,
      time: updated.next.time,
      moved: updated.moving,
    });
    return updated.next;
  }

  async cancel(id: string): Promise<Reservation> {
    const cancelled = await this.locks.runExclusive(reservationLockKey(id), async () => {
      const current = this.mustGetConfirmed(id);
      return this.locks.runExclusive(slotLockKey(current.date, current.time), () => {
        const next = this.repo.update(id, { status: 'cancelled' });
        if (!next) throw new InvariantViolationError(`Reservation ${id} vanished mid-cancel`);
        this.ledger.release(current.date, current.time, id);
        return next;
      });
    });

    logger.info('[reservation] cancelled', { id, date: cancelled.date, time: cancelled.time });
    return cancelled;
  }

  /**
   * Confirmed reservations whose phone contains `phone` or whose name contains
   * `name` (case-insensitive). Either criterion is enough.
   */
  lookup(query: LookupQuery): Reservation[] {
    const phone = query.phone?.trim() ?? '';
    const name = query.name?.trim().toLowerCase() ?? '';
    if (!phone && !name) {
      throw new ValidationError('Provide a phone number or a name to search', ['phone', 'name']);
    }

    return this.repo.findAll('confirmed').filter((r) => {
      if (phone && r.phone.includes(phone)) return true;
      return Boolean(name) && r.name.toLowerCase().includes(name);
    });
  }

  getById(id: string): Reservation {
    const found = this.repo.findById(id);
    if (!found) throw new NotFoundError(`Reservation ${id} not found`);
    return found;
  }

  /** Confirmed reservations grouped by date; dates ascending, each day in slot order. */
  listByDate(): ReservationsByDate {
    const grouped = new Map<DateKey, Reservation[]>();
    for (const r of this.repo.findAll('confirmed')) {
      const day = grouped.get(r.date) ?? [];
      day.push(r);
      grouped.set(r.date, day);
    }

    const out: ReservationsByDate = {};
    for (const date of [...grouped.keys()].sort()) {
      const day = grouped.get(date) ?? [];
      out[date] = day.sort((a, b) => this.slotIndex(a.time) - this.slotIndex(b.time));
    }
    return out;
  }

  /**
   * Cross-checks the store against the ledger: each confirmed reservation holds
   * exactly its own slot, and no slot holds anything else. Walks every record,
   * so `ConversationService` only runs it outside production.
   *
   * @throws InvariantViolationError on the first mismatch
   */
  assertConsistent(): void {
    const confirmed = new Map(this.repo.findAll('confirmed').map((r) => [r.id, r]));
    for (const slot of this.ledger.snapshot()) {
      if (slot.booked !== slot.occupants.length || slot.booked > slot.capacity) {
        throw new InvariantViolationError(`Slot ${slot.date} ${slot.time} out of sync`);
      }
      for (const occupant of slot.occupants) {
        const owner = confirmed.get(occupant);
        if (!owner || owner.date !== slot.date || owner.time !== slot.time) {
          throw new InvariantViolationError(
            `Slot ${slot.date} ${slot.time} held by ${occupant} without a matching reservation`,
          );
        }
      }
    }
    for (const r of confirmed.values()) {
      if (!this.ledger.isOccupiedBy(r.date, r.time, r.id)) {
        throw new InvariantViolationError(`Reservation ${r.id} holds no slot`);
      }
    }
  }

  private mustGetConfirmed(id: string): Reservation {
    const found = this.repo.findById(id);
    if (!found || found.status !== 'confirmed') {
      throw new NotFoundError(`Reservation ${id} not found`);
    }
    return found;
  }

  private unavailable(date: DateKey, time: TimeSlot): SlotUnavailableError {
    return new SlotUnavailableError(date, time, this.availability.suggestAlternatives(date, time));
  }

  private slotIndex(time: TimeSlot): number {
    const idx = this.settings.timeSlots.indexOf(time);
    return idx === -1 ? Number.MAX_SAFE_INTEGER : idx;
  }
}
