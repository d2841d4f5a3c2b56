import { ConfigurationError } from '@core/errors/configuration.error.js';
import { InvariantViolationError } from '@core/errors/invariant-violation.error.js';
import type {
  AvailabilityByTime,
  DateKey,
  ReservationSettings,
  SlotCheckResult,
  TimeSlot,
} from '@core/interfaces/reservation.types.js';

interface SlotCounter {
  capacity: number;
  booked: number;
  occupants: Set<string>;
}

export interface SlotSnapshot {
  date: DateKey;
  time: TimeSlot;
  capacity: number;
  booked: number;
  occupants: string[];
}

/**
 * Per-date, per-slot occupancy. Each operation runs to completion without
 * yielding, so a `book` can never interleave with another caller's check.
 * Callers that span several operations (check, then book, then persist)
 * serialize through the slot lock in `ReservationService`.
 */
export class SlotLedger {
  private readonly days = new Map<DateKey, Map<TimeSlot, SlotCounter>>();
  private readonly slots: readonly TimeSlot[];
  private readonly capacity: number;

  constructor(settings: Pick<ReservationSettings, 'timeSlots' | 'maxPerSlot'>) {
    this.slots = [...settings.timeSlots];
    this.capacity = settings.maxPerSlot;
  }

  get timeSlots(): readonly TimeSlot[] {
    return this.slots;
  }

  hasSlot(time: string): boolean {
    return this.slots.includes(time);
  }

  check(date: DateKey, time: TimeSlot): SlotCheckResult {
    const counter = this.counter(date, time);
    const remaining = counter.capacity - counter.booked;
    return { available: remaining > 0, remaining };
  }

  book(date: DateKey, time: TimeSlot, reservationId: string): boolean {
    const counter = this.counter(date, time);
    if (counter.occupants.has(reservationId)) return true;
    if (counter.capacity - counter.booked <= 0) return false;

    counter.booked += 1;
    counter.occupants.add(reservationId);
    this.assertConsistent(date, time, counter);
    return true;
  }

  release(date: DateKey, time: TimeSlot, reservationId: string): void {
    const counter = this.days.get(date)?.get(time);
    if (!counter || !counter.occupants.has(reservationId)) return;

    counter.occupants.delete(reservationId);
    counter.booked -= 1;
    this.assertConsistent(date, time, counter);
  }

  isOccupiedBy(date: DateKey, time: TimeSlot, reservationId: string): boolean {
    return this.days.get(date)?.get(time)?.occupants.has(reservationId) ?? false;
  }

  /** Read-only view of a day; unseen dates report full capacity without being materialized. */
  availability(date: DateKey): AvailabilityByTime {
    const day = this.days.get(date);
    const out: AvailabilityByTime = {};
    for (const time of this.slots) {
      const booked = day?.get(time)?.booked ?? 0;
      out[time] = { available: this.capacity - booked, total: this.capacity };
    }
    return out;
  }

  openSlots(date: DateKey): Array<{ time: TimeSlot; remaining: number }> {
    return this.slots
      .map((time) => ({ time, ...this.check(date, time) }))
      .filter((s) => s.available)
      .map(({ time, remaining }) => ({ time, remaining }));
  }

  snapshot(): SlotSnapshot[] {
    const out: SlotSnapshot[] = [];
    for (const [date, day] of this.days) {
      for (const [time, counter] of day) {
        out.push({
          date,
          time,
          capacity: counter.capacity,
          booked: counter.booked,
          occupants: [...counter.occupants],
        });
      }
    }
    return out;
  }

  private counter(date: DateKey, time: TimeSlot): SlotCounter {
    if (!this.hasSlot(time)) {
      throw new ConfigurationError(`Unknown time slot: ${time}`);
    }
    let day = this.days.get(date);
    if (!day) {
      day = new Map(
        this.slots.map((slot) => [
          slot,
          { capacity: this.capacity, booked: 0, occupants: new Set<string>() },
        ]),
      );
      this.days.set(date, day);
    }
    const counter = day.get(time);
    if (!counter) {
      throw new InvariantViolationError(`Slot ${time} missing from ${date}`);
    }
    return counter;
  }

  private assertConsistent(date: DateKey, time: TimeSlot, counter: SlotCounter): void {
    if (counter.booked !== counter.occupants.size || counter.booked > counter.capacity) {
      throw new InvariantViolationError(
        `Slot ${date} ${time} out of sync: booked=${counter.booked} occupants=${counter.occupants.size} capacity=${counter.capacity}`,
      );
    }
  }
}
