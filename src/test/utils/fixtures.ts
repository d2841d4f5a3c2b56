import type { ReservationDraft } from '@core/interfaces/reservation.types.js';
import type { RandomInt } from '@services/booking/confirmation-code.js';
import type { Clock } from '@utils/time.js';

/** Confirmation codes 100001, 100002, ... in call order. */
export function sequenceRandom(start = 100001): RandomInt {
  let next = start;
  return () => next++;
}

/** Replays `values` in order, then repeats the last one. */
export function scriptedRandom(values: number[]): RandomInt {
  let i = 0;
  return () => {
    const value = values[Math.min(i, values.length - 1)] ?? 100000;
    i += 1;
    return value;
  };
}

export interface ManualClock {
  clock: Clock;
  advanceMinutes(minutes: number): void;
}

export function manualClock(iso = '2025-06-01T12:00:00.000Z'): ManualClock {
  let now = Date.parse(iso);
  return {
    clock: () => new Date(now),
    advanceMinutes: (minutes) => {
      now += minutes * 60_000;
    },
  };
}

export function draft(overrides: ReservationDraft = {}): ReservationDraft {
  return {
    name: 'Ada Lovelace',
    partySize: 4,
    date: '2025-06-15',
    time: '19:00',
    phone: '555-0101',
    specialRequests: '',
    ...overrides,
  };
}
