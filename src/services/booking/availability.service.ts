import type {
  AvailabilityByTime,
  DateKey,
  SlotCheckResult,
  TimeSlot,
} from '@core/interfaces/reservation.types.js';

import { SlotLedger } from './slot-ledger.js';
import { ValidationService } from './validation.service.js';

export interface OpenSlot {
  time: TimeSlot;
  remaining: number;
}

export class AvailabilityService {
  constructor(
    private readonly ledger: SlotLedger,
    private readonly validation: ValidationService,
  ) {}

  get timeSlots(): readonly TimeSlot[] {
    return this.ledger.timeSlots;
  }

  /** Dashboard view of a day: remaining and total per configured slot. */
  getAvailability(date: DateKey): AvailabilityByTime {
    this.validation.validateDate(date);
    return this.ledger.availability(date);
  }

  checkSlot(date: DateKey, time: TimeSlot): SlotCheckResult {
    this.validation.validateDate(date);
    this.validation.validateTime(time);
    return this.ledger.check(date, time);
  }

  openSlots(date: DateKey): OpenSlot[] {
    this.validation.validateDate(date);
    return this.ledger.openSlots(date);
  }

  /** Every other open slot on the same date, in grid order. */
  suggestAlternatives(date: DateKey, excluding?: TimeSlot): TimeSlot[] {
    return this.ledger
      .openSlots(date)
      .map((s) => s.time)
      .filter((time) => time !== excluding);
  }
}
