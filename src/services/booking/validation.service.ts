import { ConfigurationError } from '@core/errors/configuration.error.js';
import { ValidationError } from '@core/errors/validation.error.js';
import type {
  ReservationChanges,
  ReservationDraft,
  ReservationSettings,
} from '@core/interfaces/reservation.types.js';

import { isDateKey } from '@utils/time.js';

export type CompleteDraft = Required<Omit<ReservationDraft, 'specialRequests'>> &
  Pick<ReservationDraft, 'specialRequests'>;

export const REQUIRED_DRAFT_FIELDS = ['name', 'partySize', 'date', 'time', 'phone'] as const;

export class ValidationService {
  constructor(
    private readonly settings: Pick<ReservationSettings, 'timeSlots' | 'maxPartySize'>,
  ) {}

  missingFields(draft: ReservationDraft): string[] {
    return REQUIRED_DRAFT_FIELDS.filter((field) => {
      const value = draft[field];
      return typeof value === 'string' ? value.trim() === '' : value === undefined;
    });
  }

  validateDraft(draft: ReservationDraft): CompleteDraft {
    const missing = this.missingFields(draft);
    const { name, partySize, date, time, phone } = draft;
    if (
      missing.length ||
      name === undefined ||
      partySize === undefined ||
      date === undefined ||
      time === undefined ||
      phone === undefined
    ) {
      throw new ValidationError(`Missing reservation details: ${missing.join(', ')}`, missing);
    }

    this.validatePartySize(partySize);
    this.validateDate(date);
    this.validateTime(time);

    return {
      name: name.trim(),
      partySize,
      date,
      time,
      phone: phone.trim(),
      specialRequests: draft.specialRequests?.trim() ?? '',
    };
  }

  validateChanges(changes: ReservationChanges): void {
    if (changes.partySize !== undefined) this.validatePartySize(changes.partySize);
    if (changes.date !== undefined) this.validateDate(changes.date);
    if (changes.time !== undefined) this.validateTime(changes.time);
  }

  validatePartySize(partySize: number): void {
    const max = this.settings.maxPartySize;
    if (!Number.isInteger(partySize) || partySize < 1 || partySize > max) {
      throw new ValidationError(`Party size must be between 1 and ${max}`, ['partySize']);
    }
  }

  validateDate(date: string): void {
    if (!isDateKey(date)) {
      throw new ValidationError(`Date must be a calendar date in YYYY-MM-DD format`, ['date']);
    }
  }

  validateTime(time: string): void {
    if (!this.settings.timeSlots.includes(time)) {
      throw new ConfigurationError(
        `${time} is not one of the time slots: ${this.settings.timeSlots.join(', ')}`,
      );
    }
  }
}
