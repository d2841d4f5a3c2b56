import { BaseError } from './base-error.js';

export class SlotUnavailableError extends BaseError {
  constructor(
    public readonly date: string,
    public readonly time: string,
    public readonly alternatives: string[] = [],
  ) {
    super('SLOT_UNAVAILABLE', 409, `${time} on ${date} is fully booked`, {
      date,
      time,
      alternatives,
    });
  }
}
