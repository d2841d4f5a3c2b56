import { DateTime } from 'luxon';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const SLOT_LABEL = /^([01]\d|2[0-3]):[0-5]\d$/;

/** True for a real calendar date written `YYYY-MM-DD`. */
export function isDateKey(value: string): boolean {
  return DateTime.fromFormat(value, 'yyyy-MM-dd', { zone: 'utc' }).isValid;
}

export function isSlotLabel(value: string): boolean {
  return SLOT_LABEL.test(value);
}

export function toIso(clock: Clock): string {
  return DateTime.fromJSDate(clock()).toUTC().toISO() ?? clock().toISOString();
}
