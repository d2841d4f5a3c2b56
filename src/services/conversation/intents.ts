import { z } from 'zod';

import { ValidationError } from '@core/errors/validation.error.js';
import type { ReservationChanges } from '@core/interfaces/reservation.types.js';

import type { Intent, IntentName } from './state.types.js';

export const INTENT_NAMES = [
  'proceed',
  'start_new_reservation',
  'lookup_reservation',
  'set_name',
  'set_party_size',
  'set_date',
  'set_time',
  'set_phone',
  'set_requests',
  'check_availability',
  'confirm_reservation',
  'modify_reservation',
  'cancel_existing_reservation',
  'cancel_flow',
] as const satisfies readonly IntentName[];

/** Tool names the voice platform has historically sent for the same intents. */
const INTENT_ALIASES: Readonly<Record<string, IntentName>> = {
  set_reservation_name: 'set_name',
  set_reservation_date: 'set_date',
  set_reservation_time: 'set_time',
  set_phone_number: 'set_phone',
  set_special_requests: 'set_requests',
};

const text = z.string().trim();
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const SetNameArgs = z.object({ name: text.min(1, 'name is required') });
const SetPartySizeArgs = z.object({ party_size: z.coerce.number().int('party_size must be a whole number') });
const SetDateArgs = z.object({ date: text.min(1, 'date is required') });
const SetTimeArgs = z.object({ time: text.min(1, 'time is required') });
const SetPhoneArgs = z.object({ phone: text.min(1, 'phone is required') });
const SetRequestsArgs = z.object({ requests: z.string().trim().optional().default('') });
const CheckAvailabilityArgs = z.object({ date: optionalText, time: optionalText });
const LookupArgs = z.object({ phone: optionalText, name: optionalText });
const ModifyArgs = z.object({
  party_size: z.coerce.number().int('party_size must be a whole number').optional(),
  date: optionalText,
  time: optionalText,
  special_requests: z.string().trim().optional(),
});

export function resolveIntentName(raw: string): IntentName | undefined {
  const name = raw.trim();
  const alias = INTENT_ALIASES[name];
  if (alias) return alias;
  return INTENT_NAMES.find((known) => known === name);
}

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((i) => i.path.join('.')).filter(Boolean))];
    const message = parsed.error.issues.map((i) => i.message).join('; ');
    throw new ValidationError(message, fields);
  }
  return parsed.data;
}

/** Turns a platform tool call into a typed intent; throws `ValidationError` on bad input. */
export function parseIntent(rawName: string, args?: unknown): Intent {
  const name = resolveIntentName(rawName);
  if (!name) throw new ValidationError(`Unknown intent: ${rawName}`, ['intent']);

  switch (name) {
    case 'proceed':
    case 'start_new_reservation':
    case 'confirm_reservation':
    case 'cancel_existing_reservation':
    case 'cancel_flow':
      return { name };
    case 'lookup_reservation': {
      const { phone, name: guestName } = parseArgs(LookupArgs, args);
      return { name, phone, guestName };
    }
    case 'set_name':
      return { name, guestName: parseArgs(SetNameArgs, args).name };
    case 'set_party_size':
      return { name, partySize: parseArgs(SetPartySizeArgs, args).party_size };
    case 'set_date':
      return { name, date: parseArgs(SetDateArgs, args).date };
    case 'set_time':
      return { name, time: parseArgs(SetTimeArgs, args).time };
    case 'set_phone':
      return { name, phone: parseArgs(SetPhoneArgs, args).phone };
    case 'set_requests':
      return { name, requests: parseArgs(SetRequestsArgs, args).requests };
    case 'check_availability': {
      const { date, time } = parseArgs(CheckAvailabilityArgs, args);
      return { name, date, time };
    }
    case 'modify_reservation': {
      const parsed = parseArgs(ModifyArgs, args);
      const changes: ReservationChanges = {};
      if (parsed.party_size !== undefined) changes.partySize = parsed.party_size;
      if (parsed.date !== undefined) changes.date = parsed.date;
      if (parsed.time !== undefined) changes.time = parsed.time;
      if (parsed.special_requests !== undefined) changes.specialRequests = parsed.special_requests;
      return { name, changes };
    }
  }
}
