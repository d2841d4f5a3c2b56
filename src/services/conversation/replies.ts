import type { Reservation, ReservationDraft } from '@core/interfaces/reservation.types.js';

import type { OpenSlot } from '../booking/availability.service.js';

import type { IntentName } from './state.types.js';

const FIELD_LABELS: Record<string, string> = {
  name: 'name',
  partySize: 'party size',
  date: 'date',
  time: 'time',
  phone: 'phone number',
};

const INTENT_HINTS: Record<IntentName, string> = {
  proceed: 'continue',
  start_new_reservation: 'make a new reservation',
  lookup_reservation: 'look up an existing reservation',
  set_name: 'give the name',
  set_party_size: 'give the party size',
  set_date: 'give the date',
  set_time: 'choose a time',
  set_phone: 'give a phone number',
  set_requests: 'add special requests',
  check_availability: 'check availability',
  confirm_reservation: 'confirm the reservation',
  modify_reservation: 'change the reservation',
  cancel_existing_reservation: 'cancel the reservation',
  cancel_flow: 'start over',
};

const join = (items: readonly string[]) => items.join(', ');

export const replies = {
  welcome: (restaurant: string) =>
    `Welcome to ${restaurant}! I can help you make a new reservation or look up an existing one. What would you like to do?`,
  menu: () => 'How can I help you today?',
  startNew: () => "Wonderful! Let's get you a table. May I have the name for the reservation?",
  nameSet: (name: string) => `Thank you, ${name}. How many guests will be joining us?`,
  partySizeSet: (size: number) => `Party of ${size}, got it. What date would you like to dine with us?`,
  partyTooLarge: (max: number) =>
    `I'm sorry, we can only accommodate parties up to ${max}. For larger groups, please call us directly.`,
  partyTooSmall: () => 'The party needs at least one guest. How many will be joining us?',
  badDate: () => 'I need the date as year, month and day. Which date would you like?',
  dateOpen: (date: string, open: readonly OpenSlot[]) =>
    `We have availability on ${date}. Available times are: ${join(open.map((s) => s.time))}. What time would you prefer?`,
  dayFull: (date: string) =>
    `I'm sorry, we're fully booked on ${date}. Would you like to try a different date?`,
  dateFirst: () => 'What date would you like? I need the date before I can check times.',
  badSlot: (slots: readonly string[]) =>
    `I'm sorry, that's not a valid time slot. We have openings at: ${join(slots)}.`,
  slotFull: (time: string, alternatives: readonly string[]) =>
    `I'm sorry, ${time} is fully booked. We have availability at: ${join(alternatives)}. Would you like one of those?`,
  timeSet: (time: string) =>
    `Great, ${time} is available! May I have a phone number for the reservation?`,
  phoneSet: () =>
    'Perfect! Any special requests or occasions we should know about? For example, a birthday, anniversary, dietary restrictions, or seating preferences?',
  slotCheck: (date: string, time: string, remaining: number) =>
    remaining > 0
      ? `Yes, ${time} on ${date} is available with ${remaining} spots remaining.`
      : `I'm sorry, ${time} on ${date} is fully booked.`,
  dayCheck: (date: string, open: readonly OpenSlot[]) =>
    open.length
      ? `On ${date}, we have availability at: ${join(open.map((s) => `${s.time} (${s.remaining} spots)`))}.`
      : `I'm sorry, we're fully booked on ${date}.`,
  missing: (fields: readonly string[]) =>
    `I'm missing some information: ${join(fields.map((f) => FIELD_LABELS[f] ?? f))}. Let's go back and complete those.`,
  summary: (draft: ReservationDraft) => {
    let text =
      `Let me confirm your reservation: ${draft.name}, party of ${draft.partySize}, ` +
      `on ${draft.date} at ${draft.time}. Phone: ${draft.phone}.`;
    if (draft.specialRequests) text += ` Special requests: ${draft.specialRequests}.`;
    return `${text} Is this correct?`;
  },
  confirmed: (r: Reservation) =>
    `Your reservation is confirmed! ${r.name}, party of ${r.partySize}, on ${r.date} at ${r.time}. ` +
    `Your confirmation number is ${r.id}. We look forward to seeing you!`,
  slotTaken: (alternatives: readonly string[]) =>
    alternatives.length
      ? `I'm sorry, that time slot was just taken. We still have: ${join(alternatives)}. Which time would you like?`
      : "I'm sorry, that time slot was just taken and the day is now fully booked. Would you like to try a different date?",
  lookupPrompt: () =>
    'I can look up your reservation by phone number or name. Which would you like to provide?',
  lookupNone: () =>
    "I couldn't find a reservation with that information. Would you like to try different details or make a new reservation?",
  lookupOne: (r: Reservation) =>
    `I found your reservation: ${r.name}, party of ${r.partySize}, on ${r.date} at ${r.time}. Would you like to modify or cancel this reservation?`,
  lookupMany: (matches: readonly Reservation[]) =>
    `I found ${matches.length} reservations: ${matches
      .slice(0, 3)
      .map((r) => `${r.name} on ${r.date} at ${r.time}`)
      .join('; ')}. Could you provide more details to help me find the right one?`,
  lookupFirst: () =>
    'I need to look up your reservation first. Can you provide your phone number or name?',
  reidentify: () =>
    "I can't find that reservation anymore. Could you give me your phone number or name again?",
  nothingToChange: () =>
    'What would you like to change: the date, the time, the party size, or the special requests?',
  modified: (r: Reservation) =>
    `Your reservation has been updated: ${r.name}, party of ${r.partySize}, on ${r.date} at ${r.time}. Is there anything else?`,
  moveUnavailable: (date: string, time: string, alternatives: readonly string[]) =>
    alternatives.length
      ? `I'm sorry, ${time} on ${date} is not available. We have openings at: ${join(alternatives)}. Would you like one of those?`
      : `I'm sorry, ${time} on ${date} is not available. Would you like to try a different date?`,
  cancelled: (r: Reservation) =>
    `Your reservation for ${r.name} on ${r.date} at ${r.time} has been cancelled. Is there anything else I can help with?`,
  aborted: () => 'No problem! Is there anything else I can help you with?',
  invalid: (message: string) => `Sorry, I didn't catch that: ${message}.`,
  notNow: (allowed: readonly IntentName[]) =>
    `I can't do that right now. At this point you can ${join(allowed.map((i) => INTENT_HINTS[i]))}.`,
};
