import { config as appConfig, type AppConfig } from '@config/env.config.js';

import { ConfigurationError } from '@core/errors/configuration.error.js';
import type { ReservationSettings } from '@core/interfaces/reservation.types.js';

import { isSlotLabel } from '@utils/time.js';

export const DEFAULT_TIME_SLOTS = ['17:00', '18:00', '19:00', '20:00', '21:00'] as const;

export const DEFAULT_RESERVATION_SETTINGS: Readonly<ReservationSettings> = Object.freeze({
  timeSlots: DEFAULT_TIME_SLOTS,
  maxPerSlot: 5,
  maxPartySize: 20,
  confirmationMaxAttempts: 10,
});

export function buildReservationSettings(
  overrides: Partial<ReservationSettings> = {},
): ReservationSettings {
  const settings: ReservationSettings = { ...DEFAULT_RESERVATION_SETTINGS, ...overrides };
  const slots = settings.timeSlots;

  if (slots.length === 0) {
    throw new ConfigurationError('At least one time slot must be configured');
  }
  const malformed = slots.filter((s) => !isSlotLabel(s));
  if (malformed.length) {
    throw new ConfigurationError(`Malformed time slots: ${malformed.join(', ')}`);
  }
  if (new Set(slots).size !== slots.length) {
    throw new ConfigurationError('Time slots must be unique');
  }
  for (const key of ['maxPerSlot', 'maxPartySize', 'confirmationMaxAttempts'] as const) {
    if (!Number.isInteger(settings[key]) || settings[key] < 1) {
      throw new ConfigurationError(`${key} must be a positive integer`);
    }
  }

  return { ...settings, timeSlots: [...slots].sort() };
}

export function readReservationSettings(cfg: Readonly<AppConfig> = appConfig): ReservationSettings {
  return buildReservationSettings({
    timeSlots: cfg.TIME_SLOTS,
    maxPerSlot: cfg.MAX_PER_SLOT,
    maxPartySize: cfg.MAX_PARTY_SIZE,
    confirmationMaxAttempts: cfg.CONFIRMATION_MAX_ATTEMPTS,
  });
}
