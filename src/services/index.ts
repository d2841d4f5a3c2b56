import type { AppConfig } from '@config/env.config.js';
import { config as appConfig } from '@config/env.config.js';

import type {
  AvailabilityByTime,
  DateKey,
  ReservationsByDate,
} from '@core/interfaces/index.js';

import { readReservationSettings } from './booking/config.defaults.js';
import { ReservationService } from './booking/reservation.service.js';
import { ConversationService } from './conversation/conversation.service.js';
import { ConversationStateStore } from './conversation/state.store.js';
import { ReservationEventBus } from './events/event-bus.js';

/** The pieces one restaurant process runs on, wired once and shared by every caller. */
export interface BookingCore {
  config: Readonly<AppConfig>;
  reservations: ReservationService;
  conversations: ConversationService;
  sessions: ConversationStateStore;
  events: ReservationEventBus;
  listReservationsByDate(): ReservationsByDate;
  getAvailability(date: DateKey): AvailabilityByTime;
}

export interface BookingCoreOverrides {
  reservations?: ReservationService;
  sessions?: ConversationStateStore;
  events?: ReservationEventBus;
}

export function createBookingCore(
  cfg: Readonly<AppConfig> = appConfig,
  overrides: BookingCoreOverrides = {},
): BookingCore {
  const reservations = overrides.reservations ?? new ReservationService(readReservationSettings(cfg));
  const sessions = overrides.sessions ?? new ConversationStateStore();
  const events = overrides.events ?? new ReservationEventBus();
  const conversations = new ConversationService(
    reservations,
    sessions,
    events,
    undefined,
    undefined,
    cfg.RESTAURANT_NAME,
  );

  return {
    config: cfg,
    reservations,
    conversations,
    sessions,
    events,
    listReservationsByDate: () => reservations.listByDate(),
    getAvailability: (date) => reservations.availability.getAvailability(date),
  };
}
