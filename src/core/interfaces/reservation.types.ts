export type ReservationStatus = 'confirmed' | 'cancelled';

/** Slot label in 24h `HH:mm`, drawn from the configured grid. */
export type TimeSlot = string;

/** Calendar date as `YYYY-MM-DD`. */
export type DateKey = string;

export interface Reservation {
  id: string;
  name: string;
  partySize: number;
  date: DateKey;
  time: TimeSlot;
  phone: string;
  specialRequests: string;
  status: ReservationStatus;
  createdAt: string;
}

export interface ReservationDraft {
  name?: string;
  partySize?: number;
  date?: DateKey;
  time?: TimeSlot;
  phone?: string;
  specialRequests?: string;
}

export type DraftField = keyof ReservationDraft;

export interface ReservationChanges {
  partySize?: number;
  date?: DateKey;
  time?: TimeSlot;
  specialRequests?: string;
}

export interface LookupQuery {
  phone?: string;
  name?: string;
}

export interface SlotCheckResult {
  available: boolean;
  remaining: number;
}

export interface SlotAvailability {
  available: number;
  total: number;
}

export type AvailabilityByTime = Record<TimeSlot, SlotAvailability>;

export type ReservationsByDate = Record<DateKey, Reservation[]>;

export interface ReservationSettings {
  timeSlots: readonly TimeSlot[];
  /** Reservations per slot, independent of party size. */
  maxPerSlot: number;
  maxPartySize: number;
  confirmationMaxAttempts: number;
}

export type ReservationEvent =
  | { type: 'reservation_confirmed'; reservation: Reservation; occurredAt: string }
  | { type: 'reservation_modified'; reservation: Reservation; occurredAt: string }
  | {
      type: 'reservation_cancelled';
      reservationId: string;
      reservation: Reservation;
      occurredAt: string;
    };

export type ReservationEventType = ReservationEvent['type'];
