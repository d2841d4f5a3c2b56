import type {
  Reservation,
  ReservationEvent,
  ReservationsByDate,
  ReservationStatus,
} from '@core/interfaces/reservation.types.js';

/** Wire shape read by the dashboard. Field names are snake_case there. */
export interface ReservationJson {
  id: string;
  name: string;
  party_size: number;
  date: string;
  time: string;
  phone: string;
  special_requests: string;
  status: ReservationStatus;
  created_at: string;
}

export type ReservationEventJson =
  | {
      type: 'reservation_confirmed' | 'reservation_modified';
      reservation: ReservationJson;
      occurred_at: string;
    }
  | {
      type: 'reservation_cancelled';
      reservation_id: string;
      reservation: ReservationJson;
      occurred_at: string;
    };

export function toReservationJson(r: Reservation): ReservationJson {
  return {
    id: r.id,
    name: r.name,
    party_size: r.partySize,
    date: r.date,
    time: r.time,
    phone: r.phone,
    special_requests: r.specialRequests,
    status: r.status,
    created_at: r.createdAt,
  };
}

export function toEventJson(event: ReservationEvent): ReservationEventJson {
  const reservation = toReservationJson(event.reservation);
  if (event.type === 'reservation_cancelled') {
    return {
      type: event.type,
      reservation_id: event.reservationId,
      reservation,
      occurred_at: event.occurredAt,
    };
  }
  return { type: event.type, reservation, occurred_at: event.occurredAt };
}

export function toReservationsByDateJson(grouped: ReservationsByDate) {
  const reservations: Record<string, ReservationJson[]> = {};
  let total = 0;
  for (const [date, day] of Object.entries(grouped)) {
    reservations[date] = day.map(toReservationJson);
    total += day.length;
  }
  return { reservations, total_count: total };
}
