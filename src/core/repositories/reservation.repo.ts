import type { Reservation, ReservationStatus } from '@core/interfaces/reservation.types.js';

type ReservationPatch = Partial<Omit<Reservation, 'id' | 'createdAt'>>;

/** Canonical reservation records, in insertion order. Records are copied in and out. */
export class ReservationRepository {
  private readonly records = new Map<string, Reservation>();

  insert(reservation: Reservation): Reservation {
    if (this.records.has(reservation.id)) {
      throw new Error(`Reservation ${reservation.id} already exists`);
    }
    this.records.set(reservation.id, { ...reservation });
    return { ...reservation };
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  findById(id: string): Reservation | undefined {
    const found = this.records.get(id);
    return found ? { ...found } : undefined;
  }

  update(id: string, patch: ReservationPatch): Reservation | undefined {
    const current = this.records.get(id);
    if (!current) return undefined;
    const next = { ...current, ...patch };
    this.records.set(id, next);
    return { ...next };
  }

  findAll(status?: ReservationStatus): Reservation[] {
    const out: Reservation[] = [];
    for (const record of this.records.values()) {
      if (!status || record.status === status) out.push({ ...record });
    }
    return out;
  }
}
