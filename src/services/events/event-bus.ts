import { EventEmitter } from 'node:events';

import type {
  ReservationEvent,
  ReservationEventType,
} from '@core/interfaces/reservation.types.js';

import { logger } from '@utils/logger.js';

type EventOf<K extends ReservationEventType> = Extract<ReservationEvent, { type: K }>;
type Handler<E> = (event: E) => void | Promise<void>;

const ALL = '*';

function isOfType<K extends ReservationEventType>(
  event: ReservationEvent,
  type: K,
): event is EventOf<K> {
  return event.type === type;
}

/**
 * In-process dispatcher for reservation events. Subscriber failures are
 * logged and never reach the publisher.
 */
export class ReservationEventBus {
  private readonly emitter = new EventEmitter();

  constructor(maxListeners = 50) {
    this.emitter.setMaxListeners(maxListeners);
  }

  on<K extends ReservationEventType>(type: K, handler: Handler<EventOf<K>>): () => void {
    return this.subscribe(type, (event) => {
      if (isOfType(event, type)) return handler(event);
    });
  }

  /** Every event type, in publish order. */
  onAny(handler: Handler<ReservationEvent>): () => void {
    return this.subscribe(ALL, handler);
  }

  publish(events: readonly ReservationEvent[]): void {
    for (const event of events) {
      this.emitter.emit(event.type, event);
      this.emitter.emit(ALL, event);
    }
  }

  listenerCount(type: ReservationEventType | typeof ALL = ALL): number {
    return this.emitter.listenerCount(type);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }

  private subscribe(channel: string, handler: Handler<ReservationEvent>): () => void {
    const listener = (event: ReservationEvent) => {
      const fail = (err: unknown) =>
        logger.error('[event-bus] handler error', { type: event.type, err });
      try {
        const result = handler(event);
        if (result instanceof Promise) result.catch(fail);
      } catch (err) {
        fail(err);
      }
    };
    this.emitter.on(channel, listener);
    return () => {
      this.emitter.off(channel, listener);
    };
  }
}
