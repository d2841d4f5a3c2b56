import type { Request, Response } from 'express';

import type { ReservationEvent } from '@core/interfaces/reservation.types.js';
import type { ReservationEventBus } from '@services/events/event-bus.js';

import { logger } from '@utils/logger.js';

import { toEventJson } from '../serializers/reservation.serializer.js';

/** One server-sent event frame. */
export function formatSse(event: ReservationEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(toEventJson(event))}\n\n`;
}

export function eventsController(bus: ReservationEventBus) {
  return {
    stream: (req: Request, res: Response) => {
      res.status(200).set({
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
      });
      res.flushHeaders();
      res.write(': connected\n\n');

      const unsubscribe = bus.onAny((event) => {
        res.write(formatSse(event));
      });
      logger.debug('[events] subscriber connected', { listeners: bus.listenerCount() });

      req.on('close', () => {
        unsubscribe();
        logger.debug('[events] subscriber disconnected', { listeners: bus.listenerCount() });
      });
    },
  };
}
