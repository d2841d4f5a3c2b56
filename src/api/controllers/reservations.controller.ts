import type { NextFunction, Request, Response } from 'express';

import type { BookingCore } from '@services/index.js';

import { toReservationsByDateJson } from '../serializers/reservation.serializer.js';

export function reservationsController(core: BookingCore) {
  return {
    list: (_req: Request, res: Response) => {
      res.json(toReservationsByDateJson(core.listReservationsByDate()));
    },

    availability: (req: Request, res: Response, next: NextFunction) => {
      try {
        res.json(core.getAvailability(String(req.params.date)));
      } catch (err) {
        next(err);
      }
    },

    config: (_req: Request, res: Response) => {
      const { config, reservations, conversations } = core;
      res.json({
        restaurant_name: config.RESTAURANT_NAME,
        phone_number: config.PHONE_NUMBER ?? null,
        timezone: config.TIMEZONE,
        time_slots: reservations.settings.timeSlots,
        max_party_size: reservations.settings.maxPartySize,
        greeting: conversations.greeting(),
      });
    },
  };
}
