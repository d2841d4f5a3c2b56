import { Router } from 'express';

import type { ReservationEventBus } from '@services/events/event-bus.js';

import { eventsController } from '../controllers/events.controller.js';

export default function eventsRoutes(bus: ReservationEventBus): Router {
  const router = Router();
  router.get('/events', eventsController(bus).stream);
  return router;
}
