import { Router } from 'express';

import type { BookingCore } from '@services/index.js';

import { reservationsController } from '../controllers/reservations.controller.js';

export default function reservationsRoutes(core: BookingCore): Router {
  const router = Router();
  const ctrl = reservationsController(core);
  router.get('/config', ctrl.config);
  router.get('/reservations', ctrl.list);
  router.get('/availability/:date', ctrl.availability);
  return router;
}
