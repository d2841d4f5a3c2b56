import { Router } from 'express';

import type { BookingCore } from '@services/index.js';

import eventsRoutes from './events.routes.js';
import reservationsRoutes from './reservations.routes.js';
import sessionsRoutes from './sessions.routes.js';

export function createApiRouter(core: BookingCore): Router {
  const api = Router();
  api.use(reservationsRoutes(core));
  api.use(sessionsRoutes(core.conversations));
  api.use(eventsRoutes(core.events));

  const router = Router();
  router.use('/api', api);
  return router;
}

export default createApiRouter;
