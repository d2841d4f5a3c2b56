import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { createApiRouter } from './api/index.js';
import { errorMiddleware } from './middleware/index.js';
import { createBookingCore, type BookingCore } from './services/index.js';

export function createApp(core: BookingCore = createBookingCore()): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  app.use('/', createApiRouter(core));
  app.use(errorMiddleware);

  return app;
}
