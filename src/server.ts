import { config } from '@config/env.config.js';

import { startSessionSweeper } from '@services/conversation/index.js';
import { createBookingCore } from '@services/index.js';

import { logger } from '@utils/logger.js';

import { createApp } from './app.js';

function bootstrap() {
  const core = createBookingCore(config);
  const stopSweeper = startSessionSweeper(core.sessions, {
    ttlMinutes: config.SESSION_TTL_MINUTES,
    intervalSeconds: config.SESSION_SWEEP_INTERVAL_SECONDS,
  });

  const server = createApp(core).listen(config.PORT, () => {
    logger.info('[server] listening', {
      port: config.PORT,
      restaurant: config.RESTAURANT_NAME,
      slots: core.reservations.settings.timeSlots,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('[server] shutting down', { signal });
    stopSweeper();
    core.events.removeAllListeners();
    server.close((err) => {
      if (err) {
        logger.error('[server] close failed', { err });
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

try {
  bootstrap();
} catch (err) {
  logger.error('[server] fatal bootstrap error', { err });
  process.exit(1);
}
