export * from './controllers/events.controller.js';
export * from './controllers/reservations.controller.js';
export * from './controllers/sessions.controller.js';
export * from './serializers/reservation.serializer.js';
export { createApiRouter } from './routes/index.js';
