export * from './reservation.types.js';
