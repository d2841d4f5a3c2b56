export * from './base-error.js';
export * from './validation.error.js';
export * from './configuration.error.js';
export * from './not-found.error.js';
export * from './slot-unavailable.error.js';
export * from './invariant-violation.error.js';
