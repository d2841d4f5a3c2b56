import { BaseError } from './base-error.js';

/** Raised for slot labels outside the configured grid and for an exhausted id space. */
export class ConfigurationError extends BaseError {
  constructor(message = 'Invalid configuration') {
    super('CONFIGURATION_ERROR', 422, message);
  }
}
