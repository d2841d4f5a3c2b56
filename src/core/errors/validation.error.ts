import { BaseError } from './base-error.js';

export class ValidationError extends BaseError {
  constructor(
    message = 'Validation failed',
    public readonly fields: string[] = [],
  ) {
    super('VALIDATION_ERROR', 422, message, fields.length ? { fields } : undefined);
  }
}
