import { BaseError } from './base-error.js';

/** Ledger state no longer matches its own bookkeeping. Never recovered from. */
export class InvariantViolationError extends BaseError {
  constructor(message = 'Invariant violated') {
    super('INVARIANT_VIOLATION', 500, message);
  }
}
