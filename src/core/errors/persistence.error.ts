import { BaseError } from './base-error.js';

/** A session or reservation write did not go through; the caller must not advance state. */
export class PersistenceError extends BaseError {
  constructor(message = 'Persistence failure', cause?: unknown) {
    super('PERSISTENCE_FAILURE', 503, message);
    if (cause !== undefined) this.cause = cause;
  }
}
