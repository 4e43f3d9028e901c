import { BaseError } from './base-error.js';

export class ReferenceDataUnavailableError extends BaseError {
  constructor(message = 'Reference data is not available') {
    super('REFERENCE_DATA_UNAVAILABLE', 503, message);
  }
}
