import { BaseError } from './base-error.js';

export class SignatureError extends BaseError {
  constructor(message = 'Invalid webhook signature') {
    super('INVALID_SIGNATURE', 401, message);
  }
}
