import { BaseError } from './base.error';

/**
 * Payload error - an indexed point carries an unusable payload
 */
export class PayloadError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PAYLOAD_ERROR', 422, context);
  }
}
