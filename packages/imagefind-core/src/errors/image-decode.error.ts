import { BaseError } from './base.error';

/**
 * Image decode error - bytes could not be decoded as an image
 */
export class ImageDecodeError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'DECODE_ERROR', 422, context, { cause });
  }
}
