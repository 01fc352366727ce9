import { BaseError } from './base.error';

/**
 * Configuration error - fatal at startup (env, endpoints, dimension mismatch)
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'CONFIG_ERROR', 500, context, { cause });
  }
}
