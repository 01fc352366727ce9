/**
 * Base error for all imagefind failures
 * Carries a stable code, an HTTP-like status and structured context for logs
 */
export class BaseError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}
