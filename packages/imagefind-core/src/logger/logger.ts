import pino from 'pino';

/**
 * Logger factory - creates structured logger instances
 */
export function createLogger(moduleName: string, bindings: Record<string, unknown> = {}) {
  return pino({
    name: moduleName,
    level: process.env.LOG_LEVEL || 'info',
    base: { pid: process.pid, ...bindings },
    formatters: {
      level: (label) => {
        return { level: label };
      }
    },
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Normalize an unknown thrown value into loggable fields
 */
export function describeError(error: unknown): { message: string; code?: string } {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return code ? { message: error.message, code } : { message: error.message };
  }
  return { message: String(error) };
}
