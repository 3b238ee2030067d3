import pino from 'pino';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

export const logger = pino({
  level,
  base: { service: 'stance-search' },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    error: pino.stdSerializers.err,
    cause: pino.stdSerializers.err,
  },
});

export type Logger = typeof logger;

/**
 * Message of an unknown thrown value, for log fields and error chains.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
