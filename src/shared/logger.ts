import pino from 'pino';
import type { BaseLogger, Logger as PinoLogger } from 'pino';

/**
 * The slice of a pino logger the pipeline writes to.
 *
 * Both a standalone pino instance (worker) and `fastify.log` (API)
 * satisfy it.
 */
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export function createLogger(level: string, name: string): PinoLogger {
  return pino({ level, name });
}
