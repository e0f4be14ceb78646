import { pino, type BaseLogger } from 'pino';

export const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof logLevels)[number];

/**
 * The logging surface the tunnel core needs. Satisfied by a pino logger and by fastify's
 * `app.log`, so the relay's internals log through the same instance as its HTTP routes.
 */
export type Logger = BaseLogger;

export function createLogger(level: LogLevel, name: string): Logger {
  return pino({ level, name });
}
