import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, used directly.
 *
 * Data-first calls:
 *   logger.debug({ level: 'session', path }, 'opened container');
 *   logger.error({ err: error }, 'listing failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * RECTREE_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent (a library stays quiet unless asked)
 */
export function logLevelFromEnv(env: Record<string, string | undefined> = process.env): LogLevel {
  const level = env['RECTREE_LOG_LEVEL']?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'silent';
}
