import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, used directly.
 *
 * API follows pino idiom (data-first):
 *   logger.trace({ depth: 2, shape: 'range' }, 'loop entered');
 *   logger.warn({ maxDepth }, 'control stack overflow');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * LOOPWIRE_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent (a library stays quiet unless asked)
 */
export function resolveLogLevel(env: Record<string, string | undefined>): LogLevel {
  const level = env['LOOPWIRE_LOG_LEVEL']?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'silent';
}
