import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, used directly.
 *
 * API follows pino idiom (data-first):
 *   logger.info({ bearerToken }, 'Run finished');
 *   logger.error({ err: error }, 'Invocation failed');
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

  /** Change verbosity after construction (children follow the root). */
  setLevel(level: LogLevel): void;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level);
}
