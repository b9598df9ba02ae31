import type { LogLevel } from '../core/logging/index.js';
import { LOG_LEVELS } from '../core/logging/index.js';

/**
 * Commander accumulator for a repeatable `-v`.
 */
export function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * `-v` shows the run summary, `-vv` every invocation. Never lowers a level
 * already configured through the environment.
 */
export function levelForVerbosity(count: number, current: LogLevel): LogLevel {
  const requested: LogLevel = count >= 2 ? 'debug' : count === 1 ? 'info' : current;
  return LOG_LEVELS.indexOf(requested) < LOG_LEVELS.indexOf(current) ? requested : current;
}
