import pino from 'pino';
import type { Logger } from './types.js';
import { parseLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Bootstrap logger for use BEFORE the DI container is initialized
 * (composition root, config loading).
 *
 * After DI is ready, use the injected ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: parseLogLevel(process.env['PROVIDER_INVOKE_LOG_LEVEL']) ?? 'silent',
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
