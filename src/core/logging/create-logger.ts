import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { parseLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * PROVIDER_INVOKE_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent (the outcome summary is the CLI's only output unless asked)
 */
function getLogLevel(): LogLevel {
  return parseLogLevel(process.env['PROVIDER_INVOKE_LOG_LEVEL']) ?? 'silent';
}

/**
 * Root pino logger:
 * - sync output to stderr (stdout carries the outcome summary)
 * - JSON format for machine parsing
 * - redaction of credential-shaped fields
 */
export function createRootLogger(level: LogLevel = getLogLevel()): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers. Singleton lifecycle.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  setLevel(level: LogLevel): void {
    this._root.level = level;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
