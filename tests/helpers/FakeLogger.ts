import type { Logger } from '../../src/core/logging/index.js';

/**
 * Fake logger for testing. Fakes over mocks: captures calls for assertions.
 */
export interface LogEntry {
  level: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  obj?: object;
  msg?: string;
  bindings: object;
}

export class FakeLogger {
  level: string = 'debug';

  constructor(
    readonly entries: LogEntry[] = [],
    private readonly bindings: object = {}
  ) {}

  trace(objOrMsg: object | string, msg?: string): void {
    this.log('trace', objOrMsg, msg);
  }

  debug(objOrMsg: object | string, msg?: string): void {
    this.log('debug', objOrMsg, msg);
  }

  info(objOrMsg: object | string, msg?: string): void {
    this.log('info', objOrMsg, msg);
  }

  warn(objOrMsg: object | string, msg?: string): void {
    this.log('warn', objOrMsg, msg);
  }

  error(objOrMsg: object | string, msg?: string): void {
    this.log('error', objOrMsg, msg);
  }

  fatal(objOrMsg: object | string, msg?: string): void {
    this.log('fatal', objOrMsg, msg);
  }

  /** Children share the parent's entry list and accumulate bindings. */
  child(bindings: object): FakeLogger {
    return new FakeLogger(this.entries, { ...this.bindings, ...bindings });
  }

  private log(level: LogEntry['level'], objOrMsg: object | string, msg?: string): void {
    if (typeof objOrMsg === 'string') {
      this.entries.push({ level, msg: objOrMsg, bindings: this.bindings });
    } else {
      this.entries.push({ level, obj: objOrMsg, msg, bindings: this.bindings });
    }
  }

  // ═══════════════════════════════════════════════════════════════════
  // Test Helpers
  // ═══════════════════════════════════════════════════════════════════

  /** The fake stands in for pino's Logger wherever one is injected. */
  asLogger(): Logger {
    return this as unknown as Logger;
  }

  clear(): void {
    this.entries.length = 0;
  }

  hasEntry(level: LogEntry['level'], msgContains: string): boolean {
    return this.entries.some((e) => e.level === level && e.msg?.includes(msgContains));
  }

  getEntries(level?: LogEntry['level']): LogEntry[] {
    return level ? this.entries.filter((e) => e.level === level) : [...this.entries];
  }
}
