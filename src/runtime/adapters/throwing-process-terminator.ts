import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: never exits the process.
 * Useful to catch accidental termination during tests.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    const detail = code.kind === 'failure' ? `failure:${code.status}` : code.kind;
    throw new Error(`[ProcessTerminator] terminate(${detail})`);
  }
}
