import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

/**
 * Exits the real process with the CLI's numeric status.
 */
export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    switch (code.kind) {
      case 'success':
        return process.exit(0);
      case 'failure':
        return process.exit(code.status);
      default:
        return assertNever(code);
    }
  }
}
