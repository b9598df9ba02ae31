/**
 * Typed exit codes for CLI commands.
 * Prefer these over raw integers for type safety.
 * 0-2 follow Unix conventions; 3-5 distinguish how a run ended.
 */
export type ExitCode =
  | { kind: 'success' }            // 0 - successful execution
  | { kind: 'general_error' }      // 1 - general errors
  | { kind: 'misuse' }             // 2 - misuse of command (bad args, bad input files)
  | { kind: 'handler_failed' }     // 3 - handler reported FAILED
  | { kind: 'budget_exhausted' }   // 4 - re-invoke budget ran out while IN_PROGRESS
  | { kind: 'invocation_error' }   // 5 - transport, validation or cancellation error
  | { kind: 'unhandled' };         // 127 - crash outside any command

/**
 * Convert ExitCode to numeric value for process exit.
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
    case 'handler_failed':
      return 3;
    case 'budget_exhausted':
      return 4;
    case 'invocation_error':
      return 5;
    case 'unhandled':
      return 127;
  }
}

/**
 * Convert ExitCode to ProcessTerminator's expected format.
 */
export function toProcessExitCode(exitCode: ExitCode): { kind: 'success' } | { kind: 'failure'; status: number } {
  return exitCode.kind === 'success' ? { kind: 'success' } : { kind: 'failure', status: toNumericExitCode(exitCode) };
}
