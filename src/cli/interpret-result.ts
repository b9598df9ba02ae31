/**
 * CLI Result Interpreter
 *
 * Bridges CLI command results to process termination.
 * This is the only place where CliResult is converted to process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExitCode, toNumericExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

/**
 * Print the result and terminate with its exit code on failure.
 * Use this when the DI container is available.
 */
export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Let the process end naturally so pending stderr writes flush.
      return;

    case 'failure':
      terminator.terminate(toProcessExitCode(result.exitCode));
  }
}

/**
 * Print the result and exit without DI (config errors, crashes before the
 * container exists).
 */
export function interpretCliResultWithoutDI(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;

    case 'failure':
      process.exit(toNumericExitCode(result.exitCode));
  }
}
