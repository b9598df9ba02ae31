/**
 * CLI Types - Public API
 */

export type { ExitCode } from './exit-code.js';
export { toProcessExitCode, toNumericExitCode } from './exit-code.js';

export type { CliOutput, CliResult, FailureOptions } from './cli-result.js';
export { success, failure, misuse } from './cli-result.js';
