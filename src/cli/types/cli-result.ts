/**
 * CLI Result Types
 *
 * Discriminated unions for CLI command outcomes.
 * Commands return these types; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';

/**
 * Structured output for CLI display.
 * Separates content from presentation.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  /** Preformatted block (pretty JSON) printed unstyled after the details. */
  readonly body?: string;
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

/**
 * Result of a CLI command execution.
 * All commands should return this type.
 */
export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export interface FailureOptions {
  readonly exitCode?: ExitCode;
  readonly details?: readonly string[];
  readonly body?: string;
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

/**
 * Failure result; general_error unless an exit code is given.
 */
export function failure(message: string, options: FailureOptions = {}): CliResult {
  return {
    kind: 'failure',
    exitCode: options.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options.details,
      body: options.body,
      warnings: options.warnings,
      suggestions: options.suggestions,
    },
  };
}

/**
 * Misuse failure (bad arguments, unreadable input files).
 */
export function misuse(message: string, options: Omit<FailureOptions, 'exitCode'> = {}): CliResult {
  return failure(message, { ...options, exitCode: { kind: 'misuse' } });
}
