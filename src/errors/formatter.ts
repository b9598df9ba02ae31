import type { AppError } from './app-error.js';
import type { LoopError, RequestConfigurationError } from '../domain/invocation/invocation-errors.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'Unexpected':
      return `${error.message}\nCause: ${safeToString(error.cause)}`;

    default:
      return assertNever(error);
  }
}

/**
 * One-line summary of anything that ended a run in error.
 */
export function formatLoopError(error: LoopError): string {
  switch (error.code) {
    case 'CONNECTION_ERROR':
      return `Connection error: ${error.message}`;
    case 'TIMEOUT':
      return `Timeout: ${error.message}`;
    case 'PROTOCOL_ERROR':
      return `Protocol error: ${error.message}`;
    case 'CANCELLED':
      return `Cancelled: ${error.reason}`;
    case 'UNKNOWN_STATUS':
    case 'MISSING_ERROR_CODE':
    case 'INVALID_DELAY':
    case 'MALFORMED_EVENT':
      return `Invalid progress event (${error.code}): ${error.message}`;
    default:
      return assertNever(error);
  }
}

export function formatRequestConfigurationError(error: RequestConfigurationError): string {
  switch (error.code) {
    case 'INVALID_ACTION':
      return error.message;
    case 'MALFORMED_REQUEST':
      return `Malformed request: ${error.message}`;
    default:
      return assertNever(error);
  }
}

export function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}
