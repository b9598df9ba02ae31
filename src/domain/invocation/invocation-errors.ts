import type { JsonValue } from './json-types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration errors (raised before any invocation)
// ─────────────────────────────────────────────────────────────────────────────

export type InvalidActionError = {
  readonly code: 'INVALID_ACTION';
  readonly message: string;
  readonly value: string;
};

export type MalformedRequestError = {
  readonly code: 'MALFORMED_REQUEST';
  readonly message: string;
};

export type RequestConfigurationError = InvalidActionError | MalformedRequestError;

// ─────────────────────────────────────────────────────────────────────────────
// Transport errors (one handler call failed)
// ─────────────────────────────────────────────────────────────────────────────

export type TransportError =
  | { readonly code: 'CONNECTION_ERROR'; readonly message: string; readonly endpoint: string }
  | { readonly code: 'TIMEOUT'; readonly message: string; readonly timeoutMs: number }
  | { readonly code: 'PROTOCOL_ERROR'; readonly message: string; readonly raw?: string };

export type CancelledError = {
  readonly code: 'CANCELLED';
  readonly message: string;
  readonly reason: string;
};

export type HandlerCallError = TransportError | CancelledError;

// ─────────────────────────────────────────────────────────────────────────────
// Validation errors (response violates the envelope contract)
// ─────────────────────────────────────────────────────────────────────────────

export type ProgressEventValidationCode =
  | 'UNKNOWN_STATUS'
  | 'MISSING_ERROR_CODE'
  | 'INVALID_DELAY'
  | 'MALFORMED_EVENT';

export type ProgressEventValidationError = {
  readonly code: ProgressEventValidationCode;
  readonly message: string;
  /** The response exactly as the handler returned it. */
  readonly raw: JsonValue;
};

/**
 * Anything that ends a run in `done_error`.
 */
export type LoopError = HandlerCallError | ProgressEventValidationError;

export function cancelled(reason: unknown): CancelledError {
  const text = describeAbortReason(reason);
  return { code: 'CANCELLED', message: `Invocation cancelled: ${text}`, reason: text };
}

function describeAbortReason(reason: unknown): string {
  if (reason instanceof Error) return reason.message;
  if (typeof reason === 'string' && reason.length > 0) return reason;
  return 'aborted';
}
