/**
 * Error codes a handler may report with a FAILED status.
 *
 * The harness reports whatever code the handler returns verbatim; codes outside
 * this catalogue only raise a contract warning.
 */
export const HANDLER_ERROR_CODES = [
  'NotUpdatable',
  'InvalidRequest',
  'AccessDenied',
  'InvalidCredentials',
  'AlreadyExists',
  'NotFound',
  'ResourceConflict',
  'Throttling',
  'ServiceLimitExceeded',
  'NotStabilized',
  'GeneralServiceException',
  'ServiceInternalError',
  'NetworkFailure',
  'InternalFailure',
  'InvalidTypeConfiguration',
  'HandlerInternalFailure',
  'NonCompliant',
  'Unknown',
  'UnsupportedTarget',
] as const;

export type HandlerErrorCode = (typeof HANDLER_ERROR_CODES)[number];

const KNOWN_CODES: ReadonlySet<string> = new Set(HANDLER_ERROR_CODES);

export function isKnownHandlerErrorCode(code: string): code is HandlerErrorCode {
  return KNOWN_CODES.has(code);
}
