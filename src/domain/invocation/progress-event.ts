import { isLosslessNumber } from 'lossless-json';
import { z } from 'zod';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { isKnownHandlerErrorCode } from './handler-error-code.js';
import type { ProgressEventValidationCode, ProgressEventValidationError } from './invocation-errors.js';
import { stringifyJson } from './json-codec.js';
import type { JsonObject, JsonValue } from './json-types.js';
import { EMPTY_JSON_OBJECT, JsonObjectSchema, JsonValueSchema, isJsonObject } from './json-types.js';
import { assertNever } from '../../runtime/assert-never.js';

export const OPERATION_STATUSES = ['SUCCESS', 'FAILED', 'IN_PROGRESS'] as const;
export type OperationStatus = (typeof OPERATION_STATUSES)[number];

interface EventBase {
  readonly message?: string;
  readonly resourceModel?: JsonValue;
  readonly resourceModels?: readonly JsonValue[];
  readonly nextToken?: string;
}

export interface SuccessEvent extends EventBase {
  readonly status: 'SUCCESS';
}

export interface FailedEvent extends EventBase {
  readonly status: 'FAILED';
  readonly errorCode: string;
}

export interface InProgressEvent extends EventBase {
  readonly status: 'IN_PROGRESS';
  /** Empty when the handler returned none. */
  readonly callbackContext: JsonObject;
  readonly callbackDelaySeconds?: number;
}

export type ProgressEvent = SuccessEvent | FailedEvent | InProgressEvent;

export type TerminalEvent = SuccessEvent | FailedEvent;

/**
 * Non-fatal deviation from the envelope contract. Reported with the outcome.
 */
export type ContractWarning =
  | { readonly code: 'UNEXPECTED_CALLBACK_CONTEXT'; readonly status: 'SUCCESS' | 'FAILED'; readonly message: string }
  | { readonly code: 'UNEXPECTED_CALLBACK_DELAY'; readonly status: 'SUCCESS' | 'FAILED'; readonly message: string }
  | { readonly code: 'UNEXPECTED_ERROR_CODE'; readonly status: 'SUCCESS'; readonly message: string }
  | { readonly code: 'UNKNOWN_ERROR_CODE'; readonly status: 'FAILED'; readonly message: string };

export interface ParsedProgressEvent {
  readonly event: ProgressEvent;
  readonly warnings: readonly ContractWarning[];
}

// null is accepted everywhere an optional field is: handlers serialize absent fields either way.
const EnvelopeFieldsSchema = z.object({
  message: z.string().nullish(),
  errorCode: z.string().nullish(),
  callbackContext: JsonObjectSchema.nullish(),
  callbackDelaySeconds: z.unknown(),
  resourceModel: JsonValueSchema.nullish(),
  resourceModels: z.array(JsonValueSchema).nullish(),
  nextToken: z.string().nullish(),
});

const StatusSchema = z.enum(OPERATION_STATUSES);

export function isTerminalStatus(status: OperationStatus): boolean {
  return status !== 'IN_PROGRESS';
}

/**
 * Parse one handler response into a ProgressEvent.
 *
 * Check order: status, field types, FAILED needs an errorCode, IN_PROGRESS
 * delay must be a non-negative integer. Everything else that departs from
 * the contract is returned as a warning.
 */
export function parseProgressEvent(raw: JsonValue): Result<ParsedProgressEvent, ProgressEventValidationError> {
  if (!isJsonObject(raw)) {
    return invalid('MALFORMED_EVENT', 'Response must be a JSON object', raw);
  }
  const envelope = raw;

  const status = StatusSchema.safeParse(envelope['status']);
  if (!status.success) {
    return invalid('UNKNOWN_STATUS', `Unknown status ${stringifyJson(envelope['status'] ?? null)}`, raw);
  }

  const fields = EnvelopeFieldsSchema.safeParse(envelope);
  if (!fields.success) {
    const details = fields.error.issues
      .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    return invalid('MALFORMED_EVENT', `Response fields have the wrong type (${details})`, raw);
  }

  const f = fields.data;
  const base: EventBase = {
    ...(f.message != null ? { message: f.message } : {}),
    ...(f.resourceModel != null ? { resourceModel: f.resourceModel } : {}),
    ...(f.resourceModels != null ? { resourceModels: f.resourceModels } : {}),
    ...(f.nextToken != null ? { nextToken: f.nextToken } : {}),
  };
  const hasDelay = f.callbackDelaySeconds !== undefined && f.callbackDelaySeconds !== null;

  const statusValue = status.data;
  switch (statusValue) {
    case 'IN_PROGRESS': {
      const delaySeconds = delaySecondsOf(f.callbackDelaySeconds);
      if (hasDelay && delaySeconds === undefined) {
        return invalid(
          'INVALID_DELAY',
          `callbackDelaySeconds must be a non-negative integer, got ${stringifyJson(envelope['callbackDelaySeconds'] ?? null)}`,
          raw
        );
      }
      const event: InProgressEvent = {
        ...base,
        status: 'IN_PROGRESS',
        callbackContext: f.callbackContext ?? EMPTY_JSON_OBJECT,
        ...(delaySeconds !== undefined ? { callbackDelaySeconds: delaySeconds } : {}),
      };
      return ok({ event, warnings: [] });
    }

    case 'FAILED': {
      if (f.errorCode == null || f.errorCode.length === 0) {
        return invalid('MISSING_ERROR_CODE', 'FAILED response carries no errorCode', raw);
      }
      const warnings: ContractWarning[] = [];
      if (!isKnownHandlerErrorCode(f.errorCode)) {
        warnings.push({
          code: 'UNKNOWN_ERROR_CODE',
          status: 'FAILED',
          message: `errorCode '${f.errorCode}' is not a known handler error code`,
        });
      }
      if (f.callbackContext != null) warnings.push(unexpectedCallbackContext('FAILED'));
      if (hasDelay) warnings.push(unexpectedCallbackDelay('FAILED'));
      const event: FailedEvent = { ...base, status: 'FAILED', errorCode: f.errorCode };
      return ok({ event, warnings });
    }

    case 'SUCCESS': {
      const warnings: ContractWarning[] = [];
      if (f.errorCode != null) {
        warnings.push({
          code: 'UNEXPECTED_ERROR_CODE',
          status: 'SUCCESS',
          message: `SUCCESS response carries errorCode '${f.errorCode}'`,
        });
      }
      if (f.callbackContext != null) warnings.push(unexpectedCallbackContext('SUCCESS'));
      if (hasDelay) warnings.push(unexpectedCallbackDelay('SUCCESS'));
      const event: SuccessEvent = { ...base, status: 'SUCCESS' };
      return ok({ event, warnings });
    }

    default:
      return assertNever(statusValue);
  }
}

function delaySecondsOf(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isInteger(value) && value >= 0 ? value : undefined;
  // Integers too long for a double: the wait only has to be at least this long.
  if (isLosslessNumber(value) && /^\d+$/.test(value.value)) return Number(value.value);
  return undefined;
}

function unexpectedCallbackContext(status: 'SUCCESS' | 'FAILED'): ContractWarning {
  return {
    code: 'UNEXPECTED_CALLBACK_CONTEXT',
    status,
    message: `${status} response carries a callbackContext; it is ignored`,
  };
}

function unexpectedCallbackDelay(status: 'SUCCESS' | 'FAILED'): ContractWarning {
  return {
    code: 'UNEXPECTED_CALLBACK_DELAY',
    status,
    message: `${status} response carries callbackDelaySeconds; it is ignored`,
  };
}

function invalid(
  code: ProgressEventValidationCode,
  message: string,
  raw: JsonValue
): Result<never, ProgressEventValidationError> {
  return err({ code, message, raw });
}
