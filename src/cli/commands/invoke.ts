/**
 * Invoke Command
 *
 * Loads a request file, drives the handler to a terminal state, and turns the
 * outcome into a CliResult. Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { LoadRequestFileResult } from '../../application/use-cases/load-request-file.js';
import type { InvokeHandlerInput, InvokeHandlerResult } from '../../application/use-cases/invoke-handler.js';
import type { ExitOutcome } from '../../domain/invocation/outcome.js';
import type { HandlerTarget } from '../../domain/invocation/invocation-request.js';
import type { ReinvokeBudget } from '../../domain/invocation/loop-state.js';
import type { LoopError } from '../../domain/invocation/invocation-errors.js';
import type { JsonValue } from '../../domain/invocation/json-types.js';
import { stringifyJson } from '../../domain/invocation/json-codec.js';
import { ACTIONS } from '../../domain/invocation/action.js';
import { formatLoopError, formatRequestConfigurationError } from '../../errors/formatter.js';
import { assertNever } from '../../runtime/assert-never.js';
import { describeLoadFailure } from './load-failure.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface InvokeCommandDeps {
  readonly loadRequestFile: (filePath: string) => LoadRequestFileResult;
  readonly invokeHandler: (input: InvokeHandlerInput) => Promise<InvokeHandlerResult>;
}

export interface InvokeCommandInput {
  readonly action: string;
  readonly requestFile: string;
  readonly target: HandlerTarget;
  readonly budget: ReinvokeBudget;
  readonly signal?: AbortSignal;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeInvokeCommand(input: InvokeCommandInput, deps: InvokeCommandDeps): Promise<CliResult> {
  const loaded = deps.loadRequestFile(input.requestFile);
  if (loaded.kind !== 'loaded') {
    return describeLoadFailure(loaded);
  }

  const result = await deps.invokeHandler({
    action: input.action,
    body: loaded.body,
    target: input.target,
    budget: input.budget,
    signal: input.signal,
  });

  if (result.isErr()) {
    const error = result.error;
    return misuse(formatRequestConfigurationError(error), {
      suggestions:
        error.code === 'INVALID_ACTION'
          ? [`Use one of: ${ACTIONS.join(', ')}`]
          : [`Make ${input.requestFile} contain a single JSON object`],
    });
  }

  return toCliResult(result.value);
}

// ═══════════════════════════════════════════════════════════════════════════
// OUTCOME RENDERING
// ═══════════════════════════════════════════════════════════════════════════

export function toCliResult(outcome: ExitOutcome): CliResult {
  const runLine = `${outcome.invocations} invocation${outcome.invocations === 1 ? '' : 's'}, bearer token ${outcome.bearerToken}`;
  const warnings = outcome.warnings.length > 0 ? outcome.warnings.map((w) => w.message) : undefined;

  switch (outcome.kind) {
    case 'succeeded': {
      const details = [runLine];
      if (outcome.message !== undefined) details.push(`Message: ${outcome.message}`);
      if (outcome.nextToken !== undefined) details.push(`Next token: ${outcome.nextToken}`);
      const model = outcome.resourceModels ?? outcome.resourceModel;
      return success({
        message: `${outcome.action} succeeded`,
        details,
        body: model !== undefined ? prettyJson(model) : undefined,
        warnings,
      });
    }

    case 'handler_failed':
      return failure(`${outcome.action} failed with ${outcome.errorCode}`, {
        exitCode: { kind: 'handler_failed' },
        details: outcome.message !== undefined ? [runLine, `Message: ${outcome.message}`] : [runLine],
        warnings,
      });

    case 'budget_exhausted':
      return failure(
        `${outcome.action} still IN_PROGRESS after ${outcome.maxReinvoke} re-invocation${outcome.maxReinvoke === 1 ? '' : 's'}`,
        {
          exitCode: { kind: 'budget_exhausted' },
          details: [runLine, `Last callback context: ${stringifyJson(outcome.lastEvent.callbackContext)}`],
          warnings,
          suggestions: ['Raise --max-reinvoke or leave it unset to wait for a terminal status'],
        }
      );

    case 'invocation_error':
      return failure(formatLoopError(outcome.error), {
        exitCode: { kind: 'invocation_error' },
        details: [runLine],
        body: rawResponseOf(outcome.error),
        warnings,
      });

    default:
      return assertNever(outcome);
  }
}

function rawResponseOf(error: LoopError): string | undefined {
  switch (error.code) {
    case 'UNKNOWN_STATUS':
    case 'MISSING_ERROR_CODE':
    case 'INVALID_DELAY':
    case 'MALFORMED_EVENT':
      return prettyJson(error.raw);
    case 'PROTOCOL_ERROR':
      return error.raw;
    case 'CONNECTION_ERROR':
    case 'TIMEOUT':
    case 'CANCELLED':
      return undefined;
    default:
      return assertNever(error);
  }
}

function prettyJson(value: JsonValue): string {
  return stringifyJson(value, 2);
}
