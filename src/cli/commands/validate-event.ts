/**
 * Validate Event Command
 *
 * Checks a saved handler response against the progress event contract.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, misuse } from '../types/cli-result.js';
import type { LoadRequestFileResult } from '../../application/use-cases/load-request-file.js';
import type { ParsedProgressEvent, ProgressEvent } from '../../domain/invocation/progress-event.js';
import { parseProgressEvent } from '../../domain/invocation/progress-event.js';
import { stringifyJson } from '../../domain/invocation/json-codec.js';
import { JsonValueSchema } from '../../domain/invocation/json-types.js';
import { formatLoopError } from '../../errors/formatter.js';
import { assertNever } from '../../runtime/assert-never.js';
import { describeLoadFailure } from './load-failure.js';

export interface ValidateEventCommandDeps {
  readonly loadEventFile: (filePath: string) => LoadRequestFileResult;
}

export function executeValidateEventCommand(filePath: string, deps: ValidateEventCommandDeps): CliResult {
  const loaded = deps.loadEventFile(filePath);
  if (loaded.kind !== 'loaded') {
    return describeLoadFailure(loaded);
  }

  // Parsed files are always JSON values; this only narrows the type.
  const json = JsonValueSchema.safeParse(loaded.body);
  if (!json.success) {
    return misuse(`Not a JSON document: ${filePath}`);
  }

  const parsed = parseProgressEvent(json.data);
  if (parsed.isErr()) {
    return misuse(formatLoopError(parsed.error), {
      details: [filePath],
      suggestions: ['Handlers must return an object with status SUCCESS, FAILED or IN_PROGRESS'],
    });
  }

  return describeEvent(filePath, parsed.value);
}

function describeEvent(filePath: string, parsed: ParsedProgressEvent): CliResult {
  const { event, warnings } = parsed;
  const details = [...eventDetails(event)];
  if (event.message !== undefined) details.push(`message: ${event.message}`);
  if (event.resourceModel !== undefined) details.push(`resourceModel: ${stringifyJson(event.resourceModel)}`);
  if (event.resourceModels !== undefined) details.push(`resourceModels: ${event.resourceModels.length} item(s)`);
  if (event.nextToken !== undefined) details.push(`nextToken: ${event.nextToken}`);

  return success({
    message: warnings.length > 0
      ? `Valid ${event.status} event with warnings: ${filePath}`
      : `Valid ${event.status} event: ${filePath}`,
    details,
    warnings: warnings.length > 0 ? warnings.map((w) => w.message) : undefined,
  });
}

function eventDetails(event: ProgressEvent): readonly string[] {
  switch (event.status) {
    case 'SUCCESS':
      return ['terminal: yes'];
    case 'FAILED':
      return ['terminal: yes', `errorCode: ${event.errorCode}`];
    case 'IN_PROGRESS':
      return [
        'terminal: no',
        `callbackContext: ${stringifyJson(event.callbackContext)}`,
        `callbackDelaySeconds: ${event.callbackDelaySeconds ?? 0}`,
      ];
    default:
      return assertNever(event);
  }
}
