import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { InvalidActionError } from './invocation-errors.js';

/**
 * Lifecycle actions a resource handler implements.
 */
export const ACTIONS = ['CREATE', 'READ', 'UPDATE', 'DELETE', 'LIST'] as const;

export type Action = (typeof ACTIONS)[number];

const ACTION_SET: ReadonlySet<string> = new Set(ACTIONS);

function isAction(value: string): value is Action {
  return ACTION_SET.has(value);
}

/**
 * Parse a caller-supplied action name. Matching is exact (upper case).
 */
export function parseAction(raw: string): Result<Action, InvalidActionError> {
  if (isAction(raw)) return ok(raw);
  return err({
    code: 'INVALID_ACTION',
    message: `Unknown action '${raw}'. Expected one of: ${ACTIONS.join(', ')}`,
    value: raw,
  });
}
