import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { ACTIONS } from '../../domain/invocation/action.js';

/**
 * List the lifecycle actions `invoke` accepts.
 */
export function executeActionsCommand(): CliResult {
  return success({
    message: `${ACTIONS.length} actions available`,
    details: [...ACTIONS],
  });
}
