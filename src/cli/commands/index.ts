/**
 * CLI Commands - Public API
 */

export { executeInvokeCommand, toCliResult, type InvokeCommandDeps, type InvokeCommandInput } from './invoke.js';
export { executeValidateEventCommand, type ValidateEventCommandDeps } from './validate-event.js';
export { executeActionsCommand } from './actions.js';
export { describeLoadFailure } from './load-failure.js';
