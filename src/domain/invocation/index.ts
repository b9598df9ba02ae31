export { ACTIONS, parseAction, type Action } from './action.js';
export { HANDLER_ERROR_CODES, isKnownHandlerErrorCode, type HandlerErrorCode } from './handler-error-code.js';
export type {
  CancelledError,
  HandlerCallError,
  InvalidActionError,
  LoopError,
  MalformedRequestError,
  ProgressEventValidationCode,
  ProgressEventValidationError,
  RequestConfigurationError,
  TransportError,
} from './invocation-errors.js';
export { cancelled } from './invocation-errors.js';
export {
  toWirePayload,
  withCallbackContext,
  type BearerToken,
  type HandlerTarget,
  type InvocationPlan,
  type InvocationRequest,
} from './invocation-request.js';
export { parseJson, stringifyJson } from './json-codec.js';
export {
  EMPTY_JSON_OBJECT,
  JsonObjectSchema,
  JsonValueSchema,
  findNonJsonPath,
  isJsonObject,
  isJsonValue,
  type JsonArray,
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
} from './json-types.js';
export {
  budgetFromMaxReinvoke,
  invocationsIssued,
  isTerminal,
  type ActiveLoopStatus,
  type LoopState,
  type LoopStatus,
  type ReinvokeBudget,
  type TerminalLoopState,
  type TerminalLoopStatus,
} from './loop-state.js';
export { applyProgressEvent, beginInvocation, failLoop, initialLoopState, withinBudget } from './loop-transitions.js';
export { reportOutcome, type ExitOutcome, type ExitOutcomeKind } from './outcome.js';
export {
  OPERATION_STATUSES,
  isTerminalStatus,
  parseProgressEvent,
  type ContractWarning,
  type FailedEvent,
  type InProgressEvent,
  type OperationStatus,
  type ParsedProgressEvent,
  type ProgressEvent,
  type SuccessEvent,
  type TerminalEvent,
} from './progress-event.js';
export { RequestBuilder, type RequestBuilderDeps } from './request-builder.js';
