export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  UnexpectedError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError, formatLoopError, formatRequestConfigurationError, safeToString } from './formatter.js';
