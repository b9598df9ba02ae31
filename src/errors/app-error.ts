import type { Brand } from '../runtime/brand.js';

/** One failed field of the merged env + flag configuration. */
export type ConfigIssue = Readonly<{
  /** Env variable name, with the CLI flag where one exists. */
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

/**
 * Failures outside an invocation run. Loop and request errors have their
 * own unions in the invocation domain.
 */
export type AppError = ConfigInvalidError | UnexpectedError;

/** Config that has passed schema validation. */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
