/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { HandlerTarget } from '../domain/invocation/invocation-request.js';
import type { ReinvokeBudget } from '../domain/invocation/loop-state.js';
import { budgetFromMaxReinvoke } from '../domain/invocation/loop-state.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type InvocationTimeoutMs = Brand<number, 'InvocationTimeoutMs'>;
export type AwsRegion = Brand<string, 'AwsRegion'>;

export const DEFAULT_ENDPOINT = 'http://127.0.0.1:3001';
export const DEFAULT_FUNCTION_NAME = 'TestEntrypoint';
export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_TIMEOUT_SECONDS = 30;

export interface AppConfig {
  readonly target: HandlerTarget;
  readonly region: AwsRegion;
  readonly budget: ReinvokeBudget;
  readonly invocationTimeoutMs: InvocationTimeoutMs;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

/**
 * Values given explicitly (CLI flags). They take precedence over the environment.
 */
export interface ConfigOverrides {
  readonly endpoint?: string;
  readonly functionName?: string;
  readonly region?: string;
  readonly maxReinvoke?: string;
  readonly timeoutSeconds?: string;
}

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  readonly overrides?: ConfigOverrides;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const optionalInteger = (field: string) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(z.number({ invalid_type_error: `${field} must be a number` }).int(`${field} must be an integer`).optional());

const ConfigInputSchema = z.object({
  PROVIDER_INVOKE_ENDPOINT: z.string().url('Endpoint must be a URL').default(DEFAULT_ENDPOINT),

  PROVIDER_INVOKE_FUNCTION_NAME: z.string().min(1, 'Function name cannot be empty').default(DEFAULT_FUNCTION_NAME),

  PROVIDER_INVOKE_REGION: z.string().min(1, 'Region cannot be empty').default(DEFAULT_REGION),

  PROVIDER_INVOKE_MAX_REINVOKE: optionalInteger('Max re-invoke').pipe(
    z.number().min(0, 'Max re-invoke cannot be negative').optional()
  ),

  PROVIDER_INVOKE_TIMEOUT_SECONDS: optionalInteger('Timeout').pipe(
    z
      .number()
      .min(1, 'Timeout must be at least 1 second')
      .max(900, 'Timeout cannot exceed 900 seconds')
      .default(DEFAULT_TIMEOUT_SECONDS)
  ),
});

type ParsedInput = z.infer<typeof ConfigInputSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = ConfigInputSchema.safeParse(mergeOverrides(options.env, options.overrides ?? {}));

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function mergeOverrides(env: Record<string, string | undefined>, overrides: ConfigOverrides): Record<string, string | undefined> {
  return {
    PROVIDER_INVOKE_ENDPOINT: overrides.endpoint ?? env['PROVIDER_INVOKE_ENDPOINT'],
    PROVIDER_INVOKE_FUNCTION_NAME: overrides.functionName ?? env['PROVIDER_INVOKE_FUNCTION_NAME'],
    PROVIDER_INVOKE_REGION: overrides.region ?? env['PROVIDER_INVOKE_REGION'],
    PROVIDER_INVOKE_MAX_REINVOKE: overrides.maxReinvoke ?? env['PROVIDER_INVOKE_MAX_REINVOKE'],
    PROVIDER_INVOKE_TIMEOUT_SECONDS: overrides.timeoutSeconds ?? env['PROVIDER_INVOKE_TIMEOUT_SECONDS'],
  };
}

function buildConfig(input: ParsedInput): AppConfig {
  return {
    target: {
      endpoint: input.PROVIDER_INVOKE_ENDPOINT,
      functionIdentity: input.PROVIDER_INVOKE_FUNCTION_NAME,
    },
    region: input.PROVIDER_INVOKE_REGION as AwsRegion,
    budget: budgetFromMaxReinvoke(input.PROVIDER_INVOKE_MAX_REINVOKE),
    invocationTimeoutMs: (input.PROVIDER_INVOKE_TIMEOUT_SECONDS * 1000) as InvocationTimeoutMs,
  };
}

const FIELD_LABELS: Readonly<Record<string, string>> = {
  PROVIDER_INVOKE_ENDPOINT: 'PROVIDER_INVOKE_ENDPOINT (--endpoint)',
  PROVIDER_INVOKE_FUNCTION_NAME: 'PROVIDER_INVOKE_FUNCTION_NAME (--function-name)',
  PROVIDER_INVOKE_REGION: 'PROVIDER_INVOKE_REGION (--region)',
  PROVIDER_INVOKE_MAX_REINVOKE: 'PROVIDER_INVOKE_MAX_REINVOKE (--max-reinvoke)',
  PROVIDER_INVOKE_TIMEOUT_SECONDS: 'PROVIDER_INVOKE_TIMEOUT_SECONDS (--timeout)',
};

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => {
    const path = issue.path.length ? issue.path.join('.') : '(root)';
    return { path: FIELD_LABELS[path] ?? path, message: issue.message };
  });
}
