import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { BearerTokenSource } from '../../ports/bearer-token.port.js';
import type { Action } from './action.js';
import type { MalformedRequestError } from './invocation-errors.js';
import type { HandlerTarget, InvocationPlan } from './invocation-request.js';
import { EMPTY_JSON_OBJECT, findNonJsonPath, isJsonObject } from './json-types.js';

export interface RequestBuilderDeps {
  readonly target: HandlerTarget;
  readonly tokens: BearerTokenSource;
}

/**
 * Assembles the first invocation of a run.
 */
export class RequestBuilder {
  constructor(private readonly deps: RequestBuilderDeps) {}

  buildInitialRequest(action: Action, body: unknown): Result<InvocationPlan, MalformedRequestError> {
    if (!isJsonObject(body)) {
      return err({
        code: 'MALFORMED_REQUEST',
        message: `Request body must be a JSON object, got ${describeShape(body)}`,
      });
    }

    const badPath = findNonJsonPath(body);
    if (badPath) {
      const where = badPath.length > 0 ? badPath.join('.') : '(root)';
      return err({
        code: 'MALFORMED_REQUEST',
        message: `Request body is not plain JSON at ${where}: ${describeNonJson(valueAt(body, badPath))} is not a JSON value`,
      });
    }

    return ok({
      target: this.deps.target,
      request: {
        action,
        resourceRequest: body,
        callbackContext: EMPTY_JSON_OBJECT,
        bearerToken: this.deps.tokens.next(),
      },
    });
  }
}

function describeShape(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return `a ${typeof value}`;
}

function describeNonJson(value: unknown): string {
  return typeof value === 'number' ? String(value) : typeof value;
}

function valueAt(root: unknown, path: readonly string[]): unknown {
  return path.reduce<unknown>(
    (node, key) => (typeof node === 'object' && node !== null ? Reflect.get(node, key) : undefined),
    root
  );
}
