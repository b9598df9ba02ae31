import type { LosslessNumber } from 'lossless-json';
import { isLosslessNumber } from 'lossless-json';
import { z } from 'zod';

/**
 * Opaque structured data exchanged with handlers.
 *
 * Callback contexts, resource requests and resource models are never
 * interpreted by the harness; they are carried as a JSON tree. Numbers a
 * double cannot hold exactly stay as `LosslessNumber` with their source digits.
 */
export type JsonPrimitive = string | number | boolean | null | LosslessNumber;
export type JsonArray = readonly JsonValue[];
export interface JsonObject {
  readonly [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  return findNonJsonPath(value) === undefined;
}

/**
 * Path to the first member that is not JSON data (NaN, undefined, a function...),
 * or undefined when the whole tree is JSON.
 */
export function findNonJsonPath(value: unknown, path: readonly string[] = []): readonly string[] | undefined {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return undefined;
    case 'number':
      return Number.isFinite(value) ? undefined : path;
    case 'object': {
      if (value === null || isLosslessNumber(value)) return undefined;
      const members: [string, unknown][] = Array.isArray(value)
        ? value.map((item: unknown, index): [string, unknown] => [String(index), item])
        : Object.entries(value);
      for (const [key, member] of members) {
        const found = findNonJsonPath(member, [...path, key]);
        if (found) return found;
      }
      return undefined;
    }
    default:
      return path;
  }
}

// Both return the input as is: own "__proto__" members must survive validation.
export const JsonValueSchema: z.ZodType<JsonValue> = z.custom<JsonValue>(isJsonValue, 'Expected a JSON value');

export const JsonObjectSchema: z.ZodType<JsonObject> = z.custom<JsonObject>(
  (value) => isJsonObject(value) && isJsonValue(value),
  'Expected a JSON object'
);

export const EMPTY_JSON_OBJECT: JsonObject = Object.freeze({});
