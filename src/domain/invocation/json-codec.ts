import { LosslessNumber, isSafeNumber, parse, stringify } from 'lossless-json';
import type { JsonValue } from './json-types.js';

/**
 * JSON text codec for handler payloads and request files.
 *
 * Parsing keeps the tree JSON.parse builds (own "__proto__" members, last
 * duplicate member wins) and swaps in `LosslessNumber` wherever a number
 * would not survive a round trip through a double. `stringifyJson` writes
 * those digits back verbatim.
 */
export function parseJson(text: string): JsonValue {
  const plain: unknown = JSON.parse(text);
  return withExactNumbers(plain, parseExactNumbers(text));
}

export function stringifyJson(value: JsonValue, space?: number): string {
  // stringify only yields undefined for input that has no JSON form.
  return stringify(value, undefined, space) ?? 'null';
}

function parseExactNumbers(text: string): unknown {
  try {
    return parse(text, undefined, (digits) => (isSafeNumber(digits) ? Number(digits) : new LosslessNumber(digits)));
  } catch {
    // Rejects duplicate members with differing values, which JSON.parse accepts: numbers stay doubles then.
    return undefined;
  }
}

function withExactNumbers(plain: unknown, exact: unknown): JsonValue {
  if (typeof plain === 'number') {
    return exact instanceof LosslessNumber ? exact : plain;
  }
  if (typeof plain === 'string' || typeof plain === 'boolean' || plain === null) {
    return plain;
  }
  if (Array.isArray(plain)) {
    const items: readonly unknown[] = plain;
    const exactItems: readonly unknown[] = Array.isArray(exact) ? exact : [];
    return items.map((item, index) => withExactNumbers(item, exactItems[index]));
  }
  if (typeof plain === 'object') {
    const members: [string, unknown][] = Object.entries(plain);
    // fromEntries defines "__proto__" as an own member instead of setting the prototype.
    return Object.fromEntries(members.map(([key, member]) => [key, withExactNumbers(member, memberOf(exact, key))]));
  }
  throw new TypeError(`JSON.parse produced a ${typeof plain}`);
}

function memberOf(container: unknown, key: string): unknown {
  if (typeof container !== 'object' || container === null) return undefined;
  if (Object.prototype.hasOwnProperty.call(container, key)) return Reflect.get(container, key);
  // The lossless parser assigns a "__proto__" member, which replaces the prototype.
  return key === '__proto__' ? Object.getPrototypeOf(container) : undefined;
}
