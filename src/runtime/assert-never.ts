/**
 * Exhaustiveness check for `switch` over a discriminated union: adding a
 * variant without handling it becomes a compile error.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
