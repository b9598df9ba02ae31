/**
 * Nominal marker for values that passed a boundary check (parsed config,
 * minted tokens). Erased at runtime.
 *
 * String-keyed rather than a `unique symbol` so exported zod-derived types
 * stay nameable.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
