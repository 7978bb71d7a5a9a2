/**
 * Nominal marker for values that have passed a check.
 *
 * A branded sequence can only come out of the function that performed the
 * check, so downstream code can require it in its signature instead of
 * re-checking. Erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
