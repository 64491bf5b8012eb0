/**
 * Brand helper for "parse, don't validate".
 *
 * A branded type proves validation happened at a boundary: an
 * `AbsolutePath` was normalized, an `IndexWidth` was range-checked.
 *
 * Uses a string-keyed marker rather than a `unique symbol` so that zod
 * schemas transforming into branded types can be exported (TS4023).
 *
 * Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
