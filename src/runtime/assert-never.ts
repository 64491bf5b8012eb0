/**
 * Exhaustiveness helper for discriminated unions.
 * Use in `switch` statements so that adding a union member (a new axis kind,
 * a new level, a new error tag) fails at compile time.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected variant: ${JSON.stringify(x)}`);
}
