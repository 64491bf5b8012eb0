import type { Result } from 'neverthrow';
import type { ContainerError } from './app-error.js';

/**
 * Thrown by the convenience entry points (`Predicate.of`, `Predicate#path`,
 * `FileSpec#trial`, ...). Carries the tagged error so callers can still
 * switch on `detail._tag`.
 */
export class SpecificationError extends Error {
  readonly detail: ContainerError;

  constructor(detail: ContainerError) {
    super(detail.message);
    this.name = 'SpecificationError';
    this.detail = detail;
  }
}

export function unwrapOrThrow<T, E extends ContainerError>(result: Result<T, E>): T {
  if (result.isErr()) {
    throw new SpecificationError(result.error);
  }
  return result.value;
}
