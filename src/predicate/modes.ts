import { z } from 'zod';
import { type Result, ok, err } from 'neverthrow';
import type { InvalidSpecificationError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';

/**
 * Access mode of a predicate. `read` requires the resolved path to exist
 * when a container is opened; `write` and `append` do not.
 */
export const ModeSchema = z.enum(['read', 'write', 'append']);

export type Mode = z.infer<typeof ModeSchema>;

export const Modes = {
  READ: 'read',
  WRITE: 'write',
  APPEND: 'append',
} as const satisfies Record<string, Mode>;

export function parseMode(input: unknown): Result<Mode, InvalidSpecificationError> {
  const result = ModeSchema.safeParse(input);
  if (!result.success) {
    return err(Err.invalidSpecification('mode', input, "expected 'read', 'write' or 'append'"));
  }
  return ok(result.data);
}
