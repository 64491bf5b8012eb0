import * as path from 'path';
import { type Result, err, ok } from 'neverthrow';
import type { SpecError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { type ContainerLevel, levelDepth } from '../predicate/levels.js';
import type { Mode } from '../predicate/modes.js';
import { Predicate, type PredicateOptions } from '../predicate/predicate.js';

/** What a container can be opened from: a predicate, or the path of an existing entity. */
export type SpecLike = Predicate | string;

/**
 * Rebuild a predicate from the path of an entity at `level`, reading the
 * names of its parent directories:
 *
 *   {root}/{dataset}/{subject}/{session}/{domain}/{file}
 *
 * Nothing is checked against the filesystem.
 */
export function predicateFromPath(
  level: ContainerLevel,
  entityPath: string,
  mode?: Mode,
  options: PredicateOptions = {}
): Result<Predicate, SpecError> {
  const names: string[] = [];
  let current = path.resolve(entityPath);
  for (let depth = levelDepth(level); depth > 0; depth -= 1) {
    const name = path.basename(current);
    if (name.length === 0) {
      return err(Err.invalidSpecification('path', entityPath, `too shallow to hold a ${level}`));
    }
    names.unshift(name);
    current = path.dirname(current);
  }

  const [dataset, subject, session, domain, file] = names;
  return Predicate.parse({ mode, root: current, dataset, subject, session, domain, file }, options);
}

/**
 * A path goes through `predicateFromPath`; a predicate only takes the
 * mode override.
 */
export function verifySpec(
  level: ContainerLevel,
  spec: SpecLike,
  mode?: Mode,
  options: PredicateOptions = {}
): Result<Predicate, SpecError> {
  if (typeof spec === 'string') {
    return predicateFromPath(level, spec, mode, options);
  }
  return mode === undefined ? ok(spec) : spec.withValues({ mode });
}
