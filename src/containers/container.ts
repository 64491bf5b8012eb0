import * as path from 'path';
import type { ResultAsync } from 'neverthrow';
import type { ContainerError } from '../errors/app-error.js';
import type { ContainerLevel } from '../predicate/levels.js';
import type { Mode } from '../predicate/modes.js';
import type { Predicate, PredicateInput } from '../predicate/predicate.js';
import type { SpecLike } from './resolve-path.js';
import type { DataRoot } from './data-root.js';
import type { Dataset } from './dataset.js';
import type { Subject } from './subject.js';
import type { Session } from './session.js';
import type { Domain } from './domain.js';
import type { Datafile } from './datafile.js';

export interface ContainerByLevel {
  readonly root: DataRoot;
  readonly dataset: Dataset;
  readonly subject: Subject;
  readonly session: Session;
  readonly domain: Domain;
  readonly file: Datafile;
}

/**
 * Opens containers by level. Containers navigate to their parents and
 * children through it, so they never construct one another.
 */
export interface ContainerOpener {
  open<L extends ContainerLevel>(level: L, spec: SpecLike, mode?: Mode): ResultAsync<ContainerByLevel[L], ContainerError>;

  /** Every existing entity at `level` that `spec` denotes. */
  list<L extends ContainerLevel>(level: L, spec: Predicate): ResultAsync<readonly ContainerByLevel[L][], ContainerError>;
}

/**
 * An opened entity of the recording tree: a predicate cut to the
 * container's level, together with the path it resolved to.
 */
export abstract class Container {
  abstract readonly level: ContainerLevel;

  constructor(
    readonly spec: Predicate,
    readonly path: string,
    protected readonly opener: ContainerOpener
  ) {}

  get mode(): Mode {
    return this.spec.mode;
  }

  /** Last segment of the path. */
  get name(): string {
    return path.basename(this.path);
  }

  protected ancestor<L extends ContainerLevel>(level: L): ResultAsync<ContainerByLevel[L], ContainerError> {
    return this.opener.open(level, this.spec.atLevel(level));
  }

  protected child<L extends ContainerLevel>(
    level: L,
    overrides: PredicateInput
  ): ResultAsync<ContainerByLevel[L], ContainerError> {
    return this.spec.withValues(overrides).asyncAndThen((spec) => this.opener.open(level, spec));
  }

  protected children<L extends ContainerLevel>(
    level: L,
    overrides: PredicateInput
  ): ResultAsync<readonly ContainerByLevel[L][], ContainerError> {
    return this.spec.withValues(overrides).asyncAndThen((spec) => this.opener.list(level, spec));
  }
}
