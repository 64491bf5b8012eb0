import 'reflect-metadata';
import { type Result, type ResultAsync, err, errAsync, ok, okAsync } from 'neverthrow';
import { inject, singleton } from 'tsyringe';
import type { ContainerError, WrongLevelError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import type { PathConfig } from '../config/app-config.js';
import type { FileSystemPort } from '../ports/file-system.port.js';
import { type ContainerLevel, levelDepth } from '../predicate/levels.js';
import { type Mode, Modes } from '../predicate/modes.js';
import type { Predicate } from '../predicate/predicate.js';
import { enumerate } from '../search/enumerate.js';
import type { ContainerByLevel, ContainerOpener } from './container.js';
import { type SpecLike, verifySpec } from './resolve-path.js';
import { DataRoot } from './data-root.js';
import { Dataset } from './dataset.js';
import { Subject } from './subject.js';
import { Session } from './session.js';
import { Domain } from './domain.js';
import { Datafile } from './datafile.js';

type ContainerFactory<L extends ContainerLevel> = (
  spec: Predicate,
  resolvedPath: string,
  opener: ContainerOpener
) => ContainerByLevel[L];

const FACTORIES: { readonly [L in ContainerLevel]: ContainerFactory<L> } = {
  root: (spec, resolvedPath, opener) => new DataRoot(spec, resolvedPath, opener),
  dataset: (spec, resolvedPath, opener) => new Dataset(spec, resolvedPath, opener),
  subject: (spec, resolvedPath, opener) => new Subject(spec, resolvedPath, opener),
  session: (spec, resolvedPath, opener) => new Session(spec, resolvedPath, opener),
  domain: (spec, resolvedPath, opener) => new Domain(spec, resolvedPath, opener),
  file: (spec, resolvedPath, opener) => new Datafile(spec, resolvedPath, opener),
};

interface Resolved {
  readonly predicate: Predicate;
  readonly resolvedPath: string;
}

/**
 * Opens containers of every level.
 *
 * 1. a path is turned into a predicate; a predicate takes the mode override
 * 2. the predicate must reach the container's level, and is cut back to it
 * 3. the path is resolved
 * 4. in read mode, the path must exist
 */
@singleton()
export class ContainerRegistry implements ContainerOpener {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Infra.FileSystem) private readonly fs: FileSystemPort,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
    @inject(DI.Config.Path) private readonly config: PathConfig
  ) {
    this.logger = loggerFactory.create('ContainerRegistry');
  }

  open<L extends ContainerLevel>(level: L, spec: SpecLike, mode?: Mode): ResultAsync<ContainerByLevel[L], ContainerError> {
    return verifySpec(level, spec, mode, { config: this.config })
      .andThen((predicate) => cutToLevel(level, predicate))
      .andThen((predicate) => predicate.resolvePath().map((resolvedPath): Resolved => ({ predicate, resolvedPath })))
      .asyncAndThen((resolved) => this.checkExists(level, resolved))
      .map(({ predicate, resolvedPath }) => {
        this.logger.debug({ dataLevel: level, path: resolvedPath, mode: predicate.mode }, 'opened container');
        return FACTORIES[level](predicate, resolvedPath, this);
      })
      .mapErr((error) => {
        this.logger.debug({ dataLevel: level, error: error._tag }, error.message);
        return error;
      });
  }

  list<L extends ContainerLevel>(level: L, spec: Predicate): ResultAsync<readonly ContainerByLevel[L][], ContainerError> {
    return enumerate(spec, this.fs, { level, logger: this.logger }).andThen((predicates) =>
      combineAll(predicates.map((predicate) => this.open(level, predicate)))
    );
  }

  root(spec: SpecLike, mode?: Mode): ResultAsync<DataRoot, ContainerError> {
    return this.open('root', spec, mode);
  }

  dataset(spec: SpecLike, mode?: Mode): ResultAsync<Dataset, ContainerError> {
    return this.open('dataset', spec, mode);
  }

  subject(spec: SpecLike, mode?: Mode): ResultAsync<Subject, ContainerError> {
    return this.open('subject', spec, mode);
  }

  session(spec: SpecLike, mode?: Mode): ResultAsync<Session, ContainerError> {
    return this.open('session', spec, mode);
  }

  domain(spec: SpecLike, mode?: Mode): ResultAsync<Domain, ContainerError> {
    return this.open('domain', spec, mode);
  }

  datafile(spec: SpecLike, mode?: Mode): ResultAsync<Datafile, ContainerError> {
    return this.open('file', spec, mode);
  }

  private checkExists(level: ContainerLevel, resolved: Resolved): ResultAsync<Resolved, ContainerError> {
    if (resolved.predicate.mode !== Modes.READ) {
      return okAsync(resolved);
    }
    const { resolvedPath } = resolved;
    return this.fs
      .stat(resolvedPath)
      .map(() => resolved)
      .orElse((e): ResultAsync<Resolved, ContainerError> =>
        e.code === 'FS_NOT_FOUND'
          ? errAsync(Err.notFound(level, resolvedPath))
          : errAsync(Err.fileSystem(e.code, resolvedPath, e.message))
      );
  }
}

function cutToLevel(level: ContainerLevel, predicate: Predicate): Result<Predicate, WrongLevelError> {
  if (levelDepth(predicate.level) < levelDepth(level)) {
    return err(Err.wrongLevel(level, predicate.level));
  }
  return ok(predicate.atLevel(level));
}

function combineAll<T>(results: readonly ResultAsync<T, ContainerError>[]): ResultAsync<readonly T[], ContainerError> {
  return results.reduce<ResultAsync<readonly T[], ContainerError>>(
    (acc, next) => acc.andThen((values) => next.map((value) => [...values, value])),
    okAsync([])
  );
}
