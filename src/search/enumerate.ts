import * as path from 'path';
import { type Result, ResultAsync, ok, err, okAsync, errAsync } from 'neverthrow';
import type { ContainerError, SpecError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { Logger } from '../core/logging/index.js';
import type { DirEntry, FileSystemPort } from '../ports/file-system.port.js';
import { parseFileName } from '../parsing/file-name.js';
import { isSessionDirectoryName } from '../parsing/session-name.js';
import { type ContainerLevel, CONTAINER_LEVELS, DataLevel, levelDepth } from '../predicate/levels.js';
import { SelectionStatus, axisAccepts } from '../predicate/selection-status.js';
import { FileSpec } from '../predicate/file-spec.js';
import { SessionSpec } from '../predicate/session-spec.js';
import type { Predicate } from '../predicate/predicate.js';

export interface EnumerateOptions {
  /** level of the entities to list; defaults to the predicate's own level */
  readonly level?: ContainerLevel;
  readonly logger?: Logger;
}

type ChildLevel = Exclude<ContainerLevel, 'root'>;

interface Candidate {
  readonly name: string;
  readonly predicate: Predicate;
}

interface WalkContext {
  readonly fs: FileSystemPort;
  readonly filter: Predicate;
  readonly logger: Logger | undefined;
}

/**
 * List the concrete (SINGLE) predicates that `predicate` denotes at a
 * level, by walking the tree from the root and keeping the entries each
 * axis accepts. Hidden entries are skipped; siblings come out sorted by
 * name. A missing directory lists as empty.
 */
export function enumerate(
  predicate: Predicate,
  fs: FileSystemPort,
  options: EnumerateOptions = {}
): ResultAsync<readonly Predicate[], ContainerError> {
  const level = options.level ?? predicate.level;
  const root = predicate.root;
  if (level === DataLevel.NA) {
    return errAsync(Err.invalidSpecification('level', level, 'nothing to enumerate for an empty predicate'));
  }
  if (root === undefined) {
    return errAsync(Err.invalidSpecification('root', root, 'enumeration needs a root directory'));
  }

  const context: WalkContext = { fs, filter: predicate.atLevel(level), logger: options.logger };
  const remaining = CONTAINER_LEVELS.slice(1, levelDepth(level) + 1).filter(isChildLevel);

  const start = predicate.cleared();
  const listed: ResultAsync<readonly Predicate[], ContainerError> =
    remaining.length === 0 ? rootIfPresent(fs, start, root) : walk(context, start, root, [], remaining);

  return listed.map((found) => {
    context.logger?.debug({ dataLevel: level, root, count: found.length }, 'enumerated predicates');
    return found;
  });
}

function isChildLevel(level: ContainerLevel): level is ChildLevel {
  return level !== DataLevel.ROOT;
}

function rootIfPresent(
  fs: FileSystemPort,
  start: Predicate,
  root: string
): ResultAsync<readonly Predicate[], ContainerError> {
  return fs
    .stat(root)
    .map((stat): readonly Predicate[] => (stat.kind === 'directory' ? [start] : []))
    .orElse((e): ResultAsync<readonly Predicate[], ContainerError> =>
      e.code === 'FS_NOT_FOUND' ? okAsync([]) : errAsync(Err.fileSystem(e.code, root, e.message))
    );
}

function walk(
  context: WalkContext,
  current: Predicate,
  dir: string,
  trail: readonly string[],
  remaining: readonly ChildLevel[]
): ResultAsync<readonly Predicate[], ContainerError> {
  const [level, ...rest] = remaining;
  if (level === undefined) {
    return okAsync([current]);
  }

  return listDirectory(context.fs, dir).andThen((entries): ResultAsync<readonly Predicate[], ContainerError> => {
    const candidates = selectChildren(context.filter, current, level, trail, entries);
    if (candidates.isErr()) {
      return errAsync(candidates.error);
    }
    context.logger?.trace({ dir, dataLevel: level, kept: candidates.value.length, seen: entries.length }, 'listed directory');
    return ResultAsync.combine(
      candidates.value.map((candidate) =>
        walk(context, candidate.predicate, path.join(dir, candidate.name), [...trail, candidate.name], rest)
      )
    ).map((lists) => lists.flat());
  });
}

function listDirectory(fs: FileSystemPort, dir: string): ResultAsync<readonly DirEntry[], ContainerError> {
  return fs
    .readdir(dir)
    .orElse((e): ResultAsync<readonly DirEntry[], ContainerError> =>
      e.code === 'FS_NOT_FOUND' ? okAsync([]) : errAsync(Err.fileSystem(e.code, dir, e.message))
    );
}

function byName(a: DirEntry, b: DirEntry): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function selectChildren(
  filter: Predicate,
  current: Predicate,
  level: ChildLevel,
  trail: readonly string[],
  entries: readonly DirEntry[]
): Result<readonly Candidate[], SpecError> {
  const wantedKind = level === DataLevel.FILE ? 'file' : 'directory';
  const visible = entries.filter((entry) => entry.kind === wantedKind && !entry.name.startsWith('.'));

  const candidates: Candidate[] = [];
  for (const entry of [...visible].sort(byName)) {
    const candidate = toCandidate(filter, current, level, trail, entry.name);
    if (candidate.isErr()) {
      return err(candidate.error);
    }
    if (candidate.value !== undefined) {
      candidates.push({ name: entry.name, predicate: candidate.value });
    }
  }
  return ok(candidates);
}

/**
 * The predicate for one directory entry, or `undefined` when the filter
 * does not accept it.
 */
function toCandidate(
  filter: Predicate,
  current: Predicate,
  level: ChildLevel,
  trail: readonly string[],
  name: string
): Result<Predicate | undefined, SpecError> {
  const { fields } = filter;
  switch (level) {
    case DataLevel.DATASET:
      return axisAccepts(fields.dataset, name) ? current.withValues({ dataset: name }) : ok(undefined);
    case DataLevel.SUBJECT:
      return axisAccepts(fields.subject, name) ? current.withValues({ subject: name }) : ok(undefined);
    case DataLevel.SESSION: {
      if (!isSessionDirectoryName(name)) return ok(undefined);
      return SessionSpec.parse(name).andThen((session) =>
        fields.session.test(session) ? current.withValues({ session }) : ok(undefined)
      );
    }
    case DataLevel.DOMAIN:
      return axisAccepts(fields.domain, name) ? current.withValues({ domain: name }) : ok(undefined);
    case DataLevel.FILE: {
      const parsed = parseFileName(name);
      if (parsed.isErr()) return ok(undefined);
      const [, subject, session, domain] = trail;
      const { value } = parsed;
      if (value.subject !== subject || value.session !== session || value.domain !== domain) {
        return ok(undefined);
      }
      return FileSpec.parse(name).andThen((file): Result<Predicate | undefined, SpecError> => {
        if (file.status !== SelectionStatus.SINGLE || !fields.file.test(file)) return ok(undefined);
        return current.withValues({ file }).map((candidate) => (formatsTo(candidate, name) ? candidate : undefined));
      });
    }
  }
}

/** Entries whose names the predicate would not format back (`run1` for `run001`) are skipped. */
function formatsTo(candidate: Predicate, name: string): boolean {
  const resolved = candidate.resolvePath();
  return resolved.isOk() && path.basename(resolved.value) === name;
}
