import * as path from 'path';
import { type Result, ok, err } from 'neverthrow';
import type { SpecError, UnresolvablePathError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { unwrapOrThrow } from '../errors/specification-error.js';
import type { Brand } from '../runtime/brand.js';
import { DEFAULT_PATH_CONFIG, type PathConfig } from '../config/app-config.js';
import type { BlockType } from '../parsing/file-name.js';
import { type ContainerLevel, DataLevel, levelDepth } from './levels.js';
import { type Mode, parseMode } from './modes.js';
import {
  type Axis,
  type AxisValue,
  type StringAxisInput,
  Axes,
  SelectionStatus,
  axisStatus,
  axisValue,
  isSpecified,
  singleValue,
  toStringAxis,
} from './selection-status.js';
import { FileSpec, type FileSpecInput } from './file-spec.js';
import { type SessionLike, SessionSpec, verifySessionSpec } from './session-spec.js';
import type { ChannelInput, IndexInput, SuffixInput } from './validators.js';

/** A root directory, made absolute when the predicate is built. */
export type AbsolutePath = Brand<string, 'AbsolutePath'>;

export type FileLike = FileSpec | string | FileSpecInput;

/**
 * Keyword form of a predicate. `session` and `file` may instead be given
 * through their flattened fields (`sessionName`, ..., `suffix`, `run`, ...),
 * which then update the current session/file spec.
 */
export interface PredicateInput {
  readonly mode?: string | null;
  readonly root?: string | null;
  readonly dataset?: StringAxisInput;
  readonly subject?: StringAxisInput;
  readonly session?: SessionLike | null;
  readonly domain?: StringAxisInput;
  readonly file?: FileLike | null;

  readonly sessionName?: StringAxisInput;
  readonly sessionIndex?: IndexInput;
  readonly sessionType?: StringAxisInput;
  readonly sessionDate?: StringAxisInput;

  readonly suffix?: SuffixInput;
  readonly blocktype?: string | null;
  readonly index?: IndexInput;
  readonly trial?: IndexInput;
  readonly run?: IndexInput;
  readonly channel?: ChannelInput;
}

/** Positional form: `[mode, root, dataset, subject, session, domain, file]`. */
export type PredicateValues = readonly [
  mode?: string | null,
  root?: string | null,
  dataset?: StringAxisInput,
  subject?: StringAxisInput,
  session?: SessionLike | null,
  domain?: StringAxisInput,
  file?: FileLike | null,
];

export interface PredicateOptions {
  readonly config?: PathConfig;
}

export interface WithValuesOptions {
  /** reset every field but `mode` and `root` before applying the overrides */
  readonly clear?: boolean;
}

export interface PredicateFields {
  readonly mode: Mode;
  readonly root: AbsolutePath | undefined;
  readonly dataset: Axis<string>;
  readonly subject: Axis<string>;
  readonly session: SessionSpec;
  readonly domain: Axis<string>;
  readonly file: FileSpec;
}

/**
 * Addresses zero, one or many entities of the recording tree:
 *
 *   root / dataset / subject / session / domain / file
 *
 * Immutable. `level` is the deepest specified axis; `status` tells whether
 * the predicate denotes exactly one entity, in which case `resolvePath`
 * computes where it lives.
 */
export class Predicate {
  private constructor(
    readonly fields: PredicateFields,
    readonly config: PathConfig
  ) {}

  static parse(input: PredicateInput = {}, options: PredicateOptions = {}): Result<Predicate, SpecError> {
    const config = options.config ?? DEFAULT_PATH_CONFIG;
    return Predicate.build(input, emptyFields(config.defaultMode, undefined), config);
  }

  static of(input: PredicateInput = {}, options: PredicateOptions = {}): Predicate {
    return unwrapOrThrow(Predicate.parse(input, options));
  }

  static fromValues(values: PredicateValues, options: PredicateOptions = {}): Result<Predicate, SpecError> {
    const [mode, root, dataset, subject, session, domain, file] = values;
    return Predicate.parse({ mode, root, dataset, subject, session, domain, file }, options);
  }

  private static build(input: PredicateInput, base: PredicateFields, config: PathConfig): Result<Predicate, SpecError> {
    const mode: Result<Mode, SpecError> =
      input.mode === undefined ? ok(base.mode) : input.mode === null ? ok(config.defaultMode) : parseMode(input.mode);
    if (mode.isErr()) return err(mode.error);

    const root: Result<AbsolutePath | undefined, SpecError> =
      input.root === undefined ? ok(base.root) : normalizeRoot(input.root);
    if (root.isErr()) return err(root.error);

    const dataset: Result<Axis<string>, SpecError> =
      input.dataset === undefined ? ok(base.dataset) : toStringAxis('dataset', input.dataset);
    if (dataset.isErr()) return err(dataset.error);

    const subject: Result<Axis<string>, SpecError> =
      input.subject === undefined ? ok(base.subject) : toStringAxis('subject', input.subject);
    if (subject.isErr()) return err(subject.error);

    const domain: Result<Axis<string>, SpecError> =
      input.domain === undefined ? ok(base.domain) : toStringAxis('domain', input.domain);
    if (domain.isErr()) return err(domain.error);

    const session = computeSession(input, base.session);
    if (session.isErr()) return err(session.error);

    const file = computeFile(input, base.file);
    if (file.isErr()) return err(file.error);

    return ok(
      new Predicate(
        {
          mode: mode.value,
          root: root.value,
          dataset: dataset.value,
          subject: subject.value,
          session: session.value,
          domain: domain.value,
          file: file.value,
        },
        config
      )
    );
  }

  // ==========================================================================
  // Fields
  // ==========================================================================

  get mode(): Mode {
    return this.fields.mode;
  }

  get root(): AbsolutePath | undefined {
    return this.fields.root;
  }

  get dataset(): AxisValue<string> {
    return axisValue(this.fields.dataset);
  }

  get subject(): AxisValue<string> {
    return axisValue(this.fields.subject);
  }

  get session(): SessionSpec {
    return this.fields.session;
  }

  get domain(): AxisValue<string> {
    return axisValue(this.fields.domain);
  }

  get file(): FileSpec {
    return this.fields.file;
  }

  get sessionName(): AxisValue<string> {
    return this.fields.session.name;
  }

  get sessionIndex(): AxisValue<number> {
    return this.fields.session.index;
  }

  get sessionType(): AxisValue<string> {
    return this.fields.session.type;
  }

  get sessionDate(): AxisValue<string> {
    return this.fields.session.date;
  }

  get blocktype(): BlockType | undefined {
    return this.fields.file.blocktype;
  }

  get index(): AxisValue<number> {
    return this.fields.file.index;
  }

  /** Throws a `WrongBlockType` SpecificationError unless the file addresses trials. */
  get trial(): AxisValue<number> {
    return this.fields.file.trial;
  }

  /** Throws a `WrongBlockType` SpecificationError unless the file addresses runs. */
  get run(): AxisValue<number> {
    return this.fields.file.run;
  }

  get channel(): AxisValue<string> {
    return this.fields.file.channel;
  }

  get suffix(): AxisValue<string> {
    return this.fields.file.suffix;
  }

  // ==========================================================================
  // Level and status
  // ==========================================================================

  get level(): DataLevel {
    const { root, dataset, subject, session, domain, file } = this.fields;
    if (file.status !== SelectionStatus.UNSPECIFIED) return DataLevel.FILE;
    if (isSpecified(domain)) return DataLevel.DOMAIN;
    if (session.status !== SelectionStatus.UNSPECIFIED) return DataLevel.SESSION;
    if (isSpecified(subject)) return DataLevel.SUBJECT;
    if (isSpecified(dataset)) return DataLevel.DATASET;
    if (root !== undefined) return DataLevel.ROOT;
    return DataLevel.NA;
  }

  get hasDynamic(): boolean {
    const { dataset, subject, session, domain, file } = this.fields;
    return [dataset.kind, subject.kind, domain.kind].includes('dynamic') || session.hasDynamic || file.hasDynamic;
  }

  /**
   * DYNAMIC when any axis holds a selector; UNSPECIFIED when nothing is set.
   * Otherwise the axes are walked from the root down to `level`: the first
   * coarser axis that is not SINGLE decides, else the status at `level`.
   */
  get status(): SelectionStatus {
    if (this.hasDynamic) return SelectionStatus.DYNAMIC;

    const level = this.level;
    if (level === DataLevel.NA) return SelectionStatus.UNSPECIFIED;

    const { root, dataset, subject, session, domain, file } = this.fields;
    const walk: readonly (readonly [ContainerLevel, () => SelectionStatus])[] = [
      [DataLevel.ROOT, () => (root === undefined ? SelectionStatus.UNSPECIFIED : SelectionStatus.SINGLE)],
      [DataLevel.DATASET, () => axisStatus(dataset)],
      [DataLevel.SUBJECT, () => axisStatus(subject)],
      [DataLevel.SESSION, () => session.status],
      [DataLevel.DOMAIN, () => axisStatus(domain)],
      [DataLevel.FILE, () => file.status],
    ];
    for (const [axisLevel, statusOf] of walk) {
      const status = statusOf();
      if (axisLevel === level || status !== SelectionStatus.SINGLE) {
        return status;
      }
    }
    return file.status;
  }

  // ==========================================================================
  // Path
  // ==========================================================================

  /**
   * `root[/dataset[/subject[/session[/domain[/file name]]]]]`, down to
   * `level`. Fails with `UnresolvablePath` unless the status is SINGLE.
   */
  resolvePath(): Result<string, SpecError> {
    const level = this.level;
    const status = this.status;
    if (status !== SelectionStatus.SINGLE) {
      return err(Err.unresolvablePath(level, status));
    }

    const { root, dataset, subject, session, domain, file } = this.fields;
    if (root === undefined) return err(Err.unresolvablePath(level, SelectionStatus.UNSPECIFIED));
    if (level === DataLevel.ROOT) return ok(root);

    const datasetName = requireSingle(dataset, level);
    if (datasetName.isErr()) return err(datasetName.error);
    const datasetPath = path.join(root, datasetName.value);
    if (level === DataLevel.DATASET) return ok(datasetPath);

    const subjectName = requireSingle(subject, level);
    if (subjectName.isErr()) return err(subjectName.error);
    const subjectPath = path.join(datasetPath, subjectName.value);
    if (level === DataLevel.SUBJECT) return ok(subjectPath);

    const sessionName = session.resolveName(this.config.sessionIndexWidth);
    if (sessionName.isErr()) return err(sessionName.error);
    const sessionPath = path.join(subjectPath, sessionName.value);
    if (level === DataLevel.SESSION) return ok(sessionPath);

    const domainName = requireSingle(domain, level);
    if (domainName.isErr()) return err(domainName.error);
    const domainPath = path.join(sessionPath, domainName.value);
    if (level === DataLevel.DOMAIN) return ok(domainPath);

    return file.computePath(
      { subject: subjectName.value, sessionName: sessionName.value, domain: domainName.value, domainPath },
      this.config.runIndexWidth
    );
  }

  /** Throws a SpecificationError wrapping `UnresolvablePath` unless the status is SINGLE. */
  get path(): string {
    return unwrapOrThrow(this.resolvePath());
  }

  // ==========================================================================
  // Copies
  // ==========================================================================

  withValues(overrides: PredicateInput = {}, options: WithValuesOptions = {}): Result<Predicate, SpecError> {
    const base = options.clear ? emptyFields(this.fields.mode, this.fields.root) : this.fields;
    return Predicate.build(overrides, base, this.config);
  }

  /** Only `mode` and `root` are kept. */
  cleared(): Predicate {
    return new Predicate(emptyFields(this.fields.mode, this.fields.root), this.config);
  }

  /** Drops every axis finer than `level`. */
  atLevel(level: DataLevel): Predicate {
    const depth = levelDepth(level);
    const keeps = (axisLevel: ContainerLevel): boolean => levelDepth(axisLevel) <= depth;
    const { mode, root, dataset, subject, session, domain, file } = this.fields;
    return new Predicate(
      {
        mode,
        root: keeps(DataLevel.ROOT) ? root : undefined,
        dataset: keeps(DataLevel.DATASET) ? dataset : Axes.unspecified<string>(),
        subject: keeps(DataLevel.SUBJECT) ? subject : Axes.unspecified<string>(),
        session: keeps(DataLevel.SESSION) ? session : SessionSpec.empty(),
        domain: keeps(DataLevel.DOMAIN) ? domain : Axes.unspecified<string>(),
        file: keeps(DataLevel.FILE) ? file : FileSpec.empty(),
      },
      this.config
    );
  }
}

function emptyFields(mode: Mode, root: AbsolutePath | undefined): PredicateFields {
  return {
    mode,
    root,
    dataset: Axes.unspecified<string>(),
    subject: Axes.unspecified<string>(),
    session: SessionSpec.empty(),
    domain: Axes.unspecified<string>(),
    file: FileSpec.empty(),
  };
}

function normalizeRoot(root: unknown): Result<AbsolutePath | undefined, SpecError> {
  if (root === null) return ok(undefined);
  if (typeof root !== 'string' || root.trim().length === 0) {
    return err(Err.invalidSpecification('root', root, 'expected a directory path'));
  }
  return ok(toAbsolutePath(root));
}

export function toAbsolutePath(value: string): AbsolutePath {
  return path.resolve(value) as AbsolutePath;
}

function requireSingle(axis: Axis<string>, level: DataLevel): Result<string, UnresolvablePathError> {
  const value = singleValue(axis);
  return value === undefined ? err(Err.unresolvablePath(level, axisStatus(axis))) : ok(value);
}

function computeSession(input: PredicateInput, current: SessionSpec): Result<SessionSpec, SpecError> {
  const flattened = {
    name: input.sessionName,
    index: input.sessionIndex,
    type: input.sessionType,
    date: input.sessionDate,
  };
  const hasFlattened = Object.values(flattened).some((value) => value !== undefined);

  if (input.session !== undefined) {
    if (hasFlattened) {
      return err(Err.conflictingSpecification(['session', 'session fields'], "cannot combine 'session' with session fields"));
    }
    return input.session === null ? ok(SessionSpec.empty()) : verifySessionSpec(input.session, { acceptEmpty: true });
  }
  return hasFlattened ? current.withValues(flattened) : ok(current);
}

function computeFile(input: PredicateInput, current: FileSpec): Result<FileSpec, SpecError> {
  const flattened: FileSpecInput = {
    suffix: input.suffix,
    blocktype: input.blocktype,
    index: input.index,
    trial: input.trial,
    run: input.run,
    channel: input.channel,
  };
  const hasFlattened = Object.values(flattened).some((value) => value !== undefined);

  if (input.file !== undefined) {
    if (hasFlattened) {
      return err(Err.conflictingSpecification(['file', 'file fields'], "cannot combine 'file' with file fields"));
    }
    if (input.file === null) return ok(FileSpec.empty());
    if (input.file instanceof FileSpec) return ok(input.file);
    return FileSpec.parse(input.file);
  }
  return hasFlattened ? current.withValues(flattened) : ok(current);
}
