import { type Result, ok, err } from 'neverthrow';
import type { SpecError, UnresolvablePathError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { unwrapOrThrow } from '../errors/specification-error.js';
import { DEFAULT_PATH_CONFIG } from '../config/app-config.js';
import { type ParsedSessionName, SessionDateSchema, formatSessionName, parseSessionName } from '../parsing/session-name.js';
import { DataLevel } from './levels.js';
import {
  type Axis,
  type AxisValue,
  type StringAxisInput,
  Axes,
  SelectionStatus,
  axisMatches,
  axisStatus,
  axisValue,
  isSpecified,
  singleValue,
  toStringAxis,
} from './selection-status.js';
import { type IndexInput, validateIndex } from './validators.js';

export interface SessionSpecInput {
  readonly name?: StringAxisInput;
  readonly index?: IndexInput;
  readonly type?: StringAxisInput;
  readonly date?: StringAxisInput;
}

/** Positional form: `[name, index, type, date]`. */
export type SessionTuple = readonly [
  name?: StringAxisInput,
  index?: IndexInput,
  type?: StringAxisInput,
  date?: StringAxisInput,
];

/** Anything a session can be specified with. */
export type SessionLike = SessionSpec | string | SessionSpecInput | SessionTuple;

export interface VerifySessionOptions {
  /** return an empty spec for `undefined` instead of failing */
  readonly acceptEmpty?: boolean;
}

export interface SessionSpecFields {
  readonly name: Axis<string>;
  readonly index: Axis<number>;
  readonly type: Axis<string>;
  readonly date: Axis<string>;
}

/**
 * The session axis of a predicate. A session is named either directly
 * (`name`) or by its type, index and optional date, which format into a
 * name (`session003-2020-03-14`).
 */
export class SessionSpec {
  private constructor(readonly fields: SessionSpecFields) {}

  /**
   * A string is the session name; when it follows the session naming
   * convention, type, index and date are read from it as well.
   */
  static parse(input: string | SessionSpecInput = {}): Result<SessionSpec, SpecError> {
    const spec: SessionSpecInput = typeof input === 'string' ? { name: input } : input;

    return toStringAxis('session name', spec.name).andThen((name) => {
      const parsed = parsedName(name);
      return fieldOrParsed('session type', toStringAxis('session type', spec.type), parsed?.type).andThen((type) =>
        fieldOrParsed('session index', validateIndex(spec.index, 'session index'), parsed?.index).andThen((index) =>
          fieldOrParsed('session date', validateDates(spec.date), parsed?.date).map(
            (date) => new SessionSpec({ name, index, type, date })
          )
        )
      );
    });
  }

  static of(input: string | SessionSpecInput = {}): SessionSpec {
    return unwrapOrThrow(SessionSpec.parse(input));
  }

  static empty(): SessionSpec {
    return EMPTY_SESSION_SPEC;
  }

  get name(): AxisValue<string> {
    return axisValue(this.fields.name);
  }

  get index(): AxisValue<number> {
    return axisValue(this.fields.index);
  }

  get type(): AxisValue<string> {
    return axisValue(this.fields.type);
  }

  get date(): AxisValue<string> {
    return axisValue(this.fields.date);
  }

  /**
   * NONE and DYNAMIC dominate, then MULTIPLE on any field when a name is
   * given. Without a name, type and index must both be single to name one
   * session, and any other partial specification is MULTIPLE.
   */
  get status(): SelectionStatus {
    const { name, index, type, date } = this.fields;
    const statuses = [axisStatus(name), axisStatus(index), axisStatus(type), axisStatus(date)];
    for (const dominant of [SelectionStatus.NONE, SelectionStatus.DYNAMIC]) {
      if (statuses.includes(dominant)) return dominant;
    }
    if (isSpecified(name)) {
      return statuses.includes(SelectionStatus.MULTIPLE) ? SelectionStatus.MULTIPLE : axisStatus(name);
    }
    if (!isSpecified(index) && !isSpecified(type) && !isSpecified(date)) {
      return SelectionStatus.UNSPECIFIED;
    }
    if (axisStatus(type) === SelectionStatus.SINGLE && axisStatus(index) === SelectionStatus.SINGLE) {
      return axisStatus(date) === SelectionStatus.MULTIPLE ? SelectionStatus.MULTIPLE : SelectionStatus.SINGLE;
    }
    return SelectionStatus.MULTIPLE;
  }

  get hasDynamic(): boolean {
    const { name, index, type, date } = this.fields;
    return [name.kind, index.kind, type.kind, date.kind].includes('dynamic');
  }

  test(other: SessionSpec): boolean {
    const self = this.fields;
    return (
      axisMatches(self.name, other.fields.name) &&
      axisMatches(self.index, other.fields.index) &&
      axisMatches(self.type, other.fields.type) &&
      axisMatches(self.date, other.fields.date)
    );
  }

  /**
   * The directory name of the session this spec denotes.
   */
  resolveName(width: number = DEFAULT_PATH_CONFIG.sessionIndexWidth): Result<string, UnresolvablePathError> {
    const status = this.status;
    if (status !== SelectionStatus.SINGLE) {
      return err(Err.unresolvablePath(DataLevel.SESSION, status));
    }
    const name = singleValue(this.fields.name);
    if (name !== undefined) {
      return ok(name);
    }
    const type = singleValue(this.fields.type);
    const index = singleValue(this.fields.index);
    if (type === undefined || index === undefined) {
      return err(Err.unresolvablePath(DataLevel.SESSION, status));
    }
    return ok(formatSessionName(type, index, singleValue(this.fields.date), width));
  }

  /**
   * A new name replaces every field; changing type, index or date without
   * a name drops the current name. `null` clears a field.
   */
  withValues(overrides: SessionSpecInput): Result<SessionSpec, SpecError> {
    if (overrides.name !== undefined && overrides.name !== null) {
      return SessionSpec.parse(overrides);
    }
    const untouched = overrides.index === undefined && overrides.type === undefined && overrides.date === undefined;
    if (untouched && overrides.name === undefined) {
      return ok(this);
    }
    const { index, type, date } = this.fields;
    return SessionSpec.parse({
      index: overrides.index !== undefined ? overrides.index : axisValue(index),
      type: overrides.type !== undefined ? overrides.type : axisValue(type),
      date: overrides.date !== undefined ? overrides.date : axisValue(date),
    });
  }
}

export function verifySessionSpec(
  value: SessionLike | undefined,
  options: VerifySessionOptions = {}
): Result<SessionSpec, SpecError> {
  if (value === undefined) {
    return options.acceptEmpty
      ? ok(SessionSpec.empty())
      : err(Err.invalidSpecification('session', value, 'a session specification is required'));
  }
  if (value instanceof SessionSpec) {
    return ok(value);
  }
  if (typeof value === 'string') {
    return SessionSpec.parse(value);
  }
  if (isSessionTuple(value)) {
    const [name, index, type, date] = value;
    return SessionSpec.parse({ name, index, type, date });
  }
  return SessionSpec.parse(value);
}

function isSessionTuple(value: SessionSpecInput | SessionTuple): value is SessionTuple {
  return Array.isArray(value);
}

function parsedName(name: Axis<string>): ParsedSessionName | undefined {
  if (name.kind !== 'literal') return undefined;
  const parsed = parseSessionName(name.value);
  return parsed.isOk() ? parsed.value : undefined;
}

/**
 * An explicitly given field wins over the one read from the session name,
 * but a given literal that disagrees with the name is a conflict.
 */
function fieldOrParsed<T, E extends SpecError>(
  field: string,
  explicit: Result<Axis<T>, E>,
  fromName: T | undefined
): Result<Axis<T>, SpecError> {
  return explicit.andThen((axis): Result<Axis<T>, SpecError> => {
    if (fromName === undefined) return ok(axis);
    if (axis.kind === 'unspecified') return ok(Axes.literal<T>(fromName));
    if (axis.kind === 'literal' && axis.value !== fromName) {
      return err(
        Err.conflictingSpecification(['session name', field], `${field} '${String(axis.value)}' disagrees with the session name`)
      );
    }
    return ok(axis);
  });
}

function validateDates(input: unknown): Result<Axis<string>, SpecError> {
  return toStringAxis('session date', input).andThen((axis): Result<Axis<string>, SpecError> => {
    const values = axis.kind === 'literal' ? [axis.value] : axis.kind === 'many' ? axis.values : [];
    const invalid = values.find((value) => !SessionDateSchema.safeParse(value).success);
    if (invalid !== undefined) {
      return err(Err.invalidSpecification('session date', invalid, 'expected YYYY-MM-DD'));
    }
    return ok(axis);
  });
}

const EMPTY_SESSION_SPEC = SessionSpec.of();
