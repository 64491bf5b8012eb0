import { type Result, ok, err } from 'neverthrow';
import type { InvalidSpecificationError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * How many entities an axis (or a whole predicate) denotes.
 */
export const SelectionStatus = {
  /** explicitly empty: zero candidates */
  NONE: 'none',
  /** exactly one concrete value */
  SINGLE: 'single',
  /** an explicit collection of two or more values */
  MULTIPLE: 'multiple',
  /** a selector; the candidates are only known once it is applied */
  DYNAMIC: 'dynamic',
  /** absent: matches anything, resolution deferred */
  UNSPECIFIED: 'unspecified',
} as const;

export type SelectionStatus = (typeof SelectionStatus)[keyof typeof SelectionStatus];

export type Selector<T> = (candidate: T) => boolean;

/**
 * One coordinate of a predicate, classified once at the API boundary.
 */
export type Axis<T> =
  | { readonly kind: 'unspecified' }
  | { readonly kind: 'literal'; readonly value: T }
  | { readonly kind: 'many'; readonly values: readonly T[] }
  | { readonly kind: 'dynamic'; readonly select: Selector<T> };

/** Caller-facing shape of an axis value. */
export type AxisValue<T> = T | readonly T[] | Selector<T> | undefined;

/** What callers may pass for a string-valued axis (dataset, subject, domain, ...). */
export type StringAxisInput = string | readonly string[] | Selector<string> | null | undefined;

export const Axes = {
  unspecified: <T>(): Axis<T> => ({ kind: 'unspecified' }),
  literal: <T>(value: T): Axis<T> => ({ kind: 'literal', value }),
  many: <T>(values: readonly T[]): Axis<T> => ({ kind: 'many', values }),
  dynamic: <T>(select: Selector<T>): Axis<T> => ({ kind: 'dynamic', select }),
};

export function isSequence(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Classify a raw axis value without building an axis.
 *
 * string → SINGLE, null/undefined → UNSPECIFIED, function → DYNAMIC,
 * array → NONE / SINGLE / MULTIPLE by length.
 */
export function computeSelectionStatus(value: unknown): Result<SelectionStatus, InvalidSpecificationError> {
  if (typeof value === 'string') return ok(SelectionStatus.SINGLE);
  if (value === null || value === undefined) return ok(SelectionStatus.UNSPECIFIED);
  if (typeof value === 'function') return ok(SelectionStatus.DYNAMIC);
  if (isSequence(value)) return ok(sizeStatus(value.length));
  return err(Err.invalidSpecification('selection', value));
}

export function axisStatus<T>(axis: Axis<T>): SelectionStatus {
  switch (axis.kind) {
    case 'unspecified':
      return SelectionStatus.UNSPECIFIED;
    case 'literal':
      return SelectionStatus.SINGLE;
    case 'many':
      return sizeStatus(axis.values.length);
    case 'dynamic':
      return SelectionStatus.DYNAMIC;
    default:
      return assertNever(axis);
  }
}

function sizeStatus(size: number): SelectionStatus {
  if (size === 0) return SelectionStatus.NONE;
  if (size === 1) return SelectionStatus.SINGLE;
  return SelectionStatus.MULTIPLE;
}

export interface CombineOptions {
  /** fields on which MULTIPLE makes the aggregate MULTIPLE */
  readonly disallowMultiple: readonly string[];
  /** whether the discriminant that makes the aggregate SINGLE is present */
  readonly discriminated: boolean;
}

/**
 * Aggregate per-field statuses: NONE, then DYNAMIC, dominate everything;
 * then MULTIPLE on a disallowed field; otherwise SINGLE when discriminated,
 * else UNSPECIFIED.
 */
export function combineStatuses(
  statuses: Readonly<Record<string, SelectionStatus>>,
  options: CombineOptions
): SelectionStatus {
  const values = Object.values(statuses);
  for (const dominant of [SelectionStatus.NONE, SelectionStatus.DYNAMIC]) {
    if (values.includes(dominant)) return dominant;
  }
  if (options.disallowMultiple.some((field) => statuses[field] === SelectionStatus.MULTIPLE)) {
    return SelectionStatus.MULTIPLE;
  }
  return options.discriminated ? SelectionStatus.SINGLE : SelectionStatus.UNSPECIFIED;
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Build a string axis from caller input. A one-item array stays a `many`
 * axis (its status is still SINGLE).
 */
export function toStringAxis(field: string, input: unknown): Result<Axis<string>, InvalidSpecificationError> {
  if (input === null || input === undefined) return ok(Axes.unspecified<string>());
  if (typeof input === 'string') return ok(Axes.literal(input));
  if (typeof input === 'function') {
    return ok(Axes.dynamic((candidate: string) => Boolean(Reflect.apply(input, undefined, [candidate]))));
  }
  if (isSequence(input)) {
    const values: string[] = [];
    for (const item of input) {
      if (typeof item !== 'string') {
        return err(Err.invalidSpecification(field, input, 'collections may only hold strings'));
      }
      values.push(item);
    }
    return ok(Axes.many(values));
  }
  return err(Err.invalidSpecification(field, input));
}

// ============================================================================
// Matching and views
// ============================================================================

export function axisAccepts<T>(axis: Axis<T>, candidate: T): boolean {
  switch (axis.kind) {
    case 'unspecified':
      return true;
    case 'literal':
      return axis.value === candidate;
    case 'many':
      return axis.values.includes(candidate);
    case 'dynamic':
      return axis.select(candidate);
    default:
      return assertNever(axis);
  }
}

/**
 * Does `self` accept whatever `other` denotes? An unspecified `self`
 * matches anything; a concrete `other` matches when `self` accepts every
 * one of its values; an unspecified or dynamic `other` cannot be checked
 * against a constrained `self`.
 */
export function axisMatches<T>(self: Axis<T>, other: Axis<T>): boolean {
  if (self.kind === 'unspecified') return true;
  switch (other.kind) {
    case 'unspecified':
    case 'dynamic':
      return false;
    case 'literal':
      return axisAccepts(self, other.value);
    case 'many':
      return other.values.every((value) => axisAccepts(self, value));
    default:
      return assertNever(other);
  }
}

/** The single value of a literal axis or of a one-item `many` axis. */
export function singleValue<T>(axis: Axis<T>): T | undefined {
  if (axis.kind === 'literal') return axis.value;
  if (axis.kind === 'many' && axis.values.length === 1) return axis.values[0];
  return undefined;
}

export function axisValue<T>(axis: Axis<T>): AxisValue<T> {
  switch (axis.kind) {
    case 'unspecified':
      return undefined;
    case 'literal':
      return axis.value;
    case 'many':
      return axis.values;
    case 'dynamic':
      return axis.select;
    default:
      return assertNever(axis);
  }
}

export function isSpecified<T>(axis: Axis<T>): boolean {
  return axis.kind !== 'unspecified';
}
