import { type Result, ok, err } from 'neverthrow';
import type { InvalidIndexError, InvalidSpecificationError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { type Axis, type Selector, Axes, isSequence } from './selection-status.js';

export type IndexInput =
  | number
  | string
  | Selector<number>
  | readonly (number | string | Selector<number>)[]
  | null
  | undefined;

export type SuffixInput = string | readonly string[] | Selector<string> | null | undefined;

export type ChannelInput = string | readonly string[] | Selector<string> | null | undefined;

export type IndexValidationError = InvalidIndexError | InvalidSpecificationError;

const SEPARATORS = [',', '/', '+', '-'] as const;

/**
 * Split a string holding a repetition of values: on whitespace if there is
 * any, otherwise on the first separator present. Empty tokens are kept, so
 * `'1,,2'` gives `['1', '', '2']`. `undefined` when the string is a single value.
 */
export function splitRepeated(item: string): readonly string[] | undefined {
  const trimmed = item.trim();
  if (/\s/.test(trimmed)) {
    return trimmed.split(/\s+/);
  }
  for (const separator of SEPARATORS) {
    if (trimmed.includes(separator)) {
      return trimmed.split(separator);
    }
  }
  return undefined;
}

/**
 * Flatten validated items into one axis, dropping unspecified ones.
 * Selectors among plain values turn the whole axis dynamic.
 */
function mergeAxes<T>(axes: readonly Axis<T>[]): Axis<T> {
  const values: T[] = [];
  const selectors: Selector<T>[] = [];
  for (const axis of axes) {
    switch (axis.kind) {
      case 'unspecified':
        break;
      case 'literal':
        values.push(axis.value);
        break;
      case 'many':
        values.push(...axis.values);
        break;
      case 'dynamic':
        selectors.push(axis.select);
        break;
    }
  }
  if (selectors.length === 0) {
    return Axes.many(values);
  }
  return Axes.dynamic((candidate: T) => values.includes(candidate) || selectors.some((select) => select(candidate)));
}

function collectAxes<T, E>(items: readonly unknown[], each: (item: unknown) => Result<Axis<T>, E>): Result<Axis<T>, E> {
  const axes: Axis<T>[] = [];
  for (const item of items) {
    const result = each(item);
    if (result.isErr()) {
      return err(result.error);
    }
    axes.push(result.value);
  }
  return ok(mergeAxes(axes));
}

function wrapSelector<T>(select: Function): Selector<T> {
  return (candidate: T) => Boolean(Reflect.apply(select, undefined, [candidate]));
}

// ============================================================================
// Index
// ============================================================================

export function validateIndex(input: unknown, label = 'index'): Result<Axis<number>, IndexValidationError> {
  if (input === null || input === undefined) {
    return ok(Axes.unspecified<number>());
  }
  if (typeof input === 'number') {
    if (!Number.isInteger(input)) {
      return err(Err.invalidIndex(label, input, 'must be an integer'));
    }
    if (input < 0) {
      return err(Err.invalidIndex(label, input, 'cannot be negative'));
    }
    if (!Number.isSafeInteger(input)) {
      return err(Err.invalidIndex(label, input, 'is too large'));
    }
    return ok(Axes.literal(input));
  }
  if (typeof input === 'string') {
    const trimmed = input.trim();
    if (/^-\d+$/.test(trimmed)) {
      return err(Err.invalidIndex(label, input, 'cannot be negative'));
    }
    const tokens = splitRepeated(trimmed);
    if (tokens !== undefined) {
      if (tokens.includes('')) {
        return err(Err.invalidIndex(label, input, 'contains an empty entry'));
      }
      return collectAxes(tokens, (token) => validateIndex(token, label));
    }
    if (!/^\d+$/.test(trimmed)) {
      return err(Err.invalidIndex(label, input, 'could not be parsed into an index'));
    }
    const value = Number.parseInt(trimmed, 10);
    if (!Number.isSafeInteger(value)) {
      return err(Err.invalidIndex(label, input, 'is too large'));
    }
    return ok(Axes.literal(value));
  }
  if (typeof input === 'function') {
    return ok(Axes.dynamic(wrapSelector<number>(input)));
  }
  if (isSequence(input)) {
    return collectAxes(input, (item) => validateIndex(item, label));
  }
  return err(Err.invalidSpecification(label, input));
}

// ============================================================================
// Suffix
// ============================================================================

export function validateSuffix(input: unknown): Result<Axis<string>, InvalidSpecificationError> {
  if (input === null || input === undefined) {
    return ok(Axes.unspecified<string>());
  }
  if (typeof input === 'string') {
    const tokens = splitRepeated(input);
    if (tokens !== undefined) {
      return collectAxes(tokens, validateSuffix);
    }
    const suffix = input.trim();
    if (suffix.length === 0) {
      return ok(Axes.unspecified<string>());
    }
    return ok(Axes.literal(suffix.startsWith('.') ? suffix : `.${suffix}`));
  }
  if (typeof input === 'function') {
    return ok(Axes.dynamic(wrapSelector<string>(input)));
  }
  if (isSequence(input)) {
    return collectAxes(input, validateSuffix);
  }
  return err(Err.invalidSpecification('suffix', input));
}

// ============================================================================
// Channels
// ============================================================================

export function validateChannels(input: unknown): Result<Axis<string>, InvalidSpecificationError> {
  if (input === null || input === undefined) {
    return ok(Axes.unspecified<string>());
  }
  if (typeof input === 'string') {
    const tokens = splitRepeated(input);
    if (tokens !== undefined) {
      return collectAxes(tokens, validateChannels);
    }
    const channel = input.trim();
    return ok(channel.length === 0 ? Axes.unspecified<string>() : Axes.literal(channel));
  }
  if (typeof input === 'function') {
    return ok(Axes.dynamic(wrapSelector<string>(input)));
  }
  if (isSequence(input)) {
    return collectAxes(input, validateChannels);
  }
  return err(Err.invalidSpecification('channel', input));
}
