import { describe, expect, it } from 'vitest';
import {
  Axes,
  SelectionStatus,
  axisMatches,
  axisStatus,
  combineStatuses,
  computeSelectionStatus,
  singleValue,
  toStringAxis,
} from '../../../src/predicate/selection-status.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('computeSelectionStatus', () => {
  it('classifies scalars, absence and selectors', () => {
    expect(expectOk(computeSelectionStatus('ds1'), 'string')).toBe(SelectionStatus.SINGLE);
    expect(expectOk(computeSelectionStatus(undefined), 'undefined')).toBe(SelectionStatus.UNSPECIFIED);
    expect(expectOk(computeSelectionStatus(null), 'null')).toBe(SelectionStatus.UNSPECIFIED);
    expect(expectOk(computeSelectionStatus((name: string) => name.length > 2), 'selector')).toBe(
      SelectionStatus.DYNAMIC
    );
  });

  it('classifies collections by size', () => {
    const cases: ReadonlyArray<readonly [readonly string[], SelectionStatus]> = [
      [[], SelectionStatus.NONE],
      [['a'], SelectionStatus.SINGLE],
      [['a', 'b'], SelectionStatus.MULTIPLE],
      [['a', 'b', 'c', 'd'], SelectionStatus.MULTIPLE],
    ];
    for (const [collection, expected] of cases) {
      expect(expectOk(computeSelectionStatus(collection), `size ${collection.length}`)).toBe(expected);
    }
  });

  it('rejects other values', () => {
    const error = expectErr(computeSelectionStatus(42), 'number');
    expect(error._tag).toBe('InvalidSpecification');
    expect(error.field).toBe('selection');
    expect(error.message).toBe('unexpected selection specification: 42');
  });
});

describe('combineStatuses', () => {
  const options = { disallowMultiple: ['suffix', 'index'], discriminated: true };

  it('lets NONE dominate DYNAMIC and MULTIPLE', () => {
    expect(combineStatuses({ suffix: 'dynamic', index: 'none', channel: 'multiple' }, options)).toBe('none');
  });

  it('lets DYNAMIC dominate MULTIPLE', () => {
    expect(combineStatuses({ suffix: 'multiple', index: 'dynamic', channel: 'single' }, options)).toBe('dynamic');
  });

  it('is MULTIPLE only on disallowed fields', () => {
    expect(combineStatuses({ suffix: 'single', index: 'multiple', channel: 'single' }, options)).toBe('multiple');
    expect(combineStatuses({ suffix: 'single', index: 'single', channel: 'multiple' }, options)).toBe('single');
  });

  it('is UNSPECIFIED without the discriminant', () => {
    expect(
      combineStatuses({ suffix: 'single', index: 'unspecified', channel: 'unspecified' }, { ...options, discriminated: false })
    ).toBe('unspecified');
  });
});

describe('toStringAxis', () => {
  it('builds one variant per input shape', () => {
    expect(expectOk(toStringAxis('dataset', 'ds1'), 'literal')).toEqual({ kind: 'literal', value: 'ds1' });
    expect(expectOk(toStringAxis('dataset', ['ds1']), 'many')).toEqual({ kind: 'many', values: ['ds1'] });
    expect(expectOk(toStringAxis('dataset', undefined), 'unspecified')).toEqual({ kind: 'unspecified' });
    expect(expectOk(toStringAxis('dataset', (name: string) => name === 'ds2'), 'dynamic').kind).toBe('dynamic');
  });

  it('keeps a one-item collection SINGLE', () => {
    const axis = expectOk(toStringAxis('subject', ['S1']), 'one item');
    expect(axisStatus(axis)).toBe('single');
    expect(singleValue(axis)).toBe('S1');
  });

  it('rejects collections holding non-strings', () => {
    const error = expectErr(toStringAxis('dataset', ['a', 1]), 'mixed collection');
    expect(error.message).toBe('unexpected dataset specification ["a",1]: collections may only hold strings');
  });
});

describe('axisMatches', () => {
  it('matches anything against an unspecified axis', () => {
    expect(axisMatches(Axes.unspecified<string>(), Axes.literal('a'))).toBe(true);
    expect(axisMatches(Axes.unspecified<string>(), Axes.unspecified<string>())).toBe(true);
  });

  it('requires every candidate value to be accepted', () => {
    expect(axisMatches(Axes.many(['a', 'b']), Axes.literal('a'))).toBe(true);
    expect(axisMatches(Axes.literal('a'), Axes.many(['a', 'b']))).toBe(false);
    expect(axisMatches(Axes.dynamic((value: string) => value.startsWith('S')), Axes.many(['S1', 'S2']))).toBe(true);
  });

  it('does not match an unspecified or dynamic candidate against a constrained axis', () => {
    expect(axisMatches(Axes.literal('.csv'), Axes.unspecified<string>())).toBe(false);
    expect(axisMatches(Axes.literal('a'), Axes.dynamic((value: string) => value === 'a'))).toBe(false);
  });
});
