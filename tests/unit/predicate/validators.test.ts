import { describe, expect, it } from 'vitest';
import { axisAccepts } from '../../../src/predicate/selection-status.js';
import { splitRepeated, validateChannels, validateIndex, validateSuffix } from '../../../src/predicate/validators.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('splitRepeated', () => {
  it('splits on whitespace before separators', () => {
    expect(splitRepeated('1 2,3')).toEqual(['1', '2,3']);
  });

  it('splits on the first separator present', () => {
    expect(splitRepeated('a/b/c')).toEqual(['a', 'b', 'c']);
    expect(splitRepeated('ch1-ch2')).toEqual(['ch1', 'ch2']);
  });

  it('keeps empty tokens between separators', () => {
    expect(splitRepeated('1,,2')).toEqual(['1', '', '2']);
    expect(splitRepeated('+5')).toEqual(['', '5']);
  });

  it('returns undefined for a single value', () => {
    expect(splitRepeated('007')).toBeUndefined();
  });
});

describe('validateIndex', () => {
  it('accepts non-negative integers and numeric strings', () => {
    expect(expectOk(validateIndex(3), 'number')).toEqual({ kind: 'literal', value: 3 });
    expect(expectOk(validateIndex('007'), 'string')).toEqual({ kind: 'literal', value: 7 });
    expect(expectOk(validateIndex(undefined), 'undefined')).toEqual({ kind: 'unspecified' });
  });

  it('parses repeated strings into one ordered collection', () => {
    expect(expectOk(validateIndex('1,2,3'), 'commas')).toEqual({ kind: 'many', values: [1, 2, 3] });
    expect(expectOk(validateIndex('4 5'), 'whitespace')).toEqual({ kind: 'many', values: [4, 5] });
  });

  it.each([',', '-', '+5', '1,,2', '1--2', '3,'])('rejects %j for its empty entry', (input) => {
    const error = expectErr(validateIndex(input), input);
    expect(error._tag).toBe('InvalidIndex');
    expect(error.message).toBe(`index contains an empty entry (got '${input}')`);
  });

  it('rejects a separator followed by whitespace', () => {
    expect(expectErr(validateIndex('1, 2'), 'comma and space').message).toBe(
      "index contains an empty entry (got '1,')"
    );
  });

  it('rejects indices beyond the safe integer range', () => {
    expect(expectErr(validateIndex('99999999999999999999'), 'long string').message).toBe(
      "index is too large (got '99999999999999999999')"
    );
    expect(expectErr(validateIndex(2 ** 53, 'run index'), 'large number').message).toBe(
      'run index is too large (got 9007199254740992)'
    );
    expect(expectOk(validateIndex(String(Number.MAX_SAFE_INTEGER)), 'largest safe')).toEqual({
      kind: 'literal',
      value: Number.MAX_SAFE_INTEGER,
    });
  });

  it('flattens nested repetitions', () => {
    expect(expectOk(validateIndex([1, '2 3', [4]]), 'nested')).toEqual({ kind: 'many', values: [1, 2, 3, 4] });
  });

  it('rejects negative indices', () => {
    const fromString = expectErr(validateIndex('-1'), 'negative string');
    expect(fromString._tag).toBe('InvalidIndex');
    expect(fromString.message).toBe("index cannot be negative (got '-1')");

    const fromNumber = expectErr(validateIndex(-4, 'run index'), 'negative number');
    expect(fromNumber.message).toBe('run index cannot be negative (got -4)');
  });

  it('rejects fractions and unparsable tokens', () => {
    expect(expectErr(validateIndex(2.5), 'fraction').message).toBe('index must be an integer (got 2.5)');
    expect(expectErr(validateIndex('abc'), 'letters').message).toBe(
      "index could not be parsed into an index (got 'abc')"
    );
    expect(expectErr(validateIndex('1,x'), 'bad token')._tag).toBe('InvalidIndex');
  });

  it('rejects values of other types', () => {
    const error = expectErr(validateIndex({ run: 1 }), 'object');
    expect(error._tag).toBe('InvalidSpecification');
  });

  it('turns a selector into a dynamic axis', () => {
    const axis = expectOk(validateIndex((index: number) => index > 2), 'selector');
    expect(axis.kind).toBe('dynamic');
    expect(axisAccepts(axis, 3)).toBe(true);
    expect(axisAccepts(axis, 1)).toBe(false);
  });

  it('merges listed values and selectors into one dynamic axis', () => {
    const axis = expectOk(validateIndex([1, (index: number) => index > 5]), 'mixed');
    expect(axis.kind).toBe('dynamic');
    expect(axisAccepts(axis, 1)).toBe(true);
    expect(axisAccepts(axis, 6)).toBe(true);
    expect(axisAccepts(axis, 3)).toBe(false);
  });
});

describe('validateSuffix', () => {
  it('prefixes a dot', () => {
    expect(expectOk(validateSuffix('csv'), 'bare')).toEqual({ kind: 'literal', value: '.csv' });
    expect(expectOk(validateSuffix('.csv'), 'dotted')).toEqual({ kind: 'literal', value: '.csv' });
  });

  it('treats an empty string as unspecified', () => {
    expect(expectOk(validateSuffix(''), 'empty')).toEqual({ kind: 'unspecified' });
  });

  it('collects repeated suffixes', () => {
    expect(expectOk(validateSuffix('.csv .json'), 'repeated')).toEqual({ kind: 'many', values: ['.csv', '.json'] });
    expect(expectOk(validateSuffix(['csv', 'npy']), 'array')).toEqual({ kind: 'many', values: ['.csv', '.npy'] });
  });

  it('rejects values of other types', () => {
    expect(expectErr(validateSuffix(3), 'number').message).toBe('unexpected suffix specification: 3');
  });
});

describe('validateChannels', () => {
  it('keeps channel names as given', () => {
    expect(expectOk(validateChannels(' ch1 '), 'padded')).toEqual({ kind: 'literal', value: 'ch1' });
    expect(expectOk(validateChannels('ch1-ch2'), 'joined')).toEqual({ kind: 'many', values: ['ch1', 'ch2'] });
    expect(expectOk(validateChannels(''), 'empty')).toEqual({ kind: 'unspecified' });
  });
});
