import { describe, expect, it } from 'vitest';
import { NotFoundError, ValidationError } from '../../src/errors.js';
import { parseFlag, parseIdList, parseRouteId } from '../../src/utils/query.js';

describe('parseFlag', () => {
  it.each([
    ['1', true],
    ['2', true],
    ['0', false],
    ['true', true],
    ['Yes', true],
    ['on', true],
    ['false', false],
    ['', false],
  ])('%j -> %s', (value, expected) => {
    expect(parseFlag(value)).toBe(expected);
  });

  it('is false when absent', () => {
    expect(parseFlag(undefined)).toBe(false);
  });

  it('uses the first of repeated values', () => {
    expect(parseFlag(['0', '1'])).toBe(false);
  });
});

describe('parseIdList', () => {
  it('splits comma-separated ids', () => {
    expect(parseIdList('3, 1,3', 'tags')).toEqual([3, 1]);
  });

  it('joins repeated params', () => {
    expect(parseIdList(['1', '2,4'], 'tags')).toEqual([1, 2, 4]);
  });

  it('treats an empty value as no filter', () => {
    expect(parseIdList('', 'tags')).toBeUndefined();
    expect(parseIdList(undefined, 'tags')).toBeUndefined();
  });

  it('rejects non-integer ids under the parameter name', () => {
    try {
      parseIdList('1,abc', 'ingredients');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.fields).toEqual({
          ingredients: ['Expected a comma-separated list of integer ids.'],
        });
      }
    }
  });
});

describe('parseRouteId', () => {
  it('parses digits', () => {
    expect(parseRouteId('42')).toBe(42);
  });

  it('treats anything else as not found', () => {
    expect(() => parseRouteId('abc')).toThrow(NotFoundError);
    expect(() => parseRouteId('-1')).toThrow(NotFoundError);
  });
});
