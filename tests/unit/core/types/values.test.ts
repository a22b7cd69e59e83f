/**
 * Tests for runtime values, calendar dates and ductility.
 */
import { describe, it, expect } from 'vitest';
import { CalendarDate } from '../../../../src/core/types/calendar-date.js';
import { isDuctile, validateDuctile } from '../../../../src/core/types/ductile.js';
import { Table } from '../../../../src/core/types/table.js';
import { describeKind, isDict, isList, toFrozenValue, valuesEqual } from '../../../../src/core/types/values.js';
import { ConversionError, ErrorCodes } from '../../../../src/utils/errors.js';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof ConversionError ? error.code : undefined;
  }
  return undefined;
}

describe('CalendarDate', () => {
  it('should parse and print ISO dates', () => {
    expect(CalendarDate.parse('2024-02-29').toString()).toBe('2024-02-29');
    expect(new CalendarDate(99, 1, 5).toString()).toBe('0099-01-05');
  });

  it('should know leap years', () => {
    expect(CalendarDate.isValid(2024, 2, 29)).toBe(true);
    expect(CalendarDate.isValid(2023, 2, 29)).toBe(false);
    expect(CalendarDate.isValid(1900, 2, 29)).toBe(false);
    expect(CalendarDate.isValid(2000, 2, 29)).toBe(true);
  });

  it('should reject invalid dates', () => {
    expect(() => new CalendarDate(2024, 13, 1)).toThrow('invalid calendar date: 2024-13-1');
    expect(() => CalendarDate.parse('2024-1-5')).toThrow(ConversionError);
  });

  it('should serialise to its ISO form', () => {
    expect(JSON.stringify({ on: new CalendarDate(2024, 6, 1) })).toBe('{"on":"2024-06-01"}');
  });
});

describe('values', () => {
  describe('isDict / isList', () => {
    it('should accept only plain objects as dicts', () => {
      expect(isDict({ a: 1 })).toBe(true);
      expect(isDict(Object.create(null))).toBe(true);
      expect(isDict([])).toBe(false);
      expect(isDict(new Map())).toBe(false);
      expect(isDict(new CalendarDate(2024, 1, 1))).toBe(false);
      expect(isList([1])).toBe(true);
    });
  });

  describe('toFrozenValue', () => {
    it('should deeply freeze a copy', () => {
      const source = { a: [1, { b: 'c' }] };
      const frozen = toFrozenValue(source);
      expect(frozen).toEqual(source);
      expect(frozen).not.toBe(source);
      expect(Object.isFrozen(frozen)).toBe(true);
      expect(Object.isFrozen(source)).toBe(false);
      const inner = isDict(frozen) ? frozen['a'] : undefined;
      expect(Object.isFrozen(inner)).toBe(true);
    });

    it('should copy dates', () => {
      const date = new Date(0);
      const frozen = toFrozenValue([date]);
      const copy = isList(frozen) ? frozen[0] : undefined;
      expect(copy).toEqual(date);
      expect(copy).not.toBe(date);
    });

    it('should reject unsupported values with their location', () => {
      expect(() => toFrozenValue({ m: new Map() })).toThrow('unsupported value at $.m: Map');
      expect(codeOf(() => toFrozenValue([undefined]))).toBe(ErrorCodes.UNSUPPORTED_TYPE);
    });

    it('should reject reference cycles', () => {
      const cyclic: Record<string, unknown> = {};
      cyclic['self'] = cyclic;
      expect(codeOf(() => toFrozenValue(cyclic))).toBe(ErrorCodes.CYCLIC_VALUE);
    });

    it('should keep a __proto__ key as an own property', () => {
      const frozen = toFrozenValue(JSON.parse('{"__proto__":{"x":1},"a":2}'));
      expect(isDict(frozen)).toBe(true);
      expect(Object.keys(frozen ?? {})).toEqual(['__proto__', 'a']);
    });

    it('should accept shared references that are not cycles', () => {
      const shared = ['x'];
      expect(toFrozenValue([shared, shared])).toEqual([['x'], ['x']]);
    });
  });

  describe('valuesEqual', () => {
    it('should compare structurally', () => {
      expect(valuesEqual({ a: [1, 2] }, { a: [1, 2] })).toBe(true);
      expect(valuesEqual({ a: [1, 2] }, { a: [2, 1] })).toBe(false);
      expect(valuesEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
      expect(valuesEqual(NaN, NaN)).toBe(true);
      expect(valuesEqual(new Date(5), new Date(5))).toBe(true);
      expect(valuesEqual(1, 1n)).toBe(true);
      expect(valuesEqual(1.5, 1n)).toBe(false);
      expect(valuesEqual(1, '1')).toBe(false);
    });
  });

  describe('describeKind', () => {
    it('should name runtime kinds', () => {
      expect(describeKind(null)).toBe('null');
      expect(describeKind([])).toBe('array');
      expect(describeKind('x')).toBe('string');
      expect(describeKind(new Map())).toBe('Map');
      expect(describeKind({})).toBe('Object');
    });
  });
});

describe('ductility', () => {
  it('should accept values with a one-line form', () => {
    expect(isDuctile('one line')).toBe(true);
    expect(isDuctile({ a: [1, 'x'], b: null })).toBe(true);
    expect(isDuctile(new Table(['a'], [[1]]))).toBe(true);
    expect(isDuctile(new CalendarDate(2024, 1, 1))).toBe(true);
  });

  it('should reject text with line breaks anywhere in a structure', () => {
    expect(() => validateDuctile({ a: ['ok', 'not\nok'] })).toThrow('text at $.a[1] contains a line break');
  });

  it('should reject keys with line breaks', () => {
    expect(codeOf(() => validateDuctile({ 'two\nlines': 1 }))).toBe(ErrorCodes.NOT_DUCTILE);
  });

  it('should accept only one-row tables', () => {
    expect(() => validateDuctile(new Table(['a'], [[1], [2]]))).toThrow(
      'table at $ has 2 rows; only a one-row table fits on a line'
    );
    expect(isDuctile(new Table(['a']))).toBe(false);
  });

  it('should fail on cycles instead of recursing', () => {
    const cyclic: unknown[] = [];
    cyclic.push(cyclic);
    expect(codeOf(() => validateDuctile(cyclic))).toBe(ErrorCodes.CYCLIC_VALUE);
    expect(isDuctile(cyclic)).toBe(false);
  });

  it('should report unsupported values as not ductile', () => {
    expect(isDuctile(() => 1)).toBe(false);
  });
});
