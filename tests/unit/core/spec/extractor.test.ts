/**
 * Tests for command function extraction.
 */
import { describe, it, expect, afterEach } from 'vitest';
import { FunctionExtractor, jsDocText } from '../../../../src/core/spec/extractor.js';
import { CalendarDate } from '../../../../src/core/types/calendar-date.js';
import { ErrorCodes, SpecificationError } from '../../../../src/utils/errors.js';

describe('jsDocText', () => {
  it('should strip delimiters and the gutter but keep relative indentation', () => {
    const comment = ['/**', ' * Summary.', ' *', ' * Args:', ' *     x (int): A value.', ' */'].join('\n');
    expect(jsDocText(comment)).toBe(['Summary.', '', 'Args:', '    x (int): A value.'].join('\n'));
  });
});

describe('FunctionExtractor', () => {
  const extractor = new FunctionExtractor();

  afterEach(() => {
    extractor.dispose();
  });

  it('should extract exported functions with their docs and parameters', () => {
    const [fn, ...others] = extractor.extractFromSource(
      '/project/src/commands/records.ts',
      [
        "import type { Table } from 'fncli';",
        '',
        'function helper(): number {',
        '  return 1;',
        '}',
        '',
        '/**',
        ' * Filter records by score.',
        ' */',
        'export function filter_records(records: Table, threshold = 0.5): Table {',
        '  return records;',
        '}',
      ].join('\n')
    );

    expect(others).toEqual([]);
    expect(fn?.name).toBe('filter_records');
    expect(fn?.line).toBe(10);
    expect(fn?.docstring).toBe('Filter records by score.');
    expect(fn?.returnsValue).toBe(true);
    expect(fn?.isAsync).toBe(false);
    expect(fn?.params).toEqual([
      {
        name: 'records',
        annotation: 'Table',
        optional: false,
        rest: false,
        destructured: false,
        hasDefault: false,
        defaultValue: null,
      },
      {
        name: 'threshold',
        optional: false,
        rest: false,
        destructured: false,
        hasDefault: true,
        defaultValue: 0.5,
      },
    ]);
  });

  it('should skip overload signatures', () => {
    const functions = extractor.extractFromSource(
      '/project/a.ts',
      [
        'export function show_value(x: number): void;',
        'export function show_value(x: number): void {',
        '  console.log(x);',
        '}',
      ].join('\n')
    );
    expect(functions).toHaveLength(1);
  });

  it('should only count returns of the function itself', () => {
    const [fn] = extractor.extractFromSource(
      '/project/a.ts',
      [
        'export async function print_items(items: string[]): Promise<void> {',
        '  items.forEach((item) => {',
        '    return item;',
        '  });',
        '  return;',
        '}',
      ].join('\n')
    );
    expect(fn?.returnsValue).toBe(false);
    expect(fn?.isAsync).toBe(true);
  });

  it('should evaluate literal defaults', () => {
    const [fn] = extractor.extractFromSource(
      '/project/a.ts',
      [
        'export function run_job(',
        '  a = -1,',
        '  b = 10n,',
        "  c = 'text',",
        '  d = null,',
        "  e = [1, 'x', true],",
        "  f = { key: 'value', 'other key': 2 },",
        "  g = new Date('2024-01-01T00:00:00Z'),",
        "  h = CalendarDate.parse('2024-03-01'),",
        '  i = -Infinity,',
        ') {}',
      ].join('\n')
    );
    const defaults = fn?.params.map((param) => param.defaultValue);
    expect(defaults).toEqual([
      -1,
      10n,
      'text',
      null,
      [1, 'x', true],
      { key: 'value', 'other key': 2 },
      new Date(Date.UTC(2024, 0, 1)),
      new CalendarDate(2024, 3, 1),
      -Infinity,
    ]);
    expect(Object.isFrozen(defaults?.[4])).toBe(true);
  });

  it('should record parameter shapes the builder rejects', () => {
    const [fn] = extractor.extractFromSource(
      '/project/a.ts',
      'export function run_job({ a }: { a: number }, b?: number, ...rest: number[]) {}'
    );
    expect(fn?.params.map((param) => [param.destructured, param.optional, param.rest])).toEqual([
      [true, false, false],
      [false, true, false],
      [false, false, true],
    ]);
  });

  it('should reject defaults that are not literals', () => {
    try {
      extractor.extractFromSource('/project/a.ts', 'export function run_job(n = Math.max(1, 2)) {}');
      expect.fail('expected a SpecificationError');
    } catch (error) {
      expect(error).toBeInstanceOf(SpecificationError);
      expect(error instanceof SpecificationError && error.code).toBe(ErrorCodes.UNSUPPORTED_DEFAULT);
    }
  });

  it('should reject anonymous default exports', () => {
    expect(() => extractor.extractFromSource('/project/a.ts', 'export default function () {}')).toThrow(
      '/project/a.ts:1: command functions must be named exports'
    );
  });
});
