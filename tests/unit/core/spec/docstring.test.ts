/**
 * Tests for the docstring grammar.
 */
import { describe, it, expect } from 'vitest';
import { dedent, parseDocstring } from '../../../../src/core/spec/docstring.js';
import { ErrorCodes, SpecificationError } from '../../../../src/utils/errors.js';

function doc(...lines: string[]): string {
  return lines.join('\n');
}

function codeOf(text: string): string | undefined {
  try {
    parseDocstring(text, 'filter_records');
  } catch (error) {
    return error instanceof SpecificationError ? error.code : undefined;
  }
  return undefined;
}

describe('parseDocstring', () => {
  it('should parse every supported section', () => {
    const parsed = parseDocstring(
      doc(
        'Filter records by score.',
        '',
        'Keeps rows at or above a threshold.',
        '',
        'Args:',
        '    records (table): Records to filter.',
        '    threshold (float): Minimum score',
        '        to keep [default: 0.5].',
        '',
        'Returns:',
        '    table: Records at or above the threshold.',
        '',
        'Notes:',
        '    Scores are compared as floats.',
        '',
        'References:',
        '    Internal scoring guide.'
      ),
      'filter_records'
    );

    expect(parsed).toEqual({
      summary: 'Filter records by score.',
      description: 'Keeps rows at or above a threshold.',
      params: [
        { name: 'records', typeName: 'table', type: 'table', description: 'Records to filter.' },
        {
          name: 'threshold',
          typeName: 'float',
          type: 'float',
          description: 'Minimum score to keep [default: 0.5].',
          docDefault: '0.5',
        },
      ],
      returns: { typeName: 'table', type: 'table', description: 'Records at or above the threshold.' },
      notes: 'Scores are compared as floats.',
      references: 'Internal scoring guide.',
    });
  });

  it('should accept a summary on its own', () => {
    expect(parseDocstring('Do the thing.', 'do_thing')).toEqual({ summary: 'Do the thing.' });
  });

  it('should distinguish an empty Args section from a missing one', () => {
    expect(parseDocstring(doc('Do it.', '', 'Args:'), 'do_it').params).toEqual([]);
    expect(parseDocstring('Do it.', 'do_it').params).toBeUndefined();
  });

  it('should accept section aliases', () => {
    const parsed = parseDocstring(
      doc('Do it.', '', 'Parameters:', '    count (integer): How many.', '', 'Return:', '    FrozenList: Items.'),
      'do_it'
    );
    expect(parsed.params?.[0]?.type).toBe('int');
    expect(parsed.returns?.type).toBe('list');
  });

  it('should read See Also as references', () => {
    expect(parseDocstring(doc('Do it.', '', 'See Also:', '    other commands'), 'do_it').references).toBe(
      'other commands'
    );
  });

  it('should keep multi-word prose ending in a colon as description', () => {
    expect(parseDocstring(doc('Do it.', '', 'Steps taken:', '1. first'), 'do_it').description).toBe(
      'Steps taken:\n1. first'
    );
  });

  it('should join multi-line return descriptions', () => {
    const parsed = parseDocstring(doc('Do it.', '', 'Returns:', '    dict: Counts', '    by key.'), 'do_it');
    expect(parsed.returns?.description).toBe('Counts by key.');
  });

  it('should continue a parameter description on lines at the entry margin', () => {
    const parsed = parseDocstring(
      doc('Filter.', '', 'Args:', '    threshold (float): Minimum', '    score to keep.', 'count (int): How many.'),
      'filter_rows'
    );
    expect(parsed.params).toEqual([
      { name: 'threshold', typeName: 'float', type: 'float', description: 'Minimum score to keep.' },
      { name: 'count', typeName: 'int', type: 'int', description: 'How many.' },
    ]);
  });

  it('should accept parenthesised defaults', () => {
    const parsed = parseDocstring(doc('Do it.', '', 'Args:', '    n (int): Count (default: 3).'), 'do_it');
    expect(parsed.params?.[0]?.docDefault).toBe('3');
  });

  it('should prefix errors with the function name', () => {
    expect(() => parseDocstring('', 'filter_records')).toThrow('filter_records: docstring summary is blank');
  });

  it.each([
    ['blank summary', '   \n  ', ErrorCodes.UNDOCUMENTED_FUNCTION],
    ['two-line summary', doc('First line', 'second line'), ErrorCodes.MALFORMED_DOCSTRING],
    ['unknown header', doc('Do it.', '', 'Widgets:', '    x'), ErrorCodes.UNKNOWN_HEADER],
    ['unsupported header', doc('Do it.', '', 'Raises:', '    ValueError: never'), ErrorCodes.UNSUPPORTED_HEADER],
    ['duplicate header', doc('Do it.', '', 'Args:', '', 'Parameters:'), ErrorCodes.DUPLICATE_HEADER],
    ['description without a parameter', doc('Do it.', '', 'Args:', '    A value.'), ErrorCodes.MALFORMED_DOCSTRING],
    ['untyped parameter', doc('Do it.', '', 'Args:', '    x: A value.'), ErrorCodes.MALFORMED_DOCSTRING],
    ['unknown type', doc('Do it.', '', 'Args:', '    x (widget): A value.'), ErrorCodes.UNKNOWN_TYPE],
    ['none type', doc('Do it.', '', 'Args:', '    x (None): A value.'), ErrorCodes.NONE_TYPE],
    ['variadic parameter', doc('Do it.', '', 'Args:', '    *rest (list): More.'), ErrorCodes.UNENUMERATED_PARAM],
    [
      'duplicate parameter',
      doc('Do it.', '', 'Args:', '    x (int): One.', '    x (int): Two.'),
      ErrorCodes.DUPLICATE_PARAM,
    ],
    [
      'two defaults',
      doc('Do it.', '', 'Args:', '    x (int): One [default: 1] (default: 2).'),
      ErrorCodes.MULTIPLE_DEFAULTS,
    ],
    ['untyped return', doc('Do it.', '', 'Returns:', '    Something.'), ErrorCodes.MALFORMED_DOCSTRING],
    ['none return', doc('Do it.', '', 'Returns:', '    None: Nothing.'), ErrorCodes.NONE_TYPE],
  ])('should reject a %s', (_label, text, code) => {
    expect(codeOf(text)).toBe(code);
  });
});

describe('dedent', () => {
  it('should remove the common margin and blank out empty lines', () => {
    expect(dedent(['    a', '      b', '  ', '    c'])).toEqual(['a', '  b', '', 'c']);
  });
});
