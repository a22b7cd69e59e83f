/**
 * Comma-separated form of tables.
 *
 * Dialect: `,` between fields, `"` around fields that contain a comma,
 * quote, backslash or line break, and backslash escapes inside quotes
 * (quotes are never doubled). The first record holds the headings. Each
 * cell holds a scalar token in the same grammar as flow values, so a
 * string that would read back as a number is written YAML-quoted.
 */
import { ConversionError, ErrorCodes } from '../../utils/errors.js';
import { emitText, parseElement } from './compound.js';
import { kindOf, loadScalar, representScalar, type ScalarValue } from './scalar.js';
import { Table } from './table.js';

const NEEDS_QUOTING = /[,"\\\n\r]/;

export function encodeField(field: string): string {
  if (!NEEDS_QUOTING.test(field)) {
    return field;
  }
  return `"${field.replace(/[\\"]/g, (ch) => `\\${ch}`)}"`;
}

export function encodeCell(cell: ScalarValue): string {
  if (cell === null) return '~';
  if (typeof cell === 'string') return emitText(cell);
  return representScalar(kindOf(cell), cell);
}

export function decodeCell(token: string): ScalarValue {
  const trimmed = token.trim();
  if (trimmed.startsWith('"') || trimmed.startsWith("'")) {
    const value = parseElement(trimmed);
    if (typeof value !== 'string') {
      throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `malformed quoted cell: ${token}`);
    }
    return value;
  }
  return loadScalar(trimmed);
}

/**
 * Split CSV text into records of raw fields.
 */
export function parseRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;
  let fieldStarted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quoted) {
      if (ch === '\\') {
        i++;
        if (i >= text.length) {
          throw new ConversionError(ErrorCodes.CONVERSION_FAILED, 'unterminated escape in table text');
        }
        field += text.charAt(i);
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"' && field === '') {
      quoted = true;
      fieldStarted = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
      fieldStarted = false;
    } else if (ch === '\n') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
      fieldStarted = false;
    } else {
      field += ch;
      fieldStarted = true;
    }
  }

  if (quoted) {
    throw new ConversionError(ErrorCodes.CONVERSION_FAILED, 'unterminated quoted field in table text');
  }
  if (fieldStarted || field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }
  return records;
}

export function tableToCsv(table: Table): string {
  const lines = [table.headings.map(encodeField).join(',')];
  for (const row of table.rows) {
    lines.push(row.map((cell) => encodeField(encodeCell(cell))).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export function tableFromCsv(text: string): Table {
  const records = parseRecords(text.replace(/\r\n?/g, '\n')).filter(
    (record) => !(record.length === 1 && record[0]?.trim() === '')
  );
  const [headings, ...rows] = records;
  if (!headings) {
    return new Table([]);
  }
  return new Table(
    headings,
    rows.map((row) => row.map(decodeCell))
  );
}
