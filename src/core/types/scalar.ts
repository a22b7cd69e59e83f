/**
 * Plain-scalar grammar shared by every text form.
 *
 * An unquoted token resolves to exactly one scalar kind, tried in the order
 * none, bool, int, float, datetime, date, text. Each kind has one canonical
 * representation that resolves back to the same kind and value.
 */
import { CalendarDate } from './calendar-date.js';
import { ConversionError, ErrorCodes } from '../../utils/errors.js';

export type ScalarValue = null | boolean | string | number | bigint | Date | CalendarDate;

export type ScalarKind = 'none' | 'bool' | 'int' | 'float' | 'datetime' | 'date' | 'text';

const NULL_PATTERN = /^(?:~|null|Null|NULL)?$/;
const TRUE_WORDS = ['true', 'True', 'TRUE', 'yes', 'Yes', 'YES', 'on', 'On', 'ON'];
const FALSE_WORDS = ['false', 'False', 'FALSE', 'no', 'No', 'NO', 'off', 'Off', 'OFF'];
const INT_PATTERN = /^[-+]?(?:0b[01_]+|0x[0-9a-fA-F_]+|0[0-7_]+|0|[1-9][0-9_]*)$/;
const FLOAT_PATTERN =
  /^(?:[-+]?[0-9][0-9_]*\.[0-9_]*(?:[eE][-+]?[0-9]+)?|[-+]?\.[0-9][0-9_]*(?:[eE][-+]?[0-9]+)?|[-+]?\.(?:inf|Inf|INF)|\.(?:nan|NaN|NAN))$/;
const DATE_PATTERN = /^([0-9]{4})-([0-9]{2})-([0-9]{2})$/;
const DATETIME_PATTERN =
  /^([0-9]{4})-([0-9]{1,2})-([0-9]{1,2})(?:[Tt]|[ \t]+)([0-9]{1,2}):([0-9]{2}):([0-9]{2})(?:\.([0-9]*))?(?:[ \t]*(Z|([-+])([0-9]{1,2})(?::?([0-9]{2}))?))?$/;

/** Line-break characters; a value containing any of them has no one-line form. */
const LINE_BREAK = /[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;

export function containsLineBreak(text: string): boolean {
  return LINE_BREAK.test(text);
}

export function isScalarValue(value: unknown): value is ScalarValue {
  return (
    value === null ||
    typeof value === 'boolean' ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    value instanceof Date ||
    value instanceof CalendarDate
  );
}

/**
 * Equality on scalars. NaN equals NaN, and an int equals a long of the
 * same value, since integers inside compound values load as numbers
 * whenever they fit the safe range.
 */
export function scalarsEqual(left: ScalarValue, right: ScalarValue): boolean {
  if (typeof left === 'number' && typeof right === 'number') {
    return left === right || (Number.isNaN(left) && Number.isNaN(right));
  }
  if (typeof left === 'bigint' && typeof right === 'number') {
    return Number.isInteger(right) && left === BigInt(right);
  }
  if (typeof left === 'number' && typeof right === 'bigint') {
    return Number.isInteger(left) && BigInt(left) === right;
  }
  if (left instanceof Date && right instanceof Date) {
    return left.getTime() === right.getTime();
  }
  if (left instanceof CalendarDate && right instanceof CalendarDate) {
    return left.equals(right);
  }
  return left === right;
}

/**
 * Determine which scalar kind an unquoted token resolves to.
 */
export function resolveScalar(token: string): ScalarKind {
  if (NULL_PATTERN.test(token)) return 'none';
  if (TRUE_WORDS.includes(token) || FALSE_WORDS.includes(token)) return 'bool';
  if (INT_PATTERN.test(token)) return 'int';
  if (FLOAT_PATTERN.test(token)) return 'float';
  if (parseDatetime(token) !== undefined) return 'datetime';
  if (parseDate(token) !== undefined) return 'date';
  return 'text';
}

/**
 * Load an unquoted token without a declared type. Integers outside the
 * safe range load as bigint.
 */
export function loadScalar(token: string): ScalarValue {
  switch (resolveScalar(token)) {
    case 'none':
      return null;
    case 'bool':
      return TRUE_WORDS.includes(token);
    case 'int': {
      const value = parseIntToken(token);
      return isSafeBigInt(value) ? Number(value) : value;
    }
    case 'float':
      return parseFloatToken(token);
    case 'datetime':
      return parseDatetime(token) ?? token;
    case 'date':
      return parseDate(token) ?? token;
    case 'text':
      return token;
  }
}

export function parseIntToken(token: string): bigint {
  let text = token.replace(/_/g, '');
  const negative = text.startsWith('-');
  if (text.startsWith('-') || text.startsWith('+')) {
    text = text.slice(1);
  }
  let magnitude: bigint;
  if (text.startsWith('0b')) {
    magnitude = BigInt(`0b${text.slice(2) || '0'}`);
  } else if (text.startsWith('0x')) {
    magnitude = BigInt(`0x${text.slice(2) || '0'}`);
  } else if (text.length > 1 && text.startsWith('0')) {
    magnitude = BigInt(`0o${text.slice(1)}`);
  } else {
    magnitude = BigInt(text);
  }
  return negative ? -magnitude : magnitude;
}

export function parseFloatToken(token: string): number {
  const text = token.replace(/_/g, '').toLowerCase();
  if (text.endsWith('.inf')) {
    return text.startsWith('-') ? -Infinity : Infinity;
  }
  if (text === '.nan') {
    return NaN;
  }
  return Number(text);
}

export function isSafeBigInt(value: bigint): boolean {
  return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER);
}

function parseDate(token: string): CalendarDate | undefined {
  const match = DATE_PATTERN.exec(token);
  if (!match) return undefined;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  return CalendarDate.isValid(year, month, day) ? new CalendarDate(year, month, day) : undefined;
}

function parseDatetime(token: string): Date | undefined {
  const match = DATETIME_PATTERN.exec(token);
  if (!match) return undefined;
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  if (
    year === undefined || month === undefined || day === undefined ||
    hour === undefined || minute === undefined || second === undefined ||
    !CalendarDate.isValid(year, month, day) || hour > 23 || minute > 59 || second > 59
  ) {
    return undefined;
  }
  const millis = Number((match[7] ?? '').padEnd(3, '0').slice(0, 3));
  let offsetMinutes = 0;
  if (match[9] !== undefined) {
    offsetMinutes = Number(match[10]) * 60 + Number(match[11] ?? '0');
    if (match[9] === '-') offsetMinutes = -offsetMinutes;
  }
  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  utc.setUTCHours(hour, minute - offsetMinutes, second, millis);
  return utc;
}

/**
 * Canonical one-token representation of a scalar of the given kind.
 */
export function representScalar(kind: ScalarKind, value: ScalarValue): string {
  switch (kind) {
    case 'none':
      return '';
    case 'bool':
      return value === true ? 'true' : 'false';
    case 'int':
      return typeof value === 'bigint' ? value.toString() : String(value);
    case 'float':
      return typeof value === 'number' ? representFloat(value) : String(value);
    case 'datetime':
      if (value instanceof Date) return representDatetime(value);
      break;
    case 'date':
      if (value instanceof CalendarDate) return value.toString();
      break;
    case 'text':
      if (typeof value === 'string') return value;
      break;
  }
  throw new ConversionError(ErrorCodes.TYPE_MISMATCH, `cannot represent ${String(value)} as ${kind}`);
}

function representFloat(value: number): string {
  if (Number.isNaN(value)) return '.nan';
  if (value === Infinity) return '.inf';
  if (value === -Infinity) return '-.inf';
  if (Object.is(value, -0)) return '-0.0';
  const text = String(value);
  if (text.includes('.')) return text;
  return text.includes('e') ? text.replace('e', '.0e') : `${text}.0`;
}

function representDatetime(value: Date): string {
  if (Number.isNaN(value.getTime()) || value.getUTCFullYear() < 0 || value.getUTCFullYear() > 9999) {
    throw new ConversionError(ErrorCodes.CONVERSION_FAILED, 'datetime is outside the representable range');
  }
  const [datePart = '', timePart = ''] = value.toISOString().slice(0, -1).split('T');
  const time = timePart.endsWith('.000') ? timePart.slice(0, -4) : timePart;
  return `${datePart} ${time}`;
}

/**
 * Scalar kind of a runtime value; safe integral numbers are ints.
 */
export function kindOf(value: ScalarValue): ScalarKind {
  if (value === null) return 'none';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'string') return 'text';
  if (typeof value === 'bigint') return 'int';
  if (typeof value === 'number') return Number.isSafeInteger(value) && !Object.is(value, -0) ? 'int' : 'float';
  if (value instanceof Date) return 'datetime';
  return 'date';
}
