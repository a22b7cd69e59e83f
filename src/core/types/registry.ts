/**
 * Type registry: the closed set of types a command may declare, with the
 * one-line and file forms of each.
 *
 * Every type is fileable. Scalars and dicts/lists are ductile; a table is
 * ductile only as a single row, which is checked per value.
 */
import { ConversionError, ErrorCodes } from '../../utils/errors.js';
import { NodeTextStreams, type TextStreams } from '../streams/text-streams.js';
import { CalendarDate } from './calendar-date.js';
import { emitBlockDict, emitFlow, parseDictLine, parseElement, parseListLine } from './compound.js';
import { tableFromCsv, tableToCsv } from './csv.js';
import { validateDuctile } from './ductile.js';
import {
  containsLineBreak,
  isSafeBigInt,
  loadScalar,
  parseFloatToken,
  parseIntToken,
  representScalar,
  resolveScalar,
  type ScalarKind,
} from './scalar.js';
import { Table } from './table.js';
import { describeKind, isDict, isList, toFrozenValue, type Dict, type Element, type Value } from './values.js';

export const TYPE_TAGS = [
  'none',
  'bool',
  'text',
  'float',
  'int',
  'long',
  'datetime',
  'date',
  'dict',
  'list',
  'table',
] as const;

export type TypeTag = (typeof TYPE_TAGS)[number];

export interface TypeDescriptor {
  readonly tag: TypeTag;
  readonly compound: boolean;
  /** Whether values of the type have a one-line form in general. */
  readonly ductile: boolean;
  readonly fileable: boolean;
  /** Runtime representation, shown in diagnostics. */
  readonly runtime: string;
  /** Parameter annotations accepted for the type. */
  readonly annotations: readonly string[];
}

function descriptor(
  tag: TypeTag,
  runtime: string,
  annotations: readonly string[],
  compound = false
): TypeDescriptor {
  return Object.freeze({ tag, compound, ductile: true, fileable: true, runtime, annotations });
}

const DESCRIPTORS: Readonly<Record<TypeTag, TypeDescriptor>> = {
  none: descriptor('none', 'null', ['null']),
  bool: descriptor('bool', 'boolean', ['boolean']),
  text: descriptor('text', 'string', ['string']),
  float: descriptor('float', 'number', ['number']),
  int: descriptor('int', 'number', ['number']),
  long: descriptor('long', 'bigint', ['bigint']),
  datetime: descriptor('datetime', 'Date', ['Date']),
  date: descriptor('date', 'CalendarDate', ['CalendarDate']),
  dict: descriptor('dict', 'Dict', ['Dict'], true),
  list: descriptor('list', 'List', ['List'], true),
  table: descriptor('table', 'Table', ['Table'], true),
};

/** Lower-case names accepted in documentation, including aliases. */
const TYPE_NAMES: Readonly<Record<string, TypeTag>> = {
  none: 'none',
  null: 'none',
  nonetype: 'none',
  bool: 'bool',
  boolean: 'bool',
  text: 'text',
  str: 'text',
  string: 'text',
  unicode: 'text',
  float: 'float',
  number: 'float',
  int: 'int',
  integer: 'int',
  long: 'long',
  bigint: 'long',
  datetime: 'datetime',
  date: 'date',
  calendardate: 'date',
  dict: 'dict',
  frozendict: 'dict',
  list: 'list',
  frozenlist: 'list',
  table: 'table',
  frozentable: 'table',
};

/** Runtime class names, matched exactly before the case-insensitive lookup. */
const RUNTIME_NAMES: Readonly<Record<string, TypeTag>> = {
  Date: 'datetime',
};

/**
 * Map a documented type name to its tag. `Date` names the runtime class
 * and so means datetime; other names are case-insensitive.
 */
export function lookupTypeName(name: string): TypeTag | undefined {
  return RUNTIME_NAMES[name] ?? TYPE_NAMES[name.toLowerCase()];
}

export function describeType(tag: TypeTag): TypeDescriptor {
  return DESCRIPTORS[tag];
}

/**
 * Infer the tag of a runtime value; safe integral numbers are ints.
 */
export function inferType(value: Value): TypeTag {
  if (value === null) return 'none';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'string') return 'text';
  if (typeof value === 'number') return Number.isSafeInteger(value) && !Object.is(value, -0) ? 'int' : 'float';
  if (typeof value === 'bigint') return 'long';
  if (value instanceof Date) return 'datetime';
  if (value instanceof CalendarDate) return 'date';
  if (value instanceof Table) return 'table';
  if (isList(value)) return 'list';
  return 'dict';
}

/**
 * Check a runtime value against a declared type, returning the value in
 * its canonical frozen form. Safe-integer numbers are accepted as longs.
 */
export function coerceValue(value: unknown, tag: TypeTag): Value {
  const fail = (): never => {
    throw new ConversionError(ErrorCodes.TYPE_MISMATCH, `expected ${tag}, got ${describeKind(value)}`);
  };
  switch (tag) {
    case 'none':
      return value === null ? null : fail();
    case 'bool':
      return typeof value === 'boolean' ? value : fail();
    case 'text':
      return typeof value === 'string' ? value : fail();
    case 'float':
      return typeof value === 'number' ? value : fail();
    case 'int':
      return typeof value === 'number' && Number.isSafeInteger(value) ? value : fail();
    case 'long':
      if (typeof value === 'bigint') return value;
      return typeof value === 'number' && Number.isSafeInteger(value) ? BigInt(value) : fail();
    case 'datetime':
      return value instanceof Date && !Number.isNaN(value.getTime()) ? new Date(value.getTime()) : fail();
    case 'date':
      return value instanceof CalendarDate ? value : fail();
    case 'dict':
      return isDict(value) ? toFrozenValue(value) : fail();
    case 'list':
      return isList(value) ? toFrozenValue(value) : fail();
    case 'table':
      return value instanceof Table ? value : fail();
  }
}

interface TypeCodec {
  fromLine(line: string): Value;
  toLine(value: Value): string;
  fromText(text: string): Value;
  toText(value: Value): string;
}

function conversionFailure(tag: TypeTag, line: string): ConversionError {
  return new ConversionError(ErrorCodes.CONVERSION_FAILED, `cannot read ${JSON.stringify(line)} as ${tag}`, {
    type: tag,
    line,
  });
}

/**
 * Strip a trailing comment from a scalar file line.
 */
function stripComment(line: string): string {
  const hash = line.search(/(^|\s)#/);
  return (hash < 0 ? line : line.slice(0, hash)).trim();
}

/**
 * The single content line of a scalar file: blank and comment lines are
 * ignored, `...` ends the document.
 */
function scalarFileLine(tag: TypeTag, text: string): string {
  const content: string[] = [];
  for (const raw of text.split('\n')) {
    const line = stripComment(raw);
    if (line === '...') break;
    if (line === '---') {
      throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `${tag} file may hold only one document`);
    }
    if (line !== '') content.push(line);
  }
  if (content.length > 1) {
    throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `${tag} file holds more than one value`);
  }
  return content[0] ?? '';
}

function scalarCodec(tag: TypeTag, kind: ScalarKind, load: (token: string) => Value = loadScalar): TypeCodec {
  const fromLine = (line: string): Value => {
    const token = line.trim();
    if (resolveScalar(token) !== kind) throw conversionFailure(tag, line);
    return load(token);
  };
  const toLine = (value: Value): string => {
    const checked = coerceValue(value, tag);
    if (checked instanceof Table || isDict(checked) || isList(checked)) {
      throw conversionFailure(tag, String(value));
    }
    return representScalar(kind, checked);
  };
  return {
    fromLine,
    toLine,
    fromText: (text) => fromLine(scalarFileLine(tag, text)),
    toText: (value) => `${toLine(value)}\n`,
  };
}

const textCodec: TypeCodec = {
  fromLine(line) {
    if (containsLineBreak(line)) {
      throw new ConversionError(ErrorCodes.NOT_DUCTILE, 'text argument contains a line break');
    }
    return line;
  },
  toLine(value) {
    if (typeof value !== 'string') throw conversionFailure('text', String(value));
    validateDuctile(value);
    return value;
  },
  fromText: (text) => text.replace(/\n$/, ''),
  toText(value) {
    if (typeof value !== 'string') throw conversionFailure('text', String(value));
    return `${value}\n`;
  },
};

const dictCodec: TypeCodec = {
  fromLine: (line) => parseDictLine(line),
  toLine(value) {
    const dict = coerceValue(value, 'dict');
    if (!isDict(dict)) throw conversionFailure('dict', String(value));
    validateDuctile(dict);
    return emitFlow(dict);
  },
  fromText(text) {
    const parsed = parseElement(text);
    if (!isDict(parsed)) {
      throw new ConversionError(ErrorCodes.CONVERSION_FAILED, 'dict file does not hold a mapping');
    }
    return parsed;
  },
  toText(value) {
    const dict = coerceValue(value, 'dict');
    if (!isDict(dict)) throw conversionFailure('dict', String(value));
    return Object.keys(dict).length === 0 ? '{}\n' : `${emitBlockDict(dict).join('\n')}\n`;
  },
};

/**
 * List files hold one element per line. Blank and comment-only lines are
 * skipped and `...` ends the document.
 */
function listFromText(text: string): readonly Element[] {
  const elements: Element[] = [];
  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (line === '...') break;
    if (line === '---') {
      throw new ConversionError(ErrorCodes.CONVERSION_FAILED, 'list file may hold only one document');
    }
    if (line === '' || line.startsWith('#')) continue;
    elements.push(parseElement(line));
  }
  return Object.freeze(elements);
}

const listCodec: TypeCodec = {
  fromLine: (line) => parseListLine(line),
  toLine(value) {
    const list = coerceValue(value, 'list');
    if (!isList(list)) throw conversionFailure('list', String(value));
    validateDuctile(list);
    return emitFlow(list);
  },
  fromText: listFromText,
  toText(value) {
    const list = coerceValue(value, 'list');
    if (!isList(list)) throw conversionFailure('list', String(value));
    validateDuctile(list);
    return list.map((element: Element) => `${emitFlow(element)}\n`).join('');
  },
};

const tableCodec: TypeCodec = {
  fromLine(line) {
    const record: Dict = parseDictLine(line);
    return Table.fromRecord(record);
  },
  toLine(value) {
    if (!(value instanceof Table)) throw conversionFailure('table', String(value));
    validateDuctile(value);
    return emitFlow(value.records()[0] ?? {});
  },
  fromText: tableFromCsv,
  toText(value) {
    if (!(value instanceof Table)) throw conversionFailure('table', String(value));
    return tableToCsv(value);
  },
};

function loadInt(token: string): Value {
  const value = parseIntToken(token);
  if (!isSafeBigInt(value)) {
    throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `integer ${token} is outside the int range; declare it long`);
  }
  return Number(value);
}

function loadFloat(token: string): Value {
  return resolveScalar(token) === 'int' ? Number(parseIntToken(token)) : parseFloatToken(token);
}

const floatCodec: TypeCodec = (() => {
  const base = scalarCodec('float', 'float', loadFloat);
  const fromLine = (line: string): Value => {
    const token = line.trim();
    const kind = resolveScalar(token);
    if (kind !== 'float' && kind !== 'int') throw conversionFailure('float', line);
    return loadFloat(token);
  };
  return { ...base, fromLine, fromText: (text: string) => fromLine(scalarFileLine('float', text)) };
})();

const CODECS: Readonly<Record<TypeTag, TypeCodec>> = {
  none: scalarCodec('none', 'none'),
  bool: scalarCodec('bool', 'bool'),
  text: textCodec,
  float: floatCodec,
  int: scalarCodec('int', 'int', loadInt),
  long: scalarCodec('long', 'int', parseIntToken),
  datetime: scalarCodec('datetime', 'datetime'),
  date: scalarCodec('date', 'date'),
  dict: dictCodec,
  list: listCodec,
  table: tableCodec,
};

/**
 * Converts values to and from their line and file forms. File access goes
 * through a {@link TextStreams} collaborator.
 */
export class TypeRegistry {
  constructor(private readonly streams: TextStreams = new NodeTextStreams()) {}

  describe(tag: TypeTag): TypeDescriptor {
    return describeType(tag);
  }

  fromLine(tag: TypeTag, line: string): Value {
    return CODECS[tag].fromLine(line);
  }

  toLine(tag: TypeTag, value: Value): string {
    return CODECS[tag].toLine(value);
  }

  fromText(tag: TypeTag, text: string): Value {
    return CODECS[tag].fromText(text);
  }

  toText(tag: TypeTag, value: Value): string {
    return CODECS[tag].toText(value);
  }

  fromFile(tag: TypeTag, path: string): Value {
    return this.fromText(tag, this.streams.read(path));
  }

  toFile(tag: TypeTag, value: Value, path: string): void {
    this.streams.write(path, this.toText(tag, value));
  }
}
