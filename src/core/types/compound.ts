/**
 * Text forms of dicts and lists.
 *
 * Parsing goes through the YAML parser with the failsafe schema, so every
 * scalar arrives as a string together with its quoting style. Plain
 * scalars are then resolved by the scalar grammar; quoted scalars and
 * mapping keys are always text. Emission is the inverse: a string is
 * quoted whenever its plain form would resolve to something else.
 */
import { isAlias, isMap, isScalar, isSeq, parseDocument, Scalar } from 'yaml';
import { ConversionError, ErrorCodes } from '../../utils/errors.js';
import { containsLineBreak, kindOf, loadScalar, representScalar, resolveScalar } from './scalar.js';
import { isDict, isList, type Dict, type Element } from './values.js';

const INDICATOR_START = /^[-?:,[\]{}#&*!|>'"%@`]/;
const PLAIN_UNSAFE = /[,[\]{}]|: |:$| #|[\x00-\x1f\x7f]/;
const DOCUMENT_MARKER = /^(?:---|\.\.\.)/;

/**
 * Parse one YAML document into an element. An empty document is null.
 */
export function parseElement(source: string): Element {
  const doc = parseDocument(source, { schema: 'failsafe' });
  const [firstError] = doc.errors;
  if (firstError) {
    throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `malformed value: ${firstError.message}`, {
      source,
    });
  }
  return fromNode(doc.contents, '$');
}

function fromNode(node: unknown, where: string): Element {
  if (node === null || node === undefined) {
    return null;
  }
  if (isAlias(node)) {
    throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `aliases are not supported (at ${where})`);
  }
  if (isScalar(node)) {
    const text = String(node.value ?? '');
    return node.type === Scalar.PLAIN ? loadScalar(text.trim()) : text;
  }
  if (isSeq(node)) {
    return Object.freeze(node.items.map((item, index) => fromNode(item, `${where}[${index}]`)));
  }
  if (isMap(node)) {
    const entries = node.items.map((pair): [string, Element] => {
      const key = keyText(pair.key, where);
      return [key, fromNode(pair.value, `${where}.${key}`)];
    });
    // fromEntries defines own properties, so a __proto__ key stays a key
    return Object.freeze(Object.fromEntries(entries));
  }
  throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `unsupported node at ${where}`);
}

function keyText(key: unknown, where: string): string {
  if (isScalar(key) && key.value !== null && key.value !== undefined) {
    return String(key.value);
  }
  throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `mapping keys must be text (at ${where})`);
}

/**
 * Parse a dict from its one-line flow form; the braces may be omitted.
 */
export function parseDictLine(line: string): Dict {
  const trimmed = line.trim();
  const source = trimmed.startsWith('{') && trimmed.endsWith('}') ? trimmed : `{${trimmed}}`;
  const value = parseElement(source);
  if (!isDict(value)) {
    throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `not a dict: ${line}`);
  }
  return value;
}

/**
 * Parse a list from its one-line flow form; the brackets may be omitted.
 */
export function parseListLine(line: string): readonly Element[] {
  const trimmed = line.trim();
  const source = trimmed.startsWith('[') && trimmed.endsWith(']') ? trimmed : `[${trimmed}]`;
  const value = parseElement(source);
  if (!isList(value)) {
    throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `not a list: ${line}`);
  }
  return value;
}

/**
 * Emit text as a plain scalar when that resolves back to the same text,
 * otherwise double-quoted.
 */
export function emitText(text: string): string {
  const plain =
    text !== '' &&
    text === text.trim() &&
    resolveScalar(text) === 'text' &&
    !INDICATOR_START.test(text) &&
    !PLAIN_UNSAFE.test(text) &&
    !DOCUMENT_MARKER.test(text) &&
    !containsLineBreak(text);
  return plain ? text : quoteText(text);
}

function quoteText(text: string): string {
  return JSON.stringify(text).replace(
    /[\x85\u2028\u2029]/g,
    (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

/**
 * Emit an element in flow style on a single line.
 */
export function emitFlow(value: Element): string {
  if (isList(value)) {
    return `[${value.map((item) => emitFlow(item)).join(', ')}]`;
  }
  if (isDict(value)) {
    const entries = Object.entries(value).map(([key, item]) => `${emitText(key)}: ${emitFlow(item)}`);
    return `{${entries.join(', ')}}`;
  }
  if (value === null) {
    return '~';
  }
  if (typeof value === 'string') {
    return emitText(value);
  }
  return representScalar(kindOf(value), value);
}

/**
 * Emit a dict in block style, one key per line. Nested dicts become
 * indented blocks; everything else stays in flow style.
 */
export function emitBlockDict(dict: Dict, indent = 0): string[] {
  const pad = ' '.repeat(indent);
  const lines: string[] = [];
  for (const [key, item] of Object.entries(dict)) {
    if (isDict(item) && Object.keys(item).length > 0) {
      lines.push(`${pad}${emitText(key)}:`, ...emitBlockDict(item, indent + 2));
    } else {
      lines.push(`${pad}${emitText(key)}: ${emitFlow(item)}`);
    }
  }
  return lines;
}
