/**
 * Runtime values that command functions accept and return.
 *
 * Compound values are deeply frozen: dicts are plain objects with string
 * keys, lists are arrays, tables are {@link Table} instances.
 */
import { Table } from './table.js';
import { isScalarValue, scalarsEqual, type ScalarValue } from './scalar.js';
import { ConversionError, ErrorCodes } from '../../utils/errors.js';

export interface Dict {
  readonly [key: string]: Element;
}

export type List = readonly Element[];

/** Anything that may sit inside a dict or list; tables never nest. */
export type Element = ScalarValue | Dict | List;

export type Value = Element | Table;

export type { ScalarValue };

export function isDict(value: unknown): value is Dict {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isList(value: unknown): value is List {
  return Array.isArray(value);
}

/**
 * Check that a value is built only from supported values and contains no
 * reference cycle, returning a deeply frozen copy.
 */
export function toFrozenValue(value: unknown): Value {
  if (value instanceof Table) {
    return value;
  }
  return freezeNode(value, new Set<object>(), '$');
}

function freezeNode(value: unknown, ancestors: Set<object>, where: string): Element {
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (isScalarValue(value)) {
    return value;
  }
  if (Array.isArray(value) || isDict(value)) {
    if (ancestors.has(value)) {
      throw new ConversionError(ErrorCodes.CYCLIC_VALUE, `value contains a reference cycle at ${where}`);
    }
    ancestors.add(value);
    try {
      if (Array.isArray(value)) {
        const items: Element[] = value.map((item: unknown, index) => freezeNode(item, ancestors, `${where}[${index}]`));
        return Object.freeze(items);
      }
      const entries = Object.entries(value).map(
        ([key, item]): [string, Element] => [key, freezeNode(item, ancestors, `${where}.${key}`)]
      );
      return Object.freeze(Object.fromEntries(entries));
    } finally {
      ancestors.delete(value);
    }
  }
  throw new ConversionError(
    ErrorCodes.UNSUPPORTED_TYPE,
    `unsupported value at ${where}: ${describeKind(value)}`
  );
}

/**
 * Structural equality on values; see {@link scalarsEqual} for scalars.
 */
export function valuesEqual(left: Value, right: Value): boolean {
  if (isScalarValue(left) && isScalarValue(right)) {
    return scalarsEqual(left, right);
  }
  if (left instanceof Table && right instanceof Table) {
    return left.equals(right);
  }
  if (isList(left) && isList(right)) {
    return left.length === right.length && left.every((item, index) => valuesEqual(item, right[index] ?? null));
  }
  if (isDict(left) && isDict(right)) {
    const leftKeys = Object.keys(left);
    const rightKeys = Object.keys(right);
    return (
      leftKeys.length === rightKeys.length &&
      leftKeys.every((key) => Object.hasOwn(right, key) && valuesEqual(left[key] ?? null, right[key] ?? null))
    );
  }
  return left === right;
}

export function describeKind(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'Date';
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    const ctor: unknown = proto && typeof proto === 'object' ? Reflect.get(proto, 'constructor') : undefined;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  return typeof value;
}
