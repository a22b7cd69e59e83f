/**
 * Ductility: whether a value can be written on a single command-line
 * argument without loss.
 */
import { ConversionError, ErrorCodes } from '../../utils/errors.js';
import { containsLineBreak, isScalarValue } from './scalar.js';
import { Table } from './table.js';
import { describeKind, isDict } from './values.js';

/**
 * Throw a ConversionError unless the value has a one-line form.
 *
 * Text must contain no line break; dict keys and values, list elements
 * recursively likewise; a table must have exactly one row. Cyclic
 * structures fail rather than recurse forever.
 */
export function validateDuctile(value: unknown): void {
  visit(value, new Set<object>(), '$');
}

export function isDuctile(value: unknown): boolean {
  try {
    validateDuctile(value);
    return true;
  } catch (error) {
    if (error instanceof ConversionError) return false;
    throw error;
  }
}

function visit(value: unknown, ancestors: Set<object>, where: string): void {
  if (typeof value === 'string') {
    if (containsLineBreak(value)) {
      throw new ConversionError(ErrorCodes.NOT_DUCTILE, `text at ${where} contains a line break`);
    }
    return;
  }
  if (value instanceof Table) {
    if (value.rowCount !== 1) {
      throw new ConversionError(
        ErrorCodes.NOT_DUCTILE,
        `table at ${where} has ${value.rowCount} rows; only a one-row table fits on a line`
      );
    }
    return;
  }
  if (isScalarValue(value)) {
    return;
  }
  if (Array.isArray(value) || isDict(value)) {
    if (ancestors.has(value)) {
      throw new ConversionError(ErrorCodes.CYCLIC_VALUE, `value contains a reference cycle at ${where}`);
    }
    ancestors.add(value);
    if (Array.isArray(value)) {
      value.forEach((item: unknown, index) => visit(item, ancestors, `${where}[${index}]`));
    } else {
      for (const [key, item] of Object.entries(value)) {
        if (containsLineBreak(key)) {
          throw new ConversionError(ErrorCodes.NOT_DUCTILE, `key at ${where} contains a line break`);
        }
        visit(item, ancestors, `${where}.${key}`);
      }
    }
    ancestors.delete(value);
    return;
  }
  throw new ConversionError(ErrorCodes.UNSUPPORTED_TYPE, `unsupported value at ${where}: ${describeKind(value)}`);
}
