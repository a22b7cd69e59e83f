/**
 * A value paired with its type, so that it can be marshalled without the
 * caller naming the type again.
 */
import { ConversionError, ErrorCodes } from '../../utils/errors.js';
import { coerceValue, inferType, TypeRegistry, type TypeTag } from './registry.js';
import { describeKind, type Value } from './values.js';

export class Chaperon {
  readonly type: TypeTag;
  readonly value: Value;

  /**
   * Wrap a value. Without an explicit type the type is inferred, and
   * anything outside the supported value space is rejected.
   */
  constructor(value: unknown, type?: TypeTag) {
    if (type === undefined) {
      if (value === undefined) {
        throw new ConversionError(ErrorCodes.UNSUPPORTED_TYPE, 'cannot wrap undefined');
      }
      const frozen = coerceAny(value);
      this.type = inferType(frozen);
      this.value = frozen;
    } else {
      this.type = type;
      this.value = coerceValue(value, type);
    }
    Object.freeze(this);
  }

  static fromLine(registry: TypeRegistry, type: TypeTag, line: string): Chaperon {
    return new Chaperon(registry.fromLine(type, line), type);
  }

  static fromFile(registry: TypeRegistry, type: TypeTag, path: string): Chaperon {
    return new Chaperon(registry.fromFile(type, path), type);
  }

  toLine(registry: TypeRegistry): string {
    return registry.toLine(this.type, this.value);
  }

  toFile(registry: TypeRegistry, path: string): void {
    registry.toFile(this.type, this.value, path);
  }

  toString(): string {
    return new TypeRegistry().toLine(this.type, this.value);
  }
}

function coerceAny(value: unknown): Value {
  for (const tag of ['none', 'bool', 'text', 'float', 'long', 'datetime', 'date', 'dict', 'list', 'table'] as const) {
    try {
      return coerceValue(value, tag);
    } catch (error) {
      if (!(error instanceof ConversionError) || error.code !== ErrorCodes.TYPE_MISMATCH) throw error;
    }
  }
  throw new ConversionError(ErrorCodes.UNSUPPORTED_TYPE, `unsupported value: ${describeKind(value)}`);
}
