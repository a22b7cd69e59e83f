/**
 * Immutable two-dimensional table: named columns of scalar cells.
 */
import { ConversionError, ErrorCodes } from '../../utils/errors.js';
import { containsLineBreak, isScalarValue, scalarsEqual, type ScalarValue } from './scalar.js';

export type TableRow = readonly ScalarValue[];

export class Table {
  readonly headings: readonly string[];
  readonly rows: readonly TableRow[];

  constructor(headings: readonly string[], rows: readonly (readonly unknown[])[] = []) {
    const seen = new Set<string>();
    for (const heading of headings) {
      if (heading === '' || containsLineBreak(heading)) {
        throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `invalid table heading: ${JSON.stringify(heading)}`);
      }
      if (seen.has(heading)) {
        throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `duplicate table heading: ${heading}`);
      }
      seen.add(heading);
    }

    this.headings = Object.freeze([...headings]);
    this.rows = Object.freeze(
      rows.map((row, index) => {
        if (row.length !== headings.length) {
          throw new ConversionError(
            ErrorCodes.CONVERSION_FAILED,
            `table row ${index + 1} has ${row.length} cells, expected ${headings.length}`
          );
        }
        return Object.freeze(row.map((cell) => Table.checkCell(cell, index)));
      })
    );
    Object.freeze(this);
  }

  private static checkCell(cell: unknown, row: number): ScalarValue {
    if (!isScalarValue(cell)) {
      throw new ConversionError(ErrorCodes.UNSUPPORTED_TYPE, `table row ${row + 1} has a non-scalar cell`);
    }
    if (typeof cell === 'string' && containsLineBreak(cell)) {
      throw new ConversionError(ErrorCodes.NOT_DUCTILE, `table row ${row + 1} has a cell containing a line break`);
    }
    return cell;
  }

  /**
   * Build a single-row table from a record of cells.
   */
  static fromRecord(record: Readonly<Record<string, unknown>>): Table {
    const headings = Object.keys(record);
    return new Table(headings, [headings.map((heading) => record[heading])]);
  }

  get rowCount(): number {
    return this.rows.length;
  }

  get columnCount(): number {
    return this.headings.length;
  }

  column(heading: string): readonly ScalarValue[] {
    const index = this.headings.indexOf(heading);
    if (index < 0) {
      throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `no such table column: ${heading}`);
    }
    return this.rows.map((row) => row[index] ?? null);
  }

  /**
   * Rows as records keyed by heading.
   */
  records(): Array<Record<string, ScalarValue>> {
    return this.rows.map((row) =>
      Object.fromEntries(this.headings.map((heading, index) => [heading, row[index] ?? null]))
    );
  }

  equals(other: Table): boolean {
    return (
      this.headings.length === other.headings.length &&
      this.headings.every((heading, index) => heading === other.headings[index]) &&
      this.rows.length === other.rows.length &&
      this.rows.every((row, r) => row.every((cell, c) => scalarsEqual(cell, other.rows[r]?.[c] ?? null)))
    );
  }
}
