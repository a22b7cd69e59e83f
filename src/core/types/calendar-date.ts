/**
 * A calendar date without a time of day.
 */
import { ConversionError, ErrorCodes } from '../../utils/errors.js';

const ISO_DATE = /^([0-9]{4})-([0-9]{2})-([0-9]{2})$/;

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : (MONTH_DAYS[month - 1] ?? 0);
}

export class CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;

  constructor(year: number, month: number, day: number) {
    if (!CalendarDate.isValid(year, month, day)) {
      throw new ConversionError(
        ErrorCodes.CONVERSION_FAILED,
        `invalid calendar date: ${year}-${month}-${day}`
      );
    }
    this.year = year;
    this.month = month;
    this.day = day;
    Object.freeze(this);
  }

  static isValid(year: number, month: number, day: number): boolean {
    return (
      Number.isInteger(year) && year >= 0 && year <= 9999 &&
      Number.isInteger(month) && month >= 1 && month <= 12 &&
      Number.isInteger(day) && day >= 1 && day <= daysInMonth(year, month)
    );
  }

  /**
   * Parse a `YYYY-MM-DD` string.
   */
  static parse(text: string): CalendarDate {
    const match = ISO_DATE.exec(text);
    if (!match) {
      throw new ConversionError(ErrorCodes.CONVERSION_FAILED, `invalid calendar date: ${text}`);
    }
    return new CalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  equals(other: CalendarDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }

  toString(): string {
    const year = String(this.year).padStart(4, '0');
    const month = String(this.month).padStart(2, '0');
    const day = String(this.day).padStart(2, '0');
    return `${year}-${month}-${day}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
