import { CalendarDate, formatTimestamp } from './calendar-date';
import { MalformedAddressError } from './errors';
import { CellValue, Literal, RawRow } from './types';

const DIGITS = /^\d+$/;
const DECIMAL = /^(\d+\.\d*|\.\d+)$/;

function parseNumberMarker(text: string, payload: string): Literal {
  const value = Number(payload.trim());
  if (payload.trim() === '' || Number.isNaN(value)) {
    throw new MalformedAddressError(text, 'numeric literal expected');
  }
  return { kind: 'number', value };
}

/**
 * Evaluate a boundary or substitute-value literal.
 *
 * `T:abc` and `T(abc)` force text, `N:1.5` and `N(1.5)` force a number,
 * bare digit strings are integers and bare single-dot decimals are numbers.
 * Everything else passes through as text.
 */
export function parseLiteral(text: string): Literal {
  if (text.startsWith('T:')) return { kind: 'text', value: text.slice(2) };
  if (text.startsWith('T(') && text.endsWith(')')) return { kind: 'text', value: text.slice(2, -1) };
  if (text.startsWith('N:')) return parseNumberMarker(text, text.slice(2));
  if (text.startsWith('N(') && text.endsWith(')')) return parseNumberMarker(text, text.slice(2, -1));
  if (DIGITS.test(text)) return { kind: 'integer', value: Number.parseInt(text, 10) };
  if (DECIMAL.test(text)) return { kind: 'number', value: Number.parseFloat(text) };
  return { kind: 'text', value: text };
}

export function isBlank(value: CellValue | undefined): boolean {
  return value === null || value === undefined || value === '';
}

function isMidnight(date: Date): boolean {
  return (
    date.getHours() === 0 &&
    date.getMinutes() === 0 &&
    date.getSeconds() === 0 &&
    date.getMilliseconds() === 0
  );
}

/**
 * Drop redundant precision: `-0` becomes `0` and a timestamp at exactly
 * midnight becomes a date-only value. Integral numbers are already integers.
 */
export function trimValue(value: CellValue): CellValue {
  if (typeof value === 'number') {
    return Object.is(value, -0) ? 0 : value;
  }
  if (value instanceof Date && !Number.isNaN(value.getTime()) && isMidnight(value)) {
    return CalendarDate.fromDate(value);
  }
  return value;
}

export function trimRow(row: RawRow): CellValue[] {
  return row.map(trimValue);
}

export function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatTimestamp(value);
  return String(value);
}
