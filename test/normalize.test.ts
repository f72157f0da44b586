import { describe, expect, it } from 'vitest';

import { CalendarDate } from '../src/calendar-date';
import { MalformedAddressError } from '../src/errors';
import { cellText, isBlank, parseLiteral, trimRow, trimValue } from '../src/normalize';

describe('parseLiteral', () => {
  it('honours explicit markers', () => {
    expect(parseLiteral('T:abc')).toEqual({ kind: 'text', value: 'abc' });
    expect(parseLiteral('T(a b)')).toEqual({ kind: 'text', value: 'a b' });
    expect(parseLiteral('N:2')).toEqual({ kind: 'number', value: 2 });
    expect(parseLiteral('N(2.5)')).toEqual({ kind: 'number', value: 2.5 });
  });

  it('recognizes bare integers and decimals', () => {
    expect(parseLiteral('42')).toEqual({ kind: 'integer', value: 42 });
    expect(parseLiteral('1.5')).toEqual({ kind: 'number', value: 1.5 });
    expect(parseLiteral('.5')).toEqual({ kind: 'number', value: 0.5 });
  });

  it('passes everything else through as text', () => {
    expect(parseLiteral('1.2.3')).toEqual({ kind: 'text', value: '1.2.3' });
    expect(parseLiteral('T(')).toEqual({ kind: 'text', value: 'T(' });
    expect(parseLiteral('')).toEqual({ kind: 'text', value: '' });
  });

  it('rejects a numeric marker without a number', () => {
    expect(() => parseLiteral('N:x')).toThrow(MalformedAddressError);
    expect(() => parseLiteral('N()')).toThrow(MalformedAddressError);
  });
});

describe('trimValue', () => {
  it('turns midnight timestamps into calendar dates', () => {
    const trimmed = trimValue(new Date(2000, 11, 31));
    expect(trimmed).toBeInstanceOf(CalendarDate);
    expect(String(trimmed)).toBe('2000-12-31');
  });

  it('keeps timestamps with a time of day', () => {
    const stamp = new Date(2000, 11, 31, 8, 30);
    expect(trimValue(stamp)).toBe(stamp);
  });

  it('collapses negative zero and leaves other values alone', () => {
    expect(Object.is(trimValue(-0), 0)).toBe(true);
    expect(trimValue(30)).toBe(30);
    expect(trimValue(2.5)).toBe(2.5);
    expect(trimValue('3.0')).toBe('3.0');
    expect(trimValue(null)).toBeNull();
  });

  it('is idempotent', () => {
    const row = [30, -0, new Date(2021, 4, 1), new Date(2021, 4, 1, 12), 'x', null];
    const once = trimRow(row);
    expect(trimRow(once)).toEqual(once);
  });
});

describe('cellText', () => {
  it('renders each value type', () => {
    expect(cellText(null)).toBe('');
    expect(cellText(undefined)).toBe('');
    expect(cellText(new Date(2001, 0, 2, 3, 4, 5))).toBe('2001-01-02 03:04:05');
    expect(cellText(new CalendarDate(2001, 1, 2))).toBe('2001-01-02');
    expect(cellText(2.5)).toBe('2.5');
    expect(cellText(true)).toBe('true');
  });
});

describe('isBlank', () => {
  it('only treats missing values and empty strings as blank', () => {
    expect(isBlank(null)).toBe(true);
    expect(isBlank(undefined)).toBe(true);
    expect(isBlank('')).toBe(true);
    expect(isBlank(' ')).toBe(false);
    expect(isBlank(0)).toBe(false);
    expect(isBlank(false)).toBe(false);
  });
});
