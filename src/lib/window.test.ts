import { describe, it, expect } from 'vitest';
import {
  assertWindow,
  formatIsoDate,
  historyWindow,
  isWithinWindow,
  parseIsoDate,
  parseObservationDate,
} from './window';
import { ValidationError } from './errors';

describe('parseIsoDate', () => {
  it('parses calendar dates as UTC midnight', () => {
    expect(parseIsoDate('2024-02-29')).toBe(Date.UTC(2024, 1, 29));
    expect(parseIsoDate('2023-07-04')).toBe(Date.UTC(2023, 6, 4));
  });

  it('rejects impossible or malformed dates', () => {
    expect(parseIsoDate('2023-02-29')).toBeNull();
    expect(parseIsoDate('2023-13-01')).toBeNull();
    expect(parseIsoDate('07/04/2023')).toBeNull();
    expect(parseIsoDate('')).toBeNull();
  });

  it('rejects padding and anything after the date', () => {
    expect(parseIsoDate(' 2023-07-04')).toBeNull();
    expect(parseIsoDate('2023-07-04 ')).toBeNull();
    expect(parseIsoDate('2023-07-04T05:00')).toBeNull();
    expect(parseIsoDate('2023-07-04xyz')).toBeNull();
  });
});

describe('parseObservationDate', () => {
  it('keeps the calendar day of a timestamp', () => {
    const july4 = { date: '2023-07-04', ms: Date.UTC(2023, 6, 4) };
    expect(parseObservationDate('2023-07-04')).toEqual(july4);
    expect(parseObservationDate(' 2023-07-04 ')).toEqual(july4);
    expect(parseObservationDate('2023-07-04 23:59')).toEqual(july4);
    expect(parseObservationDate('2023-07-04T12:00:00Z')).toEqual(july4);
    expect(parseObservationDate('2023-07-04T12:00:00.000-07:00')).toEqual(july4);
  });

  it('rejects trailing text that is not a time of day', () => {
    expect(parseObservationDate('2023-07-04xyz')).toBeNull();
    expect(parseObservationDate('2023-07-04 noon')).toBeNull();
    expect(parseObservationDate('2023-02-30T00:00')).toBeNull();
  });
});

describe('historyWindow', () => {
  const NOW = Date.UTC(2024, 5, 15, 18, 30);

  it('ends today and spans 365 days per year', () => {
    expect(historyWindow(5, NOW)).toEqual({ begin: '2019-06-17', end: '2024-06-15' });
    expect(historyWindow(1, NOW)).toEqual({ begin: '2023-06-16', end: '2024-06-15' });
  });

  it('defaults to five years', () => {
    expect(historyWindow(undefined, NOW).begin).toBe('2019-06-17');
  });

  it('rejects non-positive or fractional years', () => {
    expect(() => historyWindow(0, NOW)).toThrow(ValidationError);
    expect(() => historyWindow(2.5, NOW)).toThrow(ValidationError);
  });
});

describe('assertWindow', () => {
  it('accepts a single-day window', () => {
    expect(assertWindow({ begin: '2023-05-01', end: '2023-05-01' })).toEqual({
      begin: '2023-05-01',
      end: '2023-05-01',
    });
  });

  it('rejects reversed or malformed windows', () => {
    expect(() => assertWindow({ begin: '2023-05-02', end: '2023-05-01' })).toThrow(
      'Invalid date window: begin must not be after end'
    );
    expect(() => assertWindow({ begin: '2023-5-1', end: '2023-05-01' })).toThrow(
      'Invalid date window: begin: expected YYYY-MM-DD'
    );
    expect(() => assertWindow('2023')).toThrow(ValidationError);
  });

  it('rejects padded dates and trailing text', () => {
    expect(() => assertWindow({ begin: ' 2023-01-01T05:00', end: '2023-01-02' })).toThrow(
      'Invalid date window: begin: expected YYYY-MM-DD'
    );
    expect(() => assertWindow({ begin: '2023-01-01', end: '2023-01-02xyz' })).toThrow(
      'Invalid date window: end: expected YYYY-MM-DD'
    );
    expect(() => assertWindow({ begin: '2023-01-01 ', end: '2023-01-02' })).toThrow(ValidationError);
  });
});

describe('isWithinWindow', () => {
  const window = { begin: '2023-01-01', end: '2023-01-31' };

  it('includes both end points', () => {
    expect(isWithinWindow(Date.UTC(2023, 0, 1), window)).toBe(true);
    expect(isWithinWindow(Date.UTC(2023, 0, 31), window)).toBe(true);
    expect(isWithinWindow(Date.UTC(2022, 11, 31), window)).toBe(false);
    expect(isWithinWindow(Date.UTC(2023, 1, 1), window)).toBe(false);
  });
});

describe('formatIsoDate', () => {
  it('formats in UTC', () => {
    expect(formatIsoDate(new Date(Date.UTC(2023, 0, 9, 23, 59)))).toBe('2023-01-09');
  });
});
