import { describe, expect, it } from 'vitest';
import {
  TimeFormatError,
  cdToDatetime,
  datetimeToStr,
  toDateKey,
} from './time.js';

describe('cdToDatetime', () => {
  it('should parse a calendar date as UTC', () => {
    const date = cdToDatetime('1900-Jan-01 00:11');
    expect(date.toISOString()).toBe('1900-01-01T00:11:00.000Z');
  });

  it('should accept month names in any case', () => {
    expect(cdToDatetime('2020-dec-31 23:59').toISOString()).toBe(
      '2020-12-31T23:59:00.000Z',
    );
  });

  it('should throw TimeFormatError for malformed input', () => {
    expect(() => cdToDatetime('2020-01-01 00:00')).toThrow(TimeFormatError);
    expect(() => cdToDatetime('yesterday')).toThrow('Invalid calendar date');
  });

  it('should throw TimeFormatError for an unknown month', () => {
    expect(() => cdToDatetime('2020-Foo-01 00:00')).toThrow(
      'Unknown month in calendar date: 2020-Foo-01 00:00',
    );
  });

  it('should reject out-of-range parts instead of rolling over', () => {
    expect(() => cdToDatetime('2021-Feb-30 00:00')).toThrow(
      'Out-of-range calendar date',
    );
    expect(() => cdToDatetime('2021-Feb-01 24:00')).toThrow(TimeFormatError);
  });
});

describe('datetimeToStr', () => {
  it('should format without seconds', () => {
    expect(datetimeToStr(new Date('2020-01-01T00:00:59Z'))).toBe(
      '2020-01-01 00:00',
    );
  });

  it('should zero-pad every part', () => {
    expect(datetimeToStr(new Date('2003-04-05T06:07:00Z'))).toBe(
      '2003-04-05 06:07',
    );
  });
});

describe('toDateKey', () => {
  it('should truncate to the UTC calendar day', () => {
    expect(toDateKey(new Date('2020-01-01T23:59:00Z'))).toBe('2020-01-01');
  });
});
