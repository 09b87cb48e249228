import { describe, it, expect } from 'vitest';
import { DateParseError, inferYear, parseDateRange } from '../../src/domain/index.js';

describe('parseDateRange', () => {
  it('infers next year for an early-year month/day seen in December', () => {
    expect(parseDateRange('1/15', '2025-12-01')).toEqual({ start: '2026-01-15', end: null });
    expect(parseDateRange('3/1', '2025-12-01')).toEqual({ start: '2026-03-01', end: null });
  });

  it('keeps a date from earlier this month in the current year', () => {
    expect(parseDateRange('11/20', '2025-12-01')).toEqual({ start: '2025-11-20', end: null });
  });

  it('wraps a range end into the following year', () => {
    expect(parseDateRange('12/28〜1/3', '2025-12-01')).toEqual({ start: '2025-12-28', end: '2026-01-03' });
  });

  it('reads the adjacent-date shorthand', () => {
    expect(parseDateRange('2025年8月1日(金)・3日(日)', '2025-07-01'))
      .toEqual({ start: '2025-08-01', end: '2025-08-03' });
  });

  it('lets a bare end day inherit the start month and year', () => {
    expect(parseDateRange('8月1日〜3日', '2025-07-01')).toEqual({ start: '2025-08-01', end: '2025-08-03' });
  });

  it('reads ranges that cross a month boundary', () => {
    expect(parseDateRange('8月30日～9月2日', '2025-07-01')).toEqual({ start: '2025-08-30', end: '2025-09-02' });
  });

  it('strips circled weekday glyphs', () => {
    expect(parseDateRange('2025年8月1日㈮', '2025-07-01')).toEqual({ start: '2025-08-01', end: null });
  });

  it.each([
    '2025年8月1日(金)・3日(日)',
    '8月1日〜3日',
    '8月30日～9月2日',
    '令和7年8月1日〜3日',
    '2025年8月2日・9日・16日',
    '12/28〜1/3',
  ])('never ends before it starts: %s', (text) => {
    const { start, end } = parseDateRange(text, '2025-07-01');
    expect(end).not.toBeNull();
    expect(start <= (end ?? '')).toBe(true);
  });

  it('takes the first and last entries of a date list', () => {
    expect(parseDateRange('2025年8月2日・9日・16日', '2025-07-01'))
      .toEqual({ start: '2025-08-02', end: '2025-08-16' });
  });

  it('converts era years', () => {
    expect(parseDateRange('令和7年5月3日', '2025-04-01')).toEqual({ start: '2025-05-03', end: null });
  });

  it('ignores weekday annotations and clock times', () => {
    expect(parseDateRange('2025/08/01(金) 18:00〜21:00', '2025-07-01'))
      .toEqual({ start: '2025-08-01', end: null });
  });

  it('reads dashed ISO-style dates', () => {
    expect(parseDateRange('2025-08-01', '2025-07-01')).toEqual({ start: '2025-08-01', end: null });
  });

  it('accepts a date exactly at the future horizon and rejects one past it', () => {
    expect(parseDateRange('2027年1月1日', '2025-01-01')).toEqual({ start: '2027-01-01', end: null });
    expect(() => parseDateRange('2028年1月1日', '2025-01-01')).toThrow(
      'Cannot parse date "2028年1月1日": date is invalid or more than 730 days ahead',
    );
  });

  it('rejects impossible calendar dates', () => {
    expect(() => parseDateRange('2/30', '2025-12-01')).toThrow(DateParseError);
  });

  it('throws DateParseError carrying the original text when no date is present', () => {
    try {
      parseDateRange('未定', '2025-12-01');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DateParseError);
      expect((err as DateParseError).text).toBe('未定');
      expect((err as DateParseError).message).toBe('Cannot parse date "未定": no date token found');
    }
  });

  it('throws on blank text', () => {
    expect(() => parseDateRange('  ', '2025-12-01')).toThrow('Cannot parse date "  ": empty date text');
  });
});

describe('inferYear', () => {
  it('keeps the current year for upcoming dates', () => {
    expect(inferYear(8, 2, '2025-07-01')).toBe(2025);
  });

  it('tolerates dates up to 30 days in the past', () => {
    expect(inferYear(6, 1, '2025-07-01')).toBe(2025);
    expect(inferYear(5, 31, '2025-07-01')).toBe(2026);
  });
});
