import {
  addDays,
  dayOfWeek,
  isIsoDate,
  isSaturday,
  nextSaturday,
  parseIsoDate,
  startOfWeek,
  todayInTimeZone,
} from '../../../src/lib/dates';

describe('dates', () => {
  describe('parseIsoDate', () => {
    it('parses to UTC midnight', () => {
      expect(parseIsoDate('2026-06-13').toISOString()).toBe('2026-06-13T00:00:00.000Z');
    });

    it('rejects impossible calendar dates', () => {
      expect(() => parseIsoDate('2026-02-30')).toThrow('Invalid date: 2026-02-30');
    });

    it('rejects other formats', () => {
      expect(() => parseIsoDate('13/06/2026')).toThrow('Invalid date: 13/06/2026');
    });
  });

  it('isIsoDate accepts leap days only in leap years', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2023-02-29')).toBe(false);
  });

  it('addDays crosses month and year boundaries', () => {
    expect(addDays('2026-06-13', 1)).toBe('2026-06-14');
    expect(addDays('2026-12-31', 1)).toBe('2027-01-01');
    expect(addDays('2026-06-13', -7)).toBe('2026-06-06');
  });

  it('dayOfWeek counts from Sunday', () => {
    expect(dayOfWeek('2026-06-13')).toBe(6);
    expect(dayOfWeek('2026-06-14')).toBe(0);
    expect(isSaturday('2026-06-13')).toBe(true);
    expect(isSaturday('2026-06-14')).toBe(false);
  });

  describe('nextSaturday', () => {
    it('returns the coming Saturday from a weekday', () => {
      expect(nextSaturday('2026-06-10')).toBe('2026-06-13');
    });

    it('is strictly after a Saturday', () => {
      expect(nextSaturday('2026-06-13')).toBe('2026-06-20');
    });

    it('skips to the following week from a Sunday', () => {
      expect(nextSaturday('2026-06-14')).toBe('2026-06-20');
    });
  });

  it('startOfWeek returns the Monday of the week', () => {
    expect(startOfWeek('2026-06-13')).toBe('2026-06-08');
    expect(startOfWeek('2026-06-14')).toBe('2026-06-08');
    expect(startOfWeek('2026-06-15')).toBe('2026-06-15');
  });

  it('todayInTimeZone follows the timezone, not UTC', () => {
    const instant = new Date('2026-06-14T01:30:00Z');

    expect(todayInTimeZone('America/Sao_Paulo', instant)).toBe('2026-06-13');
    expect(todayInTimeZone('UTC', instant)).toBe('2026-06-14');
  });
});
