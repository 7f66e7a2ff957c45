/**
 * Calendar date helpers
 *
 * Shift dates are plain `YYYY-MM-DD` strings. All arithmetic happens at
 * UTC midnight so no local offset can move a date across a day boundary.
 */

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export const SATURDAY = 6;
export const SUNDAY = 0;

/**
 * Parse a `YYYY-MM-DD` string into a UTC-midnight Date
 *
 * @throws Error if the string is not a real calendar date
 */
export const parseIsoDate = (value: string): Date => {
  if (!ISO_DATE_PATTERN.test(value)) {
    throw new Error(`Invalid date: ${value}`);
  }

  const parsed = new Date(`${value}T00:00:00.000Z`);
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value) {
    throw new Error(`Invalid date: ${value}`);
  }

  return parsed;
};

export const isIsoDate = (value: string): boolean => {
  try {
    parseIsoDate(value);
    return true;
  } catch {
    return false;
  }
};

export const formatIsoDate = (date: Date): string => date.toISOString().slice(0, 10);

export const addDays = (value: string, days: number): string =>
  formatIsoDate(new Date(parseIsoDate(value).getTime() + days * DAY_MS));

/**
 * Day of week, 0 = Sunday ... 6 = Saturday
 */
export const dayOfWeek = (value: string): number => parseIsoDate(value).getUTCDay();

export const isSaturday = (value: string): boolean => dayOfWeek(value) === SATURDAY;

/**
 * Next Saturday strictly after the given date
 */
export const nextSaturday = (value: string): string => {
  const daysUntil = (SATURDAY - dayOfWeek(value) + 7) % 7;
  return addDays(value, daysUntil === 0 ? 7 : daysUntil);
};

/**
 * Monday that starts the week containing the date
 */
export const startOfWeek = (value: string): string => {
  const offset = (dayOfWeek(value) + 6) % 7;
  return addDays(value, -offset);
};

/**
 * Today's calendar date in the given IANA timezone
 */
export const todayInTimeZone = (timeZone: string, now: Date = new Date()): string => {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')}`;
};
