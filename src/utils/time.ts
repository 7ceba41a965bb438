/**
 * Calendar arithmetic in a fixed civil UTC offset (no daylight saving).
 */

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

/** UTC-3 */
export const DEFAULT_UTC_OFFSET_MINUTES = -180;

export interface CalendarDay {
  year: number;
  month: number; // 1-12
  day: number;
}

/**
 * Half-open instant range [start, end)
 */
export interface TimeRange {
  start: Date;
  end: Date;
}

export function calendarDayOf(
  instant: Date,
  offsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES,
): CalendarDay {
  const shifted = new Date(instant.getTime() + offsetMinutes * MINUTE_MS);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

export function addDays(day: CalendarDay, amount: number): CalendarDay {
  const date = new Date(Date.UTC(day.year, day.month - 1, day.day + amount));
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  };
}

export function isValidCalendarDay(day: CalendarDay): boolean {
  if (!Number.isInteger(day.year) || !Number.isInteger(day.month) || !Number.isInteger(day.day)) {
    return false;
  }
  if (day.month < 1 || day.month > 12 || day.day < 1) {
    return false;
  }
  const date = new Date(Date.UTC(day.year, day.month - 1, day.day));
  return (
    date.getUTCFullYear() === day.year &&
    date.getUTCMonth() === day.month - 1 &&
    date.getUTCDate() === day.day
  );
}

export function dayRange(
  day: CalendarDay,
  offsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES,
): TimeRange {
  const start = new Date(
    Date.UTC(day.year, day.month - 1, day.day) - offsetMinutes * MINUTE_MS,
  );
  return { start, end: new Date(start.getTime() + DAY_MS) };
}

/**
 * Range covering `days` calendar days ending with (and including) `lastDay`
 */
export function trailingDaysRange(
  lastDay: CalendarDay,
  days: number,
  offsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES,
): TimeRange {
  const first = addDays(lastDay, -(Math.max(1, days) - 1));
  return {
    start: dayRange(first, offsetMinutes).start,
    end: dayRange(lastDay, offsetMinutes).end,
  };
}

const pad = (value: number): string => String(value).padStart(2, '0');

export function formatDay(day: CalendarDay): string {
  return `${pad(day.day)}/${pad(day.month)}/${day.year}`;
}

export function formatClock(
  instant: Date,
  offsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES,
): string {
  const shifted = new Date(instant.getTime() + offsetMinutes * MINUTE_MS);
  return `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}`;
}

/**
 * IANA `Etc/GMT±N` zone for a whole-hour offset, undefined otherwise.
 * The Etc names carry the inverted sign: UTC-3 is `Etc/GMT+3`.
 */
export function offsetTimeZone(offsetMinutes: number): string | undefined {
  if (offsetMinutes % 60 !== 0) {
    return undefined;
  }
  const hours = -offsetMinutes / 60;
  if (hours === 0) {
    return 'Etc/GMT';
  }
  if (hours < -14 || hours > 12) {
    return undefined;
  }
  return hours > 0 ? `Etc/GMT+${hours}` : `Etc/GMT${hours}`;
}

export function sameDay(a: CalendarDay, b: CalendarDay): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}
