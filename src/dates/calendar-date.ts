// src/dates/calendar-date.ts

/**
 * A calendar day with no time component. Month is 1-12.
 * All arithmetic goes through Date.UTC so the host time zone never leaks in.
 */
export type CalendarDate = Readonly<{
  year: number;
  month: number;
  day: number;
}>;

const DAY_MS = 24 * 60 * 60 * 1000;

// Monday = 0 ... Sunday = 6
export const MONDAY = 0;
export const THURSDAY = 3;
export const SUNDAY = 6;

export function isValidCalendarDate(year: number, month: number, day: number) {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
  if (month < 1 || month > 12) return false;
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day >= 1 && day <= lastDay;
}

/** Returns null when the triple is not a real day (31.02, month 13, ...). */
export function calendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (!isValidCalendarDate(year, month, day)) return null;
  return Object.freeze({ year, month, day });
}

export function toUtcMs(date: CalendarDate) {
  return Date.UTC(date.year, date.month - 1, date.day);
}

/** Calendar date of a UTC instant (already shifted to the wanted zone, if any). */
export function fromUtcMs(ms: number): CalendarDate {
  const d = new Date(ms);
  return Object.freeze({
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
  });
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromUtcMs(toUtcMs(date) + days * DAY_MS);
}

/** Whole days from `to` back to `from` (positive when `from` is later). */
export function diffDays(from: CalendarDate, to: CalendarDate) {
  return Math.round((toUtcMs(from) - toUtcMs(to)) / DAY_MS);
}

export function weekday(date: CalendarDate) {
  // getUTCDay: Sunday = 0
  return (new Date(toUtcMs(date)).getUTCDay() + 6) % 7;
}

export function compareDates(a: CalendarDate, b: CalendarDate) {
  return toUtcMs(a) - toUtcMs(b);
}

export function sameDate(a: CalendarDate, b: CalendarDate) {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}
