/**
 * Fixed numeric date formats. Order matters: first match wins.
 */

import { type CalendarDate, calendarDate, fromUtcMs } from "./calendar-date";

type FixedFormat = {
  name: string;
  pattern: RegExp;
  toParts: (m: RegExpMatchArray) => [year: number, month: number, day: number];
};

function twoDigitYear(yy: string) {
  return 2000 + Number(yy);
}

export const FIXED_FORMATS: readonly FixedFormat[] = [
  {
    name: "YYYY-MM-DD",
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    toParts: (m) => [Number(m[1]), Number(m[2]), Number(m[3])],
  },
  {
    name: "DD.MM.YYYY",
    pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/,
    toParts: (m) => [Number(m[3]), Number(m[2]), Number(m[1])],
  },
  {
    name: "DD/MM/YYYY",
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    toParts: (m) => [Number(m[3]), Number(m[2]), Number(m[1])],
  },
  {
    name: "DD.MM.YY",
    pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{2})$/,
    toParts: (m) => [twoDigitYear(m[3]), Number(m[2]), Number(m[1])],
  },
  {
    name: "DD/MM/YY",
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/,
    toParts: (m) => [twoDigitYear(m[3]), Number(m[2]), Number(m[1])],
  },
];

export function parseFixedDate(input: string): CalendarDate | null {
  const s = String(input ?? "").trim();
  if (!s) return null;

  for (const fmt of FIXED_FORMATS) {
    const m = s.match(fmt.pattern);
    if (!m) continue;
    const [year, month, day] = fmt.toParts(m);
    // a pattern hit with an impossible day is still "not recognized"
    return calendarDate(year, month, day);
  }
  return null;
}

// Workbook serial day numbers count from 1899-12-30.
const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);
const SERIAL_REGEX = /^(\d{5})(?:\.\d+)?$/;
const TRAILING_TIME_REGEX = /[ T]\d{1,2}:\d{2}(?::\d{2})?$/;

/**
 * Delivery dates as they come out of a sheet cell: a fixed-format date,
 * the same followed by a time ("10.11.2025 00:00:00"), or a serial day number.
 */
export function parseSheetDate(raw: string): CalendarDate | null {
  const s = String(raw ?? "").trim();
  if (!s) return null;

  const serial = s.match(SERIAL_REGEX);
  if (serial) {
    return fromUtcMs(SERIAL_EPOCH_MS + Number(serial[1]) * 24 * 60 * 60 * 1000);
  }

  return parseFixedDate(s.replace(TRAILING_TIME_REGEX, ""));
}

function pad2(n: number) {
  return String(n).padStart(2, "0");
}

/** DD.MM.YYYY */
export function formatDate(date: CalendarDate) {
  return `${pad2(date.day)}.${pad2(date.month)}.${date.year}`;
}

/** YYYY-MM-DD */
export function formatIsoDate(date: CalendarDate) {
  return `${date.year}-${pad2(date.month)}-${pad2(date.day)}`;
}
