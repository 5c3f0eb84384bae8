import { type CalendarDate, fromUtcMs } from "./calendar-date";

/** A zone pinned to one UTC offset (no DST), e.g. Moscow = +180. */
export type FixedZone = Readonly<{
  label: string;
  offsetMinutes: number;
}>;

const OFFSET_REGEX = /^(?:utc|gmt)?\s*([+-])(\d{1,2})(?::?(\d{2}))?$/i;

/**
 * "+05:00", "+5", "-0330", "UTC+3" -> minutes east of UTC.
 * Returns null for anything else or for offsets outside -12:00..+14:00.
 */
export function parseOffset(input: string): number | null {
  const m = String(input ?? "").trim().match(OFFSET_REGEX);
  if (!m) return null;
  const [, sign, hStr, mStr] = m;
  const hours = Number(hStr);
  const minutes = mStr ? Number(mStr) : 0;
  if (minutes >= 60) return null;
  const total = (sign === "-" ? -1 : 1) * (hours * 60 + minutes);
  if (total < -12 * 60 || total > 14 * 60) return null;
  return total;
}

export function formatOffset(offsetMinutes: number) {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  const h = Math.floor(abs / 60);
  const m = abs % 60;
  return m ? `UTC${sign}${h}:${String(m).padStart(2, "0")}` : `UTC${sign}${h}`;
}

export function fixedZone(label: string, offsetMinutes: number): FixedZone {
  return Object.freeze({ label: label.trim(), offsetMinutes });
}

/** "Москва, UTC+3" */
export function describeZone(zone: FixedZone) {
  const offset = formatOffset(zone.offsetMinutes);
  return zone.label ? `${zone.label}, ${offset}` : offset;
}

/** Calendar date shown on a wall clock in `zone` at instant `now`. */
export function todayIn(zone: FixedZone, now: Date): CalendarDate {
  return fromUtcMs(now.getTime() + zone.offsetMinutes * 60_000);
}

/** Instant of `hour:minute` local time on `date` in `zone`. */
export function atLocalTime(date: CalendarDate, zone: FixedZone, hour: number, minute = 0) {
  const wallClock = Date.UTC(date.year, date.month - 1, date.day, hour, minute);
  return new Date(wallClock - zone.offsetMinutes * 60_000);
}
