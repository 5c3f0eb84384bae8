import { type CalendarDate, addDays, weekday } from "./calendar-date";
import { parseFixedDate } from "./fixed-date";

type HumanDateRule = {
  pattern: RegExp;
  resolve: (m: RegExpMatchArray, today: CalendarDate) => CalendarDate | null;
};

export const WEEKDAY_ALIASES: Readonly<Record<string, number>> = {
  пн: 0,
  вт: 1,
  ср: 2,
  чт: 3,
  пт: 4,
  сб: 5,
  вс: 6,
  mon: 0,
  tue: 1,
  wed: 2,
  thu: 3,
  fri: 4,
  sat: 5,
  sun: 6,
};

/** Next occurrence strictly after today: asking for today's weekday means +7. */
export function nextWeekday(today: CalendarDate, target: number) {
  const delta = (target - weekday(today) + 7) % 7;
  return addDays(today, delta === 0 ? 7 : delta);
}

function weekdayRule(m: RegExpMatchArray, today: CalendarDate) {
  const target = WEEKDAY_ALIASES[m[1]];
  return target === undefined ? null : nextWeekday(today, target);
}

const RULES: readonly HumanDateRule[] = [
  { pattern: /^(?:сегодня|today)$/, resolve: (_m, today) => today },
  { pattern: /^(?:завтра|tomorrow)$/, resolve: (_m, today) => addDays(today, 1) },
  {
    pattern: /^(?:послезавтра|day after tomorrow)$/,
    resolve: (_m, today) => addDays(today, 2),
  },
  {
    pattern: /^через\s+(\d{1,4})(?:\s*(?:день|дня|дней|дн\.?))?$/,
    resolve: (m, today) => addDays(today, Number(m[1])),
  },
  {
    pattern: /^in\s+(\d{1,4})\s+days?$/,
    resolve: (m, today) => addDays(today, Number(m[1])),
  },
  { pattern: /^(?:в|во)\s*(пн|вт|ср|чт|пт|сб|вс)$/, resolve: weekdayRule },
  { pattern: /^on\s+(mon|tue|wed|thu|fri|sat|sun)$/, resolve: weekdayRule },
];

/**
 * Free-form user input -> calendar date relative to `today`.
 * Relative words first, then the fixed numeric formats. Null when nothing matches.
 */
export function parseHumanDate(input: string, today: CalendarDate): CalendarDate | null {
  const s = String(input ?? "").trim().toLowerCase().replace(/\s+/g, " ");
  if (!s) return null;

  for (const rule of RULES) {
    const m = s.match(rule.pattern);
    if (m) return rule.resolve(m, today);
  }

  return parseFixedDate(s);
}
