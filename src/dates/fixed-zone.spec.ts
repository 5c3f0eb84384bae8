import { calendarDate } from "./calendar-date";
import { atLocalTime, describeZone, fixedZone, formatOffset, parseOffset, todayIn } from "./fixed-zone";

describe("parseOffset", () => {
  it("reads the usual spellings", () => {
    expect(parseOffset("+05:00")).toBe(300);
    expect(parseOffset("+3")).toBe(180);
    expect(parseOffset("UTC+3")).toBe(180);
    expect(parseOffset("-0330")).toBe(-210);
    expect(parseOffset("+05:45")).toBe(345);
  });

  it("returns null for garbage or out-of-range offsets", () => {
    expect(parseOffset("Europe/Moscow")).toBeNull();
    expect(parseOffset("+15:00")).toBeNull();
    expect(parseOffset("+05:75")).toBeNull();
    expect(parseOffset("")).toBeNull();
  });
});

describe("formatOffset / describeZone", () => {
  it("prints whole and fractional hours", () => {
    expect(formatOffset(300)).toBe("UTC+5");
    expect(formatOffset(-210)).toBe("UTC-3:30");
    expect(formatOffset(0)).toBe("UTC+0");
  });

  it("prefixes the label when there is one", () => {
    expect(describeZone(fixedZone("Москва", 180))).toBe("Москва, UTC+3");
    expect(describeZone(fixedZone("  ", 180))).toBe("UTC+3");
  });
});

describe("todayIn", () => {
  const pickup = fixedZone("Аша", 300);
  const delivery = fixedZone("Москва", 180);

  it("gives different calendar days on either side of local midnight", () => {
    // 20:30 UTC = 01:30 next day at UTC+5, 23:30 same day at UTC+3
    const now = new Date("2025-11-12T20:30:00Z");
    expect(todayIn(pickup, now)).toEqual({ year: 2025, month: 11, day: 13 });
    expect(todayIn(delivery, now)).toEqual({ year: 2025, month: 11, day: 12 });
  });
});

describe("atLocalTime", () => {
  it("returns the instant of a wall-clock time in the zone", () => {
    const date = calendarDate(2025, 11, 17);
    if (!date) throw new Error("bad date");
    expect(atLocalTime(date, fixedZone("Москва", 180), 12).toISOString()).toBe("2025-11-17T09:00:00.000Z");
  });
});
