import { addDays, diffDays, weekday, MONDAY } from "../dates/calendar-date";
import { fixedZone } from "../dates/fixed-zone";
import { daysUntilDelivery, resolveDelivery } from "./delivery-date";

const pickupZone = fixedZone("Аша", 300);
const deliveryZone = fixedZone("Москва", 180);

// Monday 10.11.2025 ... Sunday 16.11.2025
const monday = { year: 2025, month: 11, day: 10 };
const week = Array.from({ length: 7 }, (_, i) => addDays(monday, i));

describe("daysUntilDelivery", () => {
  it("Sunday's +1 and the Thu-Sat countdown agree on Monday", () => {
    expect([0, 1, 2, 3, 4, 5, 6].map(daysUntilDelivery)).toEqual([0, 0, 0, 4, 3, 2, 1]);
    for (let wd = 3; wd <= 6; wd++) {
      expect((wd + daysUntilDelivery(wd)) % 7).toBe(MONDAY);
    }
  });
});

describe("resolveDelivery", () => {
  it("keeps Mon-Wed pickups on the same date", () => {
    for (const pickup of week.slice(0, 3)) {
      const r = resolveDelivery(pickup, pickupZone, deliveryZone);
      expect(r.delivery).toEqual(pickup);
      expect(r.deferred).toBe(false);
    }
  });

  it("moves Thu-Sun pickups to the following Monday", () => {
    for (const pickup of week.slice(3)) {
      const r = resolveDelivery(pickup, pickupZone, deliveryZone);
      expect(r.delivery).toEqual({ year: 2025, month: 11, day: 17 });
      expect(weekday(r.delivery)).toBe(MONDAY);
      const ahead = diffDays(r.delivery, pickup);
      expect(ahead).toBeGreaterThan(0);
      expect(ahead).toBeLessThanOrEqual(7);
      expect(r.deferred).toBe(true);
    }
  });

  it("handles a Sunday pickup across the year boundary", () => {
    const r = resolveDelivery({ year: 2025, month: 12, day: 28 }, pickupZone, deliveryZone);
    expect(r.delivery).toEqual({ year: 2025, month: 12, day: 29 });
    const thu = resolveDelivery({ year: 2026, month: 1, day: 1 }, pickupZone, deliveryZone);
    expect(thu.delivery).toEqual({ year: 2026, month: 1, day: 5 });
  });

  it("stamps noon in the delivery zone for display", () => {
    const r = resolveDelivery(week[3], pickupZone, deliveryZone);
    expect(r.deliveryAt.toISOString()).toBe("2025-11-17T09:00:00.000Z");
    expect(r.deliveryZone).toBe(deliveryZone);
    expect(r.pickupZone).toBe(pickupZone);
  });
});
