import { type CalendarDate, addDays, weekday, SUNDAY, THURSDAY } from "../dates/calendar-date";
import { type FixedZone, atLocalTime } from "../dates/fixed-zone";

export type DeliveryResolution = Readonly<{
  pickup: CalendarDate;
  pickupZone: FixedZone;
  delivery: CalendarDate;
  deliveryZone: FixedZone;
  /** Noon in the delivery zone. Display only. */
  deliveryAt: Date;
  deferred: boolean;
}>;

const DISPLAY_HOUR = 12;

/**
 * Thu-Sun pickups ship on the next Monday, Mon-Wed ship the same day.
 * Sunday is +1; Thu/Fri/Sat are "days until Monday" (4/3/2).
 */
export function daysUntilDelivery(pickupWeekday: number) {
  if (pickupWeekday === SUNDAY) return 1;
  if (pickupWeekday >= THURSDAY) return 7 - pickupWeekday;
  return 0;
}

/**
 * Pickup day (pickup zone calendar) -> delivery day (delivery zone calendar).
 * The day number carries over between zones as-is.
 */
export function resolveDelivery(
  pickup: CalendarDate,
  pickupZone: FixedZone,
  deliveryZone: FixedZone,
): DeliveryResolution {
  const shift = daysUntilDelivery(weekday(pickup));
  const delivery = addDays(pickup, shift);

  return Object.freeze({
    pickup,
    pickupZone,
    delivery,
    deliveryZone,
    deliveryAt: atLocalTime(delivery, deliveryZone, DISPLAY_HOUR),
    deferred: shift > 0,
  });
}
