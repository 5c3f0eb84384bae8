import { formatIsoDate } from "../dates/fixed-date";
import { describeZone } from "../dates/fixed-zone";
import type { DeliveryResolution } from "./delivery-date";
import type { ProductionWindow, ShelfLifeConfig } from "./production-date";

export function toWindowDto(window: ProductionWindow, config: ShelfLifeConfig) {
  return {
    deliveryDate: formatIsoDate(window.delivery),
    minProductionDate: formatIsoDate(window.minProduction),
    maxElapsedDays: window.maxElapsedDays,
    allowedAgeDays: window.allowedAgeDays,
    shelfLifeDays: config.shelfLifeDays,
    targetPercent: config.targetPercent,
    bufferDays: config.bufferDays,
    rounding: config.rounding,
  };
}

export function toResolutionDto(resolution: DeliveryResolution) {
  return {
    pickupDate: formatIsoDate(resolution.pickup),
    pickupZone: describeZone(resolution.pickupZone),
    deliveryZone: describeZone(resolution.deliveryZone),
    deliveryAt: resolution.deliveryAt.toISOString(),
    deferred: resolution.deferred,
  };
}
