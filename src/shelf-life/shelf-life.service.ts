import { Inject, Injectable } from "@nestjs/common";
import { BOT_CONFIG, type BotConfig } from "../config/bot-config";
import type { CalendarDate } from "../dates/calendar-date";
import { parseFixedDate } from "../dates/fixed-date";
import { todayIn } from "../dates/fixed-zone";
import { parseHumanDate } from "../dates/human-date";
import { type DeliveryResolution, resolveDelivery } from "./delivery-date";
import { type ProductionWindow, type ShelfLifeConfig, productionWindow } from "./production-date";

export type PickupCalculation =
  | { status: "ok"; resolution: DeliveryResolution; window: ProductionWindow }
  | { status: "unrecognized"; input: string };

export type DeliveryCalculation =
  | { status: "ok"; window: ProductionWindow }
  | { status: "unrecognized"; input: string };

@Injectable()
export class ShelfLifeService {
  constructor(@Inject(BOT_CONFIG) private readonly config: BotConfig) {}

  get settings(): ShelfLifeConfig {
    return this.config.shelfLife;
  }

  forDelivery(delivery: CalendarDate): ProductionWindow {
    return productionWindow(delivery, this.config.shelfLife);
  }

  forPickup(pickup: CalendarDate) {
    const resolution = resolveDelivery(pickup, this.config.pickupZone, this.config.deliveryZone);
    return { resolution, window: this.forDelivery(resolution.delivery) };
  }

  /** Free text typed by a user, read against today's date in the pickup zone. */
  forPickupText(text: string, now: Date = new Date()): PickupCalculation {
    const today = todayIn(this.config.pickupZone, now);
    const pickup = parseHumanDate(text, today);
    if (!pickup) return { status: "unrecognized", input: text };
    return { status: "ok", ...this.forPickup(pickup) };
  }

  forDeliveryText(text: string): DeliveryCalculation {
    const delivery = parseFixedDate(text);
    if (!delivery) return { status: "unrecognized", input: text };
    return { status: "ok", window: this.forDelivery(delivery) };
  }
}
