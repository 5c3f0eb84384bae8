import { Inject, Injectable, Logger } from "@nestjs/common";
import { BOT_CONFIG, type BotConfig } from "../config/bot-config";
import { parseSheetDate } from "../dates/fixed-date";
import { ShelfLifeService } from "../shelf-life/shelf-life.service";
import type { ProductionWindow } from "../shelf-life/production-date";
import { describeTable, extractOrderRecords, type SheetDiagnostics } from "../sheets/sheet-rows";
import { ORDER_SHEET_SOURCE, type OrderSheetSource } from "../sheets/sheet-source";
import { OrdersCache, type OrdersSnapshot } from "./orders-cache";

export type OrderLookup =
  | { status: "ok"; key: string; rawDeliveryDate: string; window: ProductionWindow }
  | { status: "not-found"; key: string }
  | { status: "missing-date"; key: string }
  | { status: "unparseable"; key: string; rawDeliveryDate: string };

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);
  private inflight: Promise<OrdersSnapshot> | null = null;

  constructor(
    @Inject(ORDER_SHEET_SOURCE) private readonly source: OrderSheetSource,
    @Inject(BOT_CONFIG) private readonly config: BotConfig,
    private readonly cache: OrdersCache,
    private readonly shelfLife: ShelfLifeService,
  ) {}

  snapshot() {
    return this.cache.current();
  }

  shelfLifeSettings() {
    return this.shelfLife.settings;
  }

  /**
   * Re-read the sheet and swap the cache. Calls made while a load is running
   * share it. On failure the previous snapshot stays and the error propagates.
   */
  reload(): Promise<OrdersSnapshot> {
    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async load() {
    const table = await this.source.readTable();
    const records = extractOrderRecords(table, this.config.sheet);
    const snapshot = this.cache.replace(records, {
      loadedAt: new Date(),
      sheetTitle: `${table.spreadsheetTitle} / ${table.tab}`,
    });
    this.logger.log(`Loaded ${snapshot.records.size} orders from ${this.source.kind} sheet ${snapshot.sheetTitle}`);
    return snapshot;
  }

  async diagnose(): Promise<SheetDiagnostics> {
    return describeTable(await this.source.readTable());
  }

  lookup(key: string): OrderLookup {
    const rawDeliveryDate = this.cache.get(key);
    if (rawDeliveryDate === undefined) return { status: "not-found", key };
    if (!rawDeliveryDate) return { status: "missing-date", key };

    const delivery = parseSheetDate(rawDeliveryDate);
    if (!delivery) return { status: "unparseable", key, rawDeliveryDate };

    return { status: "ok", key, rawDeliveryDate, window: this.shelfLife.forDelivery(delivery) };
  }
}
