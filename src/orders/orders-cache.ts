import { Injectable } from "@nestjs/common";
import type { OrderRecord } from "./order-record";

export type OrdersSnapshot = Readonly<{
  records: ReadonlyMap<string, string>;
  keys: readonly string[];
  loadedAt: Date | null;
  sheetTitle: string | null;
}>;

export const EMPTY_SNAPSHOT: OrdersSnapshot = Object.freeze({
  records: new Map<string, string>(),
  keys: Object.freeze([]),
  loadedAt: null,
  sheetTitle: null,
});

/**
 * key -> raw delivery date. The whole snapshot is swapped by reference,
 * never edited, so a reader holds either the old one or the new one.
 */
@Injectable()
export class OrdersCache {
  private snapshot: OrdersSnapshot = EMPTY_SNAPSHOT;

  current(): OrdersSnapshot {
    return this.snapshot;
  }

  replace(records: readonly OrderRecord[], meta: { loadedAt: Date; sheetTitle: string }) {
    const map = new Map<string, string>();
    for (const r of records) map.set(r.key, r.rawDeliveryDate);

    const next: OrdersSnapshot = Object.freeze({
      records: map,
      keys: Object.freeze(Array.from(map.keys()).sort()),
      loadedAt: meta.loadedAt,
      sheetTitle: meta.sheetTitle,
    });
    this.snapshot = next;
    return next;
  }

  get size() {
    return this.snapshot.records.size;
  }

  get(key: string) {
    return this.snapshot.records.get(key);
  }
}
