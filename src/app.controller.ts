import { Controller, Get } from "@nestjs/common";
import { OrdersService } from "./orders/orders.service";

@Controller("/api")
export class AppController {
  constructor(private readonly orders: OrdersService) {}

  @Get("health")
  health() {
    const snap = this.orders.snapshot();
    return {
      ok: true,
      orders: snap.records.size,
      loadedAt: snap.loadedAt?.toISOString() ?? null,
    };
  }
}
