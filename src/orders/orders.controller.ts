import {
  BadGatewayException,
  Controller,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  Post,
  UnprocessableEntityException,
} from "@nestjs/common";
import { SheetError } from "../sheets/sheet-source";
import { toWindowDto } from "../shelf-life/shelf-life.dto";
import { OrdersService } from "./orders.service";

@Controller("/api/orders")
export class OrdersController {
  constructor(private readonly orders: OrdersService) {}

  @Get()
  list() {
    const snap = this.orders.snapshot();
    return {
      loadedAt: snap.loadedAt?.toISOString() ?? null,
      sheet: snap.sheetTitle,
      keys: snap.keys,
    };
  }

  @Post("reload")
  @HttpCode(200)
  async reload() {
    try {
      const snap = await this.orders.reload();
      return { count: snap.records.size, loadedAt: snap.loadedAt?.toISOString() ?? null };
    } catch (err) {
      if (err instanceof SheetError) throw new BadGatewayException(err.message);
      throw err;
    }
  }

  @Get(":key")
  lookup(@Param("key") key: string) {
    const result = this.orders.lookup(key);
    switch (result.status) {
      case "ok":
        return {
          key: result.key,
          rawDeliveryDate: result.rawDeliveryDate,
          ...toWindowDto(result.window, this.orders.shelfLifeSettings()),
        };
      case "not-found":
        throw new NotFoundException(`Order not found: ${key}`);
      case "missing-date":
        throw new UnprocessableEntityException(`Order ${key} has no delivery date`);
      case "unparseable":
        throw new UnprocessableEntityException(
          `Delivery date not recognized for ${key}: ${result.rawDeliveryDate}`,
        );
    }
  }
}
