import { Module } from "@nestjs/common";
import { SheetsModule } from "../sheets/sheets.module";
import { ShelfLifeModule } from "../shelf-life/shelf-life.module";
import { OrdersCache } from "./orders-cache";
import { OrdersController } from "./orders.controller";
import { OrdersService } from "./orders.service";

@Module({
  imports: [SheetsModule, ShelfLifeModule],
  controllers: [OrdersController],
  providers: [OrdersCache, OrdersService],
  exports: [OrdersService],
})
export class OrdersModule {}
