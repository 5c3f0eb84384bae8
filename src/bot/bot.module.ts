import { Module } from "@nestjs/common";
import { OrdersModule } from "../orders/orders.module";
import { ShelfLifeModule } from "../shelf-life/shelf-life.module";
import { BotService } from "./bot.service";
import { BotUpdate } from "./bot.update";

@Module({
  imports: [OrdersModule, ShelfLifeModule],
  providers: [BotUpdate, BotService],
})
export class BotModule {}
