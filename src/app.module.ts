import { Module } from "@nestjs/common";
import { AppController } from "./app.controller";
import { BotModule } from "./bot/bot.module";
import { ConfigModule } from "./config/config.module";
import { OrdersModule } from "./orders/orders.module";
import { ShelfLifeModule } from "./shelf-life/shelf-life.module";

@Module({
  imports: [ConfigModule, ShelfLifeModule, OrdersModule, BotModule],
  controllers: [AppController],
})
export class AppModule {}
