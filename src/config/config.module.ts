import { Global, Module } from "@nestjs/common";
import { BOT_CONFIG, loadConfig } from "./bot-config";

@Global()
@Module({
  providers: [{ provide: BOT_CONFIG, useFactory: () => loadConfig(process.env) }],
  exports: [BOT_CONFIG],
})
export class ConfigModule {}
