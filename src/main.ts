import "dotenv/config";
import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { BOT_CONFIG, type BotConfig } from "./config/bot-config";

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { abortOnError: false });
  app.enableShutdownHooks();

  const config = app.get<BotConfig>(BOT_CONFIG);
  await app.listen(config.port);
  Logger.log(`OSG bot API listening on http://localhost:${config.port}`, "Bootstrap");
}

bootstrap().catch((err: unknown) => {
  // ConfigError lands here: fail fast with every issue listed
  Logger.error(err instanceof Error ? err.message : String(err), "Bootstrap");
  process.exitCode = 1;
});
