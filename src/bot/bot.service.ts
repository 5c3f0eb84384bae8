import { Inject, Injectable, Logger, OnApplicationBootstrap, OnApplicationShutdown } from "@nestjs/common";
import { Telegraf } from "telegraf";
import { BOT_CONFIG, type BotConfig } from "../config/bot-config";
import { BotUpdate } from "./bot.update";

@Injectable()
export class BotService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(BotService.name);
  private bot: Telegraf | null = null;

  constructor(
    @Inject(BOT_CONFIG) private readonly config: BotConfig,
    private readonly update: BotUpdate,
  ) {}

  onApplicationBootstrap() {
    const token = this.config.telegramToken;
    if (!this.config.botEnabled || !token) {
      this.logger.log("Telegram bot disabled, HTTP API only");
      return;
    }

    const bot = new Telegraf(token);
    this.update.register(bot);

    // launch() drops a leftover webhook itself and resolves only when polling stops
    bot.launch({ dropPendingUpdates: true }).catch((err: unknown) => {
      this.logger.error(`Bot polling stopped: ${err instanceof Error ? err.message : String(err)}`);
      this.bot = null;
    });
    this.bot = bot;
    this.logger.log("Bot started, waiting for messages");
  }

  onApplicationShutdown(signal?: string) {
    if (!this.bot) return;
    this.bot.stop(signal ?? "shutdown");
    this.bot = null;
  }
}
