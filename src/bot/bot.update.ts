import { Inject, Injectable, Logger } from "@nestjs/common";
import type { Context, Telegraf } from "telegraf";
import { callbackQuery, message } from "telegraf/filters";
import { BOT_CONFIG, type BotConfig } from "../config/bot-config";
import { OrdersService } from "../orders/orders.service";
import { ShelfLifeService } from "../shelf-life/shelf-life.service";
import { NOOP, keyFromCallbackData, ordersKeyboard } from "./bot.keyboard";
import {
  EMPTY_CACHE,
  FAILURE,
  NOT_RECOGNIZED,
  ONE_DATE_ONLY,
  PICK_ORDER,
  STALE_BUTTON,
  diagnosticsFailed,
  diagnosticsReply,
  helpText,
  orderReply,
  pickupReply,
  reloadDone,
  reloadFailed,
  startText,
} from "./bot.messages";

type ReplyCtx = Pick<Context, "reply">;
type FailedCtx = Pick<Context, "reply" | "updateType">;
type ButtonCtx = Pick<Context, "answerCbQuery" | "editMessageText">;

// one date per message
const LIST_SEPARATORS = /[,;\n]/;

function reasonOf(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

@Injectable()
export class BotUpdate {
  private readonly logger = new Logger(BotUpdate.name);

  constructor(
    @Inject(BOT_CONFIG) private readonly config: BotConfig,
    private readonly orders: OrdersService,
    private readonly shelfLife: ShelfLifeService,
  ) {}

  register(bot: Telegraf<Context>) {
    bot.start((ctx) => this.onStart(ctx));
    bot.help((ctx) => this.onHelp(ctx));
    bot.command("reload", (ctx) => this.onReload(ctx));
    bot.command("orders", (ctx) => this.onOrders(ctx));
    bot.command("debug", (ctx) => this.onDebug(ctx));
    bot.on(callbackQuery("data"), (ctx) => this.onOrderButton(ctx, ctx.callbackQuery.data));
    bot.on(message("text"), (ctx) => this.onText(ctx, ctx.message.text));

    bot.catch((err, ctx) => this.onError(err, ctx));
  }

  /** Never rejects: a rejection here would end the polling loop. */
  async onError(err: unknown, ctx: FailedCtx) {
    this.logger.error(`Update ${ctx.updateType} failed: ${reasonOf(err)}`, err instanceof Error ? err.stack : undefined);
    try {
      await ctx.reply(FAILURE);
    } catch (replyErr) {
      this.logger.warn(`Apology not delivered: ${reasonOf(replyErr)}`);
    }
  }

  async onStart(ctx: ReplyCtx) {
    await ctx.reply(startText(this.config));
  }

  async onHelp(ctx: ReplyCtx) {
    await ctx.reply(helpText(this.config));
  }

  async onReload(ctx: ReplyCtx) {
    try {
      const snap = await this.orders.reload();
      await ctx.reply(reloadDone(snap.records.size));
    } catch (err) {
      this.logger.error(`Reload failed: ${reasonOf(err)}`, err instanceof Error ? err.stack : undefined);
      await ctx.reply(reloadFailed(reasonOf(err)));
    }
  }

  async onOrders(ctx: ReplyCtx) {
    const { keys } = this.orders.snapshot();
    if (!keys.length) {
      await ctx.reply(EMPTY_CACHE);
      return;
    }
    await ctx.reply(PICK_ORDER, ordersKeyboard(keys));
  }

  async onDebug(ctx: ReplyCtx) {
    try {
      await ctx.reply(diagnosticsReply(await this.orders.diagnose()));
    } catch (err) {
      this.logger.error(`Sheet diagnostics failed: ${reasonOf(err)}`);
      await ctx.reply(diagnosticsFailed(reasonOf(err)));
    }
  }

  async onOrderButton(ctx: ButtonCtx, data: string) {
    await ctx.answerCbQuery();

    const key = keyFromCallbackData(data, this.orders.snapshot().keys);
    if (key === null) {
      await ctx.editMessageText(data === NOOP ? EMPTY_CACHE : STALE_BUTTON);
      return;
    }

    await ctx.editMessageText(orderReply(this.orders.lookup(key), this.config));
  }

  async onText(ctx: ReplyCtx, text: string, now: Date = new Date()) {
    const input = text.trim();
    this.logger.debug(`Text received: ${JSON.stringify(input)}`);

    if (input.startsWith("/")) {
      await ctx.reply(helpText(this.config));
      return;
    }
    if (LIST_SEPARATORS.test(input)) {
      await ctx.reply(ONE_DATE_ONLY);
      return;
    }

    const result = this.shelfLife.forPickupText(input, now);
    if (result.status !== "ok") {
      await ctx.reply(NOT_RECOGNIZED);
      return;
    }
    await ctx.reply(pickupReply(result, this.config), { parse_mode: "Markdown" });
  }
}
