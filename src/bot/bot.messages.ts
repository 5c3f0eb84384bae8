import type { BotConfig } from "../config/bot-config";
import { type CalendarDate, weekday } from "../dates/calendar-date";
import { formatDate } from "../dates/fixed-date";
import { describeZone } from "../dates/fixed-zone";
import type { OrderLookup } from "../orders/orders.service";
import type { PickupCalculation } from "../shelf-life/shelf-life.service";
import type { SheetDiagnostics } from "../sheets/sheet-rows";

const WEEKDAY_SHORT = ["пн", "вт", "ср", "чт", "пт", "сб", "вс"] as const;

const EXAMPLES = "Примеры: 2025-11-10, 10.11.2025, «в пн», «через 3 дня».";

export const EMPTY_CACHE = "Кэш пуст. Сначала выполните /reload.";
export const PICK_ORDER = "Выбери заказ:";
export const ONE_DATE_ONLY = `Пожалуйста, отправляй одну дату за раз. ${EXAMPLES}`;
export const NOT_RECOGNIZED = `Не распознала дату 🤔\n${EXAMPLES}`;
export const STALE_BUTTON = "Список заказов обновился. Выполните /orders ещё раз.";
export const FAILURE = "Ой, что-то пошло не так. Я записал ошибку в лог.";

// legacy Markdown: these open an entity unless escaped
function escapeMarkdown(text: string) {
  return text.replace(/[_*`[]/g, "\\$&");
}

/** 13.11.2025 (чт) */
export function formatDay(date: CalendarDate) {
  return `${formatDate(date)} (${WEEKDAY_SHORT[weekday(date)]})`;
}

export function helpText(config: BotConfig) {
  const { shelfLife, pickupZone, deliveryZone } = config;
  const delivery = describeZone(deliveryZone);
  return [
    `👋 Введи дату сборки (${describeZone(pickupZone)}), чтобы проверить допустимую дату производства.`,
    "Примеры: 2025-11-10, 10.11.2025, завтра, в пн, через 3 дня.",
    "",
    `Правило недели: Чт–Вс → доставка в ближайший понедельник (${delivery}). ` +
      `Пн–Ср → доставка в эту же дату (${delivery}).`,
    `Параметры: СГ=${shelfLife.shelfLifeDays} дн, ОСГ≥${shelfLife.targetPercent}%, запас ${shelfLife.bufferDays} дн.`,
    "",
    "Заказы из таблицы:",
    "• /reload — перечитать таблицу и обновить кэш",
    "• /orders — показать кнопки с заказами",
    "• /debug — диагностика подключения к таблице",
  ].join("\n");
}

export function startText(config: BotConfig) {
  return `Бот расчёта дат производства для ОСГ.\n${helpText(config)}`;
}

/** Markdown reply for a typed pickup date. */
export function pickupReply(result: Extract<PickupCalculation, { status: "ok" }>, config: BotConfig) {
  const { resolution, window } = result;
  const { targetPercent, bufferDays } = config.shelfLife;
  return [
    `📦 Сборка (${escapeMarkdown(describeZone(resolution.pickupZone))}): *${formatDay(resolution.pickup)}*`,
    `🚚 Доставка (${escapeMarkdown(describeZone(resolution.deliveryZone))}): *${formatDay(resolution.delivery)}*`,
    `🧾 Производство — *не раньше ${formatDate(window.minProduction)}* (ОСГ ≥ ${targetPercent}% + ${bufferDays} дн)`,
  ].join("\n");
}

export function orderReply(result: OrderLookup, config: BotConfig) {
  const head = `📦 Заказ: ${result.key}`;
  switch (result.status) {
    case "not-found":
      return `${head}\n⚠️ Заказ не найден в кэше. Выполните /reload`;
    case "missing-date":
      return `${head}\n⚠️ Дата доставки не найдена`;
    case "unparseable":
      return `${head}\n⚠️ Не удалось распознать дату доставки: ${result.rawDeliveryDate}`;
    case "ok": {
      const { shelfLifeDays, targetPercent, bufferDays } = config.shelfLife;
      return [
        head,
        `📅 Дата доставки: ${formatDate(result.window.delivery)}`,
        `🎯 Требуемый ОСГ: ≥ ${targetPercent}%`,
        `🏭 Производство — не раньше: ${formatDate(result.window.minProduction)}`,
        `ℹ️ Параметры: СГ=${shelfLifeDays} дней, буфер=${bufferDays} дн.`,
      ].join("\n");
    }
  }
}

export function reloadDone(count: number) {
  return `✅ Загружено ${count} заказов из таблицы.`;
}

export function reloadFailed(reason: string) {
  return `⚠️ Ошибка при загрузке данных: ${reason}`;
}

export function diagnosticsReply(d: SheetDiagnostics) {
  return [
    "✅ Подключение к таблице — OK",
    `Книга: ${d.spreadsheetTitle}`,
    `Листы: ${d.tabs.join(", ")}`,
    `Использую лист: ${d.tab}`,
    `Заголовки первой строки: [${d.header.join(", ")}]`,
    `Строк с данными: ${d.dataRows}`,
  ].join("\n");
}

export function diagnosticsFailed(reason: string) {
  return `❌ Ошибка таблицы: ${reason}`;
}
