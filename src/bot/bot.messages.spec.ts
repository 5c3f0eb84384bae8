import { loadConfig } from "../config/bot-config";
import { ShelfLifeService } from "../shelf-life/shelf-life.service";
import { diagnosticsReply, formatDay, helpText, orderReply, pickupReply, reloadDone } from "./bot.messages";

const config = loadConfig({ BOT_ENABLED: "false" });
const shelfLife = new ShelfLifeService(config);

describe("bot messages", () => {
  it("formats a day with its short weekday", () => {
    expect(formatDay({ year: 2025, month: 11, day: 13 })).toBe("13.11.2025 (чт)");
    expect(formatDay({ year: 2025, month: 11, day: 16 })).toBe("16.11.2025 (вс)");
  });

  it("puts the zones and parameters in the help text", () => {
    const lines = helpText(config).split("\n");
    expect(lines[0]).toBe("👋 Введи дату сборки (Аша, UTC+5), чтобы проверить допустимую дату производства.");
    expect(lines[3]).toBe(
      "Правило недели: Чт–Вс → доставка в ближайший понедельник (Москва, UTC+3). " +
        "Пн–Ср → доставка в эту же дату (Москва, UTC+3).",
    );
    expect(lines[4]).toBe("Параметры: СГ=360 дн, ОСГ≥82%, запас 2 дн.");
  });

  it("answers a Thursday pickup with Monday delivery", () => {
    const result = shelfLife.forPickupText("13.11.2025");
    if (result.status !== "ok") throw new Error("expected a date");
    expect(pickupReply(result, config)).toBe(
      [
        "📦 Сборка (Аша, UTC+5): *13.11.2025 (чт)*",
        "🚚 Доставка (Москва, UTC+3): *17.11.2025 (пн)*",
        "🧾 Производство — *не раньше 15.09.2025* (ОСГ ≥ 82% + 2 дн)",
      ].join("\n"),
    );
  });

  it("escapes Markdown characters in zone labels", () => {
    const labelled = loadConfig({ BOT_ENABLED: "false", PICKUP_TZ_LABEL: "Аша_склад", DELIVERY_TZ_LABEL: "*Москва*" });
    const result = new ShelfLifeService(labelled).forPickupText("13.11.2025");
    if (result.status !== "ok") throw new Error("expected a date");
    const [pickup, delivery] = pickupReply(result, labelled).split("\n");
    expect(pickup).toBe("📦 Сборка (Аша\\_склад, UTC+5): *13.11.2025 (чт)*");
    expect(delivery).toBe("🚚 Доставка (\\*Москва\\*, UTC+3): *17.11.2025 (пн)*");
  });

  it("answers an order lookup", () => {
    const window = shelfLife.forDelivery({ year: 2025, month: 11, day: 10 });
    expect(orderReply({ status: "ok", key: "A-1", rawDeliveryDate: "10.11.2025", window }, config)).toBe(
      [
        "📦 Заказ: A-1",
        "📅 Дата доставки: 10.11.2025",
        "🎯 Требуемый ОСГ: ≥ 82%",
        "🏭 Производство — не раньше: 08.09.2025",
        "ℹ️ Параметры: СГ=360 дней, буфер=2 дн.",
      ].join("\n"),
    );
  });

  it("explains lookups that went wrong", () => {
    expect(orderReply({ status: "missing-date", key: "A-1" }, config)).toBe(
      "📦 Заказ: A-1\n⚠️ Дата доставки не найдена",
    );
    expect(orderReply({ status: "unparseable", key: "A-1", rawDeliveryDate: "скоро" }, config)).toBe(
      "📦 Заказ: A-1\n⚠️ Не удалось распознать дату доставки: скоро",
    );
  });

  it("summarizes reload and diagnostics", () => {
    expect(reloadDone(12)).toBe("✅ Загружено 12 заказов из таблицы.");
    expect(
      diagnosticsReply({
        spreadsheetTitle: "Книга",
        tabs: ["Orders", "Archive"],
        tab: "Orders",
        header: ["OrderNo", "DeliveryDate"],
        dataRows: 3,
      }),
    ).toBe(
      [
        "✅ Подключение к таблице — OK",
        "Книга: Книга",
        "Листы: Orders, Archive",
        "Использую лист: Orders",
        "Заголовки первой строки: [OrderNo, DeliveryDate]",
        "Строк с данными: 3",
      ].join("\n"),
    );
  });
});
