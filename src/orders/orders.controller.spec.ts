import { BadGatewayException, NotFoundException, UnprocessableEntityException } from "@nestjs/common";
import { Test } from "@nestjs/testing";
import { BOT_CONFIG, loadConfig } from "../config/bot-config";
import { ShelfLifeService } from "../shelf-life/shelf-life.service";
import { ORDER_SHEET_SOURCE, type OrderSheetSource, SheetError } from "../sheets/sheet-source";
import { OrdersCache } from "./orders-cache";
import { OrdersController } from "./orders.controller";
import { OrdersService } from "./orders.service";

describe("OrdersController", () => {
  let controller: OrdersController;
  let failNext = false;

  const source: OrderSheetSource = {
    kind: "xlsx",
    readTable: async () => {
      if (failNext) throw new SheetError("Workbook not found: orders.xlsx");
      return {
        spreadsheetTitle: "orders.xlsx",
        tabs: ["Orders"],
        tab: "Orders",
        rows: [
          ["Contractor", "DeliveryDate"],
          ["ООО Ромашка", "13.11.2025"],
          ["ИП Петров", "когда-то"],
        ],
      };
    },
  };

  beforeEach(async () => {
    failNext = false;
    const moduleRef = await Test.createTestingModule({
      controllers: [OrdersController],
      providers: [
        OrdersService,
        OrdersCache,
        ShelfLifeService,
        { provide: BOT_CONFIG, useValue: loadConfig({ BOT_ENABLED: "false" }) },
        { provide: ORDER_SHEET_SOURCE, useValue: source },
      ],
    }).compile();

    controller = moduleRef.get(OrdersController);
  });

  it("lists nothing before the first reload", () => {
    expect(controller.list()).toEqual({ loadedAt: null, sheet: null, keys: [] });
  });

  it("reloads and looks up a contractor", async () => {
    await expect(controller.reload()).resolves.toMatchObject({ count: 2 });
    expect(controller.list().keys).toEqual(["ИП Петров", "ООО Ромашка"]);

    expect(controller.lookup("ООО Ромашка")).toEqual({
      key: "ООО Ромашка",
      rawDeliveryDate: "13.11.2025",
      deliveryDate: "2025-11-13",
      minProductionDate: "2025-09-11",
      maxElapsedDays: 64.8,
      allowedAgeDays: 63,
      shelfLifeDays: 360,
      targetPercent: 82,
      bufferDays: 2,
      rounding: "ceil",
    });
  });

  it("maps lookup failures to HTTP errors", async () => {
    await controller.reload();
    expect(() => controller.lookup("нет такого")).toThrow(NotFoundException);
    expect(() => controller.lookup("ИП Петров")).toThrow(UnprocessableEntityException);
  });

  it("turns sheet errors into 502", async () => {
    failNext = true;
    await expect(controller.reload()).rejects.toThrow(BadGatewayException);
  });
});
