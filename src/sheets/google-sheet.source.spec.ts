import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { loadConfig } from "../config/bot-config";
import { GoogleSheetSource, type SheetsReader } from "./google-sheet.source";
import { SheetError } from "./sheet-source";

function fakeReader(values: unknown[][], failures: unknown[] = []) {
  const valuesGet = jest.fn(async () => {
    const failure = failures.shift();
    if (failure) throw failure;
    return { data: { values } };
  });
  const reader: SheetsReader = {
    spreadsheets: {
      get: jest.fn(async () => ({
        data: {
          properties: { title: "Заказы 2025" },
          sheets: [{ properties: { title: "Sheet1" } }, { properties: { title: "Orders" } }],
        },
      })),
      values: { get: valuesGet },
    },
  };
  return { reader, valuesGet };
}

describe("GoogleSheetSource", () => {
  let dir: string;
  let credentialsPath: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "osg-gsa-"));
    credentialsPath = join(dir, "gsa.json");
    writeFileSync(credentialsPath, JSON.stringify({ client_email: "bot@example.test" }));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function settings(overrides: { spreadsheetId?: string | null; credentialsPath?: string } = {}) {
    const base = loadConfig({ BOT_ENABLED: "false" }).sheet;
    return { ...base, spreadsheetId: "test-sheet-id", credentialsPath, ...overrides };
  }

  it("reads the named tab and stringifies cells", async () => {
    const { reader, valuesGet } = fakeReader([
      ["OrderNo", "DeliveryDate"],
      [1001, "10.11.2025"],
      ["A-2", null],
    ]);
    const table = await new GoogleSheetSource(settings(), () => reader).readTable();

    expect(table).toEqual({
      spreadsheetTitle: "Заказы 2025",
      tabs: ["Sheet1", "Orders"],
      tab: "Orders",
      rows: [
        ["OrderNo", "DeliveryDate"],
        ["1001", "10.11.2025"],
        ["A-2", ""],
      ],
    });
    expect(valuesGet).toHaveBeenCalledWith({
      spreadsheetId: "test-sheet-id",
      range: "'Orders'",
      majorDimension: "ROWS",
      valueRenderOption: "FORMATTED_VALUE",
    });
  });

  it("retries once on a quota error", async () => {
    const { reader, valuesGet } = fakeReader([["OrderNo", "DeliveryDate"]], [{ code: 429, message: "Quota exceeded" }]);
    const table = await new GoogleSheetSource(settings(), () => reader, 0).readTable();
    expect(valuesGet).toHaveBeenCalledTimes(2);
    expect(table.rows).toEqual([["OrderNo", "DeliveryDate"]]);
  });

  it("does not retry a permission error", async () => {
    const denied = Object.assign(new Error("The caller does not have permission"), { code: 403 });
    const { reader, valuesGet } = fakeReader([], [denied]);
    await expect(new GoogleSheetSource(settings(), () => reader, 0).readTable()).rejects.toThrow(
      "Google Sheets values.get:Orders failed: The caller does not have permission",
    );
    expect(valuesGet).toHaveBeenCalledTimes(1);
  });

  it("checks settings before calling the API", async () => {
    const factory = jest.fn(() => fakeReader([]).reader);
    await expect(new GoogleSheetSource(settings({ spreadsheetId: null }), factory).readTable()).rejects.toThrow(
      "GOOGLE_SHEET_ID is not set",
    );
    await expect(
      new GoogleSheetSource(settings({ credentialsPath: join(dir, "missing.json") }), factory).readTable(),
    ).rejects.toThrow(SheetError);
    expect(factory).not.toHaveBeenCalled();
  });
});
