import { existsSync } from "fs";
import { basename } from "path";
import * as XLSX from "xlsx";
import type { SheetSettings } from "../config/bot-config";
import { type OrderSheetSource, type SheetTable, SheetError, pickTab } from "./sheet-source";

/**
 * Local workbook (.xlsx/.xls/.csv). Cells are read raw: date cells come back as
 * serial day numbers, so the sheet's display format never decides day/month order.
 */
export class XlsxSheetSource implements OrderSheetSource {
  readonly kind = "xlsx" as const;

  constructor(private readonly settings: SheetSettings) {}

  async readTable(): Promise<SheetTable> {
    const path = this.settings.xlsxPath;
    if (!path) throw new SheetError("ORDERS_XLSX_PATH is not set");
    if (!existsSync(path)) throw new SheetError(`Workbook not found: ${path}`);

    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.readFile(path, { cellDates: false });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SheetError(`Cannot read workbook ${path}: ${reason}`, { cause: err });
    }

    const tabs = [...workbook.SheetNames];
    const tab = pickTab(tabs, this.settings.title);
    const worksheet = workbook.Sheets[tab];
    if (!worksheet) throw new SheetError(`Tab ${tab} is empty`);

    const grid = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
      header: 1,
      raw: true,
      defval: "",
      blankrows: false,
    });

    return {
      spreadsheetTitle: basename(path),
      tabs,
      tab,
      rows: grid.map((row) => row.map((cell) => String(cell ?? ""))),
    };
  }
}
