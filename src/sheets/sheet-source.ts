import type { SheetSourceKind } from "../config/bot-config";

export const ORDER_SHEET_SOURCE = "ORDER_SHEET_SOURCE";

/** Raw grid of one tab, every cell already a string. */
export type SheetTable = {
  spreadsheetTitle: string;
  tabs: string[];
  tab: string;
  rows: string[][];
};

export interface OrderSheetSource {
  readonly kind: SheetSourceKind;
  readTable(): Promise<SheetTable>;
}

export class SheetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SheetError";
  }
}

/** Exact title match (trimmed), otherwise the first tab. */
export function pickTab(tabs: readonly string[], wanted: string) {
  const title = wanted.trim();
  const exact = tabs.find((t) => t === title);
  if (exact !== undefined) return exact;
  const first = tabs[0];
  if (first === undefined) throw new SheetError("Spreadsheet has no tabs");
  return first;
}
