import type { OrderRecord } from "../orders/order-record";
import { SheetError, type SheetTable } from "./sheet-source";

export type HeaderSpec = {
  keyHeaders: readonly string[];
  dateHeader: string;
};

export type SheetColumns = {
  keyHeader: string;
  keyIndex: number;
  dateIndex: number;
};

export type SheetDiagnostics = {
  spreadsheetTitle: string;
  tabs: string[];
  tab: string;
  header: string[];
  dataRows: number;
};

function clean(x: unknown) {
  return String(x ?? "").trim();
}

export function headerOf(table: SheetTable) {
  return (table.rows[0] ?? []).map(clean);
}

export function locateColumns(header: readonly string[], spec: HeaderSpec, table?: SheetTable): SheetColumns {
  const keyHeader = spec.keyHeaders.find((h) => header.includes(h));
  const dateIndex = header.indexOf(spec.dateHeader);

  if (keyHeader === undefined || dateIndex < 0) {
    const wanted = `${spec.keyHeaders.join("|")} / ${spec.dateHeader}`;
    const where = table ? ` Tabs: ${table.tabs.join(", ")}. Active tab: ${table.tab}.` : "";
    throw new SheetError(`Headers ${wanted} not found. Found: [${header.join(", ")}].${where}`);
  }

  return { keyHeader, keyIndex: header.indexOf(keyHeader), dateIndex };
}

/**
 * Header-driven extraction. Short rows and rows without a key are skipped;
 * a repeated key keeps the last row. No data at all is an error.
 */
export function extractOrderRecords(table: SheetTable, spec: HeaderSpec): OrderRecord[] {
  const header = headerOf(table);
  const { keyIndex, dateIndex } = locateColumns(header, spec, table);
  const width = Math.max(keyIndex, dateIndex) + 1;

  const byKey = new Map<string, OrderRecord>();
  for (const row of table.rows.slice(1)) {
    if (row.length < width) continue;
    const key = clean(row[keyIndex]);
    if (!key) continue;
    byKey.set(key, Object.freeze({ key, rawDeliveryDate: clean(row[dateIndex]) }));
  }

  if (!byKey.size) {
    throw new SheetError(
      `No data rows found under the header. Tab: ${table.tab}, header: [${header.join(", ")}]`,
    );
  }

  return Array.from(byKey.values());
}

export function describeTable(table: SheetTable): SheetDiagnostics {
  return {
    spreadsheetTitle: table.spreadsheetTitle,
    tabs: [...table.tabs],
    tab: table.tab,
    header: headerOf(table),
    dataRows: Math.max(0, table.rows.length - 1),
  };
}
