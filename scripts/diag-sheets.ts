import "dotenv/config";
import { readFileSync } from "fs";
import { loadConfig } from "../src/config/bot-config";
import { describeTable, extractOrderRecords } from "../src/sheets/sheet-rows";
import { createSheetSource } from "../src/sheets/sheets.module";

function serviceAccountEmail(path: string) {
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
    if (typeof parsed === "object" && parsed !== null && "client_email" in parsed) {
      return String(parsed.client_email);
    }
    return "(no client_email in file)";
  } catch (err) {
    return `(cannot read: ${err instanceof Error ? err.message : String(err)})`;
  }
}

async function main() {
  // the bot token is irrelevant here
  const config = loadConfig({ ...process.env, BOT_ENABLED: "false" });
  const { sheet } = config;

  console.log("[diag] sheet source:", sheet.source);
  if (sheet.source === "google") {
    console.log("[diag] GOOGLE_APPLICATION_CREDENTIALS:", sheet.credentialsPath);
    console.log("[diag] service account:", serviceAccountEmail(sheet.credentialsPath));
    console.log("[diag] GOOGLE_SHEET_ID:", sheet.spreadsheetId ?? "(not set)");
  } else {
    console.log("[diag] ORDERS_XLSX_PATH:", sheet.xlsxPath);
  }

  const table = await createSheetSource(sheet).readTable();
  const d = describeTable(table);
  console.log("[diag] spreadsheet:", d.spreadsheetTitle);
  console.log("[diag] tabs:", d.tabs.join(", "));
  console.log("[diag] using tab:", d.tab);
  console.log("[diag] header:", d.header);

  const records = extractOrderRecords(table, sheet);
  console.log(`[diag] ${records.length} orders, first: ${records[0]?.key ?? "-"}`);
}

main().catch((err: unknown) => {
  console.error("[diag] failed:", err instanceof Error ? err.message : err);
  if ((process.env.SHEET_SOURCE ?? "google").toLowerCase() === "google") {
    console.error("[diag] check the sheet is shared with the service account and the Sheets API is enabled");
  }
  process.exitCode = 1;
});
