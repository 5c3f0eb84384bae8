import { existsSync } from "fs";
import { google, type sheets_v4 } from "googleapis";
import { Logger } from "@nestjs/common";
import type { SheetSettings } from "../config/bot-config";
import { type OrderSheetSource, type SheetTable, SheetError, pickTab } from "./sheet-source";

const READONLY_SCOPE = "https://www.googleapis.com/auth/spreadsheets.readonly";

/** The two calls this source makes; sheets_v4.Sheets satisfies it. */
export type SheetsReader = {
  spreadsheets: {
    get(
      params: sheets_v4.Params$Resource$Spreadsheets$Get,
    ): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
    values: {
      get(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Get,
      ): Promise<{ data: sheets_v4.Schema$ValueRange }>;
    };
  };
};

export type SheetsClientFactory = (credentialsPath: string) => SheetsReader;

function defaultClient(credentialsPath: string): SheetsReader {
  const auth = new google.auth.GoogleAuth({ keyFile: credentialsPath, scopes: [READONLY_SCOPE] });
  return google.sheets({ version: "v4", auth });
}

function statusOf(err: unknown): number | null {
  if (typeof err !== "object" || err === null) return null;
  const code = "code" in err ? err.code : "status" in err ? err.status : null;
  if (code === null || code === undefined) return null;
  const n = Number(code);
  return Number.isFinite(n) ? n : null;
}

function messageOf(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

// 'It''s a tab' -> quoted A1 range for the whole tab
function tabRange(tab: string) {
  return `'${tab.replace(/'/g, "''")}'`;
}

export class GoogleSheetSource implements OrderSheetSource {
  readonly kind = "google" as const;
  private readonly logger = new Logger(GoogleSheetSource.name);

  constructor(
    private readonly settings: SheetSettings,
    private readonly clientFactory: SheetsClientFactory = defaultClient,
    private readonly retryDelayMs = 900,
  ) {}

  async readTable(): Promise<SheetTable> {
    const { spreadsheetId, credentialsPath } = this.settings;
    if (!spreadsheetId) throw new SheetError("GOOGLE_SHEET_ID is not set");
    if (!existsSync(credentialsPath)) {
      throw new SheetError(
        `Credentials file not found: ${credentialsPath}. Check GOOGLE_APPLICATION_CREDENTIALS.`,
      );
    }

    const sheets = this.clientFactory(credentialsPath);

    const meta = await this.withRetry("spreadsheets.get", () =>
      sheets.spreadsheets.get({
        spreadsheetId,
        fields: "properties.title,sheets.properties.title",
      }),
    );
    const tabs = (meta.data.sheets ?? [])
      .map((s) => s.properties?.title ?? "")
      .filter((t) => t.length > 0);
    const tab = pickTab(tabs, this.settings.title);

    const res = await this.withRetry(`values.get:${tab}`, () =>
      sheets.spreadsheets.values.get({
        spreadsheetId,
        range: tabRange(tab),
        majorDimension: "ROWS",
        valueRenderOption: "FORMATTED_VALUE",
      }),
    );
    const values: unknown[][] = res.data.values ?? [];

    return {
      spreadsheetTitle: meta.data.properties?.title ?? spreadsheetId,
      tabs,
      tab,
      rows: values.map((row) => row.map((cell) => String(cell ?? ""))),
    };
  }

  // One retry on quota (429) and 5xx, anything else surfaces as SheetError
  private async withRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (first) {
      const status = statusOf(first);
      if (status !== 429 && !(status !== null && status >= 500)) {
        throw new SheetError(`Google Sheets ${label} failed: ${messageOf(first)}`, { cause: first });
      }
      this.logger.warn(`Google Sheets ${label} returned ${status}, retrying in ${this.retryDelayMs}ms`);
      await new Promise((r) => setTimeout(r, this.retryDelayMs));
      try {
        return await fn();
      } catch (second) {
        throw new SheetError(`Google Sheets ${label} failed: ${messageOf(second)}`, { cause: second });
      }
    }
  }
}
