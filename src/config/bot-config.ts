import { ConfigError } from "./config-error";
import { type FixedZone, fixedZone, parseOffset } from "../dates/fixed-zone";
import {
  type RoundingPolicy,
  type ShelfLifeConfig,
  DEFAULT_SHELF_LIFE,
  ROUNDING_POLICIES,
  shelfLifeIssues,
} from "../shelf-life/production-date";

export const BOT_CONFIG = "BOT_CONFIG";

export type SheetSourceKind = "google" | "xlsx";

export type SheetSettings = Readonly<{
  source: SheetSourceKind;
  spreadsheetId: string | null;
  credentialsPath: string;
  /** Tab to read; falls back to the first tab when missing. */
  title: string;
  /** Candidate headers for the key column, first present wins. */
  keyHeaders: readonly string[];
  dateHeader: string;
  xlsxPath: string | null;
}>;

export type BotConfig = Readonly<{
  telegramToken: string | null;
  botEnabled: boolean;
  port: number;
  shelfLife: ShelfLifeConfig;
  pickupZone: FixedZone;
  deliveryZone: FixedZone;
  sheet: SheetSettings;
}>;

export const DEFAULT_KEY_HEADERS = ["OrderNo", "Contractor", "Контрагент"] as const;

type Env = Record<string, string | undefined>;

function str(env: Env, name: string) {
  const v = (env[name] ?? "").trim();
  return v.length ? v : null;
}

// Placeholders like "<PUT_TOKEN_HERE>" count as unset
function secret(env: Env, name: string) {
  const v = str(env, name);
  return v && !v.startsWith("<") ? v : null;
}

function int(env: Env, name: string, fallback: number, issues: string[]) {
  const v = str(env, name);
  if (v === null) return fallback;
  if (!/^-?\d+$/.test(v)) {
    issues.push(`${name} must be a whole number (got "${v}")`);
    return fallback;
  }
  return Number(v);
}

function num(env: Env, name: string, fallback: number, issues: string[]) {
  const v = str(env, name);
  if (v === null) return fallback;
  const n = Number(v.replace(",", "."));
  if (!Number.isFinite(n)) {
    issues.push(`${name} must be a number (got "${v}")`);
    return fallback;
  }
  return n;
}

function bool(env: Env, name: string, fallback: boolean, issues: string[]) {
  const v = str(env, name)?.toLowerCase();
  if (v === undefined || v === null) return fallback;
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  issues.push(`${name} must be true/false (got "${v}")`);
  return fallback;
}

function zone(env: Env, prefix: string, label: string, offset: string, issues: string[]) {
  const raw = str(env, `${prefix}_TZ_OFFSET`) ?? offset;
  const minutes = parseOffset(raw);
  if (minutes === null) {
    issues.push(`${prefix}_TZ_OFFSET must look like +05:00 (got "${raw}")`);
  }
  return fixedZone(str(env, `${prefix}_TZ_LABEL`) ?? label, minutes ?? 0);
}

function rounding(env: Env, issues: string[]): RoundingPolicy {
  const v = str(env, "OSG_ROUNDING")?.toLowerCase() ?? DEFAULT_SHELF_LIFE.rounding;
  const match = ROUNDING_POLICIES.find((p) => p === v);
  if (!match) {
    issues.push(`OSG_ROUNDING must be one of ${ROUNDING_POLICIES.join("/")} (got "${v}")`);
    return DEFAULT_SHELF_LIFE.rounding;
  }
  return match;
}

function sheetSource(env: Env, issues: string[]): SheetSourceKind {
  const v = str(env, "SHEET_SOURCE")?.toLowerCase() ?? "google";
  if (v === "google" || v === "xlsx") return v;
  issues.push(`SHEET_SOURCE must be google or xlsx (got "${v}")`);
  return "google";
}

/**
 * Build the one immutable config from the environment.
 * Every problem is collected and reported at once; any problem throws ConfigError.
 */
export function loadConfig(env: Env = process.env): BotConfig {
  const issues: string[] = [];

  const shelfLife: ShelfLifeConfig = Object.freeze({
    shelfLifeDays: int(env, "SHELF_LIFE_DAYS", DEFAULT_SHELF_LIFE.shelfLifeDays, issues),
    targetPercent: num(env, "TARGET_OSG_PERCENT", DEFAULT_SHELF_LIFE.targetPercent, issues),
    bufferDays: int(env, "SAFETY_BUFFER_DAYS", DEFAULT_SHELF_LIFE.bufferDays, issues),
    rounding: rounding(env, issues),
  });
  issues.push(...shelfLifeIssues(shelfLife));

  const telegramToken = secret(env, "TELEGRAM_BOT_TOKEN");
  const botEnabled = bool(env, "BOT_ENABLED", true, issues);
  if (botEnabled && !telegramToken) {
    issues.push("TELEGRAM_BOT_TOKEN is missing (set BOT_ENABLED=false to run the HTTP API only)");
  }

  const port = int(env, "PORT", 4000, issues);
  if (port < 0 || port > 65535) issues.push(`PORT out of range (got ${port})`);

  const source = sheetSource(env, issues);
  const keyHeader = str(env, "SHEET_KEY_HEADER");
  const sheet: SheetSettings = Object.freeze({
    source,
    spreadsheetId: secret(env, "GOOGLE_SHEET_ID"),
    credentialsPath: str(env, "GOOGLE_APPLICATION_CREDENTIALS") ?? "gsa.json",
    title: str(env, "SHEET_TITLE") ?? "Orders",
    keyHeaders: Object.freeze(keyHeader ? [keyHeader] : [...DEFAULT_KEY_HEADERS]),
    dateHeader: str(env, "SHEET_DATE_HEADER") ?? "DeliveryDate",
    xlsxPath: str(env, "ORDERS_XLSX_PATH"),
  });
  if (source === "xlsx" && !sheet.xlsxPath) {
    issues.push("ORDERS_XLSX_PATH is required when SHEET_SOURCE=xlsx");
  }

  const config: BotConfig = Object.freeze({
    telegramToken,
    botEnabled,
    port,
    shelfLife,
    pickupZone: zone(env, "PICKUP", "Аша", "+05:00", issues),
    deliveryZone: zone(env, "DELIVERY", "Москва", "+03:00", issues),
    sheet,
  });

  if (issues.length) throw new ConfigError(issues);
  return config;
}
