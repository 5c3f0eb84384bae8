// src/shelf-life/production-date.ts

import { type CalendarDate, addDays } from "../dates/calendar-date";
import { ConfigError } from "../config/config-error";

export type RoundingPolicy = "ceil" | "trunc";

export const ROUNDING_POLICIES: readonly RoundingPolicy[] = ["ceil", "trunc"];

export type ShelfLifeConfig = Readonly<{
  shelfLifeDays: number;
  /** Required remaining shelf life (OSG) at delivery, percent in [0, 100). */
  targetPercent: number;
  bufferDays: number;
  rounding: RoundingPolicy;
}>;

export type ProductionWindow = Readonly<{
  delivery: CalendarDate;
  minProduction: CalendarDate;
  maxElapsedDays: number;
  allowedAgeDays: number;
}>;

export const DEFAULT_SHELF_LIFE: ShelfLifeConfig = Object.freeze({
  shelfLifeDays: 360,
  targetPercent: 82,
  bufferDays: 2,
  rounding: "ceil",
});

export function shelfLifeIssues(input: ShelfLifeConfig): string[] {
  const issues: string[] = [];
  if (!Number.isInteger(input.shelfLifeDays) || input.shelfLifeDays <= 0) {
    issues.push(`shelf life must be a positive whole number of days (got ${input.shelfLifeDays})`);
  }
  if (!Number.isFinite(input.targetPercent) || input.targetPercent < 0 || input.targetPercent >= 100) {
    issues.push(`target OSG percent must be in [0, 100) (got ${input.targetPercent})`);
  }
  if (!Number.isInteger(input.bufferDays) || input.bufferDays < 0) {
    issues.push(`safety buffer must be a non-negative whole number of days (got ${input.bufferDays})`);
  }
  if (!ROUNDING_POLICIES.includes(input.rounding)) {
    issues.push(`rounding must be one of ${ROUNDING_POLICIES.join("/")} (got ${input.rounding})`);
  }
  return issues;
}

/** Validated, frozen copy. Throws ConfigError: bad values are a startup failure, not a per-call one. */
export function createShelfLifeConfig(input: Partial<ShelfLifeConfig> = {}): ShelfLifeConfig {
  const merged: ShelfLifeConfig = { ...DEFAULT_SHELF_LIFE, ...input };
  const issues = shelfLifeIssues(merged);
  if (issues.length) throw new ConfigError(issues);
  return Object.freeze(merged);
}

/**
 * Days a product may have aged by delivery and still keep `targetPercent` of its
 * shelf life, with linear decay (100% at production, 0% at expiry).
 * 360 days at 82% -> 64.8.
 */
export function maxElapsedDays(config: ShelfLifeConfig) {
  const raw = (config.shelfLifeDays * (100 - config.targetPercent)) / 100;
  // 1e-9 snaps float noise so a whole number never rounds a day off
  return Math.round(raw * 1e9) / 1e9;
}

export function allowedAgeDays(config: ShelfLifeConfig) {
  const elapsed = maxElapsedDays(config);
  const whole = config.rounding === "trunc" ? Math.trunc(elapsed) : Math.ceil(elapsed);
  return Math.max(0, whole - config.bufferDays);
}

/** Earliest production date that still meets the OSG target on `delivery`. */
export function minProductionDate(delivery: CalendarDate, config: ShelfLifeConfig): CalendarDate {
  return addDays(delivery, -allowedAgeDays(config));
}

export function productionWindow(delivery: CalendarDate, config: ShelfLifeConfig): ProductionWindow {
  const allowed = allowedAgeDays(config);
  return Object.freeze({
    delivery,
    minProduction: addDays(delivery, -allowed),
    maxElapsedDays: maxElapsedDays(config),
    allowedAgeDays: allowed,
  });
}
