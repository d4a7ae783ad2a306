import fs from "node:fs";
import path from "node:path";
import { YearMonth, periodKey } from "../dates";

/**
 * Hand-maintained URLs for months whose report was published under a name or
 * location that none of the generated variants reproduce. Keyed by YYYY-MM.
 */
export type UrlOverrideTable = ReadonlyMap<string, string>;

const PERIOD_KEY = /^(\d{4})-(0[1-9]|1[0-2])$/;

export function parseUrlOverrides(raw: unknown): UrlOverrideTable {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error("URL override table must be a JSON object keyed by YYYY-MM");
  }

  const table = new Map<string, string>();
  for (const [key, value] of Object.entries(raw)) {
    if (!PERIOD_KEY.test(key)) {
      throw new Error(`Invalid URL override key "${key}": expected YYYY-MM`);
    }
    if (typeof value !== "string" || value.trim() === "") {
      throw new Error(`Invalid URL override for ${key}: expected a non-empty string`);
    }
    table.set(key, value.trim());
  }
  return table;
}

export function loadUrlOverrides(filePath: string): UrlOverrideTable {
  const absolutePath = path.resolve(filePath);
  if (!fs.existsSync(absolutePath)) {
    return new Map();
  }
  return parseUrlOverrides(JSON.parse(fs.readFileSync(absolutePath, "utf-8")));
}

export function lookupOverride(table: UrlOverrideTable, period: YearMonth): string | undefined {
  return table.get(periodKey(period));
}
