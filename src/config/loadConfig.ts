import fs from "node:fs";
import path from "node:path";
import { isMonthNumber } from "../dates";
import { AppConfig, ConfigOverrides, FolderBucket, OutputDirs } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://libertaciviliimmigrazione.dlci.interno.gov.it/sites/default/files",
  domainBase: "https://libertaciviliimmigrazione.dlci.interno.gov.it",
  userAgent: "migration-reports-extractor/1.0",
  ignoreHttpsErrors: false,
  downloadTimeoutMs: 30_000,
  maxDownloadAttempts: 3,
  retryDelayMs: 1_000,
  startYear: 2017,
  startMonth: 1,
  updateWindowMonths: 3,
  urlOverridesPath: "config/url-overrides.json",
  folderBuckets: [
    { through: "2025-05", folder: "2025-05" },
    { through: "2025-10", folder: "2025-10" },
  ],
  defaultFolder: "2025-12",
  outputDirs: {
    raw: "data/pdf",
    tables: "data/tables",
    manifests: "data/manifests",
    exports: "data/exports",
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`Config key "${key}" must be a string`);
  }
  return value;
}

function pickNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Config key "${key}" must be a number`);
  }
  return value;
}

function pickMonth(source: Record<string, unknown>, key: string): number | undefined {
  const value = pickNumber(source, key);
  if (value !== undefined && !isMonthNumber(value)) {
    throw new Error(`Config key "${key}" must be an integer between 1 and 12`);
  }
  return value;
}

function pickBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new Error(`Config key "${key}" must be a boolean`);
  }
  return value;
}

function parseFolderBuckets(value: unknown): FolderBucket[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new Error(`Config key "folderBuckets" must be an array`);
  }
  return value.map((entry, index) => {
    if (!isRecord(entry) || typeof entry.through !== "string" || typeof entry.folder !== "string") {
      throw new Error(`Config key "folderBuckets[${index}]" must have string "through" and "folder"`);
    }
    if (!/^\d{4}-\d{2}$/.test(entry.through)) {
      throw new Error(`Config key "folderBuckets[${index}].through" must be YYYY-MM`);
    }
    return { through: entry.through, folder: entry.folder };
  });
}

function parseOutputDirs(value: unknown): Partial<OutputDirs> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new Error(`Config key "outputDirs" must be an object`);
  }
  const dirs: Partial<OutputDirs> = {};
  for (const key of ["raw", "tables", "manifests", "exports"] as const) {
    const dir = pickString(value, key);
    if (dir !== undefined) {
      dirs[key] = dir;
    }
  }
  return dirs;
}

export function parseConfigOverrides(raw: unknown): ConfigOverrides {
  if (!isRecord(raw)) {
    throw new Error("Config file must contain a JSON object");
  }

  return {
    baseUrl: pickString(raw, "baseUrl"),
    domainBase: pickString(raw, "domainBase"),
    userAgent: pickString(raw, "userAgent"),
    ignoreHttpsErrors: pickBoolean(raw, "ignoreHttpsErrors"),
    downloadTimeoutMs: pickNumber(raw, "downloadTimeoutMs"),
    maxDownloadAttempts: pickNumber(raw, "maxDownloadAttempts"),
    retryDelayMs: pickNumber(raw, "retryDelayMs"),
    startYear: pickNumber(raw, "startYear"),
    startMonth: pickMonth(raw, "startMonth"),
    updateWindowMonths: pickNumber(raw, "updateWindowMonths"),
    urlOverridesPath: pickString(raw, "urlOverridesPath"),
    folderBuckets: parseFolderBuckets(raw.folderBuckets),
    defaultFolder: pickString(raw, "defaultFolder"),
    outputDirs: parseOutputDirs(raw.outputDirs),
  };
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  return parseConfigOverrides(JSON.parse(raw));
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toMonth(value: string | undefined, fallback: number): number {
  const parsed = toInt(value, fallback);
  return isMonthNumber(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const file = readConfigFile(configPath);
  const fileDirs = file.outputDirs ?? {};

  return {
    baseUrl: env.BASE_URL ?? file.baseUrl ?? DEFAULT_CONFIG.baseUrl,
    domainBase: env.DOMAIN_BASE ?? file.domainBase ?? DEFAULT_CONFIG.domainBase,
    userAgent: env.USER_AGENT ?? file.userAgent ?? DEFAULT_CONFIG.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, file.ignoreHttpsErrors ?? DEFAULT_CONFIG.ignoreHttpsErrors),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, file.downloadTimeoutMs ?? DEFAULT_CONFIG.downloadTimeoutMs),
    maxDownloadAttempts: toInt(env.MAX_DOWNLOAD_ATTEMPTS, file.maxDownloadAttempts ?? DEFAULT_CONFIG.maxDownloadAttempts),
    retryDelayMs: toInt(env.RETRY_DELAY_MS, file.retryDelayMs ?? DEFAULT_CONFIG.retryDelayMs),
    startYear: toInt(env.START_YEAR, file.startYear ?? DEFAULT_CONFIG.startYear),
    startMonth: toMonth(env.START_MONTH, file.startMonth ?? DEFAULT_CONFIG.startMonth),
    updateWindowMonths: toInt(env.UPDATE_WINDOW_MONTHS, file.updateWindowMonths ?? DEFAULT_CONFIG.updateWindowMonths),
    urlOverridesPath: env.URL_OVERRIDES_PATH ?? file.urlOverridesPath ?? DEFAULT_CONFIG.urlOverridesPath,
    folderBuckets: file.folderBuckets ?? DEFAULT_CONFIG.folderBuckets,
    defaultFolder: file.defaultFolder ?? DEFAULT_CONFIG.defaultFolder,
    outputDirs: {
      raw: env.OUTPUT_RAW_DIR ?? fileDirs.raw ?? DEFAULT_CONFIG.outputDirs.raw,
      tables: env.OUTPUT_TABLES_DIR ?? fileDirs.tables ?? DEFAULT_CONFIG.outputDirs.tables,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? fileDirs.manifests ?? DEFAULT_CONFIG.outputDirs.manifests,
      exports: env.OUTPUT_EXPORTS_DIR ?? fileDirs.exports ?? DEFAULT_CONFIG.outputDirs.exports,
    },
  };
}

export { DEFAULT_CONFIG };
