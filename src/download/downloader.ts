import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { HttpFetch, getFetchDispatcher, httpFetch } from "../core/fetch";
import { YearMonth, compareYearMonth, daysInMonth, lastCompletedMonth, monthsBetween, periodKey } from "../dates";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { DownloadResult, DownloadSummary, FetchOutcome } from "../types";
import { UrlOverrideTable, lookupOverride } from "./urlOverrides";

export interface SourceCandidate {
  url: string;
  filename: string;
  origin: "override" | "generated";
}

export interface DocumentAcquirerDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  overrides: UrlOverrideTable;
  sink?: Sink;
  fetchFn?: HttpFetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local name for a remote document: the decoded basename of its URL path. */
export function filenameFromUrl(url: string): string {
  const basename = path.posix.basename(new URL(url).pathname);
  try {
    return decodeURIComponent(basename);
  } catch {
    return basename;
  }
}

/** Filename spellings the publisher has used for end-of-month reports, in the order they are tried. */
export function generateFilenameVariants(period: YearMonth): string[] {
  const day = daysInMonth(period.year, period.month);
  const numeric = `${pad2(day)}-${pad2(period.month)}-${period.year}`;
  return [
    `Cruscotto statistico giornaliero ${numeric}.pdf`,
    `cruscotto_statistico_giornaliero_${numeric}.pdf`,
    `Cruscotto_statistico_giornaliero_${numeric}.pdf`,
    `cruscotto_statistico_giornaliero_${day}_${period.month}_${period.year}.pdf`,
  ];
}

export class DocumentAcquirer {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly overrides: UrlOverrideTable;
  private readonly sink?: Sink;
  private readonly fetchFn: HttpFetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly saveDir: string;

  constructor(deps: DocumentAcquirerDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.overrides = deps.overrides;
    this.sink = deps.sink;
    this.fetchFn = deps.fetchFn ?? httpFetch;
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => new Date());
    this.saveDir = path.resolve(this.config.outputDirs.raw);
  }

  /** Remote folder a month's report is expected in, by the configured date buckets. */
  storageFolder(period: YearMonth): string {
    for (const bucket of this.config.folderBuckets) {
      const [year, month] = bucket.through.split("-").map(Number);
      if (compareYearMonth(period, { year, month }) <= 0) {
        return bucket.folder;
      }
    }
    return this.config.defaultFolder;
  }

  /** Candidate sources for a month: the override (if any) first, then generated variants. */
  resolve(year: number, month: number): SourceCandidate[] {
    const period = { year, month };
    const candidates: SourceCandidate[] = [];

    const override = lookupOverride(this.overrides, period);
    if (override) {
      const url = /^https?:\/\//i.test(override)
        ? override
        : `${this.config.domainBase.replace(/\/+$/, "")}/${override.replace(/^\/+/, "")}`;
      candidates.push({ url, filename: filenameFromUrl(url), origin: "override" });
    }

    const folder = this.storageFolder(period);
    const base = this.config.baseUrl.replace(/\/+$/, "");
    for (const variant of generateFilenameVariants(period)) {
      candidates.push({
        url: `${base}/${folder}/${encodeURIComponent(variant)}`,
        filename: variant,
        origin: "generated",
      });
    }

    return candidates;
  }

  async fetch(url: string, targetName: string): Promise<boolean> {
    const outcome = await this.fetchDocument(url, targetName);
    return outcome.status !== "download_failed";
  }

  async process(year: number, month: number): Promise<boolean> {
    const period = periodKey({ year, month });
    const resolved = this.resolve(year, month);
    const present = resolved.find((candidate) => fs.existsSync(path.join(this.saveDir, path.basename(candidate.filename))));
    const candidates = present ? [present] : resolved;
    this.logger.info("download_period_start", { period, candidates: candidates.length, present: present?.filename });

    let tried = 0;
    let attempts = 0;
    let lastOutcome: FetchOutcome | undefined;
    for (const candidate of candidates) {
      tried += 1;
      lastOutcome = await this.fetchDocument(candidate.url, candidate.filename);
      attempts += lastOutcome.attempts;
      if (lastOutcome.status !== "download_failed") {
        await this.publish({
          period,
          status: lastOutcome.status,
          url: candidate.url,
          filename: candidate.filename,
          candidatesTried: tried,
          attempts,
          bytes: lastOutcome.bytes,
          sha256: lastOutcome.sha256,
          finishedAt: this.now().toISOString(),
        });
        return true;
      }
    }

    this.logger.warn("download_period_unresolved", { period, candidatesTried: tried });
    await this.publish({
      period,
      status: "download_failed",
      candidatesTried: tried,
      attempts,
      error: lastOutcome?.error ?? "no candidate source",
      finishedAt: this.now().toISOString(),
    });
    return false;
  }

  /**
   * Acquires every month from the start through the last completed month.
   * The month in progress is never requested.
   */
  async downloadRange(startYear: number, startMonth: number): Promise<DownloadSummary> {
    const end = lastCompletedMonth(this.now());
    const periods = monthsBetween({ year: startYear, month: startMonth }, end);
    this.logger.info("download_range_start", {
      from: periodKey({ year: startYear, month: startMonth }),
      to: periodKey(end),
      periods: periods.length,
    });

    const failedPeriods: string[] = [];
    let success = 0;
    for (const period of periods) {
      if (await this.process(period.year, period.month)) {
        success += 1;
      } else {
        failedPeriods.push(periodKey(period));
      }
    }

    const summary = { total: periods.length, success, failed: failedPeriods.length, failedPeriods };
    this.logger.info("download_range_complete", { ...summary });
    return summary;
  }

  listDownloaded(): string[] {
    if (!fs.existsSync(this.saveDir)) {
      return [];
    }
    return fs
      .readdirSync(this.saveDir)
      .filter((name) => name.toLowerCase().endsWith(".pdf"))
      .sort();
  }

  private async fetchDocument(url: string, targetName: string): Promise<FetchOutcome> {
    const filename = path.basename(targetName);
    const targetPath = path.join(this.saveDir, filename);

    if (fs.existsSync(targetPath)) {
      this.metrics.incrementCounter("downloads_skipped");
      this.logger.info("download_already_present", { filename });
      return { status: "already_present", url, filename, attempts: 0 };
    }

    let lastError = "no attempt made";
    const maxAttempts = Math.max(1, this.config.maxDownloadAttempts);
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const stopTimer = this.metrics.startTimer("download_ms");
      try {
        const body = await this.requestBody(url);
        const durationMs = stopTimer();
        if (body.ok) {
          const written = await this.writeAtomically(targetPath, body.data);
          this.metrics.incrementCounter("downloads_ok");
          this.logger.info("download_ok", { url, filename, attempt, durationMs, bytes: written.bytes });
          return { status: "downloaded_ok", url, filename, attempts: attempt, ...written };
        }
        lastError = `HTTP ${body.status}`;
        this.logger.warn("download_attempt_failed_http", { url, filename, attempt, durationMs, statusCode: body.status });
      } catch (error) {
        const durationMs = stopTimer();
        lastError = error instanceof Error ? error.message : String(error);
        this.logger.warn("download_attempt_error", { url, filename, attempt, durationMs, error: lastError });
      }

      if (attempt < maxAttempts) {
        await this.sleep(this.config.retryDelayMs);
      }
    }

    this.metrics.incrementCounter("downloads_failed");
    return { status: "download_failed", url, filename, attempts: maxAttempts, error: lastError };
  }

  private async requestBody(url: string): Promise<{ ok: true; data: Buffer } | { ok: false; status: number }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.downloadTimeoutMs);
    try {
      const response = await this.fetchFn(url, {
        headers: {
          "user-agent": this.config.userAgent,
          accept: "application/pdf,*/*",
        },
        signal: controller.signal,
        dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
      });
      if (!response.ok) {
        return { ok: false, status: response.status };
      }
      return { ok: true, data: Buffer.from(await response.arrayBuffer()) };
    } finally {
      clearTimeout(timeout);
    }
  }

  private async writeAtomically(targetPath: string, data: Buffer): Promise<{ bytes: number; sha256: string }> {
    await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });
    const tempPath = `${targetPath}.part`;
    try {
      await fs.promises.writeFile(tempPath, data);
      await fs.promises.rename(tempPath, targetPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
    return {
      bytes: data.length,
      sha256: crypto.createHash("sha256").update(data).digest("hex"),
    };
  }

  private async publish(result: DownloadResult): Promise<void> {
    if (this.sink) {
      await this.sink.publishDownloadResult([result]);
    }
  }
}
