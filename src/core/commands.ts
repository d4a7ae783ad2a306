import path from "node:path";
import { Accumulator, SaveResult } from "../accumulate";
import { AppConfig } from "../config";
import { DATASETS, Row } from "../datasets";
import { YearMonth, extractReferenceDate, lastCompletedMonth, periodKey, toUtcDate } from "../dates";
import { DocumentAcquirer, loadUrlOverrides } from "../download";
import { DATASET_EXTRACTORS, DatasetExtractionSummary, DatasetExtractor, DocumentSource, processAll } from "../extract";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { DatabaseStats, TableStore } from "../store";
import { DownloadSummary } from "../types";
import { HttpFetch } from "./fetch";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: TableStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  fetchFn?: HttpFetch;
  loader?: DocumentSource;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  extractors?: ReadonlyArray<DatasetExtractor<Row>>;
}

export interface ExtractCommandSummary {
  documents: DatasetExtractionSummary[];
  saved: SaveResult[];
}

export interface UpdateSummary extends ExtractCommandSummary {
  period: string;
  downloaded: boolean;
  windowStart: string;
}

function createAcquirer(ctx: CommandContext): DocumentAcquirer {
  return new DocumentAcquirer({
    config: ctx.config,
    logger: ctx.logger.child("download"),
    metrics: ctx.metrics,
    overrides: loadUrlOverrides(ctx.config.urlOverridesPath),
    sink: ctx.sink,
    fetchFn: ctx.fetchFn,
    sleep: ctx.sleep,
    now: ctx.now,
  });
}

async function extractAndSave(
  ctx: CommandContext,
  options: { merge: boolean; maxDocs?: number; filter?: (filename: string) => boolean },
): Promise<ExtractCommandSummary> {
  const documents = await processAll(
    {
      rawDir: ctx.config.outputDirs.raw,
      logger: ctx.logger.child("extract"),
      metrics: ctx.metrics,
      sink: ctx.sink,
      loader: ctx.loader,
      filter: options.filter,
      maxDocs: options.maxDocs,
    },
    ctx.extractors ?? DATASET_EXTRACTORS,
  );

  const accumulator = new Accumulator({ store: ctx.store, logger: ctx.logger.child("accumulate"), metrics: ctx.metrics });
  const saved: SaveResult[] = [];
  for (const summary of documents) {
    accumulator.accumulate(summary.dataset, summary.records);
    saved.push(accumulator.saveCanonical(summary.dataset, { merge: options.merge }));
  }
  return { documents, saved };
}

export async function runDownload(ctx: CommandContext, start?: YearMonth): Promise<DownloadSummary> {
  const from = start ?? { year: ctx.config.startYear, month: ctx.config.startMonth };
  ctx.logger.info("download_start", { from: periodKey(from) });
  const summary = await createAcquirer(ctx).downloadRange(from.year, from.month);
  ctx.logger.info("download_complete", { ...summary });
  return summary;
}

/** Re-extracts every acquired document and rebuilds each canonical table from scratch. */
export async function runExtract(ctx: CommandContext, maxDocs?: number): Promise<ExtractCommandSummary> {
  ctx.logger.info("extract_start", { maxDocs });
  const summary = await extractAndSave(ctx, { merge: false, maxDocs });
  ctx.logger.info("extract_complete", {
    datasets: summary.documents.map((entry) => ({ dataset: entry.dataset, ok: entry.ok, failed: entry.failed })),
  });
  return summary;
}

export async function runPipeline(
  ctx: CommandContext,
  options: { start?: YearMonth; maxDocs?: number } = {},
): Promise<{ download: DownloadSummary; extract: ExtractCommandSummary }> {
  ctx.logger.info("pipeline_start", { maxDocs: options.maxDocs });
  const download = await runDownload(ctx, options.start);
  const extract = await runExtract(ctx, options.maxDocs);
  ctx.logger.info("pipeline_complete", { downloaded: download.success, failedPeriods: download.failed });
  return { download, extract };
}

/**
 * Monthly refresh: acquires the last completed month, re-extracts documents
 * dated within the update window and merges them into the stored tables,
 * superseding every stored row that shares a reference date with new rows.
 */
export async function runUpdate(ctx: CommandContext): Promise<UpdateSummary> {
  const now = (ctx.now ?? (() => new Date()))();
  const latest = lastCompletedMonth(now);
  const period = periodKey(latest);
  ctx.logger.info("update_start", { period, windowMonths: ctx.config.updateWindowMonths });

  const downloaded = await createAcquirer(ctx).process(latest.year, latest.month);
  if (!downloaded) {
    ctx.logger.warn("update_latest_unavailable", { period });
  }

  const cutoff = now.getTime() - ctx.config.updateWindowMonths * 30 * DAY_MS;
  const windowStart = new Date(cutoff).toISOString().slice(0, 10);
  const summary = await extractAndSave(ctx, {
    merge: true,
    filter: (filename) => {
      const date = extractReferenceDate(filename);
      return date !== undefined && toUtcDate(date).getTime() >= cutoff;
    },
  });

  ctx.logger.info("update_complete", {
    period,
    downloaded,
    windowStart,
    rows: summary.saved.map((entry) => ({ table: entry.table, rows: entry.rows, written: entry.written })),
  });
  return { ...summary, period, downloaded, windowStart };
}

export async function runStatus(ctx: CommandContext): Promise<DatabaseStats> {
  ctx.logger.info("status_start");
  const stats = ctx.store.getDatabaseStats();
  for (const table of stats.tables) {
    ctx.logger.info("status_table", {
      table: table.name,
      rows: table.rowCount,
      sizeBytes: table.sizeBytes,
      modifiedAt: table.modifiedAt,
      dateRange: table.dateRange,
      columns: table.columns.map((column) => column.name),
      coverage: ctx.store.getTemporalCoverage(table.name).map((entry) => ({
        period: periodKey(entry),
        rows: entry.rows,
        total: entry.total,
      })),
    });
  }
  ctx.logger.info("status_complete", {
    tableCount: stats.tableCount,
    totalRows: stats.totalRows,
    totalBytes: stats.totalBytes,
  });
  return stats;
}

/** Writes `<exports>/<table>.csv` for every canonical table that has rows. */
export async function runExport(ctx: CommandContext): Promise<Record<string, number>> {
  const exported: Record<string, number> = {};
  for (const definition of Object.values(DATASETS)) {
    const target = path.join(ctx.config.outputDirs.exports, `${definition.table}.csv`);
    exported[definition.table] = ctx.store.exportCsv(definition.table, target);
  }
  ctx.logger.info("export_complete", { exported, directory: ctx.config.outputDirs.exports });
  return exported;
}
