import fs from "node:fs";
import path from "node:path";
import { DatasetName, Row } from "../datasets";
import { daysInMonth, extractReferenceDate, toIsoDate } from "../dates";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { ExtractionReport } from "../types";
import { DocumentSource, PdfDocumentLoader } from "./pdfDocument";
import {
  DatasetExtractor,
  ExtractionAttempt,
  ExtractionContext,
  ExtractionFailureReason,
  ExtractionOutcome,
  PdfDocumentContent,
} from "./types";

/** Page predicate applied to the upper-cased page text. */
export type PageMatcher = (upperText: string) => boolean;

/**
 * Index of the first page that any matcher accepts. Matchers run from the
 * exact title down to loose header keywords, but page order decides.
 */
export function locatePageByMatchers(document: PdfDocumentContent, matchers: PageMatcher[]): number | undefined {
  for (const page of document.pages) {
    if (!page.text) {
      continue;
    }
    const upper = page.text.toUpperCase();
    if (matchers.some((matcher) => matcher(upper))) {
      return page.index;
    }
  }
  return undefined;
}

export function containsAny(phrases: string[]): PageMatcher {
  const upper = phrases.map((phrase) => phrase.toUpperCase());
  return (text) => upper.some((phrase) => text.includes(phrase));
}

export function containsAll(keywords: string[]): PageMatcher {
  const upper = keywords.map((keyword) => keyword.toUpperCase());
  return (text) => upper.every((keyword) => text.includes(keyword));
}

export function matchesPattern(pattern: RegExp): PageMatcher {
  return (text) => pattern.test(text);
}

function failure<TRow extends Row>(
  extractor: DatasetExtractor<TRow>,
  filename: string,
  reason: ExtractionFailureReason,
  extra: Partial<Omit<Extract<ExtractionOutcome<TRow>, { status: "failed" }>, "status" | "reason">> = {},
): ExtractionOutcome<TRow> {
  return {
    status: "failed",
    dataset: extractor.dataset,
    filename,
    reason,
    attempts: [],
    ...extra,
  };
}

/**
 * Runs one dataset extractor over one loaded document:
 * locate page, detect format, then try each strategy until one validates.
 * Partial results are never emitted.
 */
export function extractOne<TRow extends Row>(
  document: PdfDocumentContent,
  extractor: DatasetExtractor<TRow>,
): ExtractionOutcome<TRow> {
  const referenceDate = extractReferenceDate(document.filename);
  if (!referenceDate) {
    return failure(extractor, document.filename, "date_not_recognized");
  }
  const referenceIso = toIsoDate(referenceDate);

  const pageIndex = extractor.locatePage(document);
  const page = pageIndex === undefined ? undefined : document.pages[pageIndex];
  if (pageIndex === undefined || !page) {
    return failure(extractor, document.filename, "page_not_found", { referenceDate: referenceIso });
  }

  const baseContext = {
    filename: document.filename,
    referenceDate,
    referenceIso,
    daysInMonth: daysInMonth(referenceDate.year, referenceDate.month),
  };
  const format = extractor.detectFormat(page, baseContext);
  const ctx: ExtractionContext = { ...baseContext, format };

  const attempts: ExtractionAttempt[] = [];
  for (const strategy of extractor.strategies) {
    const rows = strategy.extract(page, ctx);
    const verdict = extractor.validate(rows, ctx);
    attempts.push({ pageIndex, format, strategy: strategy.name, rowCount: rows.length, verdict });
    if (verdict.valid) {
      return {
        status: "ok",
        dataset: extractor.dataset,
        filename: document.filename,
        referenceDate: referenceIso,
        pageIndex,
        format,
        strategy: strategy.name,
        records: rows.map((row) => ({ ...row, reference_date: referenceIso, source_filename: document.filename })),
        attempts,
      };
    }
  }

  const last = attempts[attempts.length - 1];
  return failure(extractor, document.filename, "validation_failed", {
    referenceDate: referenceIso,
    pageIndex,
    format,
    attempts,
    detail: last && !last.verdict.valid ? last.verdict.reason : "no strategy configured",
  });
}

export interface DatasetExtractionSummary {
  dataset: DatasetName;
  processed: number;
  ok: number;
  failed: number;
  failedFiles: string[];
  records: Row[];
}

export interface ProcessAllDeps {
  rawDir: string;
  logger: Logger;
  metrics: MetricsRegistry;
  sink?: Sink;
  loader?: DocumentSource;
  /** Restricts processing to matching filenames (applied before `maxDocs`). */
  filter?: (filename: string) => boolean;
  maxDocs?: number;
}

export function listDocuments(rawDir: string): string[] {
  const absolute = path.resolve(rawDir);
  if (!fs.existsSync(absolute)) {
    return [];
  }
  return fs
    .readdirSync(absolute)
    .filter((name) => name.toLowerCase().endsWith(".pdf"))
    .sort();
}

function toReport<TRow extends Row>(outcome: ExtractionOutcome<TRow>): ExtractionReport {
  const finishedAt = new Date().toISOString();
  if (outcome.status === "ok") {
    return {
      dataset: outcome.dataset,
      filename: outcome.filename,
      status: "extracted_ok",
      referenceDate: outcome.referenceDate,
      pageIndex: outcome.pageIndex,
      format: outcome.format,
      strategy: outcome.strategy,
      rowCount: outcome.records.length,
      finishedAt,
    };
  }
  return {
    dataset: outcome.dataset,
    filename: outcome.filename,
    status: "extracted_failed",
    referenceDate: outcome.referenceDate,
    pageIndex: outcome.pageIndex,
    format: outcome.format,
    rowCount: 0,
    reason: outcome.detail ? `${outcome.reason}: ${outcome.detail}` : outcome.reason,
    finishedAt,
  };
}

/**
 * Extracts every dataset from every acquired document, in filename order.
 * Each document is parsed once and handed to all extractors; a failure in
 * one document or one extractor is recorded and never stops the batch.
 */
export async function processAll(
  deps: ProcessAllDeps,
  extractors: ReadonlyArray<DatasetExtractor<Row>>,
): Promise<DatasetExtractionSummary[]> {
  const { logger, metrics } = deps;
  const loader = deps.loader ?? new PdfDocumentLoader();
  const summaries = extractors.map<DatasetExtractionSummary>((extractor) => ({
    dataset: extractor.dataset,
    processed: 0,
    ok: 0,
    failed: 0,
    failedFiles: [],
    records: [],
  }));

  let filenames = listDocuments(deps.rawDir);
  if (deps.filter) {
    filenames = filenames.filter(deps.filter);
  }
  if (deps.maxDocs !== undefined) {
    filenames = filenames.slice(0, Math.max(deps.maxDocs, 0));
  }
  logger.info("extract_batch_start", { documents: filenames.length, datasets: extractors.map((e) => e.dataset) });

  for (const [position, filename] of filenames.entries()) {
    const stopTimer = metrics.startTimer("extract_ms");
    logger.info("extract_document_start", { filename, position: position + 1, of: filenames.length });

    const outcomes = await extractDocument(deps, loader, filename, extractors);
    const reports: ExtractionReport[] = [];
    outcomes.forEach((outcome, index) => {
      const summary = summaries[index];
      summary.processed += 1;
      if (outcome.status === "ok") {
        summary.ok += 1;
        summary.records.push(...outcome.records);
        metrics.incrementCounter("extracts_ok", 1, outcome.dataset);
        logger.info("extract_document_ok", {
          filename,
          dataset: outcome.dataset,
          pageIndex: outcome.pageIndex,
          format: outcome.format,
          strategy: outcome.strategy,
          rows: outcome.records.length,
        });
      } else {
        summary.failed += 1;
        summary.failedFiles.push(filename);
        metrics.incrementCounter("extracts_failed", 1, outcome.dataset);
        logger.warn("extract_document_failed", {
          filename,
          dataset: outcome.dataset,
          reason: outcome.reason,
          detail: outcome.detail,
          attempts: outcome.attempts.map((attempt) => ({
            strategy: attempt.strategy,
            rows: attempt.rowCount,
            verdict: attempt.verdict.valid ? "valid" : attempt.verdict.reason,
          })),
        });
      }
      reports.push(toReport(outcome));
    });

    if (deps.sink) {
      await deps.sink.publishExtractionResult(reports);
    }
    logger.debug("extract_document_complete", { filename, durationMs: stopTimer() });
  }

  for (const summary of summaries) {
    logger.info("extract_dataset_summary", {
      dataset: summary.dataset,
      processed: summary.processed,
      ok: summary.ok,
      failed: summary.failed,
      rows: summary.records.length,
      failedFiles: summary.failedFiles.slice(0, 10),
    });
  }
  return summaries;
}

async function extractDocument(
  deps: ProcessAllDeps,
  loader: DocumentSource,
  filename: string,
  extractors: ReadonlyArray<DatasetExtractor<Row>>,
): Promise<Array<ExtractionOutcome<Row>>> {
  if (!extractReferenceDate(filename)) {
    return extractors.map((extractor) => failure(extractor, filename, "date_not_recognized"));
  }

  let document: PdfDocumentContent;
  try {
    document = await loader.load(path.join(path.resolve(deps.rawDir), filename));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return extractors.map((extractor) => failure(extractor, filename, "document_unreadable", { detail }));
  }
  if (document.tableError) {
    deps.logger.warn("extract_table_detection_failed", { filename, error: document.tableError });
  }

  return extractors.map((extractor) => {
    try {
      return extractOne(document, extractor);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      return failure(extractor, filename, "unexpected_error", { detail });
    }
  });
}
