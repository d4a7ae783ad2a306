import { CalendarDate } from "../dates";
import { DatasetName, ProvenanceFields, Row } from "../datasets";

export interface PageContent {
  /** 0-based page index. */
  index: number;
  text: string;
  tables: string[][][];
}

export interface PdfDocumentContent {
  filename: string;
  pageCount: number;
  pages: PageContent[];
  /** Set when structured table detection failed; page text is still usable. */
  tableError?: string;
}

export interface ExtractionContext {
  filename: string;
  referenceDate: CalendarDate;
  referenceIso: string;
  daysInMonth: number;
  format: string;
}

export type ValidationVerdict = { valid: true } | { valid: false; reason: string };

export interface ExtractionStrategy<TRow extends Row> {
  readonly name: string;
  extract(page: PageContent, ctx: ExtractionContext): TRow[];
}

/**
 * What one dataset contributes to the shared per-document state machine:
 * where its page is, which layout applies, how to read it, and what counts
 * as a plausible result.
 */
export interface DatasetExtractor<TRow extends Row> {
  readonly dataset: DatasetName;
  locatePage(document: PdfDocumentContent): number | undefined;
  detectFormat(page: PageContent, ctx: Omit<ExtractionContext, "format">): string;
  readonly strategies: ReadonlyArray<ExtractionStrategy<TRow>>;
  validate(rows: TRow[], ctx: ExtractionContext): ValidationVerdict;
}

export interface ExtractionAttempt {
  pageIndex: number;
  format: string;
  strategy: string;
  rowCount: number;
  verdict: ValidationVerdict;
}

export type ExtractionFailureReason =
  | "date_not_recognized"
  | "page_not_found"
  | "validation_failed"
  | "document_unreadable"
  | "unexpected_error";

export type ExtractionOutcome<TRow extends Row> =
  | {
      status: "ok";
      dataset: DatasetName;
      filename: string;
      referenceDate: string;
      pageIndex: number;
      format: string;
      strategy: string;
      records: Array<TRow & ProvenanceFields>;
      attempts: ExtractionAttempt[];
    }
  | {
      status: "failed";
      dataset: DatasetName;
      filename: string;
      reason: ExtractionFailureReason;
      detail?: string;
      referenceDate?: string;
      pageIndex?: number;
      format?: string;
      attempts: ExtractionAttempt[];
    };
