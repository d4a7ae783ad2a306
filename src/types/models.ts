export type DownloadStatus = "downloaded_ok" | "already_present" | "download_failed";

export interface FetchOutcome {
  status: DownloadStatus;
  url: string;
  filename: string;
  attempts: number;
  bytes?: number;
  sha256?: string;
  error?: string;
}

/** Outcome of acquiring the report for one calendar month. */
export interface DownloadResult {
  period: string;
  status: DownloadStatus;
  url?: string;
  filename?: string;
  candidatesTried: number;
  attempts: number;
  bytes?: number;
  sha256?: string;
  error?: string;
  finishedAt: string;
}

export interface DownloadSummary {
  total: number;
  success: number;
  failed: number;
  failedPeriods: string[];
}

/** Manifest entry describing one dataset extraction from one document. */
export interface ExtractionReport {
  dataset: string;
  filename: string;
  status: "extracted_ok" | "extracted_failed";
  referenceDate?: string;
  pageIndex?: number;
  format?: string;
  strategy?: string;
  rowCount: number;
  reason?: string;
  finishedAt: string;
}
