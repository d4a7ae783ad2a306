export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  filename?: string;
  dataset?: string;
  url?: string;
  period?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "downloads_ok"
  | "downloads_failed"
  | "downloads_skipped"
  | "extracts_ok"
  | "extracts_failed"
  | "rows_written";

export type MetricTimerName = "download_ms" | "extract_ms";
