import { DownloadResult, ExtractionReport } from "../types";

export interface Sink {
  publishDownloadResult(results: DownloadResult[]): Promise<void>;
  publishExtractionResult(results: ExtractionReport[]): Promise<void>;
}
