import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { DownloadResult, ExtractionReport } from "../types";
import { Sink } from "./types";

export class LocalJsonlSink implements Sink {
  private readonly manifestsDir: string;
  private readonly downloadsPath: string;
  private readonly extractsPath: string;
  private readonly runId: string;

  constructor(config: AppConfig, runId: string) {
    this.manifestsDir = path.resolve(config.outputDirs.manifests);
    this.downloadsPath = path.join(this.manifestsDir, "downloads.jsonl");
    this.extractsPath = path.join(this.manifestsDir, "extracts.jsonl");
    this.runId = runId;
  }

  async publishDownloadResult(results: DownloadResult[]): Promise<void> {
    await this.appendLines(
      this.downloadsPath,
      results.map((result) => ({
        runId: this.runId,
        ...result,
      })),
    );
  }

  async publishExtractionResult(results: ExtractionReport[]): Promise<void> {
    await this.appendLines(
      this.extractsPath,
      results.map((result) => ({
        runId: this.runId,
        ...result,
      })),
    );
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    await fs.promises.mkdir(this.manifestsDir, { recursive: true });
    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}

export class NoopSink implements Sink {
  async publishDownloadResult(_results: DownloadResult[]): Promise<void> {
    return;
  }

  async publishExtractionResult(_results: ExtractionReport[]): Promise<void> {
    return;
  }
}
