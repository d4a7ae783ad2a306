import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AppConfig, DEFAULT_CONFIG } from "../src/config";
import { daysInMonth, parseIsoDate } from "../src/dates";
import { ExtractionContext, PageContent, PdfDocumentContent } from "../src/extract";
import { Sink } from "../src/sink";
import { DownloadResult, ExtractionReport } from "../src/types";

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "migration-reports-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function makeConfig(root: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    baseUrl: "https://reports.example.test/files",
    domainBase: "https://reports.example.test",
    userAgent: "test-agent",
    maxDownloadAttempts: 3,
    retryDelayMs: 0,
    urlOverridesPath: path.join(root, "url-overrides.json"),
    outputDirs: {
      raw: path.join(root, "raw"),
      tables: path.join(root, "tables"),
      manifests: path.join(root, "manifests"),
      exports: path.join(root, "exports"),
    },
    ...overrides,
  };
}

export class RecordingSink implements Sink {
  readonly downloads: DownloadResult[] = [];
  readonly extracts: ExtractionReport[] = [];

  async publishDownloadResult(results: DownloadResult[]): Promise<void> {
    this.downloads.push(...results);
  }

  async publishExtractionResult(results: ExtractionReport[]): Promise<void> {
    this.extracts.push(...results);
  }
}

export function makePage(text: string, tables: string[][][] = [], index = 0): PageContent {
  return { index, text, tables };
}

export function makeDocument(filename: string, pages: Array<{ text: string; tables?: string[][][] }>): PdfDocumentContent {
  return {
    filename,
    pageCount: pages.length,
    pages: pages.map((page, index) => makePage(page.text, page.tables ?? [], index)),
  };
}

export function makeContext(referenceIso: string, format = "standard"): ExtractionContext {
  const referenceDate = parseIsoDate(referenceIso);
  if (!referenceDate) {
    throw new Error(`bad fixture date ${referenceIso}`);
  }
  return {
    filename: `fixture ${referenceIso}.pdf`,
    referenceDate,
    referenceIso,
    daysInMonth: daysInMonth(referenceDate.year, referenceDate.month),
    format,
  };
}

/** Body of an HTTP response carrying `text`. */
export function responseBody(text: string): ArrayBuffer {
  const encoded = Buffer.from(text);
  const body = new ArrayBuffer(encoded.length);
  new Uint8Array(body).set(encoded);
  return body;
}

export const NATIONALITY_PAGE_TEXT = [
  "Cruscotto statistico giornaliero",
  "Nazionalità dichiarate al momento dello sbarco",
  "Tunisia 1.234",
  "Bangladesh 987 12%",
  "Totale 2.221",
  "Fonte: banca dati sbarchi",
].join("\n");

export const NATIONALITY_TABLE: string[][] = [
  ["Nazionalità dichiarate al momento dello sbarco", ""],
  ["Tunisia", "1.234"],
  ["Costa d’Avorio", "850"],
  ["Guinea", "0"],
  ["Totale", "2.084"],
  ["Note: dati provvisori", ""],
];

export const ACCOMMODATION_PAGE_TEXT = "PRESENZE MIGRANTI IN ACCOGLIENZA\nRegione Hot spot Centri di accoglienza SAI Totale";

export const POST_CUTOVER_TABLE: string[][] = [
  ["Regione", "Hot spot", "Centri di accoglienza", "SAI", "Totale"],
  ["Lombardia", "0", "8.000", "1.500", "9.500"],
  ["Sicilia", "350", "5.000", "2.000", "7.350"],
  ["Trentino-Alto Adige/Südtirol", "0", "1.000", "200", "1.200"],
  ["Valle d'Aosta/Vallée d'Aoste", "0", "100", "20", "120"],
  ["Emilia Romagna", "0", "6.000", "1.000", "7.000"],
  ["Totale", "350", "20.100", "4.720", "25.170"],
];

export const CHART_FIRST_CAPTION =
  "*I dati si riferiscono agli eventi di sbarco rilevati entro le ore 8:00 del giorno di riferimento";
export const CHART_SECOND_CAPTION =
  "Fonte: Dipartimento della Pubblica sicurezza. I dati sono suscettibili di successivo consolidamento.";

/** Landings chart page for October 2025 with the given axis labels. */
export function chartPageText(labels: string[], trailing: string[] = []): string {
  return [
    "Migranti sbarcati per giorno al 31 ottobre 2025* - mese di ottobre",
    ...labels,
    CHART_FIRST_CAPTION,
    CHART_SECOND_CAPTION,
    ...trailing,
  ].join("\n");
}

/** `<d>-<abbr> <value>` labels for days 1..count, valued day * 10. */
export function dayLabels(count: number, abbreviation = "ott"): string[] {
  return Array.from({ length: count }, (_, index) => `${index + 1}-${abbreviation} ${(index + 1) * 10}`);
}
