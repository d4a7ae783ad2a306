import { ACCOMMODATION_CUTOVER_DATE, AccommodationFormat, AccommodationRow } from "../datasets";
import { containsAll, containsAny, locatePageByMatchers, matchesPattern } from "./engine";
import { ITALIAN_REGIONS, matchRegion } from "./regions";
import { cleanTable, countTokens, foldText, parseCount, splitLines } from "./textUtils";
import {
  DatasetExtractor,
  ExtractionContext,
  ExtractionStrategy,
  PageContent,
  PdfDocumentContent,
  ValidationVerdict,
} from "./types";

const TITLE_INDICATORS = [
  "PRESENZE MIGRANTI IN ACCOGLIENZA",
  "PRESENZA MIGRANTI IN ACCOGLIENZA",
  "PRESENZE IN ACCOGLIENZA",
  "PRESENZA IN ACCOGLIENZA",
];

const PRE_CUTOVER_INDICATORS = [
  "Totale immigrati presenti sul territorio regione",
  "percentuale di distribuzione",
  "Percentuale di distribuzione",
];

const COMMON_NOISE = ["presenze migranti", "presenza migranti", "totale", "aggiornamento", "regione", "note", "fonte"];
const PRE_CUTOVER_NOISE = [...COMMON_NOISE, "percentuale"];

/** A quarter of the 20 regions. */
export const MIN_REGIONS = Math.ceil(ITALIAN_REGIONS.length * 0.25);

function asFormat(value: string): AccommodationFormat {
  return value === "pre-cutover" ? "pre-cutover" : "post-cutover";
}

function isNoise(label: string, format: AccommodationFormat): boolean {
  const folded = foldText(label);
  const patterns = format === "pre-cutover" ? PRE_CUTOVER_NOISE : COMMON_NOISE;
  return patterns.some((pattern) => folded.includes(pattern));
}

function buildRow(region: string, format: AccommodationFormat, counts: number[]): AccommodationRow {
  if (format === "pre-cutover") {
    return {
      region,
      hotspot: 0,
      reception_centres: 0,
      sai_network: 0,
      total_accommodated: counts[0] ?? 0,
      format,
    };
  }
  return {
    region,
    hotspot: counts[0] ?? 0,
    reception_centres: counts[1] ?? 0,
    sai_network: counts[2] ?? 0,
    total_accommodated: counts[3] ?? 0,
    format,
  };
}

function rowsFromTable(table: string[][], format: AccommodationFormat): AccommodationRow[] {
  const rows: AccommodationRow[] = [];
  const seen = new Set<string>();
  for (const row of cleanTable(table)) {
    if (row.length < 2 || row[0] === "" || isNoise(row[0], format)) {
      continue;
    }
    const region = matchRegion(row[0]);
    if (!region || seen.has(region)) {
      continue;
    }
    seen.add(region);
    // Missing trailing cells read as "0".
    const cells = format === "pre-cutover" ? [row[1]] : [1, 2, 3, 4].map((column) => row[column] ?? "0");
    rows.push(buildRow(region, format, cells.map(parseCount)));
  }
  return rows;
}

export const accommodationTableStrategy: ExtractionStrategy<AccommodationRow> = {
  name: "table",
  extract(page: PageContent, ctx: ExtractionContext): AccommodationRow[] {
    const format = asFormat(ctx.format);
    let best: AccommodationRow[] = [];
    for (const table of page.tables) {
      if (table.length < 3) {
        continue;
      }
      const rows = rowsFromTable(table, format);
      if (rows.length > best.length) {
        best = rows;
      }
    }
    return best;
  },
};

export const accommodationTextStrategy: ExtractionStrategy<AccommodationRow> = {
  name: "text_lines",
  extract(page: PageContent, ctx: ExtractionContext): AccommodationRow[] {
    const format = asFormat(ctx.format);
    const rows: AccommodationRow[] = [];
    const seen = new Set<string>();
    for (const line of splitLines(page.text)) {
      if (isNoise(line, format)) {
        continue;
      }
      const region = matchRegion(line.replace(/[\d.,%]+/g, " "));
      if (!region || seen.has(region)) {
        continue;
      }
      const counts = countTokens(line);
      if (counts.length === 0) {
        continue;
      }
      seen.add(region);
      if (format === "pre-cutover" || counts.length >= 4) {
        rows.push(buildRow(region, format, counts.slice(0, 4)));
      } else {
        rows.push(buildRow(region, format, [0, 0, 0, counts[counts.length - 1]]));
      }
    }
    return rows;
  },
};

export const accommodationExtractor: DatasetExtractor<AccommodationRow> = {
  dataset: "accommodation",
  strategies: [accommodationTableStrategy, accommodationTextStrategy],

  locatePage(document: PdfDocumentContent): number | undefined {
    return locatePageByMatchers(document, [
      containsAny(TITLE_INDICATORS),
      matchesPattern(/PRESENZ[AE]\s*(MIGRANTI)?\s*IN\s*ACCOGLIENZA/i),
      containsAll(["REGIONE", "HOT SPOT", "ACCOGLIENZA"]),
      containsAll(["REGIONE", "TOTALE IMMIGRATI PRESENTI"]),
    ]);
  },

  detectFormat(page: PageContent, ctx: Omit<ExtractionContext, "format">): AccommodationFormat {
    if (PRE_CUTOVER_INDICATORS.some((indicator) => page.text.includes(indicator))) {
      return "pre-cutover";
    }
    return ctx.referenceIso < ACCOMMODATION_CUTOVER_DATE ? "pre-cutover" : "post-cutover";
  },

  validate(rows: AccommodationRow[]): ValidationVerdict {
    const regions = new Set(rows.map((row) => row.region));
    if (regions.size < MIN_REGIONS) {
      return { valid: false, reason: `${regions.size} regions found, at least ${MIN_REGIONS} required` };
    }
    return { valid: true };
  },
};
