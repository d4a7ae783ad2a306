import { NationalityRow } from "../datasets";
import { containsAll, containsAny, locatePageByMatchers, matchesPattern } from "./engine";
import { matchRegion } from "./regions";
import { cleanTable, hasDigit, parseCount, splitLines } from "./textUtils";
import { DatasetExtractor, ExtractionStrategy, PageContent, PdfDocumentContent, ValidationVerdict } from "./types";

const TITLE_INDICATORS = [
  "Nazionalità dichiarate al momento dello sbarco",
  "Nazionalità dichiarata al momento dello sbarco",
  "Nazionalità dichiarate",
];

const TITLE_PATTERN = /NAZIONALIT[ÀA].*DICHIARAT[AE].*SBARCO/i;
const TABLE_NOISE = /TOTALE|NAZIONALIT[ÀA]|NOTE/i;
const TEXT_NOISE = /TOTALE|NAZIONALIT[ÀA]|NOTE|FONTE|AGGIORNAT|DATI|MIGRANTI|SBARC|PAGINA/i;
// Headings that close the nationality block when other sections share its page.
const SECTION_END =
  /PRESENZ[AE]\s*(?:MIGRANTI\s*)?IN\s*ACCOGLIENZA|MIGRANTI\s+SBARCATI\s+PER\s+GIORNO|^\s*FONTE\s*:|^\s*TOTALE\b/i;
const TEXT_ROW = /^(\D*[A-Za-zÀ-ÿ]\D*?)\s+(\d{1,3}(?:\.\d{3})+|\d+)(?!\d)/;
const COSTA_D_AVORIO = /costa\s*d(?:['’‘´`]|â€™|\s)+avorio/i;

/** Collapses every spelling of Costa d'Avorio found in the reports; other names pass through trimmed. */
export function normalizeNationality(name: string): string {
  const trimmed = name.trim();
  return COSTA_D_AVORIO.test(trimmed) ? "Costa d'Avorio" : trimmed;
}

function acceptRow(rows: NationalityRow[], seen: Set<string>, rawName: string, rawCount: string, noise: RegExp): void {
  const name = rawName.trim();
  if (name === "" || noise.test(name) || !hasDigit(rawCount) || matchRegion(name) !== undefined) {
    return;
  }
  const count = parseCount(rawCount);
  if (count <= 0) {
    return;
  }
  const nationality = normalizeNationality(name);
  if (seen.has(nationality)) {
    return;
  }
  seen.add(nationality);
  rows.push({ nationality, landed_migrants: count });
}

function rowsFromTable(table: string[][]): NationalityRow[] {
  const rows: NationalityRow[] = [];
  const seen = new Set<string>();
  for (const row of cleanTable(table)) {
    if (row.length < 2) {
      continue;
    }
    acceptRow(rows, seen, row[0], row[1], TABLE_NOISE);
  }
  return rows;
}

export const nationalityTableStrategy: ExtractionStrategy<NationalityRow> = {
  name: "table",
  extract(page: PageContent): NationalityRow[] {
    for (const table of page.tables) {
      if (table.length < 3) {
        continue;
      }
      const rows = rowsFromTable(table);
      if (rows.length > 0) {
        return rows;
      }
    }
    return [];
  },
};

export const nationalityTextStrategy: ExtractionStrategy<NationalityRow> = {
  name: "text_lines",
  extract(page: PageContent): NationalityRow[] {
    const lines = splitLines(page.text);
    const titleIndex = lines.findIndex((line) => TITLE_PATTERN.test(line) || /NAZIONALIT[ÀA] DICHIARAT/i.test(line));
    const body = titleIndex >= 0 ? lines.slice(titleIndex + 1) : lines;
    const endIndex = body.findIndex((line) => SECTION_END.test(line));

    const rows: NationalityRow[] = [];
    const seen = new Set<string>();
    for (const line of endIndex >= 0 ? body.slice(0, endIndex) : body) {
      const match = TEXT_ROW.exec(line);
      if (match) {
        acceptRow(rows, seen, match[1], match[2], TEXT_NOISE);
      }
    }
    return rows;
  },
};

export const nationalityExtractor: DatasetExtractor<NationalityRow> = {
  dataset: "nationality",
  strategies: [nationalityTableStrategy, nationalityTextStrategy],

  locatePage(document: PdfDocumentContent): number | undefined {
    return locatePageByMatchers(document, [
      containsAny(TITLE_INDICATORS),
      matchesPattern(TITLE_PATTERN),
      containsAll(["NAZIONALIT", "SBARC"]),
    ]);
  },

  detectFormat(): string {
    return "standard";
  },

  validate(rows: NationalityRow[]): ValidationVerdict {
    return rows.length > 0 ? { valid: true } : { valid: false, reason: "no nationality rows" };
  },
};
