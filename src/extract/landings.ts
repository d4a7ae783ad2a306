import { LandingsRow } from "../datasets";
import { ITALIAN_MONTH_ABBREVIATIONS } from "../dates";
import { splitLines } from "./textUtils";
import { DatasetExtractor, ExtractionContext, ExtractionStrategy, PageContent, PdfDocumentContent, ValidationVerdict } from "./types";

/** Largest daily value the chart can plausibly show. */
export const MAX_DAILY_LANDINGS = 10000;
export const MIN_COVERAGE = 0.25;
export const MIN_DAYS = 5;
/** Share of the days between the first and last label that must carry a value. */
export const MIN_DENSITY = 0.8;
const RELAXED_FILL_BELOW = 0.3;

const CHART_TITLE = /Migranti\s+sbarcati\s+per\s+giorno\s+al\s+\d{1,2}\s+\w+\s+\d{4}\s*\*\s*-\s*mese\s+di\s+\w+/;
const FIRST_CAPTION =
  /\*\s*I\s+dati\s+si\s+riferiscono\s+agli\s+eventi\s+di\s+sbarco\s+rilevati\s+entro\s+le\s+ore\s+8:00\s+del\s+giorno\s+di\s+riferimento/;
const SECOND_CAPTION =
  /Fonte:\s+Dipartimento\s+della\s+Pubblica\s+sicurezza\.\s+I\s+dati\s+sono\s+suscettibili\s+di\s+successivo\s+consolidamento\./;
const AREA_NOISE = [/^Note:/i, /^Tabella/i, /^PRESENZE/i, /^NAZIONALIT[ÀA]/i, /^Totale/i];

/** Text between the chart title and its first caption, without lines from neighbouring tables. */
export function isolateChartArea(text: string): string | undefined {
  const title = CHART_TITLE.exec(text);
  if (!title) {
    return undefined;
  }
  const rest = text.slice(title.index + title[0].length);
  const caption = FIRST_CAPTION.exec(rest);
  if (!caption) {
    return undefined;
  }
  return splitLines(rest.slice(0, caption.index))
    .filter((line) => !AREA_NOISE.some((pattern) => pattern.test(line)))
    .join("\n");
}

function monthAbbreviation(ctx: ExtractionContext): string {
  return ITALIAN_MONTH_ABBREVIATIONS[ctx.referenceDate.month - 1];
}

function labelledPairs(area: string, abbreviation: string): Array<[number, number]> {
  const pattern = new RegExp(`(\\d{1,2})-${abbreviation}\\s+(\\d{1,6})`, "gi");
  return Array.from(area.matchAll(pattern), (match): [number, number] => [Number(match[1]), Number(match[2])]);
}

function withinBounds(day: number, value: number, ctx: ExtractionContext): boolean {
  return day >= 1 && day <= ctx.daysInMonth && value >= 0 && value <= MAX_DAILY_LANDINGS;
}

function toRows(pairs: Iterable<[number, number]>): LandingsRow[] {
  return Array.from(pairs, ([day, value]) => ({ day, landed_migrants: value })).sort((a, b) => a.day - b.day);
}

/** Every `<d>-<abbr> <value>` label as printed, left for validation to judge. */
export const chartLabelStrategy: ExtractionStrategy<LandingsRow> = {
  name: "chart_labels",
  extract(page: PageContent, ctx: ExtractionContext): LandingsRow[] {
    const area = isolateChartArea(page.text);
    return area === undefined ? [] : toRows(labelledPairs(area, monthAbbreviation(ctx)));
  },
};

/**
 * In-bounds labels (a repeated day keeps its last value). When those cover
 * less than 30% of the month, looser layouts fill the missing days: a spaced
 * abbreviation, a single-letter residue of the abbreviation, then bare
 * `<day> <value>` pairs.
 */
export const relaxedChartStrategy: ExtractionStrategy<LandingsRow> = {
  name: "relaxed_labels",
  extract(page: PageContent, ctx: ExtractionContext): LandingsRow[] {
    const area = isolateChartArea(page.text);
    if (area === undefined) {
      return [];
    }
    const abbreviation = monthAbbreviation(ctx);
    const days = new Map<number, number>();
    for (const [day, value] of labelledPairs(area, abbreviation)) {
      if (withinBounds(day, value, ctx)) {
        days.set(day, value);
      }
    }
    if (days.size >= ctx.daysInMonth * RELAXED_FILL_BELOW) {
      return toRows(days.entries());
    }

    const alternatives = [
      new RegExp(`(\\d{1,2})\\s+${abbreviation}\\s+(\\d{1,6})`, "gi"),
      new RegExp(`(\\d{1,2})[${abbreviation}]\\s*(\\d{1,6})`, "gi"),
      /(\d{1,2})\s+(\d{1,6})/g,
    ];
    for (const pattern of alternatives) {
      for (const match of area.matchAll(pattern)) {
        const day = Number(match[1]);
        const value = Number(match[2]);
        if (withinBounds(day, value, ctx) && !days.has(day)) {
          days.set(day, value);
        }
      }
    }
    return toRows(days.entries());
  },
};

export const landingsExtractor: DatasetExtractor<LandingsRow> = {
  dataset: "landings",
  strategies: [chartLabelStrategy, relaxedChartStrategy],

  locatePage(document: PdfDocumentContent): number | undefined {
    // Matched on the page text as printed; all three anchors are required.
    return document.pages.find(
      (page) => CHART_TITLE.test(page.text) && FIRST_CAPTION.test(page.text) && SECOND_CAPTION.test(page.text),
    )?.index;
  },

  detectFormat(): string {
    return "daily-chart";
  },

  validate(rows: LandingsRow[], ctx: ExtractionContext): ValidationVerdict {
    if (rows.length === 0) {
      return { valid: false, reason: "no chart values" };
    }
    const days = rows.map((row) => row.day);
    if (days.some((day) => day < 1 || day > ctx.daysInMonth)) {
      return { valid: false, reason: `day outside 1..${ctx.daysInMonth}` };
    }
    if (rows.some((row) => row.landed_migrants < 0 || row.landed_migrants > MAX_DAILY_LANDINGS)) {
      return { valid: false, reason: `value above ${MAX_DAILY_LANDINGS}` };
    }
    if (new Set(days).size !== days.length) {
      return { valid: false, reason: "duplicate days" };
    }
    const minimum = Math.ceil(Math.max(MIN_DAYS, ctx.daysInMonth * MIN_COVERAGE));
    if (days.length < minimum) {
      return { valid: false, reason: `${days.length} days found, at least ${minimum} required` };
    }
    const span = Math.max(...days) - Math.min(...days) + 1;
    const dense = Math.ceil(span * MIN_DENSITY);
    if (days.length < dense) {
      return { valid: false, reason: `${days.length} days over a ${span}-day span, at least ${dense} required` };
    }
    return { valid: true };
  },
};
