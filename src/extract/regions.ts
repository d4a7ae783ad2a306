import { foldText } from "./textUtils";

export const ITALIAN_REGIONS = [
  "Abruzzo",
  "Basilicata",
  "Calabria",
  "Campania",
  "Emilia-Romagna",
  "Friuli-Venezia Giulia",
  "Lazio",
  "Liguria",
  "Lombardia",
  "Marche",
  "Molise",
  "Piemonte",
  "Puglia",
  "Sardegna",
  "Sicilia",
  "Toscana",
  "Trentino-Alto Adige",
  "Umbria",
  "Valle d'Aosta",
  "Veneto",
] as const;

export type ItalianRegion = (typeof ITALIAN_REGIONS)[number];

/** Spelled variants seen in the reports, keyed by their normalized form. */
const REGION_SYNONYMS: Array<[string, ItalianRegion]> = [
  ["trentino", "Trentino-Alto Adige"],
  ["alto adige", "Trentino-Alto Adige"],
  ["sudtirol", "Trentino-Alto Adige"],
  ["valle d aosta", "Valle d'Aosta"],
  ["valle daosta", "Valle d'Aosta"],
  ["aosta", "Valle d'Aosta"],
  ["friuli", "Friuli-Venezia Giulia"],
  ["venezia giulia", "Friuli-Venezia Giulia"],
  ["emilia", "Emilia-Romagna"],
  ["romagna", "Emilia-Romagna"],
  ["puglie", "Puglia"],
  ["toscane", "Toscana"],
  ["lombardie", "Lombardia"],
];

/** Folded, punctuation-free form: "VALLE D'AOSTA/Vallée d'Aoste" becomes "valle d aosta vallee d aoste". */
export function normalizeRegionKey(value: string): string {
  return foldText(value)
    .replace(/[-'’‘´`./]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

const VOCABULARY: Array<[string, ItalianRegion]> = [
  ...ITALIAN_REGIONS.map<[string, ItalianRegion]>((region) => [normalizeRegionKey(region), region]),
  ...REGION_SYNONYMS,
];

function containsPhrase(haystack: string, phrase: string): boolean {
  return ` ${haystack} `.includes(` ${phrase} `);
}

/** Canonical region named by a table cell or text line, if any. */
export function matchRegion(value: string): ItalianRegion | undefined {
  const key = normalizeRegionKey(value);
  if (key === "") {
    return undefined;
  }
  for (const [phrase, region] of VOCABULARY) {
    if (containsPhrase(key, phrase)) {
      return region;
    }
  }
  return undefined;
}
