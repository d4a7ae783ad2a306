import { CalendarDate, isValidCalendarDate, monthFromItalianName } from "./calendar";

interface DatePattern {
  name: string;
  regex: RegExp;
  toDate(match: RegExpExecArray): CalendarDate | undefined;
}

function numeric(dayIndex: number, monthIndex: number, yearIndex: number) {
  return (match: RegExpExecArray): CalendarDate => ({
    year: Number(match[yearIndex]),
    month: Number(match[monthIndex]),
    day: Number(match[dayIndex]),
  });
}

function spelled(match: RegExpExecArray): CalendarDate | undefined {
  const month = monthFromItalianName(match[2]);
  if (month === undefined) {
    return undefined;
  }
  return { year: Number(match[3]), month, day: Number(match[1]) };
}

const LEGACY_CONCATENATED_YEARS = new Set([2017, 2018]);

/**
 * Naming conventions seen across the report archive, most specific first.
 * The bare `d_month_yyyy` form comes after the prefix-anchored one so that
 * unrelated digit runs elsewhere in a name are not picked up first.
 */
const DATE_PATTERNS: DatePattern[] = [
  { name: "dashed", regex: /(\d{2})-(\d{2})-(\d{4})/g, toDate: numeric(1, 2, 3) },
  { name: "dotted", regex: /(\d{2})\.(\d{2})\.(\d{4})/g, toDate: numeric(1, 2, 3) },
  { name: "spelled", regex: /(\d{1,2})\s+([A-Za-z]+)\s+(\d{4})/g, toDate: spelled },
  {
    name: "concatenated",
    regex: /(\d{2})(\d{2})(\d{4})/g,
    toDate: (match) => {
      const date = numeric(1, 2, 3)(match);
      return LEGACY_CONCATENATED_YEARS.has(date.year) ? date : undefined;
    },
  },
  {
    name: "prefixed_underscore",
    regex: /cruscotto_statistico_giornaliero_(?:del_)?(\d{1,2})_([A-Za-z]+)_(\d{4})/gi,
    toDate: spelled,
  },
  { name: "underscore", regex: /(\d{1,2})_([A-Za-z]+)_(\d{4})/g, toDate: spelled },
];

export interface DateMatch {
  date: CalendarDate;
  pattern: string;
}

export function matchReferenceDate(filename: string): DateMatch | undefined {
  for (const pattern of DATE_PATTERNS) {
    const regex = new RegExp(pattern.regex.source, pattern.regex.flags);
    for (let match = regex.exec(filename); match !== null; match = regex.exec(filename)) {
      const date = pattern.toDate(match);
      if (date && isValidCalendarDate(date)) {
        return { date, pattern: pattern.name };
      }
    }
  }
  return undefined;
}

/**
 * Reference date a report covers, read from its filename.
 * `undefined` means no known naming convention matched; callers skip the file.
 */
export function extractReferenceDate(filename: string): CalendarDate | undefined {
  return matchReferenceDate(filename)?.date;
}
