export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface YearMonth {
  year: number;
  month: number;
}

export const ITALIAN_MONTHS = [
  "gennaio",
  "febbraio",
  "marzo",
  "aprile",
  "maggio",
  "giugno",
  "luglio",
  "agosto",
  "settembre",
  "ottobre",
  "novembre",
  "dicembre",
] as const;

/** Three-letter labels used on the daily landings chart axis. */
export const ITALIAN_MONTH_ABBREVIATIONS = [
  "gen",
  "feb",
  "mar",
  "apr",
  "mag",
  "giu",
  "lug",
  "ago",
  "set",
  "ott",
  "nov",
  "dic",
] as const;

export function monthFromItalianName(name: string): number | undefined {
  const index = ITALIAN_MONTHS.findIndex((month) => month === name.trim().toLowerCase());
  return index >= 0 ? index + 1 : undefined;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidCalendarDate(date: CalendarDate): boolean {
  return (
    Number.isInteger(date.year) &&
    Number.isInteger(date.month) &&
    Number.isInteger(date.day) &&
    date.month >= 1 &&
    date.month <= 12 &&
    date.day >= 1 &&
    date.day <= daysInMonth(date.year, date.month)
  );
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function toIsoDate(date: CalendarDate): string {
  return `${String(date.year).padStart(4, "0")}-${pad2(date.month)}-${pad2(date.day)}`;
}

export function parseIsoDate(value: string): CalendarDate | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  return isValidCalendarDate(date) ? date : undefined;
}

export function isMonthNumber(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 12;
}

export function periodKey(period: YearMonth): string {
  return `${String(period.year).padStart(4, "0")}-${pad2(period.month)}`;
}

export function compareYearMonth(a: YearMonth, b: YearMonth): number {
  return a.year !== b.year ? a.year - b.year : a.month - b.month;
}

export function nextMonth(period: YearMonth): YearMonth {
  return period.month === 12 ? { year: period.year + 1, month: 1 } : { year: period.year, month: period.month + 1 };
}

/** The month before the one `now` falls in; the in-progress month is never complete. */
export function lastCompletedMonth(now: Date): YearMonth {
  const year = now.getFullYear();
  const month = now.getMonth() + 1;
  return month === 1 ? { year: year - 1, month: 12 } : { year, month: month - 1 };
}

export function monthsBetween(start: YearMonth, end: YearMonth): YearMonth[] {
  for (const period of [start, end]) {
    if (!Number.isInteger(period.year) || !isMonthNumber(period.month)) {
      throw new Error(`Invalid month: ${periodKey(period)}`);
    }
  }
  const periods: YearMonth[] = [];
  for (let current = start; compareYearMonth(current, end) <= 0; current = nextMonth(current)) {
    periods.push(current);
  }
  return periods;
}

export function toUtcDate(date: CalendarDate): Date {
  return new Date(Date.UTC(date.year, date.month - 1, date.day));
}
