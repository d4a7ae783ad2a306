import { describe, expect, it } from "vitest";
import {
  daysInMonth,
  extractReferenceDate,
  lastCompletedMonth,
  matchReferenceDate,
  monthsBetween,
  parseIsoDate,
  periodKey,
  toIsoDate,
} from "../src/dates";

function isoFromFilename(filename: string): string | undefined {
  const date = extractReferenceDate(filename);
  return date ? toIsoDate(date) : undefined;
}

describe("extractReferenceDate", () => {
  it("reads the dashed day-month-year form", () => {
    expect(isoFromFilename("Cruscotto statistico giornaliero 31-10-2025.pdf")).toBe("2025-10-31");
  });

  it("reads the dotted form", () => {
    expect(isoFromFilename("cruscotto_statistico_giornaliero_31.03.2024.pdf")).toBe("2024-03-31");
  });

  it("reads a spelled Italian month", () => {
    expect(isoFromFilename("Cruscotto statistico al 28 febbraio 2018.pdf")).toBe("2018-02-28");
  });

  it("reads the prefixed underscore form with a trailing counter", () => {
    const match = matchReferenceDate("cruscotto_statistico_giornaliero_31_ottobre_2017_0.pdf");
    expect(match).toEqual({ date: { year: 2017, month: 10, day: 31 }, pattern: "prefixed_underscore" });
  });

  it("reads the prefixed underscore form with del", () => {
    expect(isoFromFilename("cruscotto_statistico_giornaliero_del_30_giugno_2017_1.pdf")).toBe("2017-06-30");
  });

  it("reads a bare underscore form without the prefix", () => {
    const match = matchReferenceDate("report_30_novembre_2022.pdf");
    expect(match?.pattern).toBe("underscore");
    expect(match && toIsoDate(match.date)).toBe("2022-11-30");
  });

  it("accepts concatenated digits only for the legacy years", () => {
    expect(isoFromFilename("cruscotto31012017.pdf")).toBe("2017-01-31");
    expect(isoFromFilename("cruscotto31012019.pdf")).toBeUndefined();
  });

  it("prefers the earlier pattern when several match", () => {
    expect(isoFromFilename("Cruscotto 15-03-2018 del 31 marzo 2018.pdf")).toBe("2018-03-15");
  });

  it("skips impossible dates and keeps scanning", () => {
    expect(isoFromFilename("cruscotto 31-02-2019 e 28-02-2019.pdf")).toBe("2019-02-28");
  });

  it("returns undefined for an unknown month name", () => {
    expect(isoFromFilename("report 12 brumaio 2019.pdf")).toBeUndefined();
  });

  it("returns undefined when no convention matches", () => {
    expect(extractReferenceDate("report_final.pdf")).toBeUndefined();
  });
});

describe("calendar helpers", () => {
  it("knows leap years", () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(1900, 2)).toBe(28);
    expect(daysInMonth(2000, 2)).toBe(29);
    expect(daysInMonth(2025, 9)).toBe(30);
    expect(daysInMonth(2025, 10)).toBe(31);
  });

  it("treats the month in progress as incomplete", () => {
    expect(lastCompletedMonth(new Date(2026, 0, 15))).toEqual({ year: 2025, month: 12 });
    expect(lastCompletedMonth(new Date(2025, 10, 1))).toEqual({ year: 2025, month: 10 });
  });

  it("lists months across a year boundary", () => {
    expect(monthsBetween({ year: 2024, month: 11 }, { year: 2025, month: 2 }).map(periodKey)).toEqual([
      "2024-11",
      "2024-12",
      "2025-01",
      "2025-02",
    ]);
    expect(monthsBetween({ year: 2025, month: 3 }, { year: 2025, month: 2 })).toEqual([]);
  });

  it("refuses month numbers outside the calendar", () => {
    expect(() => monthsBetween({ year: 2017, month: 13 }, { year: 2018, month: 1 })).toThrow("Invalid month: 2017-13");
    expect(() => monthsBetween({ year: 2017, month: 0 }, { year: 2018, month: 1 })).toThrow("Invalid month: 2017-00");
  });

  it("parses only valid ISO dates", () => {
    expect(parseIsoDate("2024-02-29")).toEqual({ year: 2024, month: 2, day: 29 });
    expect(parseIsoDate("2019-02-29")).toBeUndefined();
    expect(parseIsoDate("2019-2-1")).toBeUndefined();
  });
});
