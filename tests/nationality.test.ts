import { describe, expect, it } from "vitest";
import {
  extractOne,
  nationalityExtractor,
  nationalityTableStrategy,
  nationalityTextStrategy,
  normalizeNationality,
} from "../src/extract";
import { makeContext, makeDocument, makePage, NATIONALITY_PAGE_TEXT, NATIONALITY_TABLE } from "./fixtures";

const ctx = makeContext("2025-10-31");

describe("normalizeNationality", () => {
  it("collapses the spellings of Costa d'Avorio", () => {
    expect(normalizeNationality("Costa D'Avorio")).toBe("Costa d'Avorio");
    expect(normalizeNationality("COSTA D’AVORIO")).toBe("Costa d'Avorio");
    expect(normalizeNationality("Costa d Avorio")).toBe("Costa d'Avorio");
    expect(normalizeNationality("Costa dâ€™Avorio")).toBe("Costa d'Avorio");
  });

  it("trims other names without changing them", () => {
    expect(normalizeNationality("  Bangladesh ")).toBe("Bangladesh");
  });
});

describe("nationality strategies", () => {
  it("reads name and count cells from the first usable table", () => {
    const page = makePage("", [[["a", "b"]], NATIONALITY_TABLE]);

    expect(nationalityTableStrategy.extract(page, ctx)).toEqual([
      { nationality: "Tunisia", landed_migrants: 1234 },
      { nationality: "Costa d'Avorio", landed_migrants: 850 },
    ]);
  });

  it("ignores tables with fewer than three rows", () => {
    const page = makePage("", [NATIONALITY_TABLE.slice(0, 2)]);
    expect(nationalityTableStrategy.extract(page, ctx)).toEqual([]);
  });

  it("reads name-count lines below the title", () => {
    expect(nationalityTextStrategy.extract(makePage(NATIONALITY_PAGE_TEXT), ctx)).toEqual([
      { nationality: "Tunisia", landed_migrants: 1234 },
      { nationality: "Bangladesh", landed_migrants: 987 },
    ]);
  });

  it("keeps the first row of a repeated nationality", () => {
    const text = "Nazionalità dichiarate al momento dello sbarco\nSudan 40\nSudan 12\nEgitto 7";
    expect(nationalityTextStrategy.extract(makePage(text), ctx)).toEqual([
      { nationality: "Sudan", landed_migrants: 40 },
      { nationality: "Egitto", landed_migrants: 7 },
    ]);
  });

  it("stops at the next section heading on the same page", () => {
    const text = [
      "Nazionalità dichiarate al momento dello sbarco",
      "Tunisia 1.234",
      "Guinea 567",
      "Presenze migranti in accoglienza",
      "Lombardia 12.345",
      "Sicilia 7.350",
    ].join("\n");
    expect(nationalityTextStrategy.extract(makePage(text), ctx)).toEqual([
      { nationality: "Tunisia", landed_migrants: 1234 },
      { nationality: "Guinea", landed_migrants: 567 },
    ]);
  });

  it("skips lines naming an Italian region", () => {
    const text = "Nazionalità dichiarate al momento dello sbarco\nEritrea 300\nSicilia 7.350\nSomalia 12";
    expect(nationalityTextStrategy.extract(makePage(text), ctx)).toEqual([
      { nationality: "Eritrea", landed_migrants: 300 },
      { nationality: "Somalia", landed_migrants: 12 },
    ]);
  });
});

describe("nationalityExtractor", () => {
  it("finds the first page that mentions the title", () => {
    const document = makeDocument("Cruscotto statistico giornaliero 31-10-2025.pdf", [
      { text: "Indice" },
      { text: "NAZIONALITÀ DICHIARATE ALLO SBARCO" },
      { text: "Nazionalità dichiarate al momento dello sbarco" },
    ]);
    expect(nationalityExtractor.locatePage(document)).toBe(1);
  });

  it("falls back to loose header keywords", () => {
    const document = makeDocument("x 31-10-2025.pdf", [{ text: "" }, { text: "Nazionalita e sbarchi" }]);
    expect(nationalityExtractor.locatePage(document)).toBe(1);
  });

  it("uses the text fallback when the page has no table", () => {
    const document = makeDocument("Cruscotto statistico giornaliero 31-10-2025.pdf", [{ text: NATIONALITY_PAGE_TEXT }]);

    const outcome = extractOne(document, nationalityExtractor);

    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") {
      return;
    }
    expect(outcome.strategy).toBe("text_lines");
    expect(outcome.attempts.map((attempt) => attempt.verdict)).toEqual([
      { valid: false, reason: "no nationality rows" },
      { valid: true },
    ]);
    expect(outcome.records[0]).toEqual({
      nationality: "Tunisia",
      landed_migrants: 1234,
      reference_date: "2025-10-31",
      source_filename: "Cruscotto statistico giornaliero 31-10-2025.pdf",
    });
  });
});
