import { describe, expect, it, vi } from "vitest";
import { PdfDocumentLoader } from "../src/extract";

function fakeParser(options: { textError?: Error; tableError?: Error; destroyError?: Error } = {}) {
  return {
    getText: vi.fn(async () => {
      if (options.textError) {
        throw options.textError;
      }
      return {
        total: 3,
        pages: [
          { num: 1, text: "Cruscotto statistico" },
          { num: 3, text: "Presenze migranti in accoglienza" },
        ],
      };
    }),
    getTable: vi.fn(async () => {
      if (options.tableError) {
        throw options.tableError;
      }
      return { total: 3, pages: [{ num: 3, tables: [[["Lazio", "1.000"]]] }] };
    }),
    destroy: vi.fn(async () => {
      if (options.destroyError) {
        throw options.destroyError;
      }
    }),
  };
}

function loaderFor(parser: ReturnType<typeof fakeParser>): PdfDocumentLoader {
  return new PdfDocumentLoader({
    parserFactory: () => parser,
    readFile: async () => Buffer.from("%PDF-1.4"),
  });
}

describe("PdfDocumentLoader", () => {
  it("maps parser pages onto 0-based page content", async () => {
    const parser = fakeParser();

    const document = await loaderFor(parser).load("/reports/Cruscotto 31-10-2025.pdf");

    expect(document).toEqual({
      filename: "Cruscotto 31-10-2025.pdf",
      pageCount: 3,
      pages: [
        { index: 0, text: "Cruscotto statistico", tables: [] },
        { index: 1, text: "", tables: [] },
        { index: 2, text: "Presenze migranti in accoglienza", tables: [[["Lazio", "1.000"]]] },
      ],
      tableError: undefined,
    });
    expect(parser.destroy).toHaveBeenCalledTimes(1);
  });

  it("keeps page text when table detection fails", async () => {
    const document = await loaderFor(fakeParser({ tableError: new Error("table grid not found") })).load("/r/a.pdf");

    expect(document.tableError).toBe("table grid not found");
    expect(document.pages[2]).toEqual({ index: 2, text: "Presenze migranti in accoglienza", tables: [] });
  });

  it("propagates unreadable documents and still releases the parser", async () => {
    const parser = fakeParser({ textError: new Error("Invalid PDF structure") });

    await expect(loaderFor(parser).load("/r/a.pdf")).rejects.toThrow("Invalid PDF structure");
    expect(parser.destroy).toHaveBeenCalledTimes(1);
  });

  it("ignores errors while releasing the parser", async () => {
    const document = await loaderFor(fakeParser({ destroyError: new Error("already destroyed") })).load("/r/a.pdf");
    expect(document.pageCount).toBe(3);
  });
});
