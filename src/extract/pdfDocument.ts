import fs from "node:fs";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import { PageContent, PdfDocumentContent } from "./types";

interface ParserLike {
  getText(): Promise<{
    total: number;
    pages: Array<{
      num: number;
      text: string;
    }>;
  }>;
  getTable(): Promise<{
    total: number;
    pages: Array<{
      num: number;
      tables: string[][][];
    }>;
  }>;
  destroy(): Promise<void>;
}

export interface PdfDocumentLoaderDeps {
  parserFactory?: (data: Buffer) => ParserLike;
  readFile?: (filePath: string) => Promise<Buffer>;
}

export interface DocumentSource {
  load(filePath: string): Promise<PdfDocumentContent>;
}

/** Reads a report once and exposes per-page text and detected tables. */
export class PdfDocumentLoader implements DocumentSource {
  private readonly parserFactory: (data: Buffer) => ParserLike;
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(deps?: PdfDocumentLoaderDeps) {
    this.parserFactory =
      deps?.parserFactory ??
      ((data) =>
        new PDFParse({
          data,
        }));
    this.readFile = deps?.readFile ?? fs.promises.readFile;
  }

  async load(filePath: string): Promise<PdfDocumentContent> {
    const pdfBuffer = await this.readFile(filePath);
    const parser = this.parserFactory(pdfBuffer);

    try {
      const textResult = await parser.getText();
      const pages: PageContent[] = Array.from({ length: textResult.total }, (_, index) => ({
        index,
        text: "",
        tables: [],
      }));
      for (const page of textResult.pages) {
        const target = pages[page.num - 1];
        if (target) {
          target.text = page.text ?? "";
        }
      }

      let tableError: string | undefined;
      try {
        const tableResult = await parser.getTable();
        for (const page of tableResult.pages) {
          const target = pages[page.num - 1];
          if (target) {
            target.tables = page.tables;
          }
        }
      } catch (error) {
        tableError = error instanceof Error ? error.message : String(error);
      }

      return {
        filename: path.basename(filePath),
        pageCount: textResult.total,
        pages,
        tableError,
      };
    } finally {
      await parser.destroy().catch(() => undefined);
    }
  }
}
