import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, Mock, vi } from "vitest";
import { AppConfig } from "../src/config";
import { CommandContext, runExport, runExtract, runStatus, runUpdate } from "../src/core/commands";
import { HttpFetch } from "../src/core/fetch";
import { DATASETS } from "../src/datasets";
import { DocumentSource } from "../src/extract";
import { createSilentLogger, MetricsRegistry } from "../src/observability";
import { ColumnarStore } from "../src/store";
import {
  ACCOMMODATION_PAGE_TEXT,
  chartPageText,
  dayLabels,
  makeConfig,
  makeDocument,
  makeTempDir,
  NATIONALITY_PAGE_TEXT,
  NATIONALITY_TABLE,
  POST_CUTOVER_TABLE,
  RecordingSink,
  removeDir,
} from "./fixtures";

const OCTOBER = "Cruscotto statistico giornaliero 31-10-2025.pdf";
const MAY = "Cruscotto statistico giornaliero 31-05-2025.pdf";

describe("commands", () => {
  let root: string;
  let config: AppConfig;
  let store: ColumnarStore;
  let sink: RecordingSink;
  let load: Mock<DocumentSource["load"]>;
  let fetchFn: Mock<HttpFetch>;

  beforeEach(() => {
    root = makeTempDir();
    config = makeConfig(root, { maxDownloadAttempts: 1 });
    fs.mkdirSync(config.outputDirs.raw, { recursive: true });
    for (const name of [MAY, OCTOBER]) {
      fs.writeFileSync(path.join(config.outputDirs.raw, name), "%PDF-1.4");
    }
    store = new ColumnarStore(config.outputDirs.tables);
    sink = new RecordingSink();
    load = vi.fn<DocumentSource["load"]>(async (filePath) =>
      makeDocument(path.basename(filePath), [
        { text: NATIONALITY_PAGE_TEXT, tables: [NATIONALITY_TABLE] },
        { text: ACCOMMODATION_PAGE_TEXT, tables: [POST_CUTOVER_TABLE] },
        { text: chartPageText(dayLabels(10)) },
      ]),
    );
    fetchFn = vi.fn<HttpFetch>(async () => ({ ok: false, status: 404, arrayBuffer: async () => new ArrayBuffer(0) }));
  });

  afterEach(() => {
    removeDir(root);
  });

  function context(): CommandContext {
    return {
      runId: "run-test",
      config,
      store,
      logger: createSilentLogger("cli"),
      metrics: new MetricsRegistry(),
      sink,
      fetchFn,
      loader: { load },
      sleep: async () => undefined,
      now: () => new Date(2025, 11, 5),
    };
  }

  it("rebuilds every table from the acquired documents", async () => {
    const summary = await runExtract(context());

    expect(load).toHaveBeenCalledTimes(2);
    // The fixture chart is labelled for October only, so May yields no landings.
    expect(summary.documents.find((entry) => entry.dataset === "landings")?.failedFiles).toEqual([MAY]);
    expect(summary.saved.map((entry) => [entry.table, entry.rows])).toEqual([
      ["nationalities", 4],
      ["accommodation", 10],
      ["daily_landings", 10],
    ]);
    expect(store.query("nationalities", { startDate: "2025-10-01" })).toEqual([
      { nationality: "Tunisia", landed_migrants: 1234, reference_date: "2025-10-31", source_filename: OCTOBER },
      { nationality: "Costa d'Avorio", landed_migrants: 850, reference_date: "2025-10-31", source_filename: OCTOBER },
    ]);
  });

  it("reports status and exports every table", async () => {
    await runExtract(context());

    const stats = await runStatus(context());
    expect(stats.tableCount).toBe(3);
    expect(stats.totalRows).toBe(24);

    const exported = await runExport(context());
    expect(exported).toEqual({ nationalities: 4, accommodation: 10, daily_landings: 10 });
    const csv = fs.readFileSync(path.join(config.outputDirs.exports, "nationalities.csv"), "utf-8").split("\n");
    expect(csv[0]).toBe("nationality,landed_migrants,reference_date,source_filename");
    expect(csv[1]).toBe(`Tunisia,1234,2025-05-31,${MAY}`);
  });

  it("updates recent reports in place and keeps older rows", async () => {
    store.writeTable("nationalities", DATASETS.nationality.columns, [
      { nationality: "Tunisia", landed_migrants: 7, reference_date: "2025-05-31", source_filename: MAY },
      { nationality: "Guinea", landed_migrants: 3, reference_date: "2025-10-31", source_filename: "old.pdf" },
    ]);

    const summary = await runUpdate(context());

    expect(summary.period).toBe("2025-11");
    expect(summary.downloaded).toBe(false);
    expect(fetchFn).toHaveBeenCalledTimes(4);
    expect(sink.downloads).toMatchObject([{ period: "2025-11", status: "download_failed", error: "HTTP 404" }]);
    expect(load).toHaveBeenCalledTimes(1);
    expect(load).toHaveBeenCalledWith(path.join(path.resolve(config.outputDirs.raw), OCTOBER));
    expect(store.getTable("nationalities")).toEqual([
      { nationality: "Tunisia", landed_migrants: 7, reference_date: "2025-05-31", source_filename: MAY },
      { nationality: "Tunisia", landed_migrants: 1234, reference_date: "2025-10-31", source_filename: OCTOBER },
      { nationality: "Costa d'Avorio", landed_migrants: 850, reference_date: "2025-10-31", source_filename: OCTOBER },
    ]);
  });
});
