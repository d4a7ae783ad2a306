import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Accumulator, mergeSupersedeByDate, sortAndFilterByDate } from "../src/accumulate";
import { createSilentLogger, MetricsRegistry } from "../src/observability";
import { ColumnarStore } from "../src/store";
import { makeTempDir, removeDir } from "./fixtures";

describe("mergeSupersedeByDate", () => {
  it("replaces every stored row of a date the new batch touches", () => {
    const existing = [
      { nationality: "Tunisia", landed_migrants: 1, reference_date: "2025-08-31" },
      { nationality: "Tunisia", landed_migrants: 2, reference_date: "2025-09-30" },
      { nationality: "Egitto", landed_migrants: 3, reference_date: "2025-09-30" },
    ];
    const incoming = [
      { nationality: "Tunisia", landed_migrants: 20, reference_date: "2025-09-30" },
      { nationality: "Sudan", landed_migrants: 5, reference_date: "2025-10-31" },
    ];

    expect(mergeSupersedeByDate(existing, incoming)).toEqual([
      { nationality: "Tunisia", landed_migrants: 1, reference_date: "2025-08-31" },
      { nationality: "Tunisia", landed_migrants: 20, reference_date: "2025-09-30" },
      { nationality: "Sudan", landed_migrants: 5, reference_date: "2025-10-31" },
    ]);
  });
});

describe("sortAndFilterByDate", () => {
  it("drops rows before the start and keeps same-date rows in order", () => {
    const rows = [
      { id: "x", reference_date: "2019-10-31" },
      { id: "y", reference_date: "2019-09-30" },
      { id: "z", reference_date: "2019-10-31" },
      { id: "w", reference_date: "2019-08-31" },
    ];

    expect(sortAndFilterByDate(rows, "2019-09-01").map((row) => row.id)).toEqual(["y", "x", "z"]);
  });
});

describe("Accumulator", () => {
  let dir: string;
  let store: ColumnarStore;
  let metrics: MetricsRegistry;
  let accumulator: Accumulator;

  beforeEach(() => {
    dir = makeTempDir();
    store = new ColumnarStore(dir);
    metrics = new MetricsRegistry();
    accumulator = new Accumulator({ store, logger: createSilentLogger("accumulate"), metrics });
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("writes the canonical table in column order from the start date on", () => {
    accumulator.accumulate("landings", [
      { day: 2, landed_migrants: 20, reference_date: "2019-10-31", source_filename: "b.pdf" },
      { day: 1, landed_migrants: 5, reference_date: "2019-08-31", source_filename: "a.pdf" },
    ]);
    accumulator.accumulate("landings", [
      { day: 1, landed_migrants: 10, reference_date: "2019-09-30", source_filename: "c.pdf", page: 4 },
    ]);
    expect(accumulator.pending("landings")).toHaveLength(3);

    const result = accumulator.saveCanonical("landings");

    expect(result).toEqual({ dataset: "landings", table: "daily_landings", written: true, incomingRows: 3, rows: 2 });
    expect(store.getTableInfo("daily_landings")?.columns.map((column) => column.name)).toEqual([
      "day",
      "landed_migrants",
      "reference_date",
      "source_filename",
    ]);
    expect(store.getTable("daily_landings")).toEqual([
      { day: 1, landed_migrants: 10, reference_date: "2019-09-30", source_filename: "c.pdf" },
      { day: 2, landed_migrants: 20, reference_date: "2019-10-31", source_filename: "b.pdf" },
    ]);
    expect(accumulator.pending("landings")).toEqual([]);
    expect(metrics.getCounter("rows_written")).toBe(2);
    expect(metrics.getCounter("rows_written", "landings")).toBe(2);
    expect(metrics.getCounter("rows_written", "nationality")).toBe(0);
  });

  it("merges into the stored table when asked", () => {
    accumulator.accumulate("landings", [
      { day: 1, landed_migrants: 10, reference_date: "2019-09-30", source_filename: "c.pdf" },
      { day: 2, landed_migrants: 20, reference_date: "2019-10-31", source_filename: "b.pdf" },
    ]);
    accumulator.saveCanonical("landings");

    accumulator.accumulate("landings", [
      { day: 1, landed_migrants: 99, reference_date: "2019-10-31", source_filename: "d.pdf" },
    ]);
    const result = accumulator.saveCanonical("landings", { merge: true });

    expect(result.rows).toBe(2);
    expect(store.getTable("daily_landings")).toEqual([
      { day: 1, landed_migrants: 10, reference_date: "2019-09-30", source_filename: "c.pdf" },
      { day: 1, landed_migrants: 99, reference_date: "2019-10-31", source_filename: "d.pdf" },
    ]);
  });

  it("leaves storage untouched when nothing was accumulated", () => {
    expect(accumulator.saveCanonical("nationality")).toEqual({
      dataset: "nationality",
      table: "nationalities",
      written: false,
      incomingRows: 0,
      rows: 0,
    });
    expect(store.listTables()).toEqual([]);
  });
});
