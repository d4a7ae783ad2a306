import { DATASETS, DatasetName, REFERENCE_DATE_COLUMN, Row } from "../datasets";
import { Logger, MetricsRegistry } from "../observability";
import { TableStore } from "../store";

export interface SaveOptions {
  /** Supersede-by-date merge into the stored table instead of replacing it. */
  merge?: boolean;
}

export interface SaveResult {
  dataset: DatasetName;
  table: string;
  written: boolean;
  incomingRows: number;
  rows: number;
}

interface AccumulatorDeps {
  store: TableStore;
  logger: Logger;
  metrics: MetricsRegistry;
}

function referenceDateOf(row: Row): string {
  return String(row[REFERENCE_DATE_COLUMN] ?? "");
}

/**
 * Rows on or after `startDate`, ordered by reference date. The sort is stable,
 * so rows of one date keep their extraction order.
 */
export function sortAndFilterByDate(rows: Row[], startDate: string): Row[] {
  return rows
    .filter((row) => referenceDateOf(row) >= startDate)
    .sort((a, b) => referenceDateOf(a).localeCompare(referenceDateOf(b)));
}

/**
 * Drops every existing row whose reference date occurs anywhere in `incoming`,
 * then appends `incoming`. Replacement is per date, not per category: a newer
 * batch that lacks a category for a date it touches removes that category's
 * old row for the date too.
 */
export function mergeSupersedeByDate(existing: Row[], incoming: Row[]): Row[] {
  const touched = new Set(incoming.map(referenceDateOf));
  return [...existing.filter((row) => !touched.has(referenceDateOf(row))), ...incoming];
}

export class Accumulator {
  private readonly store: TableStore;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly working = new Map<DatasetName, Row[]>();

  constructor(deps: AccumulatorDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
  }

  accumulate(dataset: DatasetName, records: Row[]): void {
    const rows = this.working.get(dataset) ?? [];
    rows.push(...records);
    this.working.set(dataset, rows);
  }

  pending(dataset: DatasetName): Row[] {
    return [...(this.working.get(dataset) ?? [])];
  }

  /**
   * Persists the working set of one dataset as its canonical table and clears
   * it. An empty working set leaves the stored table untouched.
   */
  saveCanonical(dataset: DatasetName, options: SaveOptions = {}): SaveResult {
    const definition = DATASETS[dataset];
    const incoming = this.working.get(dataset) ?? [];
    if (incoming.length === 0) {
      this.logger.warn("canonical_nothing_to_save", { dataset, table: definition.table });
      return { dataset, table: definition.table, written: false, incomingRows: 0, rows: 0 };
    }

    const combined = options.merge ? mergeSupersedeByDate(this.store.getTable(definition.table), incoming) : incoming;
    const canonical = sortAndFilterByDate(combined, definition.startDate).map((row) => {
      const shaped: Row = {};
      for (const column of definition.columns) {
        shaped[column.name] = row[column.name] ?? (column.type === "integer" ? 0 : "");
      }
      return shaped;
    });

    const info = this.store.writeTable(definition.table, definition.columns, canonical);
    this.working.delete(dataset);
    this.metrics.incrementCounter("rows_written", canonical.length, dataset);
    this.logger.info("canonical_saved", {
      dataset,
      table: definition.table,
      merge: options.merge ?? false,
      incomingRows: incoming.length,
      rows: info.rowCount,
      dropped: combined.length - canonical.length,
      dateRange: info.dateRange,
    });
    return { dataset, table: definition.table, written: true, incomingRows: incoming.length, rows: info.rowCount };
  }
}
