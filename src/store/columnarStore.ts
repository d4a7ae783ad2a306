import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { CellValue, ColumnDef, REFERENCE_DATE_COLUMN, Row } from "../datasets";
import { Logger, createSilentLogger } from "../observability";
import { CoverageEntry, DatabaseStats, QueryOptions, TableInfo, TableStore } from "./types";

const TABLE_FILE_EXTENSION = ".sqlite";
const TABLE_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;
const REPRESENTATIVE_MEASURES = [
  "landed_migrants",
  "total_accommodated",
  "hotspot",
  "reception_centres",
  "sai_network",
];

type ColumnInfoRow = {
  name: string;
  type: string;
};

type CountRow = {
  count: number;
};

type DateRangeRow = {
  min: string | null;
  max: string | null;
};

function assertTableName(name: string): void {
  if (!TABLE_NAME_PATTERN.test(name)) {
    throw new Error(`Invalid table name: ${name}`);
  }
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function toCell(value: unknown): CellValue {
  if (typeof value === "number" || typeof value === "string") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  return value === null || value === undefined ? "" : String(value);
}

function toRow(record: Record<string, unknown>): Row {
  const row: Row = {};
  for (const [key, value] of Object.entries(record)) {
    row[key] = toCell(value);
  }
  return row;
}

function copyRows(rows: Row[]): Row[] {
  return rows.map((row) => ({ ...row }));
}

export function csvField(value: CellValue): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * One SQLite file per canonical table under a single directory. Tables are
 * rebuilt whole and swapped in by rename; rows are read lazily and cached
 * until the table is rewritten or a reload is forced.
 */
export class ColumnarStore implements TableStore {
  private readonly directory: string;
  private readonly logger: Logger;
  private readonly cache = new Map<string, Row[]>();

  constructor(directory: string, logger: Logger = createSilentLogger("store")) {
    this.directory = path.resolve(directory);
    this.logger = logger;
  }

  listTables(): string[] {
    if (!fs.existsSync(this.directory)) {
      return [];
    }
    return fs
      .readdirSync(this.directory)
      .filter((name) => name.endsWith(TABLE_FILE_EXTENSION))
      .map((name) => name.slice(0, -TABLE_FILE_EXTENSION.length))
      .filter((name) => TABLE_NAME_PATTERN.test(name))
      .sort();
  }

  /** Rows of a table in stored order; an unknown table reads as empty. */
  getTable(name: string, forceReload = false): Row[] {
    return copyRows(this.loadRows(name, forceReload));
  }

  query(name: string, options: QueryOptions = {}): Row[] {
    const rows = this.loadRows(name, false);
    if (rows.length === 0) {
      return [];
    }
    const dateColumn = options.dateColumn ?? REFERENCE_DATE_COLUMN;
    const present = new Set(Object.keys(rows[0]));

    let result = rows;
    if (present.has(dateColumn)) {
      const { startDate, endDate } = options;
      result = result.filter((row) => {
        const value = String(row[dateColumn]);
        return (startDate === undefined || value >= startDate) && (endDate === undefined || value <= endDate);
      });
    }

    for (const [column, filter] of Object.entries(options.filters ?? {})) {
      if (!present.has(column)) {
        continue;
      }
      const accepted = Array.isArray(filter) ? filter : [filter];
      result = result.filter((row) => accepted.includes(row[column]));
    }

    if (options.columns && options.columns.length > 0) {
      const projection = options.columns.filter((column) => present.has(column));
      return result.map((row) => {
        const projected: Row = {};
        for (const column of projection) {
          projected[column] = row[column];
        }
        return projected;
      });
    }
    return copyRows(result);
  }

  /** Row count and representative measure total per (year, month) of `reference_date`. */
  getTemporalCoverage(name: string): CoverageEntry[] {
    const info = this.getTableInfo(name);
    if (!info || !info.columns.some((column) => column.name === REFERENCE_DATE_COLUMN)) {
      return [];
    }
    const integerColumns = info.columns.filter((column) => column.type === "integer").map((column) => column.name);
    const measure = REPRESENTATIVE_MEASURES.find((column) => integerColumns.includes(column)) ?? integerColumns[0];

    const buckets = new Map<string, CoverageEntry>();
    for (const row of this.loadRows(name, false)) {
      const match = /^(\d{4})-(\d{2})/.exec(String(row[REFERENCE_DATE_COLUMN]));
      if (!match) {
        continue;
      }
      const key = `${match[1]}-${match[2]}`;
      const entry = buckets.get(key) ?? { year: Number(match[1]), month: Number(match[2]), rows: 0, total: 0 };
      entry.rows += 1;
      if (measure !== undefined) {
        const value = row[measure];
        entry.total += typeof value === "number" ? value : 0;
      }
      buckets.set(key, entry);
    }
    return [...buckets.entries()].sort(([a], [b]) => a.localeCompare(b)).map(([, entry]) => entry);
  }

  /** Schema, size and date span read from the file without loading its rows. */
  getTableInfo(name: string): TableInfo | undefined {
    assertTableName(name);
    const filePath = this.tablePath(name);
    if (!fs.existsSync(filePath)) {
      return undefined;
    }
    const stat = fs.statSync(filePath);
    const db = new Database(filePath, { readonly: true, fileMustExist: true });
    try {
      const table = quoteIdentifier(name);
      const columns = db
        .prepare<[], ColumnInfoRow>(`PRAGMA table_info(${table})`)
        .all()
        .map<ColumnDef>((column) => ({
          name: column.name,
          type: column.type.toUpperCase() === "INTEGER" ? "integer" : "text",
        }));
      const rowCount = db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;

      let dateRange: TableInfo["dateRange"];
      if (columns.some((column) => column.name === REFERENCE_DATE_COLUMN)) {
        const range = db
          .prepare<[], DateRangeRow>(
            `SELECT MIN(${REFERENCE_DATE_COLUMN}) AS min, MAX(${REFERENCE_DATE_COLUMN}) AS max FROM ${table}`,
          )
          .get();
        if (range && range.min !== null && range.max !== null) {
          dateRange = { min: range.min, max: range.max };
        }
      }

      return {
        name,
        filePath,
        columns,
        rowCount,
        sizeBytes: stat.size,
        modifiedAt: stat.mtime.toISOString(),
        dateRange,
      };
    } finally {
      db.close();
    }
  }

  getDatabaseStats(): DatabaseStats {
    const tables: TableInfo[] = [];
    for (const name of this.listTables()) {
      const info = this.getTableInfo(name);
      if (info) {
        tables.push(info);
      }
    }
    return {
      tableCount: tables.length,
      totalRows: tables.reduce((sum, table) => sum + table.rowCount, 0),
      totalBytes: tables.reduce((sum, table) => sum + table.sizeBytes, 0),
      tables,
    };
  }

  /**
   * Replaces a table with exactly `rows`. The new file is built beside the old
   * one and renamed over it, so readers see either the old or the new table.
   */
  writeTable(name: string, columns: ColumnDef[], rows: Row[]): TableInfo {
    assertTableName(name);
    if (columns.length === 0) {
      throw new Error(`Table ${name} needs at least one column`);
    }
    fs.mkdirSync(this.directory, { recursive: true });
    const target = this.tablePath(name);
    const partial = `${target}.part`;
    fs.rmSync(partial, { force: true });

    const table = quoteIdentifier(name);
    const db = new Database(partial);
    try {
      const definitions = columns.map(
        (column) => `${quoteIdentifier(column.name)} ${column.type === "integer" ? "INTEGER" : "TEXT"} NOT NULL`,
      );
      db.exec(`CREATE TABLE ${table} (${definitions.join(", ")})`);
      const insert = db.prepare(
        `INSERT INTO ${table} (${columns.map((column) => quoteIdentifier(column.name)).join(", ")})
         VALUES (${columns.map(() => "?").join(", ")})`,
      );
      const insertAll = db.transaction((batch: Row[]) => {
        for (const row of batch) {
          insert.run(...columns.map((column) => row[column.name] ?? (column.type === "integer" ? 0 : "")));
        }
      });
      insertAll(rows);
      db.close();
    } catch (error) {
      if (db.open) {
        db.close();
      }
      fs.rmSync(partial, { force: true });
      throw error;
    }

    fs.renameSync(partial, target);
    this.cache.delete(name);
    this.logger.info("table_written", { table: name, rows: rows.length, path: target });

    const info = this.getTableInfo(name);
    if (!info) {
      throw new Error(`Table ${name} missing after write`);
    }
    return info;
  }

  /** Writes the table as CSV with a header line; returns the number of data rows written. */
  exportCsv(name: string, outputPath: string): number {
    const info = this.getTableInfo(name);
    const rows = this.loadRows(name, false);
    if (!info || rows.length === 0) {
      this.logger.warn("export_skipped_empty_table", { table: name });
      return 0;
    }
    const header = info.columns.map((column) => column.name);
    const lines = [header.map(csvField).join(",")];
    for (const row of rows) {
      lines.push(header.map((column) => csvField(row[column] ?? "")).join(","));
    }

    const absolute = path.resolve(outputPath);
    fs.mkdirSync(path.dirname(absolute), { recursive: true });
    const partial = `${absolute}.part`;
    fs.writeFileSync(partial, `${lines.join("\n")}\n`, "utf-8");
    fs.renameSync(partial, absolute);
    this.logger.info("table_exported", { table: name, rows: rows.length, path: absolute });
    return rows.length;
  }

  loadAll(): Record<string, Row[]> {
    const tables: Record<string, Row[]> = {};
    for (const name of this.listTables()) {
      tables[name] = this.getTable(name);
    }
    return tables;
  }

  private tablePath(name: string): string {
    return path.join(this.directory, `${name}${TABLE_FILE_EXTENSION}`);
  }

  private loadRows(name: string, forceReload: boolean): Row[] {
    assertTableName(name);
    const cached = this.cache.get(name);
    if (cached && !forceReload) {
      return cached;
    }
    const filePath = this.tablePath(name);
    if (!fs.existsSync(filePath)) {
      this.logger.warn("table_not_found", { table: name });
      this.cache.delete(name);
      return [];
    }

    const db = new Database(filePath, { readonly: true, fileMustExist: true });
    try {
      const rows = db
        .prepare<[], Record<string, unknown>>(`SELECT * FROM ${quoteIdentifier(name)} ORDER BY rowid`)
        .all()
        .map(toRow);
      this.cache.set(name, rows);
      this.logger.debug("table_loaded", { table: name, rows: rows.length });
      return rows;
    } finally {
      db.close();
    }
  }
}
