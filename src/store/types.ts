import { CellValue, ColumnDef, Row } from "../datasets";

export interface TableInfo {
  name: string;
  filePath: string;
  columns: ColumnDef[];
  rowCount: number;
  sizeBytes: number;
  modifiedAt: string;
  /** Earliest and latest `reference_date`, when the table carries one and is not empty. */
  dateRange?: { min: string; max: string };
}

export interface DatabaseStats {
  tableCount: number;
  totalRows: number;
  totalBytes: number;
  tables: TableInfo[];
}

/** Single value for equality, array for membership. */
export type QueryFilter = CellValue | CellValue[];

export interface QueryOptions {
  dateColumn?: string;
  /** Inclusive ISO date. */
  startDate?: string;
  /** Inclusive ISO date. */
  endDate?: string;
  filters?: Record<string, QueryFilter>;
  columns?: string[];
}

export interface CoverageEntry {
  year: number;
  month: number;
  rows: number;
  /** Sum of the table's representative measure, 0 when it has none. */
  total: number;
}

export interface TableStore {
  listTables(): string[];
  getTable(name: string, forceReload?: boolean): Row[];
  query(name: string, options?: QueryOptions): Row[];
  getTemporalCoverage(name: string): CoverageEntry[];
  getTableInfo(name: string): TableInfo | undefined;
  getDatabaseStats(): DatabaseStats;
  writeTable(name: string, columns: ColumnDef[], rows: Row[]): TableInfo;
  exportCsv(name: string, outputPath: string): number;
  loadAll(): Record<string, Row[]>;
}
