export type CellValue = string | number;

/** One flat row of a canonical table. */
export type Row = Record<string, CellValue>;

export type ColumnType = "integer" | "text";

export interface ColumnDef {
  name: string;
  type: ColumnType;
}

export type DatasetName = "nationality" | "accommodation" | "landings";

export const REFERENCE_DATE_COLUMN = "reference_date";
export const SOURCE_FILENAME_COLUMN = "source_filename";

export interface ProvenanceFields {
  reference_date: string;
  source_filename: string;
}

export type NationalityRow = {
  nationality: string;
  landed_migrants: number;
};

export type AccommodationFormat = "pre-cutover" | "post-cutover";

export type AccommodationRow = {
  region: string;
  hotspot: number;
  reception_centres: number;
  sai_network: number;
  total_accommodated: number;
  format: AccommodationFormat;
};

export type LandingsRow = {
  day: number;
  landed_migrants: number;
};

export interface DatasetDefinition {
  name: DatasetName;
  table: string;
  categoryColumn: string;
  measureColumns: string[];
  columns: ColumnDef[];
  /** Earliest reference date (inclusive) the canonical table admits. */
  startDate: string;
}

/** Accommodation reports switched from a single total to a per-structure breakdown here. */
export const ACCOMMODATION_CUTOVER_DATE = "2019-06-01";

const PROVENANCE_COLUMNS: ColumnDef[] = [
  { name: REFERENCE_DATE_COLUMN, type: "text" },
  { name: SOURCE_FILENAME_COLUMN, type: "text" },
];

export const DATASETS: Record<DatasetName, DatasetDefinition> = {
  nationality: {
    name: "nationality",
    table: "nationalities",
    categoryColumn: "nationality",
    measureColumns: ["landed_migrants"],
    columns: [{ name: "nationality", type: "text" }, { name: "landed_migrants", type: "integer" }, ...PROVENANCE_COLUMNS],
    startDate: "2017-01-01",
  },
  accommodation: {
    name: "accommodation",
    table: "accommodation",
    categoryColumn: "region",
    measureColumns: ["hotspot", "reception_centres", "sai_network", "total_accommodated"],
    columns: [
      { name: "region", type: "text" },
      { name: "hotspot", type: "integer" },
      { name: "reception_centres", type: "integer" },
      { name: "sai_network", type: "integer" },
      { name: "total_accommodated", type: "integer" },
      ...PROVENANCE_COLUMNS,
      { name: "format", type: "text" },
    ],
    startDate: "2017-01-01",
  },
  landings: {
    name: "landings",
    table: "daily_landings",
    categoryColumn: "day",
    measureColumns: ["landed_migrants"],
    columns: [{ name: "day", type: "integer" }, { name: "landed_migrants", type: "integer" }, ...PROVENANCE_COLUMNS],
    // The daily chart first appears in the September 2019 report.
    startDate: "2019-09-01",
  },
};
