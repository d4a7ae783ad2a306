const MOJIBAKE: Array<[string, string]> = [
  ["Ã¼", "ü"],
  ["Ã©", "é"],
  ["Ã¨", "è"],
  ["Ã¬", "ì"],
  ["Ã²", "ò"],
  ["Ã¹", "ù"],
  ["â€™", "’"],
];

export function cleanCell(cell: string | null | undefined): string {
  if (cell === null || cell === undefined) {
    return "";
  }
  return String(cell).replace(/\s+/g, " ").trim();
}

/** Whitespace-normalized copy of a table, without rows that are entirely empty. */
export function cleanTable(table: ReadonlyArray<ReadonlyArray<string | null | undefined> | null>): string[][] {
  const rows: string[][] = [];
  for (const row of table) {
    if (!row) {
      continue;
    }
    const cleaned = row.map(cleanCell);
    if (cleaned.some((cell) => cell !== "")) {
      rows.push(cleaned);
    }
  }
  return rows;
}

/**
 * Integer from a report cell: every non-digit is dropped, so "1.234" is 1234.
 * A cell without digits reads as 0 rather than failing the row.
 */
export function parseCount(raw: string | null | undefined): number {
  const digits = cleanCell(raw).replace(/\D/g, "");
  if (digits === "") {
    return 0;
  }
  const value = Number.parseInt(digits, 10);
  return Number.isFinite(value) ? value : 0;
}

export function hasDigit(value: string): boolean {
  return /\d/.test(value);
}

export function repairMojibake(value: string): string {
  let repaired = value;
  for (const [broken, fixed] of MOJIBAKE) {
    repaired = repaired.split(broken).join(fixed);
  }
  return repaired;
}

/** Lowercase, accent-free form used for vocabulary lookups. */
export function foldText(value: string): string {
  return repairMojibake(value)
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase();
}

export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line !== "");
}

/** Counts on a text line, skipping percentages and decimal shares. */
export function countTokens(text: string): number[] {
  const tokens = text.match(/\d{1,3}(?:\.\d{3})+(?![\d,%])|\d+(?:,\d+)?%?/g) ?? [];
  return tokens.filter((token) => !token.includes(",") && !token.endsWith("%")).map(parseCount);
}
