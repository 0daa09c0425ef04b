// apps/api/src/modules/imports/csvMini.ts

export type CsvRow = string[];

/** Lower-cased, trimmed column name → zero-based column index. */
export type HeaderIndex = ReadonlyMap<string, number>;

/**
 * Tokenizes CSV text into rows of cells.
 *
 * Rules:
 * - Comma separator
 * - Quoted cells, `""` inside quotes is a literal quote
 * - Newlines inside quoted cells are kept
 * - CRLF, CR and LF all end a row; a leading BOM is dropped
 * - Trailing blank rows are discarded
 */
export function parseCsv(text: string): CsvRow[] {
  const rows: CsvRow[] = [];
  const csv = text.replace(/^\uFEFF/, "");
  if (csv.trim().length === 0) return rows;

  let row: CsvRow = [];
  let cell = "";
  let inQuotes = false;

  for (let i = 0; i < csv.length; i++) {
    const c = csv[i];

    if (inQuotes) {
      if (c === '"') {
        if (csv[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cell += c;
      }
      continue;
    }

    if (c === '"') {
      inQuotes = true;
    } else if (c === ",") {
      row.push(cell);
      cell = "";
    } else if (c === "\r" || c === "\n") {
      // CRLF counts once
      if (c === "\r" && csv[i + 1] === "\n") i++;
      row.push(cell);
      cell = "";
      rows.push(row);
      row = [];
    } else {
      cell += c;
    }
  }

  row.push(cell);
  rows.push(row);

  while (rows.length > 0 && isBlankRow(rows[rows.length - 1])) {
    rows.pop();
  }

  return rows;
}

export function normalizeHeaderName(name: string): string {
  return name.trim().toLowerCase();
}

export function buildHeaderIndex(header: readonly string[]): HeaderIndex {
  const index = new Map<string, number>();
  header.forEach((name, i) => {
    const key = normalizeHeaderName(name);
    if (key.length === 0 || index.has(key)) return;
    index.set(key, i);
  });
  return index;
}

/**
 * Cell for a logical column. `undefined` means the column is absent (not in the
 * header, or past the end of a short row); `""` means present but empty.
 */
export function getCell(
  row: readonly string[],
  index: HeaderIndex,
  column: string
): string | undefined {
  const i = index.get(normalizeHeaderName(column));
  if (i === undefined || i >= row.length) return undefined;
  return row[i];
}

export function missingColumns(
  index: HeaderIndex,
  required: readonly string[]
): string[] {
  return required.filter((column) => !index.has(normalizeHeaderName(column)));
}

export function isBlankRow(row: readonly string[]): boolean {
  return row.every((cell) => cell.trim().length === 0);
}
