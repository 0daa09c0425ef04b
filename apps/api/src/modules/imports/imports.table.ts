// apps/api/src/modules/imports/imports.table.ts
import { createHttpError } from "../../shared/errors";
import {
  buildHeaderIndex,
  missingColumns,
  parseCsv,
  type CsvRow,
  type HeaderIndex
} from "./csvMini";

export type ImportRowError = {
  /** 1-based line in the file; the header is row 1. */
  row: number;
  error: string;
  fieldKey?: string;
};

export type ImportReport = {
  leagueId: string;
  upserted: number;
  rejected: number;
  skipped: number;
  errors: ImportRowError[];
};

export type CsvTable = {
  index: HeaderIndex;
  rows: Array<{ rowNumber: number; cells: CsvRow }>;
};

/**
 * Parses an uploaded CSV and checks its header. Throws a 400 for an empty upload,
 * a header-only file, or missing required columns.
 */
export function readCsvTable(
  csvText: string,
  required: readonly string[],
  optional: readonly string[]
): CsvTable {
  if (!csvText.trim()) {
    throw createHttpError(400, "Empty CSV body.", "ValidationFailed");
  }

  const parsed = parseCsv(csvText);
  if (parsed.length < 2) {
    throw createHttpError(400, "No CSV rows found.", "ValidationFailed");
  }

  const [header, ...data] = parsed;
  const index = buildHeaderIndex(header);
  const missing = missingColumns(index, required);
  if (missing.length > 0) {
    throw createHttpError(400, "Missing required columns.", "ValidationFailed", {
      required: [...required],
      missing,
      optional: [...optional],
      headerPreview: header.slice(0, 12).map((h) => h.trim())
    });
  }

  return {
    index,
    rows: data.map((cells, i) => ({ rowNumber: i + 2, cells }))
  };
}
