// apps/api/src/modules/fields/fields.service.ts
import type { FastifyBaseLogger } from "fastify";
import { isBlankRow } from "../imports/csvMini";
import { readCsvTable, type ImportReport } from "../imports/imports.table";
import type { FieldsRepo } from "./fields.repo";
import {
  FIELD_OPTIONAL_COLUMNS,
  FIELD_REQUIRED_COLUMNS,
  tryParseFieldRow
} from "./fields.import";
import type { FieldImportRow, FieldSummary } from "./fields.schemas";

export type ImportLogger = Pick<FastifyBaseLogger, "info" | "debug">;

export type FieldsService = ReturnType<typeof createFieldsService>;

export function createFieldsService(deps: { fieldsRepo: FieldsRepo }) {
  const { fieldsRepo } = deps;

  return {
    listFields(leagueId: string, activeOnly: boolean): FieldSummary[] {
      return fieldsRepo.list(leagueId, activeOnly);
    },

    /**
     * Validates every row on its own; valid rows are upserted together, the rest
     * are reported in file order.
     */
    importFields(leagueId: string, csvText: string, log: ImportLogger): ImportReport {
      const table = readCsvTable(csvText, FIELD_REQUIRED_COLUMNS, FIELD_OPTIONAL_COLUMNS);

      const report: ImportReport = {
        leagueId,
        upserted: 0,
        rejected: 0,
        skipped: 0,
        errors: []
      };

      // Last row wins when a file repeats a field key.
      const accepted = new Map<string, FieldImportRow>();
      for (const { rowNumber, cells } of table.rows) {
        if (isBlankRow(cells)) {
          report.skipped++;
          continue;
        }

        const parsed = tryParseFieldRow(cells, table.index);
        if (!parsed.ok) {
          report.rejected++;
          report.errors.push({ row: rowNumber, error: parsed.error });
          log.debug({ leagueId, row: rowNumber, error: parsed.error }, "field row rejected");
          continue;
        }
        accepted.set(parsed.value.fieldKey, parsed.value);
      }

      report.upserted = fieldsRepo.upsertMany(leagueId, [...accepted.values()]);

      log.info(
        {
          leagueId,
          upserted: report.upserted,
          rejected: report.rejected,
          skipped: report.skipped
        },
        "fields import finished"
      );
      return report;
    }
  };
}
