// apps/api/src/modules/fields/fields.repo.ts
import type { Db } from "../../db/index";
import type { FieldImportRow, FieldSummary } from "./fields.schemas";

export type FieldRow = {
  league_id: string;
  park_code: string;
  field_code: string;
  park_name: string;
  field_name: string;
  display_name: string;
  address: string;
  notes: string;
  is_active: number;
  updated_at: string;
};

const FIELD_COLUMNS = `league_id, park_code, field_code, park_name, field_name,
  display_name, address, notes, is_active, updated_at`;

function rowToField(row: FieldRow): FieldSummary {
  return {
    leagueId: row.league_id,
    fieldKey: `${row.park_code}/${row.field_code}`,
    parkCode: row.park_code,
    fieldCode: row.field_code,
    parkName: row.park_name,
    fieldName: row.field_name,
    displayName: row.display_name,
    address: row.address,
    notes: row.notes,
    isActive: row.is_active === 1,
    updatedAt: row.updated_at
  };
}

export type FieldsRepo = ReturnType<typeof createFieldsRepo>;

export function createFieldsRepo(db: Db) {
  const upsertStmt = db.prepare(
    `INSERT INTO fields (${FIELD_COLUMNS})
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT (league_id, park_code, field_code) DO UPDATE SET
       park_name = excluded.park_name,
       field_name = excluded.field_name,
       display_name = excluded.display_name,
       address = excluded.address,
       notes = excluded.notes,
       is_active = excluded.is_active,
       updated_at = excluded.updated_at`
  );

  return {
    get(leagueId: string, parkCode: string, fieldCode: string): FieldSummary | null {
      const row = db
        .prepare<[string, string, string], FieldRow>(
          `SELECT ${FIELD_COLUMNS}
           FROM fields
           WHERE league_id = ? AND park_code = ? AND field_code = ?`
        )
        .get(leagueId, parkCode, fieldCode);
      return row ? rowToField(row) : null;
    },

    list(leagueId: string, activeOnly = false): FieldSummary[] {
      return db
        .prepare<[string, number], FieldRow>(
          `SELECT ${FIELD_COLUMNS}
           FROM fields
           WHERE league_id = ? AND (? = 0 OR is_active = 1)
           ORDER BY park_name, field_name`
        )
        .all(leagueId, activeOnly ? 1 : 0)
        .map(rowToField);
    },

    /** Field key → field, for resolving many import rows at once. */
    lookup(leagueId: string): Map<string, FieldSummary> {
      return new Map(this.list(leagueId).map((f) => [f.fieldKey, f]));
    },

    upsertMany(leagueId: string, rows: FieldImportRow[]): number {
      const now = new Date().toISOString();
      const tx = db.transaction((items: FieldImportRow[]) => {
        for (const f of items) {
          upsertStmt.run(
            leagueId,
            f.parkCode,
            f.fieldCode,
            f.parkName,
            f.fieldName,
            f.displayName,
            f.address,
            f.notes,
            f.isActive ? 1 : 0,
            now
          );
        }
        return items.length;
      });
      return tx(rows);
    }
  };
}
