// apps/api/src/modules/slots/slots.repo.ts
import type { Db } from "../../db/index";
import type { Interval } from "../scheduling/scheduling.rules";
import { SLOT_STATUSES, type SlotStatus, type SlotSummary } from "./slots.schemas";

export type SlotRow = {
  slot_id: string;
  league_id: string;
  division: string;
  offering_team_id: string;
  offering_email: string;
  game_date: string;
  start_time: string;
  end_time: string;
  start_minutes: number;
  end_minutes: number;
  field_key: string;
  park_name: string;
  field_name: string;
  display_name: string;
  game_type: string;
  status: string;
  notes: string;
  created_by: string | null;
  created_at: string;
  updated_at: string;
};

export type SlotWrite = SlotSummary & Interval;

export type BookedInterval = Interval & {
  slotId: string;
  status: SlotStatus;
};

export type SlotFilters = {
  division?: string;
  gameDate?: string;
  status?: SlotStatus;
};

const SLOT_COLUMNS = `slot_id, league_id, division, offering_team_id, offering_email,
  game_date, start_time, end_time, start_minutes, end_minutes, field_key,
  park_name, field_name, display_name, game_type, status, notes,
  created_by, created_at, updated_at`;

function toStatus(raw: string): SlotStatus {
  return SLOT_STATUSES.find((s) => s === raw) ?? "Open";
}

function rowToSlot(row: SlotRow): SlotSummary {
  return {
    slotId: row.slot_id,
    leagueId: row.league_id,
    division: row.division,
    offeringTeamId: row.offering_team_id,
    offeringEmail: row.offering_email,
    gameDate: row.game_date,
    startTime: row.start_time,
    endTime: row.end_time,
    fieldKey: row.field_key,
    parkName: row.park_name,
    fieldName: row.field_name,
    displayName: row.display_name,
    gameType: row.game_type,
    status: toStatus(row.status),
    notes: row.notes,
    createdBy: row.created_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export type SlotsRepo = ReturnType<typeof createSlotsRepo>;

export function createSlotsRepo(db: Db) {
  // Re-imports keep the original creator and creation time.
  const upsertStmt = db.prepare(
    `INSERT INTO slots (${SLOT_COLUMNS})
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT (slot_id) DO UPDATE SET
       offering_email = excluded.offering_email,
       park_name = excluded.park_name,
       field_name = excluded.field_name,
       display_name = excluded.display_name,
       game_type = excluded.game_type,
       status = excluded.status,
       notes = excluded.notes,
       updated_at = excluded.updated_at`
  );

  function write(s: SlotWrite) {
    upsertStmt.run(
      s.slotId,
      s.leagueId,
      s.division,
      s.offeringTeamId,
      s.offeringEmail,
      s.gameDate,
      s.startTime,
      s.endTime,
      s.startMinutes,
      s.endMinutes,
      s.fieldKey,
      s.parkName,
      s.fieldName,
      s.displayName,
      s.gameType,
      s.status,
      s.notes,
      s.createdBy,
      s.createdAt,
      s.updatedAt
    );
  }

  return {
    findById(leagueId: string, slotId: string): SlotSummary | null {
      const row = db
        .prepare<[string, string], SlotRow>(
          `SELECT ${SLOT_COLUMNS} FROM slots WHERE league_id = ? AND slot_id = ?`
        )
        .get(leagueId, slotId);
      return row ? rowToSlot(row) : null;
    },

    /** Every slot booked on one field for one day, cancelled ones included. */
    listOnFieldDate(leagueId: string, fieldKey: string, gameDate: string): BookedInterval[] {
      return db
        .prepare<[string, string, string], Pick<SlotRow, "slot_id" | "start_minutes" | "end_minutes" | "status">>(
          `SELECT slot_id, start_minutes, end_minutes, status
           FROM slots
           WHERE league_id = ? AND field_key = ? AND game_date = ?
           ORDER BY start_minutes`
        )
        .all(leagueId, fieldKey, gameDate)
        .map((r) => ({
          slotId: r.slot_id,
          startMinutes: r.start_minutes,
          endMinutes: r.end_minutes,
          status: toStatus(r.status)
        }));
    },

    list(
      leagueId: string,
      filters: SlotFilters,
      limit: number,
      offset: number
    ): { items: SlotSummary[]; total: number } {
      const params: Array<string | number> = [leagueId];
      let where = "WHERE league_id = ?";

      if (filters.division) {
        where += " AND division = ?";
        params.push(filters.division);
      }
      if (filters.gameDate) {
        where += " AND game_date = ?";
        params.push(filters.gameDate);
      }
      if (filters.status) {
        where += " AND status = ?";
        params.push(filters.status);
      }

      const totalRow = db
        .prepare<Array<string | number>, { c: number }>(
          `SELECT COUNT(*) AS c FROM slots ${where}`
        )
        .get(...params);

      const items = db
        .prepare<Array<string | number>, SlotRow>(
          `SELECT ${SLOT_COLUMNS}
           FROM slots
           ${where}
           ORDER BY game_date, start_minutes, division
           LIMIT ? OFFSET ?`
        )
        .all(...params, limit, offset)
        .map(rowToSlot);

      return { items, total: totalRow?.c ?? 0 };
    },

    insert(slot: SlotWrite): SlotSummary {
      write(slot);
      const stored = this.findById(slot.leagueId, slot.slotId);
      if (!stored) {
        throw new Error("Failed to create slot");
      }
      return stored;
    },

    upsertMany(slots: SlotWrite[]): number {
      const tx = db.transaction((items: SlotWrite[]) => {
        for (const s of items) write(s);
        return items.length;
      });
      return tx(slots);
    }
  };
}
