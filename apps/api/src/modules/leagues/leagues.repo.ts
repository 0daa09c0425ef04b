// apps/api/src/modules/leagues/leagues.repo.ts
import type { Db } from "../../db/index";
import type { LeagueSummary } from "./leagues.schemas";

export type LeagueRow = {
  league_id: string;
  name: string;
  created_by: string | null;
  created_at: string;
};

function rowToLeague(row: LeagueRow): LeagueSummary {
  return {
    leagueId: row.league_id,
    name: row.name,
    createdBy: row.created_by,
    createdAt: row.created_at
  };
}

export type LeaguesRepo = ReturnType<typeof createLeaguesRepo>;

export function createLeaguesRepo(db: Db) {
  return {
    findById(leagueId: string): LeagueSummary | null {
      const row = db
        .prepare<[string], LeagueRow>(
          `SELECT league_id, name, created_by, created_at
           FROM leagues
           WHERE league_id = ?`
        )
        .get(leagueId);
      return row ? rowToLeague(row) : null;
    },

    list(): LeagueSummary[] {
      return db
        .prepare<[], LeagueRow>(
          `SELECT league_id, name, created_by, created_at
           FROM leagues
           ORDER BY name`
        )
        .all()
        .map(rowToLeague);
    },

    countMembers(leagueId: string): number {
      const row = db
        .prepare<[string], { c: number }>(
          `SELECT COUNT(*) AS c FROM memberships WHERE league_id = ?`
        )
        .get(leagueId);
      return row?.c ?? 0;
    },

    insert(leagueId: string, name: string, createdBy: string | null): LeagueSummary {
      const createdAt = new Date().toISOString();
      db.prepare(
        `INSERT INTO leagues (league_id, name, created_by, created_at)
         VALUES (?, ?, ?, ?)`
      ).run(leagueId, name, createdBy, createdAt);
      return { leagueId, name, createdBy, createdAt };
    }
  };
}
