// apps/api/src/modules/memberships/memberships.repo.ts
import type { Db } from "../../db/index";
import type { StoreCallOptions } from "../../shared/types";
import type {
  Membership,
  MembershipScanOptions,
  MembershipStore
} from "./memberships.schemas";

export type MembershipRow = {
  user_id: string;
  league_id: string;
  role: string;
  updated_at: string;
};

export const DEFAULT_SCAN_PAGE_SIZE = 100;

function rowToMembership(row: MembershipRow): Membership {
  return {
    userId: row.user_id,
    leagueId: row.league_id,
    role: (row.role ?? "").trim(),
    updatedAt: row.updated_at
  };
}

export type MembershipsRepo = MembershipStore & {
  listByLeague(leagueId: string): Membership[];
  upsert(userId: string, leagueId: string, role: string): Membership;
  remove(userId: string, leagueId: string): boolean;
};

export function createMembershipsRepo(db: Db): MembershipsRepo {
  const getStmt = db.prepare<[string, string], MembershipRow>(
    `SELECT user_id, league_id, role, updated_at
     FROM memberships
     WHERE user_id = ? AND league_id = ?`
  );

  const pageByUserStmt = db.prepare<[string, number, number], MembershipRow>(
    `SELECT user_id, league_id, role, updated_at
     FROM memberships
     WHERE user_id = ?
     ORDER BY league_id
     LIMIT ? OFFSET ?`
  );

  return {
    async get(userId: string, leagueId: string, options: StoreCallOptions = {}) {
      options.signal?.throwIfAborted();
      const row = getStmt.get(userId, leagueId);
      return row ? rowToMembership(row) : null;
    },

    async *listByUser(userId: string, options: MembershipScanOptions = {}) {
      const pageSize = Math.min(
        1000,
        Math.max(1, options.pageSize ?? DEFAULT_SCAN_PAGE_SIZE)
      );

      let offset = 0;
      for (;;) {
        options.signal?.throwIfAborted();
        const page = pageByUserStmt.all(userId, pageSize, offset);
        for (const row of page) {
          yield rowToMembership(row);
        }
        if (page.length < pageSize) return;
        offset += pageSize;
      }
    },

    listByLeague(leagueId: string): Membership[] {
      return db
        .prepare<[string], MembershipRow>(
          `SELECT user_id, league_id, role, updated_at
           FROM memberships
           WHERE league_id = ?
           ORDER BY user_id`
        )
        .all(leagueId)
        .map(rowToMembership);
    },

    upsert(userId: string, leagueId: string, role: string): Membership {
      const now = new Date().toISOString();
      db.prepare(
        `INSERT INTO memberships (user_id, league_id, role, updated_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT (user_id, league_id)
         DO UPDATE SET role = excluded.role, updated_at = excluded.updated_at`
      ).run(userId, leagueId, role.trim(), now);

      return { userId, leagueId, role: role.trim(), updatedAt: now };
    },

    remove(userId: string, leagueId: string): boolean {
      const info = db
        .prepare(`DELETE FROM memberships WHERE user_id = ? AND league_id = ?`)
        .run(userId, leagueId);
      return info.changes > 0;
    }
  };
}
