// apps/api/src/modules/leagues/leagues.service.ts
import type { Db } from "../../db/index";
import { createHttpError } from "../../shared/errors";
import type { CallerIdentity } from "../../shared/types";
import { parseOptionalString } from "../../shared/validation";
import { LEAGUE_ROLES } from "../memberships/memberships.schemas";
import type { MembershipsRepo } from "../memberships/memberships.repo";
import type { LeaguesRepo } from "./leagues.repo";
import type { CreateLeagueBody, LeagueDetail, LeagueSummary } from "./leagues.schemas";

const LEAGUE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

export type LeaguesService = ReturnType<typeof createLeaguesService>;

export function createLeaguesService(deps: {
  db: Db;
  leaguesRepo: LeaguesRepo;
  membershipsRepo: MembershipsRepo;
}) {
  const { db, leaguesRepo, membershipsRepo } = deps;

  function ensureLeagueExists(leagueId: string): LeagueSummary {
    const league = leaguesRepo.findById(leagueId);
    if (!league) {
      throw createHttpError(404, "League not found", "NotFound", { leagueId });
    }
    return league;
  }

  return {
    listLeagues(): LeagueSummary[] {
      return leaguesRepo.list();
    },

    getLeague(leagueId: string): LeagueDetail {
      const league = ensureLeagueExists(leagueId);
      return { ...league, memberCount: leaguesRepo.countMembers(leagueId) };
    },

    /**
     * Creates the league and makes the caller its LeagueAdmin in one transaction.
     */
    createLeague(caller: CallerIdentity, body: CreateLeagueBody | undefined): LeagueDetail {
      const leagueId = parseOptionalString(body?.leagueId);
      const name = parseOptionalString(body?.name);
      if (!leagueId || !name) {
        throw createHttpError(400, "leagueId and name are required.", "ValidationFailed");
      }
      if (!LEAGUE_ID_PATTERN.test(leagueId)) {
        throw createHttpError(
          400,
          "leagueId may only contain letters, digits, '-' and '_' (max 64).",
          "ValidationFailed"
        );
      }
      if (leaguesRepo.findById(leagueId)) {
        throw createHttpError(409, "League already exists", "Conflict", { leagueId });
      }

      const tx = db.transaction(() => {
        const league = leaguesRepo.insert(leagueId, name, caller.userId);
        membershipsRepo.upsert(caller.userId, leagueId, LEAGUE_ROLES.LeagueAdmin);
        return league;
      });

      const league = tx();
      return { ...league, memberCount: leaguesRepo.countMembers(leagueId) };
    }
  };
}
