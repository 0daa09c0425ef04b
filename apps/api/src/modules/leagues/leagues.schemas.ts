// apps/api/src/modules/leagues/leagues.schemas.ts

export type CreateLeagueBody = {
  leagueId?: unknown;
  name?: unknown;
};

export type LeagueSummary = {
  leagueId: string;
  name: string;
  createdBy: string | null;
  createdAt: string;
};

export type LeagueDetail = LeagueSummary & {
  memberCount: number;
};
