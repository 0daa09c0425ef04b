// apps/api/src/modules/memberships/memberships.schemas.ts
import type { StoreCallOptions } from "../../shared/types";

/** Role with special meaning for the admin bootstrap gate. */
export const ADMIN_ROLE = "Admin";

export const LEAGUE_ROLES = {
  LeagueAdmin: "LeagueAdmin",
  Coach: "Coach",
  Viewer: "Viewer"
} as const;

export type Membership = {
  userId: string;
  leagueId: string;
  /** Free-form, trimmed. */
  role: string;
  updatedAt: string;
};

export type MembershipScanOptions = StoreCallOptions & {
  pageSize?: number;
};

/**
 * Read side of the membership table. A missing row is `null`; anything thrown is
 * a real store failure.
 */
export interface MembershipStore {
  get(
    userId: string,
    leagueId: string,
    options?: StoreCallOptions
  ): Promise<Membership | null>;

  /** Every membership of one user, fetched in bounded pages. */
  listByUser(userId: string, options?: MembershipScanOptions): AsyncIterable<Membership>;
}

export type UpsertMembershipBody = {
  role?: unknown;
};

export type MeResponse = {
  userId: string;
  email: string;
  roles: readonly string[];
  memberships: Array<{ leagueId: string; role: string }>;
};
