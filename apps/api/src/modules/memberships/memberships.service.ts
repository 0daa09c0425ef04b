// apps/api/src/modules/memberships/memberships.service.ts
import { createHttpError } from "../../shared/errors";
import { isUnknownCaller } from "../../shared/permissions";
import type { CallerIdentity, StoreCallOptions } from "../../shared/types";
import { parseOptionalString } from "../../shared/validation";
import type { MembershipsRepo } from "./memberships.repo";
import type { MeResponse, Membership, UpsertMembershipBody } from "./memberships.schemas";

export type MembershipsService = ReturnType<typeof createMembershipsService>;

export function createMembershipsService(deps: { membershipsRepo: MembershipsRepo }) {
  const { membershipsRepo } = deps;

  return {
    listLeagueMembers(leagueId: string): Membership[] {
      return membershipsRepo.listByLeague(leagueId);
    },

    setRole(
      leagueId: string,
      userId: string,
      body: UpsertMembershipBody | undefined
    ): Membership {
      const target = userId.trim();
      if (isUnknownCaller(target)) {
        throw createHttpError(400, "userId is required.", "ValidationFailed");
      }
      const role = parseOptionalString(body?.role);
      if (!role) {
        throw createHttpError(400, "role is required.", "ValidationFailed");
      }
      return membershipsRepo.upsert(target, leagueId, role);
    },

    removeMember(leagueId: string, userId: string): void {
      if (!membershipsRepo.remove(userId.trim(), leagueId)) {
        throw createHttpError(404, "Membership not found", "NotFound", {
          leagueId,
          userId
        });
      }
    },

    async getMe(caller: CallerIdentity, options: StoreCallOptions = {}): Promise<MeResponse> {
      const memberships: MeResponse["memberships"] = [];
      if (!isUnknownCaller(caller.userId)) {
        for await (const m of membershipsRepo.listByUser(caller.userId, options)) {
          memberships.push({ leagueId: m.leagueId, role: m.role });
        }
      }
      return {
        userId: caller.userId,
        email: caller.email,
        roles: caller.roles,
        memberships
      };
    }
  };
}
