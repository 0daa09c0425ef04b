// apps/api/src/routes/memberships.ts
import type { FastifyInstance } from "fastify";
import type { MembershipsService } from "../modules/memberships/memberships.service";
import type { UpsertMembershipBody } from "../modules/memberships/memberships.schemas";
import { sendError } from "../shared/errors";
import { callerOf } from "../shared/identity";
import { requestSignal, type ApiGuards } from "../shared/permissions";

export function registerMembershipRoutes(
  app: FastifyInstance,
  deps: { guards: ApiGuards; membershipsService: MembershipsService }
) {
  const { guards, membershipsService } = deps;

  // GET /memberships – members of the scoped league
  app.get("/memberships", async (request, reply) => {
    try {
      const leagueId = guards.requireLeagueId(request);
      await guards.requireLeagueAdmin(callerOf(request).userId, leagueId, {
        signal: requestSignal(reply)
      });
      reply.send({ leagueId, items: membershipsService.listLeagueMembers(leagueId) });
    } catch (err) {
      sendError(request, reply, err);
    }
  });

  // PUT /memberships/:userId – grant or change a role (admin bootstrap gate)
  app.put<{ Params: { userId: string }; Body: UpsertMembershipBody }>(
    "/memberships/:userId",
    async (request, reply) => {
      try {
        const leagueId = guards.requireLeagueId(request);
        await guards.requireAdmin(callerOf(request).userId, {
          signal: requestSignal(reply)
        });
        const membership = membershipsService.setRole(
          leagueId,
          request.params.userId,
          request.body
        );
        reply.send(membership);
      } catch (err) {
        sendError(request, reply, err);
      }
    }
  );

  // DELETE /memberships/:userId – remove a member from the scoped league
  app.delete<{ Params: { userId: string } }>(
    "/memberships/:userId",
    async (request, reply) => {
      try {
        const leagueId = guards.requireLeagueId(request);
        await guards.requireLeagueAdmin(callerOf(request).userId, leagueId, {
          signal: requestSignal(reply)
        });
        membershipsService.removeMember(leagueId, request.params.userId);
        reply.code(204).send();
      } catch (err) {
        sendError(request, reply, err);
      }
    }
  );
}
