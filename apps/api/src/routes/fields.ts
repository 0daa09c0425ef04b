// apps/api/src/routes/fields.ts
import type { FastifyInstance } from "fastify";
import type { FieldsService } from "../modules/fields/fields.service";
import type { ListFieldsQuery } from "../modules/fields/fields.schemas";
import { sendError } from "../shared/errors";
import { callerOf } from "../shared/identity";
import { requestSignal, type ApiGuards } from "../shared/permissions";

export function registerFieldRoutes(
  app: FastifyInstance,
  deps: { guards: ApiGuards; fieldsService: FieldsService }
) {
  const { guards, fieldsService } = deps;

  // GET /fields?activeOnly=true – fields of the scoped league
  app.get<{ Querystring: ListFieldsQuery }>("/fields", async (request, reply) => {
    try {
      const leagueId = guards.requireLeagueId(request);
      await guards.requireMember(callerOf(request).userId, leagueId, {
        signal: requestSignal(reply)
      });
      const activeOnly = (request.query.activeOnly ?? "").trim().toLowerCase() === "true";
      reply.send({ leagueId, items: fieldsService.listFields(leagueId, activeOnly) });
    } catch (err) {
      sendError(request, reply, err);
    }
  });
}
