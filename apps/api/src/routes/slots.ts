// apps/api/src/routes/slots.ts
import type { FastifyInstance } from "fastify";
import type { SlotsService } from "../modules/slots/slots.service";
import type { CreateSlotBody, ListSlotsQuery } from "../modules/slots/slots.schemas";
import { sendError } from "../shared/errors";
import { callerOf } from "../shared/identity";
import { requestSignal, type ApiGuards } from "../shared/permissions";

export function registerSlotRoutes(
  app: FastifyInstance,
  deps: { guards: ApiGuards; slotsService: SlotsService }
) {
  const { guards, slotsService } = deps;

  // GET /slots?division=&gameDate=&status=&page=&limit=
  app.get<{ Querystring: ListSlotsQuery }>("/slots", async (request, reply) => {
    try {
      const leagueId = guards.requireLeagueId(request);
      await guards.requireMember(callerOf(request).userId, leagueId, {
        signal: requestSignal(reply)
      });
      reply.send(slotsService.listSlots(leagueId, request.query));
    } catch (err) {
      sendError(request, reply, err);
    }
  });

  // POST /slots – offer one slot; viewers are read-only
  app.post<{ Body: CreateSlotBody }>("/slots", async (request, reply) => {
    try {
      const leagueId = guards.requireLeagueId(request);
      const caller = callerOf(request);
      await guards.requireNotViewer(caller.userId, leagueId, {
        signal: requestSignal(reply)
      });
      const slot = slotsService.createSlot(leagueId, caller, request.body);
      reply.code(201).send(slot);
    } catch (err) {
      sendError(request, reply, err);
    }
  });
}
