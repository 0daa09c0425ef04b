// apps/api/src/routes/leagues.ts
import type { FastifyInstance } from "fastify";
import type { LeaguesService } from "../modules/leagues/leagues.service";
import type { CreateLeagueBody } from "../modules/leagues/leagues.schemas";
import { sendError } from "../shared/errors";
import { callerOf } from "../shared/identity";
import { requestSignal, type ApiGuards } from "../shared/permissions";

export function registerLeagueRoutes(
  app: FastifyInstance,
  deps: { guards: ApiGuards; leaguesService: LeaguesService }
) {
  const { guards, leaguesService } = deps;

  // GET /leagues – every league (admins only)
  app.get("/leagues", async (request, reply) => {
    try {
      const caller = callerOf(request);
      await guards.requireAdmin(caller.userId, { signal: requestSignal(reply) });
      reply.send({ items: leaguesService.listLeagues() });
    } catch (err) {
      sendError(request, reply, err);
    }
  });

  // POST /leagues – create league; the creator becomes its LeagueAdmin
  app.post<{ Body: CreateLeagueBody }>("/leagues", async (request, reply) => {
    try {
      const caller = callerOf(request);
      await guards.requireAdmin(caller.userId, { signal: requestSignal(reply) });
      const league = leaguesService.createLeague(caller, request.body);
      reply.code(201).send(league);
    } catch (err) {
      sendError(request, reply, err);
    }
  });

  // GET /leagues/:leagueId – league overview for members
  app.get<{ Params: { leagueId: string } }>(
    "/leagues/:leagueId",
    async (request, reply) => {
      try {
        const caller = callerOf(request);
        const leagueId = request.params.leagueId;
        await guards.requireMember(caller.userId, leagueId, {
          signal: requestSignal(reply)
        });
        reply.send(leaguesService.getLeague(leagueId));
      } catch (err) {
        sendError(request, reply, err);
      }
    }
  );
}
