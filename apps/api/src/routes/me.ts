// apps/api/src/routes/me.ts
import type { FastifyInstance } from "fastify";
import type { MembershipsService } from "../modules/memberships/memberships.service";
import { sendError } from "../shared/errors";
import { callerOf } from "../shared/identity";
import { requestSignal } from "../shared/permissions";

export function registerMeRoutes(
  app: FastifyInstance,
  deps: { membershipsService: MembershipsService }
) {
  const { membershipsService } = deps;

  // GET /me – who the caller is and where they belong. Unknown callers get an
  // empty membership list rather than a 401.
  app.get("/me", async (request, reply) => {
    try {
      const me = await membershipsService.getMe(callerOf(request), {
        signal: requestSignal(reply)
      });
      reply.send(me);
    } catch (err) {
      sendError(request, reply, err);
    }
  });
}
