// apps/api/src/routes/health.ts
import type { FastifyInstance } from "fastify";
import type { Db } from "../db/index";

export function registerHealthRoutes(app: FastifyInstance, deps: { db: Db }) {
  const { db } = deps;

  app.get("/health", async (request, reply) => {
    const now = new Date().toISOString();
    try {
      db.prepare<[], { ok: number }>("SELECT 1 AS ok").get();
    } catch (err) {
      request.log.error({ err }, "database ping failed");
      reply.code(503).send({ ok: false, service: "slot-swap-api", database: "down", now });
      return;
    }
    reply.send({ ok: true, service: "slot-swap-api", database: "up", now });
  });
}
