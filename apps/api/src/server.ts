// apps/api/src/server.ts
import fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";

import { loadConfig, type AppConfig } from "./config";
import { openDatabase, type Db } from "./db/index";

import { registerHealthRoutes } from "./routes/health";
import { registerMeRoutes } from "./routes/me";
import { registerLeagueRoutes } from "./routes/leagues";
import { registerMembershipRoutes } from "./routes/memberships";
import { registerFieldRoutes } from "./routes/fields";
import { registerSlotRoutes } from "./routes/slots";
import { CSV_CONTENT_TYPES, registerImportRoutes } from "./routes/imports";

import { createLeaguesRepo } from "./modules/leagues/leagues.repo";
import { createLeaguesService } from "./modules/leagues/leagues.service";
import { createMembershipsRepo } from "./modules/memberships/memberships.repo";
import { createMembershipsService } from "./modules/memberships/memberships.service";
import { createFieldsRepo } from "./modules/fields/fields.repo";
import { createFieldsService } from "./modules/fields/fields.service";
import { createSlotsRepo } from "./modules/slots/slots.repo";
import { createSlotsService } from "./modules/slots/slots.service";

import { resolveCaller } from "./shared/identity";
import { createApiGuards } from "./shared/permissions";

export type BuildServerOptions = {
  config?: AppConfig;
  /** Defaults to the database at config.dbPath. */
  db?: Db;
};

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();
  const db = options.db ?? openDatabase(config.dbPath);

  const app = fastify({
    logger: { level: config.logLevel }
  });

  await app.register(cors, {
    origin: config.corsOrigins.length > 0 ? config.corsOrigins : true
  });

  // Multipart uploads (CSV imports sent as a file)
  await app.register(multipart, {
    limits: {
      fileSize: 10 * 1024 * 1024, // 10MB
      files: 1
    }
  });

  // Raw CSV bodies
  app.addContentTypeParser(
    CSV_CONTENT_TYPES,
    { parseAs: "string", bodyLimit: 10 * 1024 * 1024 },
    (_request, body, done) => {
      done(null, body);
    }
  );

  // Global hook: attach the caller to every request
  app.addHook("preHandler", async (request) => {
    request.caller = resolveCaller(request);
  });

  app.addHook("onClose", async () => {
    if (!options.db) db.close();
  });

  const leaguesRepo = createLeaguesRepo(db);
  const membershipsRepo = createMembershipsRepo(db);
  const fieldsRepo = createFieldsRepo(db);
  const slotsRepo = createSlotsRepo(db);

  const leaguesService = createLeaguesService({ db, leaguesRepo, membershipsRepo });
  const membershipsService = createMembershipsService({ membershipsRepo });
  const fieldsService = createFieldsService({ fieldsRepo });
  const slotsService = createSlotsService({ slotsRepo, fieldsRepo });

  const guards = createApiGuards({
    store: membershipsRepo,
    requireAdminRole: config.requireAdminRole
  });

  // ───────────────────────────
  // Open to any caller
  // ───────────────────────────
  registerHealthRoutes(app, { db });
  registerMeRoutes(app, { membershipsService });

  // ───────────────────────────
  // Guarded
  // ───────────────────────────
  registerLeagueRoutes(app, { guards, leaguesService });
  registerMembershipRoutes(app, { guards, membershipsService });
  registerFieldRoutes(app, { guards, fieldsService });
  registerSlotRoutes(app, { guards, slotsService });
  registerImportRoutes(app, { guards, fieldsService, slotsService });

  return app;
}

// If this file is run directly via Node, start the server
if (require.main === module) {
  void (async () => {
    const config = loadConfig();
    try {
      const app = await buildServer({ config });
      await app.listen({ port: config.port, host: config.host });
    } catch (err) {
      console.error(err);
      process.exit(1);
    }
  })();
}
