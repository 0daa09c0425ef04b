// apps/api/src/routes/imports.ts
import type { FastifyInstance, FastifyRequest } from "fastify";
import type { FieldsService } from "../modules/fields/fields.service";
import type { SlotsService } from "../modules/slots/slots.service";
import { createHttpError, sendError } from "../shared/errors";
import { callerOf } from "../shared/identity";
import { requestSignal, type ApiGuards } from "../shared/permissions";

export const CSV_CONTENT_TYPES = ["text/csv", "text/plain"];

/**
 * CSV text of an import request: a raw text/csv (or text/plain) body, or the first
 * file part of a multipart upload.
 */
export async function readCsvBody(request: FastifyRequest): Promise<string> {
  if (request.isMultipart()) {
    const file = await request.file();
    if (!file) {
      throw createHttpError(400, "Missing file upload", "ValidationFailed");
    }
    const buf = await file.toBuffer();
    return buf.toString("utf8");
  }

  if (typeof request.body === "string") return request.body;
  if (Buffer.isBuffer(request.body)) return request.body.toString("utf8");

  throw createHttpError(
    400,
    `Send the CSV as ${CSV_CONTENT_TYPES.join(" or ")} or as a multipart file upload.`,
    "ValidationFailed"
  );
}

export function registerImportRoutes(
  app: FastifyInstance,
  deps: {
    guards: ApiGuards;
    fieldsService: FieldsService;
    slotsService: SlotsService;
  }
) {
  const { guards, fieldsService, slotsService } = deps;

  // POST /import/fields – bulk upsert of the league's fields
  app.post("/import/fields", async (request, reply) => {
    try {
      const leagueId = guards.requireLeagueId(request);
      await guards.requireLeagueAdmin(callerOf(request).userId, leagueId, {
        signal: requestSignal(reply)
      });
      const csvText = await readCsvBody(request);
      reply.send(fieldsService.importFields(leagueId, csvText, request.log));
    } catch (err) {
      sendError(request, reply, err);
    }
  });

  // POST /import/slots – bulk upsert of open slots
  app.post("/import/slots", async (request, reply) => {
    try {
      const leagueId = guards.requireLeagueId(request);
      const caller = callerOf(request);
      await guards.requireLeagueAdmin(caller.userId, leagueId, {
        signal: requestSignal(reply)
      });
      const csvText = await readCsvBody(request);
      reply.send(slotsService.importSlots(leagueId, caller, csvText, request.log));
    } catch (err) {
      sendError(request, reply, err);
    }
  });
}
