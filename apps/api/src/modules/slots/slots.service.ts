// apps/api/src/modules/slots/slots.service.ts
import { createHash, randomUUID } from "crypto";
import { createHttpError } from "../../shared/errors";
import { normalizePagination, toLimitOffset, toPaginatedResult, type PaginatedResult } from "../../shared/pagination";
import type { CallerIdentity } from "../../shared/types";
import { parseOptionalString } from "../../shared/validation";
import type { FieldsRepo } from "../fields/fields.repo";
import type { ImportLogger } from "../fields/fields.service";
import { isBlankRow } from "../imports/csvMini";
import { readCsvTable, type ImportReport } from "../imports/imports.table";
import { findOverlap, isIsoDate, type Interval } from "../scheduling/scheduling.rules";
import type { BookedInterval, SlotsRepo, SlotWrite } from "./slots.repo";
import {
  SLOT_OPTIONAL_COLUMNS,
  SLOT_REQUIRED_COLUMNS,
  parseSlotStatus,
  tryParseSlotRow
} from "./slots.import";
import { tryValidateCreateSlot } from "./slots.validation";
import {
  DEFAULT_GAME_TYPE,
  type CreateSlotBody,
  type ListSlotsQuery,
  type SlotSummary
} from "./slots.schemas";

/**
 * Stable id for an imported slot, so re-importing the same file updates rows
 * instead of duplicating them.
 */
export function importedSlotId(
  leagueId: string,
  parts: {
    division: string;
    offeringTeamId: string;
    gameDate: string;
    startTime: string;
    endTime: string;
    fieldKey: string;
  }
): string {
  const key = [
    leagueId,
    parts.division,
    parts.offeringTeamId,
    parts.gameDate,
    parts.startTime,
    parts.endTime,
    parts.fieldKey
  ]
    .map((p) => p.toLowerCase())
    .join("|");
  return createHash("sha1").update(key).digest("hex");
}

function trimmedOrEmpty(raw: string | null): string {
  return (raw ?? "").trim();
}

function blocking(booked: BookedInterval[], ignoreSlotId?: string): BookedInterval[] {
  return booked.filter((b) => b.status !== "Cancelled" && b.slotId !== ignoreSlotId);
}

export type SlotsService = ReturnType<typeof createSlotsService>;

export function createSlotsService(deps: { slotsRepo: SlotsRepo; fieldsRepo: FieldsRepo }) {
  const { slotsRepo, fieldsRepo } = deps;

  return {
    listSlots(leagueId: string, query: ListSlotsQuery): PaginatedResult<SlotSummary> {
      const gameDate = parseOptionalString(query.gameDate);
      if (gameDate && !isIsoDate(gameDate)) {
        throw createHttpError(400, "gameDate must be YYYY-MM-DD.", "ValidationFailed");
      }
      const statusText = parseOptionalString(query.status);

      const params = normalizePagination(query);
      const { limit, offset } = toLimitOffset(params);
      const { items, total } = slotsRepo.list(
        leagueId,
        {
          division: parseOptionalString(query.division),
          gameDate,
          status: statusText ? parseSlotStatus(statusText) : undefined
        },
        limit,
        offset
      );
      return toPaginatedResult(items, total, params);
    },

    /**
     * Single slot offered by a team. The field must exist and be active, and the
     * slot may not overlap another live slot on that field and day.
     */
    createSlot(
      leagueId: string,
      caller: CallerIdentity,
      body: CreateSlotBody | undefined
    ): SlotSummary {
      const result = tryValidateCreateSlot(body, caller.email);
      if (!result.ok) {
        throw createHttpError(400, result.error, "ValidationFailed");
      }
      const input = result.value;

      const field = fieldsRepo.get(leagueId, input.parkCode, input.fieldCode);
      if (!field) {
        throw createHttpError(400, "Field not found. Import fields first.", "ValidationFailed", {
          fieldKey: input.fieldKey
        });
      }
      if (!field.isActive) {
        throw createHttpError(409, "Field exists but is inactive.", "Conflict", {
          fieldKey: input.fieldKey
        });
      }

      const booked = slotsRepo.listOnFieldDate(leagueId, input.fieldKey, input.gameDate);
      const clash = findOverlap(blocking(booked), input);
      if (clash) {
        throw createHttpError(409, "Slot overlaps an existing slot on this field.", "Conflict", {
          slotId: clash.slotId,
          fieldKey: input.fieldKey,
          gameDate: input.gameDate
        });
      }

      const now = new Date().toISOString();
      return slotsRepo.insert({
        slotId: randomUUID(),
        leagueId,
        division: input.division,
        offeringTeamId: input.offeringTeamId,
        offeringEmail: trimmedOrEmpty(input.offeringEmail),
        gameDate: input.gameDate,
        startTime: input.startTime,
        endTime: input.endTime,
        startMinutes: input.startMinutes,
        endMinutes: input.endMinutes,
        fieldKey: input.fieldKey,
        parkName: field.parkName,
        fieldName: field.fieldName,
        displayName: field.displayName,
        gameType: trimmedOrEmpty(input.gameType) || DEFAULT_GAME_TYPE,
        status: "Open",
        notes: trimmedOrEmpty(input.notes),
        createdBy: input.createdBy,
        createdAt: now,
        updatedAt: now
      });
    },

    /**
     * Rows are validated independently and reported in file order. Accepted rows
     * are checked for overlaps against stored slots and earlier rows of the same
     * file, then written in one transaction.
     */
    importSlots(
      leagueId: string,
      caller: CallerIdentity,
      csvText: string,
      log: ImportLogger
    ): ImportReport {
      const table = readCsvTable(csvText, SLOT_REQUIRED_COLUMNS, SLOT_OPTIONAL_COLUMNS);
      const fields = fieldsRepo.lookup(leagueId);

      const report: ImportReport = {
        leagueId,
        upserted: 0,
        rejected: 0,
        skipped: 0,
        errors: []
      };

      const bookedByFieldDate = new Map<string, BookedInterval[]>();
      const bookedFor = (fieldKey: string, gameDate: string) => {
        const key = `${fieldKey}|${gameDate}`;
        let booked = bookedByFieldDate.get(key);
        if (!booked) {
          booked = slotsRepo.listOnFieldDate(leagueId, fieldKey, gameDate);
          bookedByFieldDate.set(key, booked);
        }
        return booked;
      };

      const reject = (row: number, error: string, fieldKey?: string) => {
        report.rejected++;
        report.errors.push(fieldKey ? { row, error, fieldKey } : { row, error });
        log.debug({ leagueId, row, error }, "slot row rejected");
      };

      // Repeated rows share an id; the last one wins.
      const accepted = new Map<string, SlotWrite>();
      const now = new Date().toISOString();

      for (const { rowNumber, cells } of table.rows) {
        if (isBlankRow(cells)) {
          report.skipped++;
          continue;
        }

        const parsed = tryParseSlotRow(cells, table.index);
        if (!parsed.ok) {
          reject(rowNumber, parsed.error);
          continue;
        }
        const row = parsed.value;

        const field = fields.get(row.fieldKey);
        if (!field) {
          reject(rowNumber, "Field not found (import fields first).", row.fieldKeyRaw);
          continue;
        }
        if (!field.isActive) {
          reject(rowNumber, "Field exists but is inactive.", row.fieldKeyRaw);
          continue;
        }

        const slotId = importedSlotId(leagueId, row);
        const interval: Interval = { startMinutes: row.startMinutes, endMinutes: row.endMinutes };
        const booked = bookedFor(row.fieldKey, row.gameDate);

        if (row.status !== "Cancelled") {
          const clash = findOverlap(blocking(booked, slotId), interval);
          if (clash) {
            reject(rowNumber, "Slot overlaps an existing slot on this field.", row.fieldKeyRaw);
            continue;
          }
        }
        const entry: BookedInterval = { slotId, status: row.status, ...interval };
        const existing = booked.findIndex((b) => b.slotId === slotId);
        if (existing === -1) booked.push(entry);
        else booked[existing] = entry;

        accepted.set(slotId, {
          slotId,
          leagueId,
          division: row.division,
          offeringTeamId: row.offeringTeamId,
          offeringEmail: row.offeringEmail,
          gameDate: row.gameDate,
          startTime: row.startTime,
          endTime: row.endTime,
          startMinutes: row.startMinutes,
          endMinutes: row.endMinutes,
          fieldKey: row.fieldKey,
          parkName: field.parkName,
          fieldName: field.fieldName,
          displayName: field.displayName,
          gameType: row.gameType,
          status: row.status,
          notes: row.notes,
          createdBy: caller.email,
          createdAt: now,
          updatedAt: now
        });
      }

      report.upserted = slotsRepo.upsertMany([...accepted.values()]);

      log.info(
        {
          leagueId,
          upserted: report.upserted,
          rejected: report.rejected,
          skipped: report.skipped
        },
        "slots import finished"
      );
      return report;
    }
  };
}
