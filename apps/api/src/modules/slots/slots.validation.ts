// apps/api/src/modules/slots/slots.validation.ts
import { tryParseFieldKeyFlexible } from "../fields/fields.import";
import { isIsoDate, validateTimeRange } from "../scheduling/scheduling.rules";
import {
  invalid,
  parseOptionalString,
  requiredMessage,
  valid,
  type ValidationResult
} from "../../shared/validation";
import type { CreateSlotBody, CreateSlotRecord } from "./slots.schemas";

const REQUIRED_PROPERTIES = [
  "division",
  "offeringTeamId",
  "gameDate",
  "startTime",
  "endTime",
  "fieldKey"
] as const;

function passThrough(raw: unknown): string | null {
  return typeof raw === "string" ? raw : null;
}

/**
 * Validates a single-slot creation body with the same field rules as the CSV
 * importer. The caller email is stamped as `createdBy` without checks.
 */
export function tryValidateCreateSlot(
  body: CreateSlotBody | null | undefined,
  callerEmail: string
): ValidationResult<CreateSlotRecord> {
  if (!body || typeof body !== "object") return invalid("Invalid JSON body.");

  const missing = REQUIRED_PROPERTIES.filter(
    (name) => parseOptionalString(body[name]) === undefined
  );
  if (missing.length > 0) return invalid(requiredMessage(missing));

  const division = parseOptionalString(body.division) ?? "";
  const offeringTeamId = parseOptionalString(body.offeringTeamId) ?? "";
  const gameDate = parseOptionalString(body.gameDate) ?? "";
  const startTime = parseOptionalString(body.startTime) ?? "";
  const endTime = parseOptionalString(body.endTime) ?? "";
  const fieldKeyRaw = parseOptionalString(body.fieldKey) ?? "";

  if (!isIsoDate(gameDate)) {
    return invalid("gameDate must be YYYY-MM-DD.");
  }

  const range = validateTimeRange(startTime, endTime);
  if (!range.ok) return range;

  const key = tryParseFieldKeyFlexible(fieldKeyRaw, "parkCode", "fieldCode");
  if (!key.ok) return key;

  return valid({
    division,
    offeringTeamId,
    gameDate,
    startTime,
    endTime,
    startMinutes: range.value.startMinutes,
    endMinutes: range.value.endMinutes,
    fieldKeyRaw,
    fieldKey: key.value.normalized,
    parkCode: key.value.parkCode,
    fieldCode: key.value.fieldCode,
    parkName: passThrough(body.parkName),
    fieldName: passThrough(body.fieldName),
    offeringEmail: passThrough(body.offeringEmail),
    gameType: passThrough(body.gameType),
    notes: passThrough(body.notes),
    createdBy: callerEmail
  });
}
