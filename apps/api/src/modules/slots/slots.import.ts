// apps/api/src/modules/slots/slots.import.ts
import { getCell, type HeaderIndex } from "../imports/csvMini";
import { tryParseFieldKeyFlexible } from "../fields/fields.import";
import { isIsoDate, validateTimeRange } from "../scheduling/scheduling.rules";
import {
  invalid,
  isBlank,
  requiredMessage,
  valid,
  type ValidationResult
} from "../../shared/validation";
import {
  DEFAULT_GAME_TYPE,
  type SlotImportRow,
  type SlotStatus
} from "./slots.schemas";

/** Logical column → label used in row errors. */
const REQUIRED: ReadonlyArray<[column: string, label: string]> = [
  ["division", "Division"],
  ["offeringteamid", "OfferingTeamId"],
  ["gamedate", "GameDate"],
  ["starttime", "StartTime"],
  ["endtime", "EndTime"],
  ["fieldkey", "FieldKey"]
];

export const SLOT_REQUIRED_COLUMNS = REQUIRED.map(([column]) => column);
export const SLOT_OPTIONAL_COLUMNS = ["offeringemail", "gametype", "notes", "status"];

/**
 * Maps free-form status text onto the slot vocabulary. Anything that does not read
 * as cancelled or confirmed is an open slot, blank included.
 */
export function parseSlotStatus(text: string | undefined): SlotStatus {
  const t = (text ?? "").trim().toLowerCase();
  if (!t) return "Open";
  if (t.includes("cancel") || t.includes("closed")) return "Cancelled";
  if (t.includes("confirm")) return "Confirmed";
  return "Open";
}

export function tryParseSlotRow(
  row: readonly string[],
  index: HeaderIndex
): ValidationResult<SlotImportRow> {
  const cell = (column: string) => getCell(row, index, column);

  const values = new Map<string, string>();
  const missing: string[] = [];
  for (const [column, label] of REQUIRED) {
    const value = cell(column);
    if (value === undefined || isBlank(value)) {
      missing.push(label);
    } else {
      values.set(column, value.trim());
    }
  }
  if (missing.length > 0) return invalid(requiredMessage(missing));

  const required = (column: string) => values.get(column) ?? "";
  const fieldKeyRaw = required("fieldkey");
  const gameDate = required("gamedate");
  const startTime = required("starttime");
  const endTime = required("endtime");

  const key = tryParseFieldKeyFlexible(fieldKeyRaw, "parkCode", "fieldCode");
  if (!key.ok) return key;

  if (!isIsoDate(gameDate)) {
    return invalid("GameDate must be YYYY-MM-DD.");
  }

  const range = validateTimeRange(startTime, endTime, {
    start: "StartTime",
    end: "EndTime"
  });
  if (!range.ok) return range;

  return valid({
    division: required("division"),
    offeringTeamId: required("offeringteamid"),
    offeringEmail: (cell("offeringemail") ?? "").trim(),
    gameDate,
    startTime,
    endTime,
    startMinutes: range.value.startMinutes,
    endMinutes: range.value.endMinutes,
    fieldKeyRaw,
    fieldKey: key.value.normalized,
    parkCode: key.value.parkCode,
    fieldCode: key.value.fieldCode,
    gameType: (cell("gametype") ?? "").trim() || DEFAULT_GAME_TYPE,
    status: parseSlotStatus(cell("status")),
    notes: (cell("notes") ?? "").trim()
  });
}
