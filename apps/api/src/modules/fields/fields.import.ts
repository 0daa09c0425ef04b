// apps/api/src/modules/fields/fields.import.ts
import { getCell, type HeaderIndex } from "../imports/csvMini";
import {
  invalid,
  isBlank,
  requiredMessage,
  valid,
  type ValidationResult
} from "../../shared/validation";
import type { FieldImportRow } from "./fields.schemas";

export const FIELD_REQUIRED_COLUMNS = ["fieldkey", "parkname", "fieldname"] as const;

export const FIELD_OPTIONAL_COLUMNS = [
  "displayname",
  "address",
  "notes",
  "status",
  "isactive",
  "lights",
  "battingcage",
  "portablemound",
  "fieldlockcode",
  "fieldnotes"
] as const;

export type ParsedFieldKey = {
  parkCode: string;
  fieldCode: string;
  /** Always "{parkCode}/{fieldCode}", whatever separator the input used. */
  normalized: string;
};

/**
 * Accepts "Park/Field" or "Park_Field". A "/" anywhere wins over "_"; the first
 * occurrence of the chosen separator splits the key.
 *
 * Park codes are lower-cased. Field codes are lower-cased and whitespace runs
 * become a single hyphen ("Field 1" → "field-1").
 */
export function tryParseFieldKeyFlexible(
  raw: string,
  parkColumnLabel: string,
  fieldColumnLabel: string
): ValidationResult<ParsedFieldKey> {
  const value = raw.trim();
  const separator = value.includes("/") ? "/" : value.includes("_") ? "_" : null;

  const shapeHint = `Use ${parkColumnLabel}/${fieldColumnLabel} or ${parkColumnLabel}_${fieldColumnLabel}.`;
  if (!separator) {
    return invalid(`Invalid field key "${value}". ${shapeHint}`);
  }

  const at = value.indexOf(separator);
  const parkCode = value.slice(0, at).trim().toLowerCase();
  const fieldCode = value
    .slice(at + 1)
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "-");

  if (!parkCode || !fieldCode) {
    return invalid(`Invalid field key "${value}". ${shapeHint}`);
  }

  return valid({ parkCode, fieldCode, normalized: `${parkCode}/${fieldCode}` });
}

function readActiveMarker(text: string | undefined): boolean | null {
  const t = (text ?? "").trim().toLowerCase();
  if (!t) return null;
  if (t.includes("inactive")) return false;
  // isActive column values
  if (t === "false" || t === "no" || t === "0") return false;
  return true;
}

/**
 * Status text wins; a blank status falls back to the second column under the same
 * rule. Both blank means active.
 */
export function parseIsActive(
  statusText: string | undefined,
  fallbackText: string | undefined
): boolean {
  return readActiveMarker(statusText) ?? readActiveMarker(fallbackText) ?? true;
}

/**
 * Folds the optional amenity columns into the notes text, skipping them when the
 * existing notes already carry the same text.
 */
export function appendOptionalFieldNotes(
  existingNotes: string,
  row: readonly string[],
  index: HeaderIndex
): string {
  const notes = existingNotes.trim();
  const opt = (column: string) => (getCell(row, index, column) ?? "").trim();

  const extras: string[] = [];
  const lights = opt("lights");
  if (lights) extras.push(`Lights: ${lights}`);
  const cage = opt("battingcage");
  if (cage) extras.push(`Batting cage: ${cage}`);
  const mound = opt("portablemound");
  if (mound) extras.push(`Portable mound: ${mound}`);
  const lockCode = opt("fieldlockcode");
  if (lockCode) extras.push(`Lock code: ${lockCode}`);
  const fieldNotes = opt("fieldnotes");
  if (fieldNotes) extras.push(fieldNotes);

  if (extras.length === 0) return notes;

  const extraText = extras.join(" | ");
  if (!notes) return extraText;
  if (notes.toLowerCase().includes(extraText.toLowerCase())) return notes;
  return `${notes} | ${extraText}`;
}

export function tryParseFieldRow(
  row: readonly string[],
  index: HeaderIndex
): ValidationResult<FieldImportRow> {
  const cell = (column: string) => getCell(row, index, column);

  const fieldKeyRaw = cell("fieldkey");
  const parkName = cell("parkname");
  const fieldName = cell("fieldname");

  const missing: string[] = [];
  if (isBlank(fieldKeyRaw)) missing.push("FieldKey");
  if (isBlank(parkName)) missing.push("ParkName");
  if (isBlank(fieldName)) missing.push("FieldName");
  if (missing.length > 0 || !fieldKeyRaw || !parkName || !fieldName) {
    return invalid(requiredMessage(missing));
  }

  const key = tryParseFieldKeyFlexible(fieldKeyRaw, "parkCode", "fieldCode");
  if (!key.ok) return key;

  const park = parkName.trim();
  const field = fieldName.trim();
  const displayName = (cell("displayname") ?? "").trim() || `${park} > ${field}`;

  return valid({
    fieldKey: key.value.normalized,
    parkCode: key.value.parkCode,
    fieldCode: key.value.fieldCode,
    parkName: park,
    fieldName: field,
    displayName,
    address: (cell("address") ?? "").trim(),
    notes: appendOptionalFieldNotes(cell("notes") ?? "", row, index),
    isActive: parseIsActive(cell("status"), cell("isactive"))
  });
}
