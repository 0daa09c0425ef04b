// apps/api/src/modules/scheduling/scheduling.rules.ts
import { invalid, valid, type ValidationResult } from "../../shared/validation";

export type Interval = {
  startMinutes: number;
  endMinutes: number;
};

/**
 * Half-open overlap: [aStart, aEnd) and [bStart, bEnd) share at least one minute.
 * Back-to-back ranges (one ends at 10:00, the other starts at 10:00) do not overlap.
 */
export function overlaps(
  aStart: number,
  aEnd: number,
  bStart: number,
  bEnd: number
): boolean {
  return aStart < bEnd && bStart < aEnd;
}

export function intervalsOverlap(a: Interval, b: Interval): boolean {
  return overlaps(a.startMinutes, a.endMinutes, b.startMinutes, b.endMinutes);
}

/**
 * First booked interval the candidate collides with, if any.
 */
export function findOverlap<T extends Interval>(
  booked: readonly T[],
  candidate: Interval
): T | undefined {
  return booked.find((b) => intervalsOverlap(b, candidate));
}

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * "HH:mm" (24-hour, two-digit hour) → minutes since midnight, or null.
 */
export function parseMinutes(hhmm: string): number | null {
  const m = TIME_PATTERN.exec(hhmm.trim());
  if (!m) return null;
  return Number(m[1]) * 60 + Number(m[2]);
}

export function validateTimeRange(
  startTime: string,
  endTime: string,
  labels: { start: string; end: string } = { start: "startTime", end: "endTime" }
): ValidationResult<Interval> {
  const startMinutes = parseMinutes(startTime);
  const endMinutes = parseMinutes(endTime);
  if (startMinutes === null || endMinutes === null) {
    return invalid("Invalid time format. Expected HH:mm (24-hour).");
  }
  if (startMinutes >= endMinutes) {
    return invalid(`${labels.start} must be before ${labels.end}.`);
  }
  return valid({ startMinutes, endMinutes });
}

/**
 * Literal YYYY-MM-DD that also names a real calendar day.
 */
export function isIsoDate(raw: string): boolean {
  const m = DATE_PATTERN.exec(raw.trim());
  if (!m) return false;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12 || day < 1) return false;

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}
