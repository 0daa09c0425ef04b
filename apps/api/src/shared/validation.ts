// apps/api/src/shared/validation.ts

/**
 * Outcome of a validator. Validators never throw for bad input; callers decide
 * how a rejection is surfaced (row error, 400 response, ...).
 */
export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export function valid<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

export function invalid<T = never>(error: string): ValidationResult<T> {
  return { ok: false, error };
}

/**
 * Parse a numeric query or body field into a number with sane defaults.
 */
export function parseNumber(
  raw: unknown,
  options: { defaultValue?: number; min?: number; max?: number } = {}
): number {
  const { defaultValue = 0, min, max } = options;
  if (raw === undefined || raw === null || raw === "") return defaultValue;
  const n = Number(raw);
  if (Number.isNaN(n)) return defaultValue;

  let value = n;
  if (typeof min === "number") value = Math.max(min, value);
  if (typeof max === "number") value = Math.min(max, value);
  return value;
}

/**
 * Trim and normalise a string; returns undefined if empty.
 */
export function parseOptionalString(raw: unknown): string | undefined {
  if (typeof raw !== "string") return undefined;
  const trimmed = raw.trim();
  return trimmed.length ? trimmed : undefined;
}

export function isBlank(raw: string | null | undefined): boolean {
  return raw === undefined || raw === null || raw.trim().length === 0;
}

/**
 * "a is required." / "a, b are required."
 */
export function requiredMessage(names: readonly string[]): string {
  return names.length === 1
    ? `${names[0]} is required.`
    : `${names.join(", ")} are required.`;
}
