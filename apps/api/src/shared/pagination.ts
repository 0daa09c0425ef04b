// apps/api/src/shared/pagination.ts
import { parseNumber } from "./validation";

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface PaginationParams {
  page: number;
  limit: number;
}

export interface PaginatedResult<T> {
  items: T[];
  page: number;
  limit: number;
  total: number;
}

/**
 * Query-string page/limit → whole numbers with page ≥ 1 and 1 ≤ limit ≤ 100.
 */
export function normalizePagination(raw: { page?: unknown; limit?: unknown }): PaginationParams {
  return {
    page: Math.floor(parseNumber(raw.page, { defaultValue: 1, min: 1 })),
    limit: Math.floor(
      parseNumber(raw.limit, { defaultValue: DEFAULT_PAGE_SIZE, min: 1, max: MAX_PAGE_SIZE })
    )
  };
}

/** Expects params from normalizePagination. */
export function toLimitOffset({ page, limit }: PaginationParams): { limit: number; offset: number } {
  return { limit, offset: (page - 1) * limit };
}

export function toPaginatedResult<T>(
  items: T[],
  total: number,
  { page, limit }: PaginationParams
): PaginatedResult<T> {
  return { items, total, page, limit };
}
