// apps/api/src/modules/slots/slots.schemas.ts

export const SLOT_STATUSES = ["Open", "Confirmed", "Cancelled"] as const;
export type SlotStatus = (typeof SLOT_STATUSES)[number];

export const DEFAULT_GAME_TYPE = "Swap";

/** A fully validated row of a slots CSV. Partially valid rows never become one. */
export type SlotImportRow = {
  division: string;
  offeringTeamId: string;
  offeringEmail: string;
  gameDate: string;
  startTime: string;
  endTime: string;
  startMinutes: number;
  endMinutes: number;
  fieldKeyRaw: string;
  fieldKey: string;
  parkCode: string;
  fieldCode: string;
  gameType: string;
  status: SlotStatus;
  notes: string;
};

/** JSON body of POST /slots. Nothing is trusted until validated. */
export type CreateSlotBody = {
  division?: unknown;
  offeringTeamId?: unknown;
  gameDate?: unknown;
  startTime?: unknown;
  endTime?: unknown;
  fieldKey?: unknown;
  parkName?: unknown;
  fieldName?: unknown;
  offeringEmail?: unknown;
  gameType?: unknown;
  notes?: unknown;
};

export type CreateSlotRecord = {
  division: string;
  offeringTeamId: string;
  gameDate: string;
  startTime: string;
  endTime: string;
  startMinutes: number;
  endMinutes: number;
  fieldKeyRaw: string;
  fieldKey: string;
  parkCode: string;
  fieldCode: string;
  parkName: string | null;
  fieldName: string | null;
  offeringEmail: string | null;
  gameType: string | null;
  notes: string | null;
  /** Caller email; recorded as given. */
  createdBy: string;
};

export type SlotSummary = {
  slotId: string;
  leagueId: string;
  division: string;
  offeringTeamId: string;
  offeringEmail: string;
  gameDate: string;
  startTime: string;
  endTime: string;
  fieldKey: string;
  parkName: string;
  fieldName: string;
  displayName: string;
  gameType: string;
  status: SlotStatus;
  notes: string;
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
};

export type ListSlotsQuery = {
  division?: string;
  gameDate?: string;
  status?: string;
  page?: unknown;
  limit?: unknown;
};
