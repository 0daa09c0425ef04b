// apps/api/src/modules/fields/fields.schemas.ts

/** A fully validated row of a fields CSV. */
export type FieldImportRow = {
  fieldKey: string;
  parkCode: string;
  fieldCode: string;
  parkName: string;
  fieldName: string;
  displayName: string;
  address: string;
  notes: string;
  isActive: boolean;
};

export type FieldSummary = FieldImportRow & {
  leagueId: string;
  updatedAt: string;
};

export type ListFieldsQuery = {
  activeOnly?: string;
};
