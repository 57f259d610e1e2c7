/**
 * ODK Central payloads and their normalized forms
 */

import { Type, type Static } from "@sinclair/typebox";

import type { JsonObject } from "../db/json.js";

// ============================================================================
// OData Wire Format
// ============================================================================

export const RawRecordSchema = Type.Record(Type.String(), Type.Unknown());

export type RawRecord = Static<typeof RawRecordSchema>;

export const ODataPageSchema = Type.Object({
  value: Type.Array(RawRecordSchema),
  "@odata.count": Type.Optional(Type.Number()),
});

export const SessionResponseSchema = Type.Object({
  token: Type.String({ minLength: 1 }),
});

// ============================================================================
// Person Detail Fields
// ============================================================================

/** Flat text fields of a person_details row, in projection order */
export const PERSON_SCALAR_FIELDS = [
  "shop_apt_unit_number",
  "type",
  "business_name",
  "tax_registered",
  "tin",
  "individual_first_name",
  "individual_middle_name",
  "individual_last_name",
  "individual_gender",
  "individual_id_type",
  "individual_nin",
  "individual_drivers_licence",
  "individual_passport_number",
  "passport_country",
  "individual_residence_permit_number",
  "residence_permit_country",
  "individual_dob",
  "mobile_1",
  "mobile_2",
  "email",
] as const;

export type PersonScalarField = (typeof PERSON_SCALAR_FIELDS)[number];

export type PersonScalarFields = Record<PersonScalarField, string | null>;

// ============================================================================
// Normalized Records
// ============================================================================

export interface SubmissionRecord {
  uuid: string;
  instanceId: string | null;
  /** ISO timestamp from __system.submissionDate, the incremental watermark */
  submittedAt: string | null;
  surveyDate: string | null;
  propertyLocation: JsonObject | null;
  propertyDescription: JsonObject | null;
  endSection: JsonObject | null;
  meta: JsonObject | null;
  system: JsonObject | null;
  /** Attachment file names referenced by the form */
  buildingImageFile: string | null;
  addressImageFile: string | null;
  /** Signed URLs, set by attachment processing; undefined leaves stored URLs alone */
  buildingImageUrl?: string;
  addressImageUrl?: string;
}

export interface PersonDetailRecord {
  key: string | null;
  parentRef: string | null;
  /** Position within the parent's repeat group */
  repeatPosition: number | null;
  /** Raw nested documents, decoded by the aggregator */
  personType: unknown;
  occupancy: unknown;
  fields: PersonScalarFields;
}

export interface ResolvedPersonDetail extends PersonDetailRecord {
  childKey: string;
  parentKey: string;
}
