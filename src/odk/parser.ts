import { IdentityError } from "../errors.js";
import { parseJsonObject, readText, type JsonObject } from "../db/json.js";
import { odkLogger } from "../logger.js";
import type {
  PersonDetailRecord,
  PersonScalarField,
  PersonScalarFields,
  RawRecord,
  SubmissionRecord,
} from "../types/odk.js";

// ============================================================================
// Field Helpers
// ============================================================================

/**
 * Normalize an ODK timestamp to ISO-8601 UTC, or null when unparseable
 */
export function normalizeTimestamp(value: unknown): string | null {
  const text = readText(value);
  if (text === null) return null;
  const date = new Date(text);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

function readDocument(raw: RawRecord, field: string): JsonObject | null {
  const result = parseJsonObject(raw[field]);
  if (result.status === "malformed") {
    odkLogger.warn(
      { field, key: readText(raw.UUID) ?? readText(raw.__id) },
      "Could not parse nested document, storing it as empty"
    );
    return null;
  }
  return result.status === "object" ? result.value : null;
}

function findTopLevelImage(raw: RawRecord, ...fragments: string[]): string | null {
  for (const [field, value] of Object.entries(raw)) {
    const name = field.toLowerCase();
    if (fragments.every((fragment) => name.includes(fragment))) {
      const file = readText(value);
      if (file !== null) return file;
    }
  }
  return null;
}

/**
 * Building photo file name: property_description.building_image, falling back
 * to any top-level field named like a building image.
 */
export function extractBuildingImage(
  raw: RawRecord,
  propertyDescription: JsonObject | null
): string | null {
  const nested = readText(propertyDescription?.building_image);
  return nested ?? findTopLevelImage(raw, "building", "image");
}

/**
 * Address plus code photo file name: property_location.address_plus_code_image,
 * falling back to a top-level field of the same shape.
 */
export function extractAddressImage(
  raw: RawRecord,
  propertyLocation: JsonObject | null
): string | null {
  const nested = readText(propertyLocation?.address_plus_code_image);
  return nested ?? findTopLevelImage(raw, "address_plus_code", "image");
}

// ============================================================================
// Submissions
// ============================================================================

/**
 * Normalize one OData submission.
 *
 * @throws IdentityError when the record carries no usable key
 */
export function normalizeSubmission(raw: RawRecord): SubmissionRecord {
  const meta = readDocument(raw, "meta");
  const instanceId = readText(raw.__id) ?? readText(meta?.instanceID);
  const uuid = readText(raw.UUID) ?? instanceId;

  if (uuid === null) {
    throw new IdentityError("Submission has no UUID or __id", {
      fields: Object.keys(raw),
    });
  }

  const system = readDocument(raw, "__system");
  const propertyLocation = readDocument(raw, "property_location");
  const propertyDescription = readDocument(raw, "property_description");

  return {
    uuid,
    instanceId,
    submittedAt: normalizeTimestamp(
      system?.submissionDate ?? raw.SubmittedDate ?? raw.SubmissionDate
    ),
    surveyDate: readText(raw.survey_date),
    propertyLocation,
    propertyDescription,
    endSection: readDocument(raw, "End") ?? readDocument(raw, "end"),
    meta,
    system,
    buildingImageFile: extractBuildingImage(raw, propertyDescription),
    addressImageFile: extractAddressImage(raw, propertyLocation),
  };
}

export interface NormalizedBatch<T> {
  records: T[];
  rejected: IdentityError[];
}

export function normalizeSubmissions(
  raws: RawRecord[]
): NormalizedBatch<SubmissionRecord> {
  const records: SubmissionRecord[] = [];
  const rejected: IdentityError[] = [];

  for (const raw of raws) {
    try {
      records.push(normalizeSubmission(raw));
    } catch (error) {
      if (!(error instanceof IdentityError)) throw error;
      odkLogger.warn(
        { error: error.message, record: error.record },
        "Dropping submission without identity"
      );
      rejected.push(error);
    }
  }

  return { records, rejected };
}

// ============================================================================
// Person Details
// ============================================================================

function readPosition(value: unknown): number | null {
  const text = readText(value);
  if (text === null || !/^\d+$/.test(text)) return null;
  return Number(text);
}

export function readScalarFields(raw: RawRecord): PersonScalarFields {
  const text = (field: PersonScalarField): string | null => readText(raw[field]);

  return {
    shop_apt_unit_number: text("shop_apt_unit_number"),
    type: text("type"),
    business_name: text("business_name"),
    tax_registered: text("tax_registered"),
    tin: text("tin"),
    individual_first_name: text("individual_first_name"),
    individual_middle_name: text("individual_middle_name"),
    individual_last_name: text("individual_last_name"),
    individual_gender: text("individual_gender"),
    individual_id_type: text("individual_id_type"),
    individual_nin: text("individual_nin"),
    individual_drivers_licence: text("individual_drivers_licence"),
    individual_passport_number: text("individual_passport_number"),
    passport_country: text("passport_country"),
    individual_residence_permit_number: text("individual_residence_permit_number"),
    residence_permit_country: text("residence_permit_country"),
    individual_dob: text("individual_dob"),
    mobile_1: text("mobile_1"),
    mobile_2: text("mobile_2"),
    email: text("email"),
  };
}

/**
 * Normalize person_details rows in feed order. Rows without an explicit
 * repeat_position get their ordinal within their parent reference's group.
 * Identity is resolved later, so nothing is dropped here.
 */
export function normalizePersonDetails(raws: RawRecord[]): PersonDetailRecord[] {
  const ordinals = new Map<string, number>();

  return raws.map((raw) => {
    const parentRef = readText(raw["__Submissions-id"]);
    let repeatPosition = readPosition(raw.repeat_position);

    if (parentRef !== null) {
      const ordinal = ordinals.get(parentRef) ?? 0;
      ordinals.set(parentRef, ordinal + 1);
      repeatPosition ??= ordinal;
    }

    return {
      key: readText(raw.UUID) ?? readText(raw.__id),
      parentRef,
      repeatPosition,
      personType: raw.person_type,
      occupancy: raw.occupancy,
      fields: readScalarFields(raw),
    };
  });
}
