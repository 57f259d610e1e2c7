/**
 * Upsert Module - Idempotent persistence of fetched records
 *
 * Read-then-write per key: look the key up, then update or insert. Payload
 * fields are overwritten wholesale on every write. Concurrent upserts of the
 * same key are not guarded; cycles are serialized by the sync loop.
 */

import { parseJsonObject, toJsonText } from "../../db/json.js";
import { errorMessage, syncLogger } from "../../logger.js";

import type {
  Database,
  NewPersonDetail,
  NewSubmission,
} from "../../db/types.js";
import type {
  ResolvedPersonDetail,
  SubmissionRecord,
} from "../../types/odk.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface UpsertSummary {
  inserted: number;
  updated: number;
  failed: number;
  /** Keys whose write failed, in input order */
  failedKeys: string[];
}

type Clock = () => Date;

const systemClock: Clock = () => new Date();

// ============================================================================
// Submissions
// ============================================================================

function submissionValues(
  record: SubmissionRecord,
  timestamp: string
): Omit<NewSubmission, "created_at"> {
  return {
    uuid: record.uuid,
    instance_id: record.instanceId,
    submitted_at: record.submittedAt,
    survey_date: record.surveyDate,
    property_location: toJsonText(record.propertyLocation),
    property_description: toJsonText(record.propertyDescription),
    end_section: toJsonText(record.endSection),
    meta: toJsonText(record.meta),
    system_data: toJsonText(record.system),
    // Only touched when image processing produced a URL for this cycle;
    // a fresh URL also clears any unrecoverable flag
    ...(record.buildingImageUrl !== undefined
      ? {
          building_image_url: record.buildingImageUrl,
          building_image_error: null,
        }
      : {}),
    ...(record.addressImageUrl !== undefined
      ? {
          address_image_url: record.addressImageUrl,
          address_image_error: null,
        }
      : {}),
    updated_at: timestamp,
  };
}

/**
 * Insert or overwrite submissions by UUID.
 */
export async function upsertSubmissions(
  db: Kysely<Database>,
  records: SubmissionRecord[],
  now: Clock = systemClock
): Promise<UpsertSummary> {
  const summary: UpsertSummary = {
    inserted: 0,
    updated: 0,
    failed: 0,
    failedKeys: [],
  };

  for (const record of records) {
    const timestamp = now().toISOString();
    const values = submissionValues(record, timestamp);

    try {
      const existing = await db
        .selectFrom("submissions")
        .select("uuid")
        .where("uuid", "=", record.uuid)
        .executeTakeFirst();

      if (existing) {
        await db
          .updateTable("submissions")
          .set(values)
          .where("uuid", "=", record.uuid)
          .execute();
        summary.updated++;
      } else {
        await db
          .insertInto("submissions")
          .values({ ...values, created_at: timestamp })
          .execute();
        summary.inserted++;
      }
    } catch (error) {
      summary.failed++;
      summary.failedKeys.push(record.uuid);
      syncLogger.error(
        {
          uuid: record.uuid,
          stage: "upsert_submissions",
          error: errorMessage(error),
        },
        "Failed to persist submission"
      );
    }
  }

  syncLogger.info(
    { ...summary, total: records.length },
    "Submissions persisted"
  );
  return summary;
}

// ============================================================================
// Person Details
// ============================================================================

/**
 * Nested documents are stored decoded; a malformed one is kept verbatim so
 * the rebuild can report it.
 */
function documentText(value: unknown): string | null {
  const result = parseJsonObject(value);
  switch (result.status) {
    case "object":
      return JSON.stringify(result.value);
    case "absent":
      return null;
    case "malformed":
      return JSON.stringify(result.raw);
  }
}

function personValues(
  record: ResolvedPersonDetail,
  timestamp: string
): Omit<NewPersonDetail, "created_at" | "ingest_seq"> {
  return {
    uuid: record.childKey,
    parent_ref: record.parentRef,
    repeat_position: record.repeatPosition,
    person_type: documentText(record.personType),
    occupancy: documentText(record.occupancy),
    ...record.fields,
    updated_at: timestamp,
  };
}

/**
 * Insert or overwrite person rows by child key. New rows get the next
 * storage sequence number; updates keep theirs, so nested-list order is
 * stable across re-fetches.
 */
export async function upsertPersonDetails(
  db: Kysely<Database>,
  records: ResolvedPersonDetail[],
  now: Clock = systemClock
): Promise<UpsertSummary> {
  const summary: UpsertSummary = {
    inserted: 0,
    updated: 0,
    failed: 0,
    failedKeys: [],
  };

  const last = await db
    .selectFrom("person_details")
    .select((eb) => eb.fn.max("ingest_seq").as("max_seq"))
    .executeTakeFirst();
  let nextSeq = Number(last?.max_seq ?? 0) + 1;

  for (const record of records) {
    const timestamp = now().toISOString();
    const values = personValues(record, timestamp);

    try {
      const existing = await db
        .selectFrom("person_details")
        .select("uuid")
        .where("uuid", "=", record.childKey)
        .executeTakeFirst();

      if (existing) {
        await db
          .updateTable("person_details")
          .set(values)
          .where("uuid", "=", record.childKey)
          .execute();
        summary.updated++;
      } else {
        await db
          .insertInto("person_details")
          .values({ ...values, ingest_seq: nextSeq, created_at: timestamp })
          .execute();
        nextSeq++;
        summary.inserted++;
      }
    } catch (error) {
      summary.failed++;
      summary.failedKeys.push(record.childKey);
      syncLogger.error(
        {
          uuid: record.childKey,
          stage: "upsert_person_details",
          error: errorMessage(error),
        },
        "Failed to persist person details"
      );
    }
  }

  syncLogger.info(
    { ...summary, total: records.length },
    "Person details persisted"
  );
  return summary;
}
