/**
 * Table definitions, built with Kysely's schema builder so the same DDL runs
 * on PostgreSQL and SQLite.
 */

import type { DatabaseDialect } from "./connection.js";
import type { Database } from "./types.js";
import type { Kysely } from "kysely";

export function jsonColumnType(dialect: DatabaseDialect): "jsonb" | "text" {
  return dialect === "postgres" ? "jsonb" : "text";
}

// ============================================================================
// Source Tables
// ============================================================================

export async function createSubmissionsTable(
  db: Kysely<Database>,
  dialect: DatabaseDialect
): Promise<void> {
  const json = jsonColumnType(dialect);

  await db.schema
    .createTable("submissions")
    .ifNotExists()
    .addColumn("uuid", "text", (col) => col.primaryKey())
    .addColumn("instance_id", "text")
    .addColumn("submitted_at", "text")
    .addColumn("survey_date", "text")
    .addColumn("property_location", json)
    .addColumn("property_description", json)
    .addColumn("end_section", json)
    .addColumn("meta", json)
    .addColumn("system_data", json)
    .addColumn("building_image_url", "text")
    .addColumn("address_image_url", "text")
    .addColumn("building_image_error", "text")
    .addColumn("address_image_error", "text")
    .addColumn("created_at", "text", (col) => col.notNull())
    .addColumn("updated_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("submissions_submitted_at_idx")
    .ifNotExists()
    .on("submissions")
    .column("submitted_at")
    .execute();
}

export async function createPersonDetailsTable(
  db: Kysely<Database>,
  dialect: DatabaseDialect
): Promise<void> {
  const json = jsonColumnType(dialect);

  await db.schema
    .createTable("person_details")
    .ifNotExists()
    .addColumn("uuid", "text", (col) => col.primaryKey())
    .addColumn("parent_ref", "text")
    .addColumn("repeat_position", "integer")
    .addColumn("ingest_seq", "integer", (col) => col.notNull())
    .addColumn("person_type", json)
    .addColumn("shop_apt_unit_number", "text")
    .addColumn("type", "text")
    .addColumn("business_name", "text")
    .addColumn("tax_registered", "text")
    .addColumn("tin", "text")
    .addColumn("individual_first_name", "text")
    .addColumn("individual_middle_name", "text")
    .addColumn("individual_last_name", "text")
    .addColumn("individual_gender", "text")
    .addColumn("individual_id_type", "text")
    .addColumn("individual_nin", "text")
    .addColumn("individual_drivers_licence", "text")
    .addColumn("individual_passport_number", "text")
    .addColumn("passport_country", "text")
    .addColumn("individual_residence_permit_number", "text")
    .addColumn("residence_permit_country", "text")
    .addColumn("individual_dob", "text")
    .addColumn("mobile_1", "text")
    .addColumn("mobile_2", "text")
    .addColumn("email", "text")
    .addColumn("occupancy", json)
    .addColumn("created_at", "text", (col) => col.notNull())
    .addColumn("updated_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("person_details_parent_ref_idx")
    .ifNotExists()
    .on("person_details")
    .column("parent_ref")
    .execute();

  await db.schema
    .createIndex("person_details_ingest_seq_idx")
    .ifNotExists()
    .on("person_details")
    .column("ingest_seq")
    .execute();
}

// ============================================================================
// Sync Tracking Tables
// ============================================================================

export async function createSyncTables(
  db: Kysely<Database>,
  dialect: DatabaseDialect
): Promise<void> {
  await db.schema
    .createTable("sync_status")
    .ifNotExists()
    .addColumn("sync_type", "text", (col) => col.primaryKey())
    .addColumn("last_sync_timestamp", "text")
    .addColumn("last_attempt_timestamp", "text")
    .addColumn("last_sync_status", "text", (col) =>
      col.notNull().defaultTo("pending")
    )
    .addColumn("last_error_message", "text")
    .addColumn("successful_sync_count", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("failed_sync_count", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("last_records_processed", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("created_at", "text", (col) => col.notNull())
    .addColumn("updated_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("sync_history")
    .ifNotExists()
    .$call((builder) =>
      dialect === "postgres"
        ? builder.addColumn("id", "serial", (col) => col.primaryKey())
        : builder.addColumn("id", "integer", (col) =>
            col.primaryKey().autoIncrement()
          )
    )
    .addColumn("sync_type", "text", (col) => col.notNull())
    .addColumn("sync_timestamp", "text", (col) => col.notNull())
    .addColumn("status", "text", (col) => col.notNull())
    .addColumn("records_processed", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("duration_seconds", "double precision")
    .addColumn("error_message", "text")
    .addColumn("sync_metadata", jsonColumnType(dialect))
    .addColumn("service_instance", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("sync_history_type_timestamp_idx")
    .ifNotExists()
    .on("sync_history")
    .columns(["sync_type", "sync_timestamp"])
    .execute();
}

// ============================================================================
// Unified Table
// ============================================================================

/**
 * Create a unified table under `name`. The primary key constraint is named
 * after `buildId` because PostgreSQL constraint names outlive table renames.
 */
export async function createUnifiedTable(
  db: Kysely<Database>,
  dialect: DatabaseDialect,
  name: string,
  buildId: string
): Promise<void> {
  const json = jsonColumnType(dialect);
  const money = "double precision";

  await db.schema
    .createTable(name)
    .addColumn("uuid", "text", (col) => col.notNull())
    .addColumn("instance_id", "text")
    .addColumn("submitted_at", "text")
    .addColumn("survey_date", "text")
    .addColumn("review_state", "text")
    .addColumn("submitter_name", "text")
    .addColumn("address_plus_code", "text")
    .addColumn("street", "text")
    .addColumn("town", "text")
    .addColumn("district", "text")
    .addColumn("property_name", "text")
    .addColumn("building_type", "text")
    .addColumn("property_location", json)
    .addColumn("property_description", json)
    .addColumn("end_section", json)
    .addColumn("building_image_url", "text")
    .addColumn("address_image_url", "text")
    .addColumn("person_details", json, (col) => col.notNull())
    .addColumn("person_count", "integer", (col) => col.notNull())
    .addColumn("building_image_html", "text")
    .addColumn("address_image_html", "text")
    .addColumn("source_link_html", "text")
    .addColumn("total_rent_gmd", money, (col) => col.notNull())
    .addColumn("commercial_income", money, (col) => col.notNull())
    .addColumn("residential_income", money, (col) => col.notNull())
    .addColumn("business_income", money, (col) => col.notNull())
    .addColumn("commercial_tax", money, (col) => col.notNull())
    .addColumn("residential_tax", money, (col) => col.notNull())
    .addColumn("business_tax", money, (col) => col.notNull())
    .addColumn("total_tax_liability", money, (col) => col.notNull())
    .addColumn("amount_paid", money, (col) => col.notNull())
    .addColumn("owner_status", "text", (col) => col.notNull())
    .addColumn("processed_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint(`unified_pk_${buildId}`, ["uuid"])
    .execute();
}
