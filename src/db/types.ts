import type {
  ColumnType,
  Generated,
  Insertable,
  Selectable,
  Updateable,
} from "kysely";

// ============================================================================
// Column Types
// ============================================================================

/**
 * JSON document column. Written as JSON text; read back as whatever the
 * driver returns (a parsed value from PostgreSQL JSONB, the raw text from
 * SQLite), so readers go through `readJsonObject` / `readJsonArray`.
 */
export type JsonColumn = ColumnType<unknown, string | null, string | null>;

/** ISO-8601 timestamp stored as text in every dialect */
export type Timestamp = string;

export type SyncStream =
  | "main_submissions"
  | "person_details"
  | "image_processing"
  | "url_refresh"
  | "unified_rebuild";

export type SyncRunStatus = "pending" | "in_progress" | "success" | "error";

export type OwnerStatus = "Owner" | "No Owner";

// ============================================================================
// Table Names
// ============================================================================

export const TABLES = {
  submissions: "submissions",
  personDetails: "person_details",
  syncStatus: "sync_status",
  syncHistory: "sync_history",
  unified: "submissions_unified",
} as const;

// ============================================================================
// Source Tables
// ============================================================================

export interface SubmissionsTable {
  uuid: string;
  instance_id: string | null;
  submitted_at: Timestamp | null;
  survey_date: string | null;
  property_location: JsonColumn;
  property_description: JsonColumn;
  end_section: JsonColumn;
  meta: JsonColumn;
  system_data: JsonColumn;
  building_image_url: string | null;
  address_image_url: string | null;
  /** 'unrecoverable_url' once a URL was found that cannot be re-signed */
  building_image_error: string | null;
  address_image_error: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface PersonDetailsTable {
  uuid: string;
  parent_ref: string | null;
  repeat_position: number | null;
  /** Storage order, assigned on first insert and never rewritten */
  ingest_seq: number;
  person_type: JsonColumn;
  shop_apt_unit_number: string | null;
  type: string | null;
  business_name: string | null;
  tax_registered: string | null;
  tin: string | null;
  individual_first_name: string | null;
  individual_middle_name: string | null;
  individual_last_name: string | null;
  individual_gender: string | null;
  individual_id_type: string | null;
  individual_nin: string | null;
  individual_drivers_licence: string | null;
  individual_passport_number: string | null;
  passport_country: string | null;
  individual_residence_permit_number: string | null;
  residence_permit_country: string | null;
  individual_dob: string | null;
  mobile_1: string | null;
  mobile_2: string | null;
  email: string | null;
  occupancy: JsonColumn;
  created_at: Timestamp;
  updated_at: Timestamp;
}

// ============================================================================
// Sync Tracking Tables
// ============================================================================

export interface SyncStatusTable {
  sync_type: SyncStream;
  last_sync_timestamp: Timestamp | null;
  last_attempt_timestamp: Timestamp | null;
  last_sync_status: SyncRunStatus;
  last_error_message: string | null;
  successful_sync_count: number;
  failed_sync_count: number;
  last_records_processed: number;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface SyncHistoryTable {
  id: Generated<number>;
  sync_type: SyncStream;
  sync_timestamp: Timestamp;
  status: SyncRunStatus;
  records_processed: number;
  duration_seconds: number | null;
  error_message: string | null;
  sync_metadata: JsonColumn;
  service_instance: string;
}

// ============================================================================
// Unified Table
// ============================================================================

export interface UnifiedTable {
  uuid: string;
  instance_id: string | null;
  submitted_at: Timestamp | null;
  survey_date: string | null;
  review_state: string | null;
  submitter_name: string | null;

  address_plus_code: string | null;
  street: string | null;
  town: string | null;
  district: string | null;
  property_name: string | null;
  building_type: string | null;

  property_location: JsonColumn;
  property_description: JsonColumn;
  end_section: JsonColumn;

  building_image_url: string | null;
  address_image_url: string | null;

  /** Ordered array of projected child documents, `[]` when none */
  person_details: JsonColumn;
  person_count: number;

  building_image_html: string | null;
  address_image_html: string | null;
  source_link_html: string | null;

  total_rent_gmd: number;
  commercial_income: number;
  residential_income: number;
  business_income: number;
  commercial_tax: number;
  residential_tax: number;
  business_tax: number;
  total_tax_liability: number;
  amount_paid: number;
  owner_status: OwnerStatus;

  /** Excluded from rebuild reproducibility */
  processed_at: Timestamp;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  submissions: SubmissionsTable;
  person_details: PersonDetailsTable;
  sync_status: SyncStatusTable;
  sync_history: SyncHistoryTable;
  submissions_unified: UnifiedTable;
}

// ============================================================================
// Helper Types
// ============================================================================

export type SubmissionRow = Selectable<SubmissionsTable>;
export type NewSubmission = Insertable<SubmissionsTable>;
export type SubmissionUpdate = Updateable<SubmissionsTable>;

export type PersonDetailRow = Selectable<PersonDetailsTable>;
export type NewPersonDetail = Insertable<PersonDetailsTable>;

export type SyncStatusRow = Selectable<SyncStatusTable>;
export type SyncHistoryRow = Selectable<SyncHistoryTable>;

export type UnifiedRow = Selectable<UnifiedTable>;
export type NewUnifiedRow = Insertable<UnifiedTable>;
