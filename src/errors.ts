/**
 * Domain error taxonomy
 *
 * Record-level errors (IdentityError, AggregationError, StorageAccessError)
 * are caught at the record that raised them. Stage-level errors
 * (FetchError, MissingSourceError, ConfigError) are caught by the stage
 * runner in the orchestrator.
 */

// ============================================================================
// Source API
// ============================================================================

export class FetchError extends Error {
  code = "FETCH_ERROR" as const;
  status: number | null;
  url: string;

  constructor(
    message: string,
    details: { url: string; status?: number; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = "FetchError";
    this.url = details.url;
    this.status = details.status ?? null;
  }
}

// ============================================================================
// Records
// ============================================================================

export class IdentityError extends Error {
  code = "IDENTITY_ERROR" as const;
  record: Record<string, unknown>;

  constructor(message: string, record: Record<string, unknown> = {}) {
    super(message);
    this.name = "IdentityError";
    this.record = record;
  }
}

export class AggregationError extends Error {
  code = "AGGREGATION_ERROR" as const;
  childKey: string;
  field: string;

  constructor(message: string, childKey: string, field: string) {
    super(message);
    this.name = "AggregationError";
    this.childKey = childKey;
    this.field = field;
  }
}

// ============================================================================
// Storage
// ============================================================================

export class StorageAccessError extends Error {
  code = "STORAGE_ACCESS_ERROR" as const;
  path: string | null;

  constructor(message: string, path: string | null, cause?: unknown) {
    super(message, { cause });
    this.name = "StorageAccessError";
    this.path = path;
  }
}

// ============================================================================
// Stages
// ============================================================================

export class MissingSourceError extends Error {
  code = "MISSING_SOURCE" as const;
  table: string;

  constructor(table: string) {
    super(`Source table "${table}" does not exist`);
    this.name = "MissingSourceError";
    this.table = table;
  }
}

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
