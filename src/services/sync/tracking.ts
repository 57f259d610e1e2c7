/**
 * Sync Tracker - per-stream status and append-only attempt history
 *
 * `sync_status.last_sync_timestamp` is the incremental-fetch watermark of a
 * stream; it only moves on success.
 */

import { hostname } from "node:os";

import { readJsonObject, toJsonText, type JsonObject } from "../../db/json.js";
import { errorMessage, syncLogger } from "../../logger.js";

import type {
  Database,
  SyncHistoryRow,
  SyncRunStatus,
  SyncStatusRow,
  SyncStream,
} from "../../db/types.js";
import type { Kysely } from "kysely";

export const SYNC_STREAMS: readonly SyncStream[] = [
  "main_submissions",
  "person_details",
  "image_processing",
  "url_refresh",
  "unified_rebuild",
];

const MAX_ERROR_LENGTH = 1000;

// ============================================================================
// Types
// ============================================================================

export interface SyncCompletion {
  recordsProcessed: number;
  /** New watermark; omitted to leave the stored one unchanged */
  watermark?: Date;
  metadata?: JsonObject;
}

export interface TrackedRun {
  historyId: number;
  stream: SyncStream;
  startedAt: Date;
}

export interface TrackedOutcome<T> {
  result: T;
  completion: SyncCompletion;
}

export interface SyncHistoryEntry {
  id: number;
  syncType: SyncStream;
  syncTimestamp: string;
  status: SyncRunStatus;
  recordsProcessed: number;
  durationSeconds: number | null;
  errorMessage: string | null;
  metadata: JsonObject | null;
  serviceInstance: string;
}

export interface SyncStatistics {
  streams: SyncStatusRow[];
  recentHistory: SyncHistoryEntry[];
}

function toHistoryEntry(row: SyncHistoryRow): SyncHistoryEntry {
  return {
    id: row.id,
    syncType: row.sync_type,
    syncTimestamp: row.sync_timestamp,
    status: row.status,
    recordsProcessed: row.records_processed,
    durationSeconds: row.duration_seconds,
    errorMessage: row.error_message,
    metadata: readJsonObject(row.sync_metadata),
    serviceInstance: row.service_instance,
  };
}

// ============================================================================
// Tracker
// ============================================================================

export class SyncTracker {
  private readonly now: () => Date;

  constructor(
    private readonly db: Kysely<Database>,
    private readonly serviceInstance = `${hostname()}-${String(process.pid)}`,
    now?: () => Date
  ) {
    this.now = now ?? (() => new Date());
  }

  /**
   * Watermark of a stream, or null when it never succeeded
   */
  async getLastSyncTime(stream: SyncStream): Promise<Date | null> {
    const row = await this.db
      .selectFrom("sync_status")
      .select("last_sync_timestamp")
      .where("sync_type", "=", stream)
      .executeTakeFirst();

    if (!row?.last_sync_timestamp) return null;
    const date = new Date(row.last_sync_timestamp);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  private async ensureStatusRow(
    stream: SyncStream,
    timestamp: string
  ): Promise<void> {
    const existing = await this.db
      .selectFrom("sync_status")
      .select("sync_type")
      .where("sync_type", "=", stream)
      .executeTakeFirst();

    if (!existing) {
      await this.db
        .insertInto("sync_status")
        .values({
          sync_type: stream,
          last_sync_status: "pending",
          successful_sync_count: 0,
          failed_sync_count: 0,
          last_records_processed: 0,
          created_at: timestamp,
          updated_at: timestamp,
        })
        .execute();
    }
  }

  async startSync(stream: SyncStream): Promise<TrackedRun> {
    const startedAt = this.now();
    const timestamp = startedAt.toISOString();

    await this.ensureStatusRow(stream, timestamp);
    await this.db
      .updateTable("sync_status")
      .set({
        last_attempt_timestamp: timestamp,
        last_sync_status: "in_progress",
        updated_at: timestamp,
      })
      .where("sync_type", "=", stream)
      .execute();

    const inserted = await this.db
      .insertInto("sync_history")
      .values({
        sync_type: stream,
        sync_timestamp: timestamp,
        status: "in_progress",
        records_processed: 0,
        service_instance: this.serviceInstance,
      })
      .returning("id")
      .executeTakeFirstOrThrow();

    syncLogger.debug({ stream, historyId: inserted.id }, "Sync started");
    return { historyId: inserted.id, stream, startedAt };
  }

  async completeSync(
    run: TrackedRun,
    completion: SyncCompletion
  ): Promise<void> {
    const finishedAt = this.now();
    const timestamp = finishedAt.toISOString();

    await this.db
      .updateTable("sync_status")
      .set((eb) => ({
        last_sync_status: "success",
        last_error_message: null,
        last_records_processed: completion.recordsProcessed,
        successful_sync_count: eb("successful_sync_count", "+", 1),
        updated_at: timestamp,
        ...(completion.watermark !== undefined
          ? { last_sync_timestamp: completion.watermark.toISOString() }
          : {}),
      }))
      .where("sync_type", "=", run.stream)
      .execute();

    await this.db
      .updateTable("sync_history")
      .set({
        status: "success",
        records_processed: completion.recordsProcessed,
        duration_seconds:
          (finishedAt.getTime() - run.startedAt.getTime()) / 1000,
        sync_metadata: toJsonText(completion.metadata),
      })
      .where("id", "=", run.historyId)
      .execute();

    syncLogger.info(
      { stream: run.stream, records: completion.recordsProcessed },
      "Sync completed"
    );
  }

  async failSync(
    run: TrackedRun,
    message: string,
    metadata?: JsonObject
  ): Promise<void> {
    const finishedAt = this.now();
    const timestamp = finishedAt.toISOString();
    const truncated = message.slice(0, MAX_ERROR_LENGTH);

    await this.db
      .updateTable("sync_status")
      .set((eb) => ({
        last_sync_status: "error",
        last_error_message: truncated,
        failed_sync_count: eb("failed_sync_count", "+", 1),
        updated_at: timestamp,
      }))
      .where("sync_type", "=", run.stream)
      .execute();

    await this.db
      .updateTable("sync_history")
      .set({
        status: "error",
        error_message: truncated,
        duration_seconds:
          (finishedAt.getTime() - run.startedAt.getTime()) / 1000,
        sync_metadata: toJsonText(metadata),
      })
      .where("id", "=", run.historyId)
      .execute();

    syncLogger.error({ stream: run.stream, error: truncated }, "Sync failed");
  }

  /**
   * Run `task` as one tracked attempt of `stream`. Failures are recorded and
   * rethrown.
   */
  async track<T>(
    stream: SyncStream,
    task: () => Promise<TrackedOutcome<T>>
  ): Promise<T> {
    const run = await this.startSync(stream);
    try {
      const { result, completion } = await task();
      await this.completeSync(run, completion);
      return result;
    } catch (error) {
      await this.failSync(run, errorMessage(error));
      throw error;
    }
  }

  async getStatistics(historyLimit = 10): Promise<SyncStatistics> {
    const streams = await this.db
      .selectFrom("sync_status")
      .selectAll()
      .orderBy("sync_type")
      .execute();

    const history = await this.db
      .selectFrom("sync_history")
      .selectAll()
      .orderBy("id", "desc")
      .limit(historyLimit)
      .execute();

    return { streams, recentHistory: history.map(toHistoryEntry) };
  }

  /**
   * Delete history rows older than `daysToKeep` days
   */
  async cleanupOldHistory(daysToKeep = 30): Promise<number> {
    const cutoff = new Date(this.now().getTime() - daysToKeep * 86_400_000);

    const result = await this.db
      .deleteFrom("sync_history")
      .where("sync_timestamp", "<", cutoff.toISOString())
      .executeTakeFirst();

    const deleted = Number(result.numDeletedRows);
    syncLogger.info({ deleted, daysToKeep }, "Cleaned up sync history");
    return deleted;
  }
}
