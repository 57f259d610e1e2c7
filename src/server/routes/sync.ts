/**
 * Sync API Routes
 *
 * Per-stream sync status and on-demand sync cycles. A cycle started over
 * HTTP runs inline; a second request while one is running is refused.
 */

import { Type } from "@sinclair/typebox";

import { ConflictError } from "../plugins/error-handler.js";
import {
  createResponseSchema,
  DocumentSchema,
  NullableNumber,
  NullableString,
  SyncRunStatusSchema,
  SyncStreamSchema,
} from "../schemas/common.js";

import type { ServerDeps } from "../app.js";
import type { SyncStatusRow } from "../../db/types.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const StreamStatusSchema = Type.Object({
  stream: SyncStreamSchema,
  status: SyncRunStatusSchema,
  lastSyncTimestamp: NullableString,
  lastAttemptTimestamp: NullableString,
  lastErrorMessage: NullableString,
  successfulSyncCount: Type.Number(),
  failedSyncCount: Type.Number(),
  lastRecordsProcessed: Type.Number(),
});

const HistoryEntrySchema = Type.Object({
  id: Type.Number(),
  syncType: SyncStreamSchema,
  syncTimestamp: Type.String(),
  status: SyncRunStatusSchema,
  recordsProcessed: Type.Number(),
  durationSeconds: NullableNumber,
  errorMessage: NullableString,
  metadata: DocumentSchema,
  serviceInstance: Type.String(),
});

const SyncStatusResponseSchema = createResponseSchema(
  Type.Object({
    streams: Type.Array(StreamStatusSchema),
    recentHistory: Type.Array(HistoryEntrySchema),
  })
);

const CycleResultSchema = Type.Object({
  submissions: Type.Number(),
  imagesProcessed: Type.Number(),
  urlsRefreshed: Type.Number(),
  personDetails: Type.Number(),
  unifiedRows: NullableNumber,
  errors: Type.Array(
    Type.Object({
      stage: Type.String(),
      message: Type.String(),
    })
  ),
  durationMs: Type.Number(),
});

const SyncRunResponseSchema = createResponseSchema(CycleResultSchema);

// ============================================================================
// Helper Functions
// ============================================================================

function formatStream(row: SyncStatusRow) {
  return {
    stream: row.sync_type,
    status: row.last_sync_status,
    lastSyncTimestamp: row.last_sync_timestamp,
    lastAttemptTimestamp: row.last_attempt_timestamp,
    lastErrorMessage: row.last_error_message,
    successfulSyncCount: row.successful_sync_count,
    failedSyncCount: row.failed_sync_count,
    lastRecordsProcessed: row.last_records_processed,
  };
}

// ============================================================================
// Route Registration
// ============================================================================

export function registerSyncRoutes(app: FastifyInstance, deps: ServerDeps): void {
  let cycleRunning = false;

  // GET /sync/status - Stream status and recent history
  app.get(
    "/sync/status",
    {
      schema: {
        summary: "Get sync status",
        description:
          "Returns the status row of every sync stream and the ten most recent attempts",
        tags: ["Sync"],
        response: {
          200: SyncStatusResponseSchema,
        },
      },
    },
    async () => {
      const stats = await deps.orchestrator.tracker.getStatistics();
      return {
        data: {
          streams: stats.streams.map(formatStream),
          recentHistory: stats.recentHistory,
        },
      };
    }
  );

  // POST /sync/run - Run one full cycle now
  app.post(
    "/sync/run",
    {
      schema: {
        summary: "Run a sync cycle",
        description:
          "Runs fetch, image processing, URL refresh, person details and the unified rebuild once. Stage failures are reported in errors.",
        tags: ["Sync"],
        response: {
          200: SyncRunResponseSchema,
        },
      },
    },
    async () => {
      if (cycleRunning) {
        throw new ConflictError("A sync cycle is already running");
      }

      cycleRunning = true;
      try {
        const result = await deps.orchestrator.runCycle();
        return { data: result };
      } finally {
        cycleRunning = false;
      }
    }
  );
}
