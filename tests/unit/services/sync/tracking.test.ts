import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { SyncTracker } from "../../../../src/services/sync/tracking.js";
import { createTestDb } from "../../../mocks/db.js";

import type { DatabaseHandle } from "../../../../src/db/connection.js";

describe("services/sync/tracking", () => {
  let handle: DatabaseHandle;
  let current: Date;
  let tracker: SyncTracker;

  beforeEach(async () => {
    handle = await createTestDb();
    current = new Date("2024-03-10T12:00:00.000Z");
    tracker = new SyncTracker(handle.db, "test-host-1", () => current);
  });

  afterEach(async () => {
    await handle.db.destroy();
  });

  function advance(seconds: number): void {
    current = new Date(current.getTime() + seconds * 1000);
  }

  async function statusOf(stream: "main_submissions" | "url_refresh") {
    return handle.db
      .selectFrom("sync_status")
      .selectAll()
      .where("sync_type", "=", stream)
      .executeTakeFirstOrThrow();
  }

  it("should report no watermark for a stream that never ran", async () => {
    await expect(tracker.getLastSyncTime("main_submissions")).resolves.toBeNull();
  });

  it("should mark a started run in progress", async () => {
    const run = await tracker.startSync("main_submissions");

    const status = await statusOf("main_submissions");
    expect(status.last_sync_status).toBe("in_progress");
    expect(status.last_attempt_timestamp).toBe("2024-03-10T12:00:00.000Z");

    const history = await handle.db
      .selectFrom("sync_history")
      .selectAll()
      .where("id", "=", run.historyId)
      .executeTakeFirstOrThrow();
    expect(history).toMatchObject({
      sync_type: "main_submissions",
      status: "in_progress",
      service_instance: "test-host-1",
    });
  });

  it("should record success with duration, count and watermark", async () => {
    const run = await tracker.startSync("main_submissions");
    advance(4.5);
    await tracker.completeSync(run, {
      recordsProcessed: 12,
      watermark: new Date("2024-03-10T11:59:00.000Z"),
      metadata: { incremental: true },
    });

    const status = await statusOf("main_submissions");
    expect(status).toMatchObject({
      last_sync_status: "success",
      last_sync_timestamp: "2024-03-10T11:59:00.000Z",
      last_records_processed: 12,
      successful_sync_count: 1,
      failed_sync_count: 0,
    });
    expect((await tracker.getLastSyncTime("main_submissions"))?.toISOString()).toBe(
      "2024-03-10T11:59:00.000Z"
    );

    const { recentHistory } = await tracker.getStatistics();
    expect(recentHistory[0]).toMatchObject({
      status: "success",
      recordsProcessed: 12,
      durationSeconds: 4.5,
      metadata: { incremental: true },
    });
  });

  it("should keep the watermark when a completion carries none", async () => {
    const first = await tracker.startSync("main_submissions");
    await tracker.completeSync(first, { recordsProcessed: 1, watermark: new Date("2024-03-01T00:00:00.000Z") });
    const second = await tracker.startSync("main_submissions");
    await tracker.completeSync(second, { recordsProcessed: 0 });

    const status = await statusOf("main_submissions");
    expect(status.last_sync_timestamp).toBe("2024-03-01T00:00:00.000Z");
    expect(status.successful_sync_count).toBe(2);
  });

  it("should record failures without moving the watermark and truncate long messages", async () => {
    const ok = await tracker.startSync("main_submissions");
    await tracker.completeSync(ok, { recordsProcessed: 1, watermark: new Date("2024-03-01T00:00:00.000Z") });

    const run = await tracker.startSync("main_submissions");
    await tracker.failSync(run, "x".repeat(1500));

    const status = await statusOf("main_submissions");
    expect(status.last_sync_status).toBe("error");
    expect(status.last_error_message).toHaveLength(1000);
    expect(status.failed_sync_count).toBe(1);
    expect(status.last_sync_timestamp).toBe("2024-03-01T00:00:00.000Z");
  });

  describe("track", () => {
    it("should return the task result and record success", async () => {
      const result = await tracker.track("url_refresh", async () => ({
        result: "done",
        completion: { recordsProcessed: 3 },
      }));

      expect(result).toBe("done");
      expect((await statusOf("url_refresh")).last_records_processed).toBe(3);
    });

    it("should record the failure and rethrow", async () => {
      await expect(
        tracker.track("url_refresh", async () => {
          throw new Error("bucket unreachable");
        })
      ).rejects.toThrow("bucket unreachable");

      const status = await statusOf("url_refresh");
      expect(status.last_sync_status).toBe("error");
      expect(status.last_error_message).toBe("bucket unreachable");
    });
  });

  it("should list recent history newest first", async () => {
    for (const stream of ["main_submissions", "person_details", "unified_rebuild"] as const) {
      const run = await tracker.startSync(stream);
      await tracker.completeSync(run, { recordsProcessed: 0 });
    }

    const statistics = await tracker.getStatistics(2);

    expect(statistics.recentHistory.map((entry) => entry.syncType)).toEqual([
      "unified_rebuild",
      "person_details",
    ]);
    expect(statistics.streams.map((row) => row.sync_type)).toEqual([
      "main_submissions",
      "person_details",
      "unified_rebuild",
    ]);
  });

  it("should delete history older than the retention window", async () => {
    const old = await tracker.startSync("main_submissions");
    await tracker.completeSync(old, { recordsProcessed: 0 });
    advance(31 * 86_400);
    const recent = await tracker.startSync("main_submissions");
    await tracker.completeSync(recent, { recordsProcessed: 0 });

    const deleted = await tracker.cleanupOldHistory(30);

    expect(deleted).toBe(1);
    const remaining = await handle.db.selectFrom("sync_history").select("id").execute();
    expect(remaining).toEqual([{ id: recent.historyId }]);
  });
});
