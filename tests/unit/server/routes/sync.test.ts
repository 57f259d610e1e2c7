import { describe, it, expect, afterEach } from "vitest";

import { createDatabase } from "../../../../src/db/connection.js";
import { buildServer } from "../../../../src/server/app.js";
import { createTestApp, seedFeed, type TestApp } from "../../../mocks/app.js";
import { FakeSubmissionSource } from "../../../mocks/odk.js";

import type { CycleResult } from "../../../../src/services/sync/orchestrator.js";
import type { ApiError, ApiResponse } from "../../../../src/types/api.js";
import type { RawRecord } from "../../../../src/types/odk.js";

interface StreamStatus {
  stream: string;
  status: string;
  successfulSyncCount: number;
}

interface SyncStatusBody {
  streams: StreamStatus[];
  recentHistory: { syncType: string; status: string }[];
}

/** Holds submission fetches until released */
class GatedSubmissionSource extends FakeSubmissionSource {
  entered: Promise<void>;
  private markEntered: () => void = () => undefined;
  private gate: Promise<void>;
  release: () => void = () => undefined;

  constructor() {
    super();
    this.entered = new Promise((resolve) => {
      this.markEntered = resolve;
    });
    this.gate = new Promise((resolve) => {
      this.release = resolve;
    });
  }

  override async fetchSubmissions(since: Date | null): Promise<RawRecord[]> {
    this.markEntered();
    await this.gate;
    return super.fetchSubmissions(since);
  }
}

describe("server/routes/sync", () => {
  let ctx: TestApp;

  afterEach(async () => {
    await ctx.app.close();
    await ctx.handle.db.destroy();
  });

  describe("GET /health", () => {
    it("should report a healthy database", async () => {
      ctx = await createTestApp();

      const response = await ctx.app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: "ok", database: true });
    });

    it("should report degraded when the database is unreachable", async () => {
      ctx = await createTestApp();
      const closed = createDatabase("sqlite::memory:");
      await closed.db.destroy();
      const app = await buildServer({ db: closed.db, orchestrator: ctx.orchestrator }, false);

      const response = await app.inject({ method: "GET", url: "/health" });
      await app.close();

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({ status: "degraded", database: false });
    });
  });

  describe("POST /api/v1/sync/run", () => {
    it("should run a cycle and return its result", async () => {
      ctx = await createTestApp();
      seedFeed(ctx.source);

      const response = await ctx.app.inject({ method: "POST", url: "/api/v1/sync/run" });

      expect(response.statusCode).toBe(200);
      expect(response.json<ApiResponse<CycleResult>>().data).toMatchObject({
        submissions: 2,
        imagesProcessed: 2,
        urlsRefreshed: 0,
        personDetails: 1,
        unifiedRows: 2,
        errors: [],
      });
    });

    it("should refuse a second cycle while one is running", async () => {
      const source = new GatedSubmissionSource();
      ctx = await createTestApp({ source });

      const first = ctx.app.inject({ method: "POST", url: "/api/v1/sync/run" });
      await source.entered;

      const second = await ctx.app.inject({ method: "POST", url: "/api/v1/sync/run" });
      source.release();
      const firstResponse = await first;

      expect(second.statusCode).toBe(409);
      expect(second.json<ApiError>()).toMatchObject({
        error: "CONFLICT",
        message: "A sync cycle is already running",
      });
      expect(firstResponse.statusCode).toBe(200);
    });
  });

  describe("GET /api/v1/sync/status", () => {
    it("should list every stream touched by a cycle", async () => {
      ctx = await createTestApp();
      seedFeed(ctx.source);
      await ctx.orchestrator.runCycle();

      const response = await ctx.app.inject({ method: "GET", url: "/api/v1/sync/status" });

      expect(response.statusCode).toBe(200);
      const { data } = response.json<ApiResponse<SyncStatusBody>>();
      expect(data.streams.map((stream) => stream.stream)).toEqual([
        "image_processing",
        "main_submissions",
        "person_details",
        "unified_rebuild",
        "url_refresh",
      ]);
      expect(data.streams.every((stream) => stream.status === "success")).toBe(true);
      expect(data.recentHistory.map((entry) => entry.syncType)).toEqual([
        "unified_rebuild",
        "person_details",
        "url_refresh",
        "image_processing",
        "main_submissions",
      ]);
    });

    it("should return empty lists before any sync", async () => {
      ctx = await createTestApp();

      const response = await ctx.app.inject({ method: "GET", url: "/api/v1/sync/status" });

      expect(response.json<ApiResponse<SyncStatusBody>>().data).toEqual({ streams: [], recentHistory: [] });
    });
  });
});
