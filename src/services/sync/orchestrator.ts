/**
 * Sync Orchestrator
 *
 * One cycle runs four stages in order:
 *
 *   1. main submissions (incremental from the stored watermark, with image
 *      re-hosting as its own tracked stream)
 *   2. signed URL refresh
 *   3. person details (full fetch, filtered to this cycle's parents on
 *      incremental runs)
 *   4. unified table rebuild
 *
 * Each stage is isolated: a failure is logged, tracked and collected, and the
 * next stage still runs.
 */

import { requireSection, type AppConfig } from "../../config.js";
import { FetchError } from "../../errors.js";
import { errorMessage, syncLogger } from "../../logger.js";
import {
  normalizePersonDetails,
  normalizeSubmissions,
} from "../../odk/parser.js";
import {
  AttachmentProcessor,
  type AttachmentSource,
} from "../images/attachments.js";
import { UrlLifecycleManager } from "../images/url-lifecycle.js";
import { UnifiedTableBuilder, type RebuildResult } from "../unified/builder.js";
import {
  buildParentIndex,
  resolveChildIdentity,
  type IdentityOptions,
} from "../unified/identity.js";
import { SyncTracker } from "./tracking.js";
import { upsertPersonDetails, upsertSubmissions } from "./upsert.js";

import type { DatabaseDialect } from "../../db/connection.js";
import type { Database } from "../../db/types.js";
import type { ObjectStorage } from "../../storage/object-storage.js";
import type {
  RawRecord,
  ResolvedPersonDetail,
  SubmissionRecord,
} from "../../types/odk.js";
import type { DeriveTotals } from "../unified/derive.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

/** The ODK Central operations a cycle needs; OdkClient in production */
export interface SubmissionSource extends AttachmentSource {
  fetchSubmissions(since: Date | null): Promise<RawRecord[]>;
  fetchPersonDetails(): Promise<RawRecord[]>;
}

export type CycleStage =
  | "main_submissions"
  | "image_processing"
  | "url_refresh"
  | "person_details"
  | "unified_rebuild";

export interface StageFailure {
  stage: CycleStage;
  message: string;
}

export interface CycleResult {
  submissions: number;
  imagesProcessed: number;
  urlsRefreshed: number;
  personDetails: number;
  unifiedRows: number | null;
  errors: StageFailure[];
  durationMs: number;
}

export interface SyncOrchestratorDeps {
  db: Kysely<Database>;
  dialect: DatabaseDialect;
  config: AppConfig;
  source: SubmissionSource | null;
  storage: ObjectStorage | null;
  tracker?: SyncTracker;
  /** Replaces the tax derivation of unified rows */
  derive?: DeriveTotals;
  now?: () => Date;
}

interface MainStageResult {
  parentKeys: Set<string>;
  incremental: boolean;
  persisted: number;
  imagesProcessed: number;
}

const ODK_SECTION = "ODK Central (ODK_BASE_URL, ODK_PROJECT_ID, ODK_FORM_ID)";
const STORAGE_SECTION =
  "Object storage (AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, AWS_BUCKET_NAME, AWS_REGION)";

function timeOf(record: SubmissionRecord): number | null {
  if (record.submittedAt === null) return null;
  const time = Date.parse(record.submittedAt);
  return Number.isNaN(time) ? null : time;
}

function latestTimestamp(records: SubmissionRecord[]): Date | undefined {
  let latest: number | undefined;
  for (const record of records) {
    const time = timeOf(record);
    if (time !== null && (latest === undefined || time > latest)) {
      latest = time;
    }
  }
  return latest === undefined ? undefined : new Date(latest);
}

/**
 * Watermark to resume from after a batch. Everything at or before it was
 * persisted, so a record whose write failed is fetched again next cycle.
 * Undefined keeps the stored watermark.
 */
export function resumeWatermark(
  records: SubmissionRecord[],
  failedKeys: ReadonlySet<string>
): Date | undefined {
  if (failedKeys.size === 0) return latestTimestamp(records);

  let ceiling = Number.POSITIVE_INFINITY;
  for (const record of records) {
    if (!failedKeys.has(record.uuid)) continue;
    const time = timeOf(record);
    // Without a time the failed record cannot be placed after any watermark
    if (time === null) return undefined;
    ceiling = Math.min(ceiling, time);
  }

  return latestTimestamp(
    records.filter((record) => {
      const time = timeOf(record);
      return !failedKeys.has(record.uuid) && time !== null && time < ceiling;
    })
  );
}

// ============================================================================
// Orchestrator
// ============================================================================

export class SyncOrchestrator {
  readonly tracker: SyncTracker;
  readonly builder: UnifiedTableBuilder;
  private readonly db: Kysely<Database>;
  private readonly config: AppConfig;
  private readonly source: SubmissionSource | null;
  private readonly storage: ObjectStorage | null;
  private readonly identity: IdentityOptions;
  private readonly now: () => Date;

  constructor(deps: SyncOrchestratorDeps) {
    this.db = deps.db;
    this.config = deps.config;
    this.source = deps.source;
    this.storage = deps.storage;
    this.now = deps.now ?? (() => new Date());
    this.tracker =
      deps.tracker ?? new SyncTracker(deps.db, undefined, this.now);
    this.identity = {
      strategy: deps.config.sync.linkStrategy,
      separator: deps.config.sync.childKeySeparator,
    };
    this.builder = new UnifiedTableBuilder(deps.db, {
      dialect: deps.dialect,
      identity: this.identity,
      sourceLink:
        deps.config.odk === null
          ? null
          : {
              baseUrl: deps.config.odk.baseUrl,
              projectId: deps.config.odk.projectId,
              formId: deps.config.odk.formId,
            },
      ...(deps.derive !== undefined ? { derive: deps.derive } : {}),
      now: this.now,
    });
  }

  /**
   * Run one full sync cycle. Never throws for a stage failure; failures are
   * returned in `errors`.
   */
  async runCycle(): Promise<CycleResult> {
    const startTime = performance.now();
    const errors: StageFailure[] = [];

    syncLogger.info("Starting sync cycle");

    const main = await this.runStage("main_submissions", errors, () =>
      this.syncMainSubmissions(errors)
    );

    let urlsRefreshed = 0;
    if (this.config.sync.enableUrlRefresh) {
      if (this.storage === null) {
        syncLogger.warn("Object storage not configured, skipping URL refresh");
      } else {
        const refreshed = await this.runStage("url_refresh", errors, () =>
          this.refreshAndPropagate()
        );
        urlsRefreshed = refreshed ?? 0;
      }
    }

    // A failed main stage leaves the parent set unknown: do a full pass
    const parentFilter = main?.incremental === true ? main.parentKeys : null;
    const personDetails = await this.runStage("person_details", errors, () =>
      this.syncPersonDetails(parentFilter)
    );

    const rebuild = await this.runStage("unified_rebuild", errors, () =>
      this.trackRebuild(true)
    );

    const result: CycleResult = {
      submissions: main?.persisted ?? 0,
      imagesProcessed: main?.imagesProcessed ?? 0,
      urlsRefreshed,
      personDetails: personDetails ?? 0,
      unifiedRows: rebuild?.rebuilt === true ? rebuild.rows : null,
      errors,
      durationMs: Math.round(performance.now() - startTime),
    };

    if (errors.length > 0) {
      syncLogger.warn(
        { ...result, errors: errors.map((failure) => failure.stage) },
        "Sync cycle finished with errors"
      );
    } else {
      syncLogger.info(result, "Sync cycle finished");
    }

    return result;
  }

  private async runStage<T>(
    stage: CycleStage,
    errors: StageFailure[],
    task: () => Promise<T>
  ): Promise<T | null> {
    try {
      return await task();
    } catch (error) {
      const message = errorMessage(error);
      syncLogger.error({ stage, error: message }, "Sync stage failed");
      errors.push({ stage, message });
      return null;
    }
  }

  // ==========================================================================
  // Stage 1: Main submissions
  // ==========================================================================

  private async syncMainSubmissions(
    errors: StageFailure[]
  ): Promise<MainStageResult> {
    const source = requireSection(this.source, ODK_SECTION);

    return this.tracker.track("main_submissions", async () => {
      const since = await this.tracker.getLastSyncTime("main_submissions");
      const raws = await this.fetchOrEmpty("main_submissions", () =>
        source.fetchSubmissions(since)
      );

      const { records, rejected } = normalizeSubmissions(raws);

      let withImages = records;
      let imagesProcessed = 0;
      if (records.length > 0) {
        if (this.storage === null) {
          syncLogger.warn(
            "Object storage not configured, skipping image processing"
          );
        } else {
          const storage = this.storage;
          const processed = await this.runStage(
            "image_processing",
            errors,
            () => this.processImages(source, storage, records)
          );
          if (processed !== null) {
            withImages = processed.records;
            imagesProcessed = processed.processed;
          }
        }
      }

      const summary = await upsertSubmissions(this.db, withImages, this.now);
      const watermark = resumeWatermark(records, new Set(summary.failedKeys));

      return {
        result: {
          parentKeys: new Set(records.map((record) => record.uuid)),
          incremental: since !== null,
          persisted: summary.inserted + summary.updated,
          imagesProcessed,
        },
        completion: {
          recordsProcessed: summary.inserted + summary.updated,
          ...(watermark !== undefined ? { watermark } : {}),
          metadata: {
            fetched: raws.length,
            rejected: rejected.length,
            inserted: summary.inserted,
            updated: summary.updated,
            failed: summary.failed,
            since: since?.toISOString() ?? null,
          },
        },
      };
    });
  }

  private async processImages(
    source: AttachmentSource,
    storage: ObjectStorage,
    records: SubmissionRecord[]
  ): Promise<{ records: SubmissionRecord[]; processed: number }> {
    const storageConfig = requireSection(this.config.storage, STORAGE_SECTION);
    const processor = new AttachmentProcessor(this.db, source, storage, {
      baseFolder: storageConfig.baseFolder,
      ttlSeconds: storageConfig.signedUrlTtlSeconds,
      maxWorkers: this.config.sync.maxWorkers,
      prioritizeNew: this.config.sync.prioritizeNew,
    });

    return this.tracker.track("image_processing", async () => {
      const result = await processor.process(records);
      return {
        result: { records: result.records, processed: result.processed },
        completion: {
          recordsProcessed: result.processed,
          metadata: {
            skipped: result.skipped,
            failures: result.failures,
          },
        },
      };
    });
  }

  /**
   * A failed fetch is not a stage failure: it yields no records and the
   * next cycle tries again from the same watermark.
   */
  private async fetchOrEmpty(
    stage: CycleStage,
    fetchRecords: () => Promise<RawRecord[]>
  ): Promise<RawRecord[]> {
    try {
      return await fetchRecords();
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      syncLogger.error(
        { stage, url: error.url, status: error.status, error: error.message },
        "Fetch failed, continuing with no records"
      );
      return [];
    }
  }

  // ==========================================================================
  // Stage 2: URL refresh
  // ==========================================================================

  private async refreshAndPropagate(): Promise<number> {
    const refreshed = await this.refreshExpiredUrls();
    if (refreshed > 0) {
      await this.syncPresentationFields();
    }
    return refreshed;
  }

  /**
   * Re-sign stored image URLs that are expired or about to expire
   *
   * @throws ConfigError when object storage is not configured
   */
  async refreshExpiredUrls(
    maxWorkers = this.config.sync.maxWorkers
  ): Promise<number> {
    const manager = this.urlManager();
    return this.tracker.track("url_refresh", async () => {
      const refreshed = await manager.refreshExpiredUrls(maxWorkers);
      return {
        result: refreshed,
        completion: { recordsProcessed: refreshed, metadata: { maxWorkers } },
      };
    });
  }

  async syncPresentationFields(): Promise<number> {
    return this.builder.syncPresentationFields();
  }

  /**
   * @throws ConfigError when object storage is not configured
   */
  urlManager(): UrlLifecycleManager {
    const storage = requireSection(this.storage, STORAGE_SECTION);
    const storageConfig = requireSection(this.config.storage, STORAGE_SECTION);
    return new UrlLifecycleManager(this.db, storage, {
      thresholdHours: this.config.sync.urlRefreshThresholdHours,
      ttlSeconds: storageConfig.signedUrlTtlSeconds,
      maxWorkers: this.config.sync.maxWorkers,
      now: this.now,
    });
  }

  // ==========================================================================
  // Stage 3: Person details
  // ==========================================================================

  private async syncPersonDetails(
    parentFilter: Set<string> | null
  ): Promise<number> {
    const source = requireSection(this.source, ODK_SECTION);

    return this.tracker.track("person_details", async () => {
      const raws = await this.fetchOrEmpty("person_details", () =>
        source.fetchPersonDetails()
      );

      const parents = buildParentIndex(
        await this.db
          .selectFrom("submissions")
          .select(["uuid", "instance_id"])
          .execute()
      );

      const resolved: ResolvedPersonDetail[] = [];
      let rejected = 0;
      for (const record of normalizePersonDetails(raws)) {
        const identity = resolveChildIdentity(
          {
            key: record.key,
            parentRef: record.parentRef,
            index: record.repeatPosition,
          },
          this.identity,
          parents
        );
        if (identity.status === "rejected") {
          syncLogger.warn(
            {
              stage: "person_details",
              error: identity.error.message,
              record: identity.error.record,
            },
            "Dropping person row without identity"
          );
          rejected++;
          continue;
        }
        resolved.push({
          ...record,
          childKey: identity.childKey,
          parentKey: identity.parentKey,
        });
      }

      const selected =
        parentFilter === null
          ? resolved
          : resolved.filter((record) => parentFilter.has(record.parentKey));

      const summary = await upsertPersonDetails(this.db, selected, this.now);

      return {
        result: summary.inserted + summary.updated,
        completion: {
          recordsProcessed: summary.inserted + summary.updated,
          metadata: {
            fetched: raws.length,
            rejected,
            selected: selected.length,
            incremental: parentFilter !== null,
            failed: summary.failed,
          },
        },
      };
    });
  }

  // ==========================================================================
  // Stage 4: Unified rebuild
  // ==========================================================================

  private async trackRebuild(force: boolean): Promise<RebuildResult> {
    return this.tracker.track("unified_rebuild", async () => {
      const result = await this.builder.rebuild({ force });
      return {
        result,
        completion: {
          recordsProcessed: result.rows,
          metadata: {
            rebuilt: result.rebuilt,
            children: result.children,
            orphanChildren: result.orphanChildren,
            rejectedChildren: result.rejectedChildren,
            warnings: result.warnings,
          },
        },
      };
    });
  }

  /**
   * Rebuild the unified table outside a cycle
   *
   * @returns whether a rebuild happened
   */
  async rebuildUnified(force = false): Promise<boolean> {
    const result = await this.trackRebuild(force);
    return result.rebuilt;
  }
}
