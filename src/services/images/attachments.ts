/**
 * Re-hosts submission photos in object storage behind signed URLs
 */

import { errorMessage, storageLogger } from "../../logger.js";
import { renderPlaceholderSvg } from "../../storage/placeholder.js";
import {
  contentTypeFor,
  imageObjectPath,
  placeholderPath,
  type ImageRole,
} from "../../storage/paths.js";
import { mapWithConcurrency } from "../../utils/concurrency.js";

import type { Database } from "../../db/types.js";
import type { ObjectStorage } from "../../storage/object-storage.js";
import type { SubmissionRecord } from "../../types/odk.js";
import type { Kysely } from "kysely";

/** Where attachment bytes come from; OdkClient in production */
export interface AttachmentSource {
  downloadAttachment(instanceId: string, filename: string): Promise<Uint8Array>;
}

export interface AttachmentProcessorOptions {
  baseFolder: string;
  ttlSeconds: number;
  maxWorkers: number;
  prioritizeNew: boolean;
}

export interface ImageProcessingResult {
  /** Input records, in input order, with signed URLs attached where produced */
  records: SubmissionRecord[];
  processed: number;
  skipped: number;
  failures: number;
}

interface ImageOutcome {
  buildingImageUrl?: string;
  addressImageUrl?: string;
  failures: number;
}

// Keeps `IN (...)` lists well under driver parameter limits
const LOOKUP_CHUNK_SIZE = 500;

export class AttachmentProcessor {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly source: AttachmentSource,
    private readonly storage: ObjectStorage,
    private readonly options: AttachmentProcessorOptions
  ) {}

  /**
   * Upload and sign images for submissions that have none stored yet.
   * Submissions not yet in the database go first when `prioritizeNew` is on.
   */
  async process(
    records: SubmissionRecord[],
    maxWorkers = this.options.maxWorkers
  ): Promise<ImageProcessingResult> {
    if (records.length === 0) {
      return { records, processed: 0, skipped: 0, failures: 0 };
    }

    const stored = await this.loadStoredUrls(
      records.map((record) => record.uuid)
    );

    const pending = records.filter((record) => {
      const url = stored.get(record.uuid);
      return url === undefined || url === null;
    });
    const skipped = records.length - pending.length;

    const queue = this.options.prioritizeNew
      ? [
          ...pending.filter((record) => !stored.has(record.uuid)),
          ...pending.filter((record) => stored.has(record.uuid)),
        ]
      : pending;

    storageLogger.info(
      { total: records.length, pending: queue.length, skipped, maxWorkers },
      "Processing submission images"
    );

    const outcomes = await mapWithConcurrency(queue, maxWorkers, (record) =>
      this.processRecord(record)
    );

    // Completion order is arbitrary; apply results back by key
    const byKey = new Map<string, ImageOutcome>();
    for (const [index, record] of queue.entries()) {
      const outcome = outcomes[index];
      if (outcome !== undefined) byKey.set(record.uuid, outcome);
    }

    let failures = 0;
    const merged = records.map((record) => {
      const outcome = byKey.get(record.uuid);
      if (outcome === undefined) return record;
      failures += outcome.failures;
      return {
        ...record,
        ...(outcome.buildingImageUrl !== undefined
          ? { buildingImageUrl: outcome.buildingImageUrl }
          : {}),
        ...(outcome.addressImageUrl !== undefined
          ? { addressImageUrl: outcome.addressImageUrl }
          : {}),
      };
    });

    return { records: merged, processed: queue.length, skipped, failures };
  }

  private async loadStoredUrls(
    keys: string[]
  ): Promise<Map<string, string | null>> {
    const stored = new Map<string, string | null>();

    for (let start = 0; start < keys.length; start += LOOKUP_CHUNK_SIZE) {
      const rows = await this.db
        .selectFrom("submissions")
        .select(["uuid", "building_image_url"])
        .where("uuid", "in", keys.slice(start, start + LOOKUP_CHUNK_SIZE))
        .execute();
      for (const row of rows) stored.set(row.uuid, row.building_image_url);
    }

    return stored;
  }

  private async processRecord(record: SubmissionRecord): Promise<ImageOutcome> {
    const outcome: ImageOutcome = { failures: 0 };

    try {
      outcome.buildingImageUrl =
        record.buildingImageFile !== null
          ? await this.rehost(record, "building", record.buildingImageFile)
          : await this.uploadPlaceholder(record);
    } catch (error) {
      outcome.failures++;
      storageLogger.error(
        { uuid: record.uuid, role: "building", error: errorMessage(error) },
        "Image processing failed"
      );
    }

    if (record.addressImageFile !== null) {
      try {
        outcome.addressImageUrl = await this.rehost(
          record,
          "address",
          record.addressImageFile
        );
      } catch (error) {
        outcome.failures++;
        storageLogger.error(
          { uuid: record.uuid, role: "address", error: errorMessage(error) },
          "Image processing failed"
        );
      }
    }

    return outcome;
  }

  private async rehost(
    record: SubmissionRecord,
    role: ImageRole,
    filename: string
  ): Promise<string> {
    const bytes = await this.source.downloadAttachment(
      record.instanceId ?? record.uuid,
      filename
    );
    const path = imageObjectPath(
      this.options.baseFolder,
      role,
      record.uuid,
      filename,
      record.submittedAt
    );

    await this.storage.put(bytes, path, contentTypeFor(filename));
    return this.storage.sign(path, this.options.ttlSeconds);
  }

  private async uploadPlaceholder(record: SubmissionRecord): Promise<string> {
    const path = placeholderPath(this.options.baseFolder, record.uuid);
    const body = renderPlaceholderSvg(record.uuid);
    await this.storage.put(body, path, "image/svg+xml");
    return this.storage.sign(path, this.options.ttlSeconds);
  }
}
