import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { AttachmentProcessor, type AttachmentProcessorOptions } from "../../../../src/services/images/attachments.js";
import { createTestDb, submissionRow } from "../../../mocks/db.js";
import { FakeSubmissionSource, submissionRecord } from "../../../mocks/odk.js";
import { InMemoryObjectStorage, testSignedUrl } from "../../../mocks/storage.js";

import type { DatabaseHandle } from "../../../../src/db/connection.js";

const NOW = new Date("2024-03-10T12:00:00.000Z");

const options: AttachmentProcessorOptions = {
  baseFolder: "odk_images",
  ttlSeconds: 3600,
  maxWorkers: 2,
  prioritizeNew: true,
};

describe("services/images/attachments", () => {
  let handle: DatabaseHandle;
  let storage: InMemoryObjectStorage;
  let source: FakeSubmissionSource;

  beforeEach(async () => {
    handle = await createTestDb();
    storage = new InMemoryObjectStorage(() => NOW);
    source = new FakeSubmissionSource();
  });

  afterEach(async () => {
    await handle.db.destroy();
  });

  it("should upload attachments and attach signed URLs", async () => {
    source.attachments.set("uuid:A/front.jpg", new Uint8Array([1, 2]));
    source.attachments.set("uuid:A/plus.png", new Uint8Array([3]));
    const processor = new AttachmentProcessor(handle.db, source, storage, options);

    const result = await processor.process([
      submissionRecord("A", { buildingImageFile: "front.jpg", addressImageFile: "plus.png" }),
    ]);

    const buildingPath = "odk_images/building-images/2024-03/A-front.jpg";
    const addressPath = "odk_images/address-plus-code-images/2024-03/A-plus.png";
    expect(result.records[0]?.buildingImageUrl).toBe(testSignedUrl(buildingPath, NOW, 3600));
    expect(result.records[0]?.addressImageUrl).toBe(testSignedUrl(addressPath, NOW, 3600));
    expect(storage.objects.get(buildingPath)).toEqual({
      body: new Uint8Array([1, 2]),
      contentType: "image/jpeg",
    });
    expect(storage.objects.get(addressPath)?.contentType).toBe("image/png");
    expect(result).toMatchObject({ processed: 1, skipped: 0, failures: 0 });
  });

  it("should upload a placeholder when there is no building photo", async () => {
    const processor = new AttachmentProcessor(handle.db, source, storage, options);

    const result = await processor.process([submissionRecord("B")]);

    expect(result.records[0]?.buildingImageUrl).toBe(
      testSignedUrl("odk_images/placeholders/B.svg", NOW, 3600)
    );
    expect(result.records[0]?.addressImageUrl).toBeUndefined();
    expect(storage.objects.get("odk_images/placeholders/B.svg")?.contentType).toBe("image/svg+xml");
  });

  it("should skip submissions that already have a stored image URL", async () => {
    await handle.db
      .insertInto("submissions")
      .values(submissionRow("C", { building_image_url: "https://stored.test/c.jpg" }))
      .execute();
    const processor = new AttachmentProcessor(handle.db, source, storage, options);

    const result = await processor.process([submissionRecord("C", { buildingImageFile: "c.jpg" })]);

    expect(result).toMatchObject({ processed: 0, skipped: 1, failures: 0 });
    expect(result.records[0]?.buildingImageUrl).toBeUndefined();
    expect(storage.objects.size).toBe(0);
  });

  it("should count failed downloads and keep going", async () => {
    source.attachments.set("uuid:E/plus.png", new Uint8Array([5]));
    const processor = new AttachmentProcessor(handle.db, source, storage, options);

    const result = await processor.process([
      submissionRecord("D", { buildingImageFile: "missing.jpg" }),
      submissionRecord("E", { buildingImageFile: "gone.jpg", addressImageFile: "plus.png" }),
    ]);

    expect(result.failures).toBe(2);
    expect(result.records.map((record) => record.uuid)).toEqual(["D", "E"]);
    expect(result.records[0]?.buildingImageUrl).toBeUndefined();
    expect(result.records[1]?.addressImageUrl).toBe(
      testSignedUrl("odk_images/address-plus-code-images/2024-03/E-plus.png", NOW, 3600)
    );
  });

  it("should process unseen submissions first when prioritizing new ones", async () => {
    await handle.db.insertInto("submissions").values(submissionRow("OLD")).execute();
    const processor = new AttachmentProcessor(handle.db, source, storage, {
      ...options,
      maxWorkers: 1,
    });

    await processor.process([submissionRecord("OLD"), submissionRecord("NEW")]);

    expect([...storage.objects.keys()]).toEqual([
      "odk_images/placeholders/NEW.svg",
      "odk_images/placeholders/OLD.svg",
    ]);
  });

  it("should keep input order when not prioritizing", async () => {
    await handle.db.insertInto("submissions").values(submissionRow("OLD")).execute();
    const processor = new AttachmentProcessor(handle.db, source, storage, {
      ...options,
      maxWorkers: 1,
      prioritizeNew: false,
    });

    await processor.process([submissionRecord("OLD"), submissionRecord("NEW")]);

    expect([...storage.objects.keys()]).toEqual([
      "odk_images/placeholders/OLD.svg",
      "odk_images/placeholders/NEW.svg",
    ]);
  });
});
