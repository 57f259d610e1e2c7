import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { createDatabase, tableExists, type DatabaseHandle } from "../../../../src/db/connection.js";
import { MissingSourceError } from "../../../../src/errors.js";
import { STAGING_TABLE, UnifiedTableBuilder } from "../../../../src/services/unified/builder.js";
import { imageMarkup } from "../../../../src/services/unified/presentation.js";
import { createTestDb, personRow, submissionRow } from "../../../mocks/db.js";

import type { DeriveTotals } from "../../../../src/services/unified/derive.js";

const sourceLink = { baseUrl: "https://odk.test", projectId: "7", formId: "survey" };

function clockAt(iso: string): () => Date {
  return () => new Date(iso);
}

describe("services/unified/builder", () => {
  let handle: DatabaseHandle;

  beforeEach(async () => {
    handle = await createTestDb();

    await handle.db
      .insertInto("submissions")
      .values([
        submissionRow("P1", {
          instance_id: "uuid:P1",
          property_location: '{"town":"Banjul","street":"Kairaba Avenue"}',
          end_section: '{"amount_paid":"100"}',
          system_data: '{"reviewState":"approved","submitterName":"Collector One"}',
          building_image_url: "https://img.test/p1.jpg",
        }),
        submissionRow("P2"),
      ])
      .execute();

    await handle.db
      .insertInto("person_details")
      .values([
        personRow("P1_0", 1, {
          parent_ref: "uuid:P1",
          repeat_position: 0,
          business_name: "Corner Shop",
          occupancy: '{"rent_annual_amount":"1000","rent_currency_unit":"dalasi"}',
        }),
        personRow("P1_1", 2, {
          occupancy: '{"rent_annual_amount":"500","currency_unit":"usd"}',
        }),
        personRow("ORPHAN_0", 3),
        personRow("", 4),
      ])
      .execute();
  });

  afterEach(async () => {
    await handle.db.destroy();
  });

  function builder(overrides: { derive?: DeriveTotals; now?: () => Date } = {}): UnifiedTableBuilder {
    return new UnifiedTableBuilder(handle.db, {
      dialect: handle.dialect,
      sourceLink,
      now: clockAt("2024-03-10T12:00:00.000Z"),
      ...overrides,
    });
  }

  it("should build one row per submission with nested children and totals", async () => {
    const result = await builder().rebuild();

    expect(result).toEqual({
      rebuilt: true,
      rows: 2,
      children: 3,
      orphanChildren: 1,
      rejectedChildren: 1,
      warnings: [],
    });

    const row = await builder().findRow("P1");
    expect(row).toMatchObject({
      uuid: "P1",
      instance_id: "uuid:P1",
      review_state: "approved",
      submitter_name: "Collector One",
      town: "Banjul",
      street: "Kairaba Avenue",
      property_location: { town: "Banjul", street: "Kairaba Avenue" },
      end_section: { amount_paid: "100" },
      person_count: 2,
      building_image_html: imageMarkup("https://img.test/p1.jpg", "Building image"),
      address_image_html: null,
      source_link_html:
        '<a href="https://odk.test/#/projects/7/forms/survey/submissions/uuid%3AP1" target="_blank" rel="noopener noreferrer">View in ODK</a>',
      total_rent_gmd: 36715,
      residential_tax: 2937.2,
      total_tax_liability: 2937.2,
      amount_paid: 100,
      owner_status: "No Owner",
      processed_at: "2024-03-10T12:00:00.000Z",
    });
    expect(row?.person_details).toHaveLength(2);
    expect(row?.person_details[0]).toMatchObject({
      uuid: "P1_0",
      business_name: "Corner Shop",
      person_type: {},
      occupancy: { rent_annual_amount: "1000", rent_currency_unit: "dalasi" },
    });
    expect(row?.person_details[1]).toMatchObject({ uuid: "P1_1" });
  });

  it("should nest children whose reference is the parent's ODK instance id", async () => {
    await handle.db
      .insertInto("submissions")
      .values(submissionRow("abc", { instance_id: "uuid:abc" }))
      .execute();
    await handle.db
      .insertInto("person_details")
      .values(
        personRow("abc_0", 5, {
          parent_ref: "uuid:abc",
          occupancy: '{"rent_annual_amount":"1000"}',
        })
      )
      .execute();

    const result = await builder().rebuild();

    expect(result.orphanChildren).toBe(1);
    const row = await builder().findRow("abc");
    expect(row?.person_count).toBe(1);
    expect(row?.total_rent_gmd).toBe(1000);
  });

  it("should give a submission without children an empty list", async () => {
    await builder().rebuild();

    const row = await builder().findRow("P2");
    expect(row?.person_details).toEqual([]);
    expect(row?.person_count).toBe(0);
    expect(row?.total_rent_gmd).toBe(0);
    expect(row?.end_section).toBeNull();
  });

  it("should build without children when the person table is missing", async () => {
    await handle.db.schema.dropTable("person_details").execute();

    const result = await builder().rebuild();

    expect(result.children).toBe(0);
    expect((await builder().findRow("P1"))?.person_details).toEqual([]);
  });

  it("should fail when the submissions table is missing", async () => {
    const empty = createDatabase("sqlite::memory:");
    try {
      const bare = new UnifiedTableBuilder(empty.db, { dialect: empty.dialect });
      await expect(bare.rebuild()).rejects.toBeInstanceOf(MissingSourceError);
    } finally {
      await empty.db.destroy();
    }
  });

  it("should leave an existing table alone unless forced", async () => {
    await builder().rebuild();
    await handle.db.insertInto("submissions").values(submissionRow("P3")).execute();

    const skipped = await builder().rebuild();
    expect(skipped.rebuilt).toBe(false);
    expect(await builder().findRow("P3")).toBeNull();

    const forced = await builder().rebuild({ force: true });
    expect(forced.rows).toBe(3);
    expect((await builder().findRow("P3"))?.uuid).toBe("P3");
  });

  it("should keep the previous table when a rebuild fails", async () => {
    await builder().rebuild();
    await handle.db.insertInto("submissions").values(submissionRow("P3")).execute();

    const failing: DeriveTotals = () => {
      throw new Error("derivation exploded");
    };
    await expect(builder({ derive: failing }).rebuild({ force: true })).rejects.toThrow(
      "derivation exploded"
    );

    expect((await builder().findRow("P1"))?.person_count).toBe(2);
    expect(await builder().findRow("P3")).toBeNull();
    expect(await tableExists(handle.db, STAGING_TABLE)).toBe(false);
  });

  it("should produce identical rows apart from processed_at", async () => {
    await builder({ now: clockAt("2024-03-10T12:00:00.000Z") }).rebuild();
    const first = await handle.db.selectFrom("submissions_unified").selectAll().orderBy("uuid").execute();

    await builder({ now: clockAt("2024-03-11T08:00:00.000Z") }).rebuild({ force: true });
    const second = await handle.db.selectFrom("submissions_unified").selectAll().orderBy("uuid").execute();

    const withoutTimestamp = (rows: typeof first) =>
      rows.map(({ processed_at: _processedAt, ...rest }) => rest);
    expect(withoutTimestamp(second)).toEqual(withoutTimestamp(first));
    expect(second[0]?.processed_at).toBe("2024-03-11T08:00:00.000Z");
  });

  describe("syncPresentationFields", () => {
    it("should copy changed image URLs and regenerate markup", async () => {
      await builder().rebuild();
      await handle.db
        .updateTable("submissions")
        .set({ address_image_url: "https://img.test/p2-plus.png" })
        .where("uuid", "=", "P2")
        .execute();

      expect(await builder().syncPresentationFields()).toBe(1);

      const row = await builder().findRow("P2");
      expect(row?.address_image_url).toBe("https://img.test/p2-plus.png");
      expect(row?.address_image_html).toBe(
        imageMarkup("https://img.test/p2-plus.png", "Address plus code image")
      );
      expect(await builder().syncPresentationFields()).toBe(0);
    });

    it("should do nothing before the first build", async () => {
      expect(await builder().syncPresentationFields()).toBe(0);
    });
  });

  it("should return null from findRow for unknown keys", async () => {
    expect(await builder().findRow("P1")).toBeNull();
    await builder().rebuild();
    expect(await builder().findRow("NOPE")).toBeNull();
  });
});
