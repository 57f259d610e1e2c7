/**
 * Unified Table Builder
 *
 * Materializes `submissions_unified`: one row per submission with its person
 * rows nested as an ordered JSON array (`[]` when there are none), image
 * markup and derived tax figures. The table is rebuilt wholesale into a
 * staging table and swapped in with renames inside one transaction, so
 * readers see either the previous table or the complete new one.
 *
 * Rebuilds are not locked against each other; the sync loop is the single
 * writer.
 */

import { randomUUID } from "node:crypto";

import {
  readJsonArray,
  readJsonObject,
  readText,
  toJsonText,
  type JsonObject,
} from "../../db/json.js";
import { tableExists, type DatabaseDialect } from "../../db/connection.js";
import { createUnifiedTable } from "../../db/schema.js";
import {
  TABLES,
  type Database,
  type NewUnifiedRow,
  type SubmissionRow,
  type UnifiedRow,
  type UnifiedTable,
} from "../../db/types.js";
import { MissingSourceError } from "../../errors.js";
import { errorMessage, syncLogger } from "../../logger.js";
import {
  aggregateChildren,
  type AggregationInput,
  type PersonDetailDocument,
} from "./aggregate.js";
import { deriveTotals, type DeriveTotals } from "./derive.js";
import {
  buildParentIndex,
  DEFAULT_IDENTITY_OPTIONS,
  resolveChildIdentity,
  type IdentityOptions,
  type ParentIndex,
} from "./identity.js";
import {
  presentationFor,
  sourceLinkMarkup,
  type SourceLinkTarget,
} from "./presentation.js";

import type { Kysely } from "kysely";

export const STAGING_TABLE = "submissions_unified_staging" as const;
export const PREVIOUS_TABLE = "submissions_unified_previous" as const;

type StagingTables = { [STAGING_TABLE]: UnifiedTable };

const INSERT_BATCH_SIZE = 200;

// ============================================================================
// Types
// ============================================================================

export interface UnifiedBuilderOptions {
  dialect: DatabaseDialect;
  identity?: IdentityOptions;
  sourceLink?: SourceLinkTarget | null;
  derive?: DeriveTotals;
  now?: () => Date;
}

export interface RebuildResult {
  rebuilt: boolean;
  rows: number;
  children: number;
  /** Children whose resolved parent key matched no submission */
  orphanChildren: number;
  /** Children dropped for lack of identity */
  rejectedChildren: number;
  warnings: string[];
}

type UnifiedDocumentColumn =
  | "person_details"
  | "property_location"
  | "property_description"
  | "end_section";

/** A unified row with its JSON columns decoded */
export type UnifiedRowView = Omit<UnifiedRow, UnifiedDocumentColumn> & {
  person_details: unknown[];
  property_location: JsonObject | null;
  property_description: JsonObject | null;
  end_section: JsonObject | null;
};

interface ChildGroups {
  groups: Map<string, PersonDetailDocument[]>;
  total: number;
  rejected: number;
  warnings: string[];
}

// ============================================================================
// Builder
// ============================================================================

export class UnifiedTableBuilder {
  private readonly identity: IdentityOptions;
  private readonly derive: DeriveTotals;
  private readonly now: () => Date;

  constructor(
    private readonly db: Kysely<Database>,
    private readonly options: UnifiedBuilderOptions
  ) {
    this.identity = options.identity ?? DEFAULT_IDENTITY_OPTIONS;
    this.derive = options.derive ?? deriveTotals;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Rebuild the unified table.
   *
   * Without `force` an existing table is left as it is. Any failure before
   * the swap leaves the previous table untouched.
   *
   * @throws MissingSourceError when the submissions table does not exist
   */
  async rebuild(options: { force?: boolean } = {}): Promise<RebuildResult> {
    if (!(await tableExists(this.db, TABLES.submissions))) {
      throw new MissingSourceError(TABLES.submissions);
    }

    const exists = await tableExists(this.db, TABLES.unified);
    if (options.force !== true && exists) {
      syncLogger.info("Unified table exists, skipping rebuild (not forced)");
      return {
        rebuilt: false,
        rows: 0,
        children: 0,
        orphanChildren: 0,
        rejectedChildren: 0,
        warnings: [],
      };
    }

    const startTime = performance.now();

    const parents = await this.db
      .selectFrom("submissions")
      .selectAll()
      .orderBy("uuid")
      .execute();
    const children = await this.loadChildGroups(buildParentIndex(parents));

    const rows = this.buildRows(parents, children.groups);

    const parentKeys = new Set(parents.map((parent) => parent.uuid));
    let orphanChildren = 0;
    for (const [parentKey, group] of children.groups) {
      if (!parentKeys.has(parentKey)) orphanChildren += group.length;
    }

    const warnings = [...children.warnings, ...(await this.publish(rows))];

    syncLogger.info(
      {
        rows: rows.length,
        children: children.total,
        orphanChildren,
        rejectedChildren: children.rejected,
        durationMs: Math.round(performance.now() - startTime),
      },
      "Unified table rebuilt"
    );

    return {
      rebuilt: true,
      rows: rows.length,
      children: children.total,
      orphanChildren,
      rejectedChildren: children.rejected,
      warnings,
    };
  }

  private async loadChildGroups(parents: ParentIndex): Promise<ChildGroups> {
    if (!(await tableExists(this.db, TABLES.personDetails))) {
      syncLogger.warn(
        "Person details table missing, building without children"
      );
      return { groups: new Map(), total: 0, rejected: 0, warnings: [] };
    }

    // Storage order is the nested list order
    const rows = await this.db
      .selectFrom("person_details")
      .selectAll()
      .orderBy("ingest_seq")
      .orderBy("uuid")
      .execute();

    const inputs: AggregationInput[] = [];
    let rejected = 0;

    for (const row of rows) {
      const identity = resolveChildIdentity(
        {
          key: row.uuid,
          parentRef: row.parent_ref,
          index: row.repeat_position,
        },
        this.identity,
        parents
      );
      if (identity.status === "rejected") {
        syncLogger.warn(
          { error: identity.error.message },
          "Skipping child without identity"
        );
        rejected++;
        continue;
      }
      inputs.push({
        childKey: identity.childKey,
        parentKey: identity.parentKey,
        personType: row.person_type,
        occupancy: row.occupancy,
        fields: row,
      });
    }

    const { groups, warnings } = aggregateChildren(inputs);
    return {
      groups,
      total: inputs.length,
      rejected,
      warnings: warnings.map((warning) => warning.message),
    };
  }

  private buildRows(
    parents: SubmissionRow[],
    groups: Map<string, PersonDetailDocument[]>
  ): NewUnifiedRow[] {
    const processedAt = this.now().toISOString();

    return parents.map((parent) => {
      const persons = groups.get(parent.uuid) ?? [];
      const location = readJsonObject(parent.property_location);
      const description = readJsonObject(parent.property_description);
      const endSection = readJsonObject(parent.end_section);
      const system = readJsonObject(parent.system_data);

      return {
        uuid: parent.uuid,
        instance_id: parent.instance_id,
        submitted_at: parent.submitted_at,
        survey_date: parent.survey_date,
        review_state: readText(system?.reviewState),
        submitter_name: readText(system?.submitterName),

        address_plus_code: readText(location?.address_plus_code),
        street: readText(location?.street),
        town: readText(location?.town),
        district: readText(location?.district),
        property_name: readText(description?.property_name),
        building_type: readText(description?.building_type),

        property_location: toJsonText(location),
        property_description: toJsonText(description),
        end_section: toJsonText(endSection),

        building_image_url: parent.building_image_url,
        address_image_url: parent.address_image_url,

        person_details: JSON.stringify(persons),
        person_count: persons.length,

        ...presentationFor(parent),
        source_link_html: sourceLinkMarkup(
          this.options.sourceLink ?? null,
          parent.instance_id ?? parent.uuid
        ),

        ...this.derive(persons, endSection),

        processed_at: processedAt,
      };
    });
  }

  /**
   * Stage, index and swap. Returns non-fatal warnings.
   */
  private async publish(rows: NewUnifiedRow[]): Promise<string[]> {
    const warnings: string[] = [];
    const buildId = randomUUID().replaceAll("-", "").slice(0, 12);

    await this.db.schema.dropTable(STAGING_TABLE).ifExists().execute();

    try {
      await createUnifiedTable(
        this.db,
        this.options.dialect,
        STAGING_TABLE,
        buildId
      );

      const staging = this.db.withTables<StagingTables>();
      for (let start = 0; start < rows.length; start += INSERT_BATCH_SIZE) {
        await staging
          .insertInto(STAGING_TABLE)
          .values(rows.slice(start, start + INSERT_BATCH_SIZE))
          .execute();
      }
    } catch (error) {
      await this.dropStaging();
      throw error;
    }

    try {
      await this.db.schema
        .createIndex(`unified_submitted_at_${buildId}`)
        .on(STAGING_TABLE)
        .column("submitted_at")
        .execute();
    } catch (error) {
      const message = `Index creation failed: ${errorMessage(error)}`;
      syncLogger.warn(
        { error: errorMessage(error) },
        "Unified index creation failed"
      );
      warnings.push(message);
    }

    try {
      await this.db.transaction().execute(async (trx) => {
        await trx.schema.dropTable(PREVIOUS_TABLE).ifExists().execute();
        if (await tableExists(trx, TABLES.unified)) {
          await trx.schema
            .alterTable(TABLES.unified)
            .renameTo(PREVIOUS_TABLE)
            .execute();
        }
        await trx.schema
          .alterTable(STAGING_TABLE)
          .renameTo(TABLES.unified)
          .execute();
        await trx.schema.dropTable(PREVIOUS_TABLE).ifExists().execute();
      });
    } catch (error) {
      await this.dropStaging();
      throw error;
    }

    return warnings;
  }

  private async dropStaging(): Promise<void> {
    try {
      await this.db.schema.dropTable(STAGING_TABLE).ifExists().execute();
    } catch (error) {
      syncLogger.warn(
        { error: errorMessage(error) },
        "Could not drop unified staging table"
      );
    }
  }

  // ==========================================================================
  // After URL refresh
  // ==========================================================================

  /**
   * Copy current submission image URLs into the unified table and regenerate
   * their markup, without a full rebuild.
   *
   * @returns number of unified rows changed
   */
  async syncPresentationFields(): Promise<number> {
    if (!(await tableExists(this.db, TABLES.unified))) {
      syncLogger.warn("Unified table missing, nothing to sync");
      return 0;
    }

    const sources = await this.db
      .selectFrom("submissions")
      .select(["uuid", "building_image_url", "address_image_url"])
      .execute();
    const current = await this.db
      .selectFrom("submissions_unified")
      .select(["uuid", "building_image_url", "address_image_url"])
      .execute();
    const currentByKey = new Map(current.map((row) => [row.uuid, row]));

    let updated = 0;
    for (const source of sources) {
      const row = currentByKey.get(source.uuid);
      if (
        row === undefined ||
        (row.building_image_url === source.building_image_url &&
          row.address_image_url === source.address_image_url)
      ) {
        continue;
      }

      await this.db
        .updateTable("submissions_unified")
        .set({
          building_image_url: source.building_image_url,
          address_image_url: source.address_image_url,
          ...presentationFor(source),
        })
        .where("uuid", "=", source.uuid)
        .execute();
      updated++;
    }

    syncLogger.info({ updated }, "Unified presentation fields synced");
    return updated;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  async findRow(uuid: string): Promise<UnifiedRowView | null> {
    if (!(await tableExists(this.db, TABLES.unified))) return null;

    const row = await this.db
      .selectFrom("submissions_unified")
      .selectAll()
      .where("uuid", "=", uuid)
      .executeTakeFirst();

    if (row === undefined) return null;
    return {
      ...row,
      person_details: readJsonArray(row.person_details),
      property_location: readJsonObject(row.property_location),
      property_description: readJsonObject(row.property_description),
      end_section: readJsonObject(row.end_section),
    };
  }
}
