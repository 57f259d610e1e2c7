import { pathToFileURL } from "node:url";

import { sql, type Kysely } from "kysely";

import { loadConfig } from "../config.js";
import { dbLogger } from "../logger.js";
import {
  closeDatabase,
  createDatabase,
  maskDatabaseUrl,
  tableExists,
  type DatabaseDialect,
} from "./connection.js";
import {
  createPersonDetailsTable,
  createSubmissionsTable,
  createSyncTables,
} from "./schema.js";
import { TABLES, type Database } from "./types.js";

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create the source and sync tracking tables. Existing tables are kept; the
 * unified table is created by the rebuild, not here.
 */
export async function runMigrations(
  db: Kysely<Database>,
  dialect: DatabaseDialect,
  options?: { fresh?: boolean }
): Promise<void> {
  if (options?.fresh === true) {
    dbLogger.warn("Dropping existing tables (--fresh mode)");
    for (const table of Object.values(TABLES)) {
      await db.schema.dropTable(table).ifExists().execute();
    }
  }

  dbLogger.info({ dialect }, "Running schema migration");

  await createSubmissionsTable(db, dialect);
  await createPersonDetailsTable(db, dialect);
  await createSyncTables(db, dialect);

  dbLogger.info("Schema migration completed");
}

export interface TableStat {
  table_name: string;
  row_count: number;
}

/**
 * Row counts of the tables that exist
 */
export async function getTableStats(db: Kysely<Database>): Promise<TableStat[]> {
  const stats: TableStat[] = [];

  for (const table of Object.values(TABLES)) {
    if (!(await tableExists(db, table))) continue;

    const result = await sql<{ row_count: number | string }>`
      SELECT COUNT(*) AS row_count FROM ${sql.table(table)}
    `.execute(db);

    stats.push({
      table_name: table,
      row_count: Number(result.rows[0]?.row_count ?? 0),
    });
  }

  return stats;
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  const fresh = process.argv.slice(2).includes("--fresh");
  const config = loadConfig();
  const handle = createDatabase(config.databaseUrl);

  console.log(`Migrating ${maskDatabaseUrl(handle.url)}`);

  try {
    await runMigrations(handle.db, handle.dialect, { fresh });
    console.log("Migration completed successfully!");

    const stats = await getTableStats(handle.db);
    console.log("\nTable statistics:");
    for (const row of stats) {
      console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
    }
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeDatabase(handle);
  }
}

const entryPath = process.argv[1];
if (entryPath !== undefined && import.meta.url === pathToFileURL(entryPath).href) {
  void main();
}
