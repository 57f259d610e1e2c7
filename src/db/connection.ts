import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, sql } from "kysely";
import pg from "pg";

import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool, types } = pg;

// Parse JSON/JSONB as values instead of strings
types.setTypeParser(
  types.builtins.JSON,
  (val: string): unknown => JSON.parse(val)
);
types.setTypeParser(
  types.builtins.JSONB,
  (val: string): unknown => JSON.parse(val)
);

// ============================================================================
// Types
// ============================================================================

export type DatabaseDialect = "postgres" | "sqlite";

export interface DatabaseHandle {
  db: Kysely<Database>;
  dialect: DatabaseDialect;
  url: string;
}

// ============================================================================
// Construction
// ============================================================================

const SQLITE_PREFIX = /^sqlite:(\/\/)?/;

function createSqliteHandle(url: string): DatabaseHandle {
  const path = url.replace(SQLITE_PREFIX, "");
  const filename = path === "" ? ":memory:" : path;

  if (filename !== ":memory:") {
    const dataDir = dirname(filename);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const db = new Kysely<Database>({
    dialect: new SqliteDialect({ database: new SQLite(filename) }),
  });
  return { db, dialect: "sqlite", url };
}

function createPostgresHandle(url: string): DatabaseHandle {
  const pool = new Pool({
    connectionString: url,
    max: 20,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5000,
  });

  pool.on("error", (error) => {
    dbLogger.error({ error }, "Idle PostgreSQL client error");
  });

  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });
  return { db, dialect: "postgres", url };
}

/**
 * Open a database from a connection URL.
 *
 * `sqlite:<path>` and `sqlite::memory:` select better-sqlite3, anything else
 * is handed to the pg pool.
 */
export function createDatabase(url: string): DatabaseHandle {
  return SQLITE_PREFIX.test(url)
    ? createSqliteHandle(url)
    : createPostgresHandle(url);
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(db: Kysely<Database>): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the database connection
 */
export async function closeDatabase(handle: DatabaseHandle): Promise<void> {
  try {
    await handle.db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

export async function tableExists(
  db: Kysely<Database>,
  name: string
): Promise<boolean> {
  const tables = await db.introspection.getTables();
  return tables.some((table) => table.name === name);
}

/**
 * Database URL for display, with the password masked
 */
export function maskDatabaseUrl(url: string): string {
  if (SQLITE_PREFIX.test(url)) return url;
  try {
    const parsed = new URL(url);
    if (parsed.password !== "") {
      parsed.password = "****";
    }
    return parsed.toString();
  } catch {
    return "<unparseable database url>";
  }
}
