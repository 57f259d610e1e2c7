/**
 * Process-wide wiring: one database handle, one ODK client and one storage
 * client, shared by the CLI commands and the HTTP server.
 */

import { loadConfig, type AppConfig } from "./config.js";
import {
  closeDatabase,
  createDatabase,
  maskDatabaseUrl,
  type DatabaseHandle,
} from "./db/connection.js";
import { runMigrations } from "./db/migrate.js";
import { logger } from "./logger.js";
import { OdkClient } from "./odk/client.js";
import { SyncOrchestrator } from "./services/sync/orchestrator.js";
import { S3ObjectStorage } from "./storage/object-storage.js";

export interface AppContext {
  config: AppConfig;
  database: DatabaseHandle;
  odk: OdkClient | null;
  storage: S3ObjectStorage | null;
  orchestrator: SyncOrchestrator;
}

export function createAppContext(config: AppConfig = loadConfig()): AppContext {
  const database = createDatabase(config.databaseUrl);
  const odk = config.odk === null ? null : new OdkClient(config.odk);
  const storage =
    config.storage === null ? null : new S3ObjectStorage(config.storage);

  logger.info(
    {
      database: maskDatabaseUrl(config.databaseUrl),
      dialect: database.dialect,
      odk: config.odk?.baseUrl ?? null,
      bucket: config.storage?.bucket ?? null,
    },
    "Application context created"
  );

  const orchestrator = new SyncOrchestrator({
    db: database.db,
    dialect: database.dialect,
    config,
    source: odk,
    storage,
  });

  return { config, database, odk, storage, orchestrator };
}

/**
 * Create any missing source and tracking tables. Runs before the first
 * cycle and before the server listens; existing tables are left alone.
 */
export async function ensureSchema(context: AppContext): Promise<void> {
  await runMigrations(context.database.db, context.database.dialect);
}

export async function closeAppContext(context: AppContext): Promise<void> {
  context.storage?.destroy();
  await closeDatabase(context.database);
}
