import chalk from "chalk";

import { checkConnection, maskDatabaseUrl } from "../../db/connection.js";
import { getTableStats, runMigrations } from "../../db/migrate.js";
import { displayTableStats } from "../utils/display.js";
import { withAppContext } from "../utils/context.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the source and sync tracking tables")
    .option("--fresh", "Drop all tables first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      await withAppContext("Running migration...", async ({ database }, spinner) => {
        if (options.fresh === true) {
          spinner.text = "Dropping existing tables and migrating...";
        }

        await runMigrations(database.db, database.dialect, {
          fresh: options.fresh === true,
        });
        spinner.succeed("Migration completed successfully");

        displayTableStats(await getTableStats(database.db));
      });
    });

  // db status
  db.command("status")
    .description("Check database connection and show table statistics")
    .action(async () => {
      await withAppContext("Checking database connection...", async ({ database }, spinner) => {
        const connected = await checkConnection(database.db);

        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`Database URL: ${maskDatabaseUrl(database.url)}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed(`Database connected (${database.dialect})`);
        console.log(`Database URL: ${maskDatabaseUrl(database.url)}\n`);

        const stats = await getTableStats(database.db);
        if (stats.length === 0) {
          console.log(chalk.yellow("Schema: not initialized (run 'db migrate')"));
        } else {
          displayTableStats(stats);
        }
      });
    });
}
