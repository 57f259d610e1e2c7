import chalk from "chalk";

import { displayUnifiedRow } from "../utils/display.js";
import { withAppContext } from "../utils/context.js";

import type { Command } from "commander";

// ============================================================================
// Unified Table Commands
// ============================================================================

export function registerUnifiedCommand(program: Command): void {
  const unified = program
    .command("unified")
    .description("Manage the submissions_unified reporting table");

  // unified rebuild
  unified
    .command("rebuild")
    .description("Rebuild the unified table from the source tables")
    .option("--force", "Rebuild even when the table already exists")
    .action(async (options: { force?: boolean }) => {
      await withAppContext("Rebuilding unified table...", async ({ orchestrator }, spinner) => {
        const rebuilt = await orchestrator.rebuildUnified(options.force === true);
        if (rebuilt) {
          spinner.succeed("Unified table rebuilt");
        } else {
          spinner.info("Unified table already exists (use --force to rebuild)");
        }
      });
    });

  // unified show <uuid>
  unified
    .command("show <uuid>")
    .description("Show the unified row of one submission")
    .option("--json", "Print the row as JSON")
    .action(async (uuid: string, options: { json?: boolean }) => {
      await withAppContext(`Loading ${uuid}...`, async ({ orchestrator }, spinner) => {
        const row = await orchestrator.builder.findRow(uuid);
        if (row === null) {
          spinner.fail(`No unified row for ${uuid}`);
          process.exitCode = 1;
          return;
        }
        spinner.stop();

        if (options.json === true) {
          console.log(JSON.stringify(row, null, 2));
          return;
        }

        displayUnifiedRow(row);
        if (row.person_details.length > 0) {
          console.log(chalk.bold("\nPersons:\n"));
          console.log(JSON.stringify(row.person_details, null, 2));
        }
      });
    });
}
