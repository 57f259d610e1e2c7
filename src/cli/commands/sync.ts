import chalk from "chalk";

import {
  closeAppContext,
  createAppContext,
  ensureSchema,
  type AppContext,
} from "../../app-context.js";
import { errorMessage } from "../../logger.js";
import { SyncScheduler } from "../../services/sync/scheduler.js";
import { displayCycleResult, displaySyncStatus } from "../utils/display.js";
import { withAppContext } from "../utils/context.js";
import { parsePositiveInteger } from "../utils/options.js";

import type { Command } from "commander";

// ============================================================================
// Sync Commands
// ============================================================================

async function showStatus(): Promise<void> {
  await withAppContext("Loading sync status...", async ({ orchestrator }, spinner) => {
    const stats = await orchestrator.tracker.getStatistics();
    spinner.stop();
    displaySyncStatus(stats);
  });
}

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Synchronize ODK Central submissions into the database")
    .addHelpText(
      "after",
      `
A cycle runs, in order:
  1. main submissions   incremental fetch, image re-hosting, upsert
  2. URL refresh        re-sign image URLs close to expiry
  3. person details     repeat group fetch and upsert
  4. unified rebuild    submissions_unified, swapped in atomically

Use 'run' for the continuous loop.
`
    );

  // sync once
  sync
    .command("once")
    .description("Run one sync cycle and exit")
    .action(async () => {
      await withAppContext("Running sync cycle...", async (context, spinner) => {
        await ensureSchema(context);
        const result = await context.orchestrator.runCycle();
        if (result.errors.length > 0) {
          spinner.warn("Sync cycle finished with errors");
          process.exitCode = 1;
        } else {
          spinner.succeed("Sync cycle finished");
        }
        displayCycleResult(result);
      });
    });

  // sync status
  sync
    .command("status")
    .description("Show per-stream sync status and recent attempts")
    .action(showStatus);

  // Top-level alias for 'sync status'
  program
    .command("status")
    .description("Show sync status (alias for 'sync status')")
    .action(showStatus);

  // run
  program
    .command("run")
    .description("Run sync cycles continuously until interrupted")
    .option("--interval <seconds>", "Seconds between cycle starts", parsePositiveInteger)
    .option("--max-cycles <count>", "Stop after this many cycles", parsePositiveInteger)
    .action(async (options: { interval?: number; maxCycles?: number }) => {
      let context: AppContext | null = null;
      const controller = new AbortController();
      const stop = (): void => {
        console.log(chalk.yellow("\nStopping after the current cycle..."));
        controller.abort();
      };
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);

      try {
        context = createAppContext();
        await ensureSchema(context);
        const scheduler = new SyncScheduler(context.orchestrator, {
          intervalSeconds: options.interval ?? context.config.sync.intervalSeconds,
          historyRetentionDays: context.config.sync.historyRetentionDays,
          ...(options.maxCycles !== undefined ? { maxCycles: options.maxCycles } : {}),
        });

        const summary = await scheduler.run(controller.signal);
        console.log(
          chalk.green(
            `Ran ${String(summary.cycles)} cycle(s), ${String(summary.cyclesWithErrors)} with errors`
          )
        );
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      } finally {
        process.off("SIGINT", stop);
        process.off("SIGTERM", stop);
        if (context !== null) {
          await closeAppContext(context);
        }
      }
    });
}
