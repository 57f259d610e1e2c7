import { displayUrlInspection } from "../utils/display.js";
import { withAppContext } from "../utils/context.js";
import { parsePositiveInteger } from "../utils/options.js";

import type { Command } from "commander";

export function registerUrlsCommand(program: Command): void {
  const urls = program
    .command("urls")
    .description("Inspect and refresh signed image URLs");

  // urls refresh
  urls
    .command("refresh")
    .description("Re-sign expired or expiring image URLs and update the unified table")
    .option("--workers <count>", "Concurrent signing workers", parsePositiveInteger)
    .action(async (options: { workers?: number }) => {
      await withAppContext("Refreshing signed URLs...", async ({ orchestrator }, spinner) => {
        const refreshed = await orchestrator.refreshExpiredUrls(options.workers);
        const synced = refreshed > 0 ? await orchestrator.syncPresentationFields() : 0;
        spinner.succeed(
          `Refreshed ${String(refreshed)} URL(s), updated ${String(synced)} unified row(s)`
        );
      });
    });

  // urls check
  urls
    .command("check")
    .description("Count stored image URLs by expiry state")
    .action(async () => {
      await withAppContext("Inspecting signed URLs...", async ({ orchestrator }, spinner) => {
        const report = await orchestrator.urlManager().inspectUrls();
        spinner.stop();
        displayUrlInspection(report);
      });
    });
}
