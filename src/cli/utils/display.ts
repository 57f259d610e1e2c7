/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { formatGmd } from "../../services/unified/derive.js";

import type { TableStat } from "../../db/migrate.js";
import type { SyncRunStatus } from "../../db/types.js";
import type { UrlInspection } from "../../services/images/url-lifecycle.js";
import type { CycleResult } from "../../services/sync/orchestrator.js";
import type { SyncStatistics } from "../../services/sync/tracking.js";
import type { UnifiedRowView } from "../../services/unified/builder.js";

function colorStatus(status: SyncRunStatus): string {
  switch (status) {
    case "success":
      return chalk.green(status);
    case "error":
      return chalk.red(status);
    case "in_progress":
      return chalk.yellow(status);
    case "pending":
      return chalk.gray(status);
  }
}

function formatTimestamp(value: string | null): string {
  return value === null ? chalk.gray("never") : value.replace("T", " ").slice(0, 19);
}

/**
 * Display the outcome of one sync cycle
 */
export function displayCycleResult(result: CycleResult): void {
  const table = new CliTable3({
    head: [chalk.cyan("Stage"), chalk.cyan("Records")],
  });

  table.push(
    ["Submissions persisted", String(result.submissions)],
    ["Images processed", String(result.imagesProcessed)],
    ["URLs refreshed", String(result.urlsRefreshed)],
    ["Person rows persisted", String(result.personDetails)],
    [
      "Unified rows",
      result.unifiedRows === null ? chalk.gray("not rebuilt") : String(result.unifiedRows),
    ]
  );

  console.log(table.toString());
  console.log(chalk.gray(`Duration: ${String(result.durationMs)}ms`));

  if (result.errors.length > 0) {
    console.log(chalk.red(`\n${String(result.errors.length)} stage(s) failed:`));
    for (const failure of result.errors) {
      console.log(`  ${chalk.yellow(failure.stage)}: ${failure.message}`);
    }
  }
}

/**
 * Display per-stream sync status and recent history
 */
export function displaySyncStatus(stats: SyncStatistics): void {
  if (stats.streams.length === 0) {
    console.log(chalk.yellow("No sync has run yet"));
    return;
  }

  const streams = new CliTable3({
    head: [
      chalk.cyan("Stream"),
      chalk.cyan("Status"),
      chalk.cyan("Watermark"),
      chalk.cyan("Last Attempt"),
      chalk.cyan("OK"),
      chalk.cyan("Failed"),
      chalk.cyan("Last Records"),
    ],
  });

  for (const row of stats.streams) {
    streams.push([
      row.sync_type,
      colorStatus(row.last_sync_status),
      formatTimestamp(row.last_sync_timestamp),
      formatTimestamp(row.last_attempt_timestamp),
      String(row.successful_sync_count),
      String(row.failed_sync_count),
      String(row.last_records_processed),
    ]);
  }

  console.log(chalk.bold("\nSync Streams:\n"));
  console.log(streams.toString());

  const failing = stats.streams.filter((row) => row.last_error_message !== null);
  for (const row of failing) {
    console.log(`  ${chalk.red(row.sync_type)}: ${row.last_error_message ?? ""}`);
  }

  if (stats.recentHistory.length === 0) return;

  const history = new CliTable3({
    head: [
      chalk.cyan("#"),
      chalk.cyan("Stream"),
      chalk.cyan("Started"),
      chalk.cyan("Status"),
      chalk.cyan("Records"),
      chalk.cyan("Seconds"),
    ],
  });

  for (const entry of stats.recentHistory) {
    history.push([
      String(entry.id),
      entry.syncType,
      formatTimestamp(entry.syncTimestamp),
      colorStatus(entry.status),
      String(entry.recordsProcessed),
      entry.durationSeconds === null ? "-" : entry.durationSeconds.toFixed(1),
    ]);
  }

  console.log(chalk.bold("\nRecent Attempts:\n"));
  console.log(history.toString());
}

/**
 * Display signed URL states per image role
 */
export function displayUrlInspection(report: UrlInspection): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Role"),
      chalk.cyan("No URL"),
      chalk.cyan("Valid"),
      chalk.cyan("Expiring Soon"),
      chalk.cyan("Expired"),
      chalk.cyan("Unrecoverable"),
    ],
  });

  for (const [role, counts] of Object.entries(report)) {
    table.push([
      role,
      String(counts.NoUrl),
      chalk.green(String(counts.Valid)),
      chalk.yellow(String(counts.ExpiringSoon)),
      chalk.red(String(counts.Expired)),
      String(counts.unrecoverable),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display one unified row with its tax figures and persons
 */
export function displayUnifiedRow(row: UnifiedRowView): void {
  console.log(chalk.bold(`\nSubmission ${row.uuid}\n`));

  const location = [row.street, row.town, row.district]
    .filter((part) => part !== null)
    .join(", ");

  const details = new CliTable3();
  details.push(
    { Submitted: formatTimestamp(row.submitted_at) },
    { "Plus code": row.address_plus_code ?? "-" },
    { Location: location === "" ? "-" : location },
    { Property: row.property_name ?? "-" },
    { "Owner status": row.owner_status },
    { Persons: String(row.person_count) },
    { "Annual rent": formatGmd(row.total_rent_gmd) },
    { "Commercial tax": formatGmd(row.commercial_tax) },
    { "Residential tax": formatGmd(row.residential_tax) },
    { "Business tax": formatGmd(row.business_tax) },
    { "Total tax liability": chalk.bold(formatGmd(row.total_tax_liability)) },
    { "Amount paid": formatGmd(row.amount_paid) },
    { "Building image": row.building_image_url ?? chalk.gray("none") },
    { "Address image": row.address_image_url ?? chalk.gray("none") }
  );
  console.log(details.toString());
}

/**
 * Display table row counts
 */
export function displayTableStats(stats: TableStat[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Table"), chalk.cyan("Rows")],
  });
  for (const stat of stats) {
    table.push([stat.table_name, String(stat.row_count)]);
  }
  console.log(table.toString());
}
