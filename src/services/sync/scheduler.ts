/**
 * Sync Scheduler - runs orchestrator cycles on a fixed interval
 */

import { errorMessage, syncLogger } from "../../logger.js";

import type { CycleResult } from "./orchestrator.js";
import type { SyncTracker } from "./tracking.js";

const HISTORY_CLEANUP_INTERVAL_MS = 60 * 60 * 1000;
const HEALTH_LOG_EVERY = 10;

export interface CycleRunner {
  readonly tracker: SyncTracker;
  runCycle(): Promise<CycleResult>;
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SchedulerOptions {
  intervalSeconds: number;
  historyRetentionDays: number;
  /** Stop after this many cycles; runs until aborted when omitted */
  maxCycles?: number;
  sleep?: Sleep;
  now?: () => number;
}

export interface SchedulerSummary {
  cycles: number;
  cyclesWithErrors: number;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });

export class SyncScheduler {
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private lastCleanup: number | null = null;

  constructor(
    private readonly runner: CycleRunner,
    private readonly options: SchedulerOptions
  ) {
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? Date.now;
  }

  async run(
    signal: AbortSignal = new AbortController().signal
  ): Promise<SchedulerSummary> {
    const intervalMs = this.options.intervalSeconds * 1000;
    const summary: SchedulerSummary = { cycles: 0, cyclesWithErrors: 0 };

    syncLogger.info(
      {
        intervalSeconds: this.options.intervalSeconds,
        maxCycles: this.options.maxCycles ?? null,
      },
      "Sync scheduler started"
    );

    while (!signal.aborted) {
      if (this.reachedMaxCycles(summary)) break;

      const startedAt = this.now();
      summary.cycles++;

      try {
        const result = await this.runner.runCycle();
        if (result.errors.length > 0) summary.cyclesWithErrors++;
      } catch (error) {
        summary.cyclesWithErrors++;
        syncLogger.error(
          { cycle: summary.cycles, error: errorMessage(error) },
          "Sync cycle crashed"
        );
      }

      const elapsed = this.now() - startedAt;
      if (elapsed > intervalMs * 2) {
        syncLogger.warn(
          { cycle: summary.cycles, elapsedMs: elapsed, intervalMs },
          "Sync cycle took longer than twice the interval"
        );
      }

      await this.maybeCleanupHistory();
      if (summary.cycles % HEALTH_LOG_EVERY === 0) {
        await this.logHealth(summary);
      }

      if (signal.aborted || this.reachedMaxCycles(summary)) break;
      await this.sleep(Math.max(0, intervalMs - elapsed), signal);
    }

    syncLogger.info(summary, "Sync scheduler stopped");
    return summary;
  }

  private reachedMaxCycles(summary: SchedulerSummary): boolean {
    const { maxCycles } = this.options;
    return maxCycles !== undefined && summary.cycles >= maxCycles;
  }

  private async maybeCleanupHistory(): Promise<void> {
    const now = this.now();
    const last = this.lastCleanup;
    if (last !== null && now - last < HISTORY_CLEANUP_INTERVAL_MS) {
      return;
    }
    this.lastCleanup = now;

    try {
      await this.runner.tracker.cleanupOldHistory(
        this.options.historyRetentionDays
      );
    } catch (error) {
      syncLogger.error(
        { error: errorMessage(error) },
        "Sync history cleanup failed"
      );
    }
  }

  private async logHealth(summary: SchedulerSummary): Promise<void> {
    try {
      const stats = await this.runner.tracker.getStatistics();
      syncLogger.info(
        {
          ...summary,
          streams: stats.streams.map((stream) => ({
            stream: stream.sync_type,
            status: stream.last_sync_status,
            successes: stream.successful_sync_count,
            failures: stream.failed_sync_count,
            lastSync: stream.last_sync_timestamp,
          })),
        },
        "Sync health"
      );
    } catch (error) {
      syncLogger.error(
        { error: errorMessage(error) },
        "Could not read sync statistics"
      );
    }
  }
}
