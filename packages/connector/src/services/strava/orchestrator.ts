/**
 * Strava - Sync Orchestrator
 *
 * Idle → AuthAcquired → Fetching → Merging → Persisting → Done
 * Failed(reason) is reachable from every state.
 *
 * Run-fatal: credential failure, fetch failure, every sink failing.
 * An empty fetch is a successful no-op run.
 */

import { setupLogger } from "../../lib/logger.js";
import { StorageError, describeError } from "../../lib/errors.js";
import type { ActivityFetcher } from "./fetcher.js";
import { merge } from "./merger.js";
import type { SyncStateTracker } from "./sync-state.js";
import type { AccessTokenProvider } from "./token-manager.js";
import type { ActivitySink, SinkMode } from "./sinks/types.js";
import type { ActivityDetail, ActivityRecord, ActivitySummary, FetchedActivity } from "./types.js";

const logger = setupLogger("strava-orchestrator");

export type SyncPhase = "idle" | "auth_acquired" | "fetching" | "merging" | "persisting" | "done" | "failed";

export interface SinkReport {
  sink: string;
  mode: SinkMode;
  ok: boolean;
  written: number;
  skipped: number;
  error?: string;
}

export interface SyncReport {
  status: "done" | "failed";
  phases: SyncPhase[];
  failure: { phase: SyncPhase; reason: string; error: unknown } | null;
  fetchedCount: number;
  newCount: number;
  updatedCount: number;
  detailsFetched: number;
  sinks: SinkReport[];
  /** Non-fatal problems (detail lookups, unreadable sink state, ...) */
  errors: string[];
  watermarkBefore: Date | null;
  watermarkAfter: Date | null;
  /** Merged records; kept so a caller can retry persistence after a total sink failure */
  records: ActivityRecord[];
  elapsedMs: number;
}

export interface SyncOptions {
  /** Lookback window used when no watermark exists (0 = full history) */
  daysBack?: number;
  /** Ignore watermark and lookback, fetch everything */
  full?: boolean;
  /** Per-activity detail calls for activities not yet persisted */
  fetchDetails?: boolean;
  /** Resolve gear names */
  fetchGear?: boolean;
  now?: () => Date;
}

export interface OrchestratorDeps {
  tokens: AccessTokenProvider;
  fetcher: ActivityFetcher;
  tracker: SyncStateTracker;
  sinks: ActivitySink[];
}

export class SyncOrchestrator {
  private phase: SyncPhase = "idle";
  private phases: SyncPhase[] = [];

  constructor(private readonly deps: OrchestratorDeps) {}

  private transition(next: SyncPhase): void {
    logger.debug(`${this.phase} → ${next}`);
    this.phase = next;
    this.phases.push(next);
  }

  /**
   * Execute one sync run. Never throws; the report carries the outcome.
   */
  async run(options: SyncOptions = {}): Promise<SyncReport> {
    const { daysBack = 30, full = false, fetchDetails = false, fetchGear = false } = options;
    const now = options.now ?? (() => new Date());
    const startTime = performance.now();

    this.phase = "idle";
    this.phases = ["idle"];

    const report: SyncReport = {
      status: "failed",
      phases: this.phases,
      failure: null,
      fetchedCount: 0,
      newCount: 0,
      updatedCount: 0,
      detailsFetched: 0,
      sinks: [],
      errors: [],
      watermarkBefore: null,
      watermarkAfter: null,
      records: [],
      elapsedMs: 0,
    };

    const fail = (reason: string, error: unknown): SyncReport => {
      const failedIn = this.phase;
      this.transition("failed");
      report.failure = { phase: failedIn, reason, error };
      report.elapsedMs = performance.now() - startTime;
      logger.error(`Sync failed during ${failedIn}: ${reason}`);
      return report;
    };

    logger.info("Starting Strava sync");

    // Idle → AuthAcquired
    try {
      await this.deps.tokens.getAccessToken();
    } catch (error) {
      return fail(describeError(error), error);
    }
    this.transition("auth_acquired");

    const state = await this.deps.tracker.loadState();
    report.errors.push(...state.errors);
    report.watermarkBefore = state.watermark;

    let lowerBound: Date | null = null;
    if (!full) {
      lowerBound = state.watermark;
      if (lowerBound === null && daysBack > 0) {
        lowerBound = new Date(now().getTime() - daysBack * 24 * 60 * 60 * 1000);
        logger.info(`No watermark yet, using ${daysBack}-day lookback`);
      }
    }

    // AuthAcquired → Fetching
    this.transition("fetching");
    const summaries: ActivitySummary[] = [];
    let details = new Map<number, ActivityDetail>();
    const gearNames = new Map<string, string>();
    try {
      for await (const summary of this.deps.fetcher.fetchSince(lowerBound)) {
        summaries.push(summary);
      }
      report.fetchedCount = summaries.length;
      logger.info(`Fetched ${summaries.length} activities`);

      if (fetchDetails) {
        const unseen = [...new Set(summaries.map((s) => s.id))].filter((id) => !state.seenIds.has(id));
        const result = await this.deps.fetcher.fetchDetails(unseen);
        details = result.details;
        report.detailsFetched = details.size;
        report.errors.push(...result.errors);
      }

      if (fetchGear) {
        const gearIds = new Set<string>();
        for (const summary of summaries) {
          const gearId = details.get(summary.id)?.gear_id ?? summary.gear_id;
          if (gearId) gearIds.add(gearId);
        }
        for (const gearId of gearIds) {
          const outcome = await this.deps.fetcher.resolveGearName(gearId);
          if (outcome.kind === "ok") {
            gearNames.set(gearId, outcome.value);
          } else if (outcome.kind === "degraded") {
            report.errors.push(`gear ${gearId}: ${outcome.error.message}`);
          }
        }
      }
    } catch (error) {
      return fail(describeError(error), error);
    }

    // Fetching → Merging
    this.transition("merging");
    const fetched: FetchedActivity[] = summaries.map((summary) => {
      const detail = details.get(summary.id) ?? null;
      const gearId = detail?.gear_id ?? summary.gear_id;
      return { summary, detail, gearName: gearId ? gearNames.get(gearId) ?? null : null };
    });
    const merged = merge(fetched, state, now());
    report.records = merged.records;
    report.newCount = merged.newRecords.length;
    report.updatedCount = merged.seenIds.length;
    logger.info(`Merged ${merged.records.length} records (${merged.newRecords.length} new, ${merged.seenIds.length} already synced)`);

    // Merging → Persisting (always, even for an empty set)
    this.transition("persisting");
    for (const sink of this.deps.sinks) {
      try {
        const result = await sink.write(merged.records);
        if (sink.mode === "append") {
          logger.info(`${sink.name}: appended ${result.written}, ${result.skipped} already present`);
        } else {
          logger.info(`${sink.name}: upserted ${result.written} (${merged.newRecords.length} new, ${merged.seenIds.length} updated)`);
        }
        report.sinks.push({ sink: sink.name, mode: sink.mode, ok: true, written: result.written, skipped: result.skipped });
      } catch (error) {
        const message = describeError(error);
        logger.error(`Sink ${sink.name} failed: ${message}`);
        report.sinks.push({ sink: sink.name, mode: sink.mode, ok: false, written: 0, skipped: 0, error: message });
      }
    }

    const failedSinks = report.sinks.filter((s) => !s.ok);
    if (report.sinks.length > 0 && failedSinks.length === report.sinks.length) {
      return fail(
        "all sinks failed",
        new StorageError("all", failedSinks.map((s) => `${s.sink}: ${s.error ?? "unknown"}`).join("; "))
      );
    }

    // Watermark moves only when every sink holds the records.
    if (failedSinks.length === 0) {
      try {
        report.watermarkAfter = await this.deps.tracker.commit(state.watermark, merged.latestStartDate);
      } catch (error) {
        report.watermarkAfter = state.watermark;
        report.errors.push(`watermark: ${describeError(error)}`);
        logger.warn(`Failed to save watermark: ${describeError(error)}`);
      }
    } else {
      report.watermarkAfter = state.watermark;
      logger.warn(`Watermark not advanced: ${failedSinks.map((s) => s.sink).join(", ")} failed`);
    }

    this.transition("done");
    report.status = "done";
    report.elapsedMs = performance.now() - startTime;
    logger.info(`Strava sync completed in ${(report.elapsedMs / 1000).toFixed(2)}s`);
    return report;
  }
}
