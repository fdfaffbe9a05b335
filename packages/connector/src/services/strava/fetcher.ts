/**
 * Strava - Activity Fetcher
 *
 * Paginated list calls (/athlete/activities), optional per-activity detail
 * calls and gear-name lookups. All calls are sequential: the provider's
 * quota is global per credential, so parallel requests would make 429
 * handling ambiguous.
 */

import { setupLogger } from "../../lib/logger.js";
import { AuthError, SyncError, describeError, type Outcome } from "../../lib/errors.js";
import { sleep as defaultSleep, type Sleep } from "../../lib/retry.js";
import type { StravaApiClient } from "./api-client.js";
import {
  activityDetailSchema,
  activityPageSchema,
  gearSchema,
  type ActivityDetail,
  type ActivitySummary,
} from "./types.js";

const logger = setupLogger("strava-fetcher");

/** Provider maximum; fewer pages means fewer requests against the quota */
export const MAX_PER_PAGE = 200;

/**
 * Seconds subtracted from the watermark for the `after` filter. `after` is
 * exclusive, so activities sharing the watermark's second come back and are
 * resolved by id instead of being skipped.
 */
export const WATERMARK_OVERLAP_SEC = 1;

export interface FetcherOptions {
  perPage?: number;
  /** Treat a short page as the last one (saves one request per run) */
  stopOnShortPage?: boolean;
  /** Attempts per list page across 429 and transient failures */
  pageMaxAttempts?: number;
  /** Attempts per detail / gear call; kept small so one bad id cannot stall the batch */
  detailMaxAttempts?: number;
  /** Pause between successive detail calls (burst quota) */
  detailPauseMs?: number;
  sleep?: Sleep;
}

export class ActivityFetcher {
  private readonly perPage: number;
  private readonly stopOnShortPage: boolean;
  private readonly pageMaxAttempts: number;
  private readonly detailMaxAttempts: number;
  private readonly detailPauseMs: number;
  private readonly sleep: Sleep;
  private readonly gearCache = new Map<string, string | null>();
  pagesRequested = 0;

  constructor(
    private readonly client: StravaApiClient,
    options: FetcherOptions = {}
  ) {
    this.perPage = Math.min(options.perPage ?? MAX_PER_PAGE, MAX_PER_PAGE);
    this.stopOnShortPage = options.stopOnShortPage ?? true;
    this.pageMaxAttempts = options.pageMaxAttempts ?? 10;
    this.detailMaxAttempts = options.detailMaxAttempts ?? 3;
    this.detailPauseMs = options.detailPauseMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Unix timestamp for the `after` filter, or undefined for full history.
   */
  static afterParam(watermark: Date | null): number | undefined {
    if (watermark === null) return undefined;
    return Math.max(0, Math.floor(watermark.getTime() / 1000) - WATERMARK_OVERLAP_SEC);
  }

  /**
   * Yield every activity started after the watermark.
   * Each call starts again from page 1.
   */
  async *fetchSince(watermark: Date | null): AsyncGenerator<ActivitySummary> {
    const after = ActivityFetcher.afterParam(watermark);
    logger.info(
      after === undefined
        ? "Fetching full activity history..."
        : `Fetching activities after ${new Date(after * 1000).toISOString()}...`
    );

    for (let page = 1; ; page++) {
      this.pagesRequested++;
      const activities = await this.client.getRequired(
        "/athlete/activities",
        { page, per_page: this.perPage, after },
        activityPageSchema,
        { maxAttempts: this.pageMaxAttempts }
      );
      logger.debug(`Page ${page}: ${activities.length} activities`);

      if (activities.length === 0) {
        return;
      }

      yield* activities;

      if (this.stopOnShortPage && activities.length < this.perPage) {
        return;
      }
    }
  }

  /**
   * Fetch the detail payload for one activity.
   *
   * 404 → absent; exhausted retries → degraded. AuthError still propagates.
   */
  async fetchDetail(id: number): Promise<Outcome<ActivityDetail>> {
    try {
      const detail = await this.client.get(
        `/activities/${id}`,
        { include_all_efforts: "false" },
        activityDetailSchema,
        { maxAttempts: this.detailMaxAttempts }
      );
      return detail === null ? { kind: "absent" } : { kind: "ok", value: detail };
    } catch (error) {
      if (error instanceof AuthError) throw error;
      const wrapped = error instanceof SyncError ? error : new SyncError(describeError(error), false, { cause: error });
      return { kind: "degraded", error: wrapped };
    }
  }

  /**
   * Fetch details for the given ids, pausing between calls.
   * Ids whose detail is unavailable are simply missing from the result.
   */
  async fetchDetails(ids: number[]): Promise<{ details: Map<number, ActivityDetail>; errors: string[] }> {
    const details = new Map<number, ActivityDetail>();
    const errors: string[] = [];

    for (const [index, id] of ids.entries()) {
      if (index > 0 && this.detailPauseMs > 0) {
        await this.sleep(this.detailPauseMs);
      }

      const outcome = await this.fetchDetail(id);
      switch (outcome.kind) {
        case "ok":
          details.set(id, outcome.value);
          break;
        case "absent":
          logger.warn(`Activity ${id} not accessible (404), keeping summary`);
          break;
        case "degraded":
          logger.warn(`Detail for activity ${id} failed, keeping summary: ${outcome.error.message}`);
          errors.push(`detail ${id}: ${outcome.error.message}`);
          break;
      }
    }

    logger.info(`Fetched ${details.size}/${ids.length} activity details`);
    return { details, errors };
  }

  /**
   * Gear display name, cached per run (many activities share one bike/shoe).
   */
  async resolveGearName(gearId: string): Promise<Outcome<string>> {
    if (this.gearCache.has(gearId)) {
      const cached = this.gearCache.get(gearId) ?? null;
      return cached === null ? { kind: "absent" } : { kind: "ok", value: cached };
    }

    try {
      const gear = await this.client.get(`/gear/${encodeURIComponent(gearId)}`, {}, gearSchema, {
        maxAttempts: this.detailMaxAttempts,
      });
      const name = gear === null ? null : gear.name ?? ([gear.brand_name, gear.model_name].filter(Boolean).join(" ") || null);
      this.gearCache.set(gearId, name);
      return name === null ? { kind: "absent" } : { kind: "ok", value: name };
    } catch (error) {
      if (error instanceof AuthError) throw error;
      // Do not retry a failing gear id for every activity that uses it.
      this.gearCache.set(gearId, null);
      const wrapped = error instanceof SyncError ? error : new SyncError(describeError(error), false, { cause: error });
      return { kind: "degraded", error: wrapped };
    }
  }
}
