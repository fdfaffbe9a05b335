/**
 * Strava - Merger / Deduplicator
 *
 * Flattens fetched activities into ActivityRecord and classifies them
 * against the SeenIdSet. Seen ids are not dropped: they are still upsert
 * candidates so provider-side edits (kudos, description, gear) propagate.
 * Append-only sinks filter on their own file contents.
 *
 * Field precedence: detail value when present and non-null, else summary.
 */

import type { ActivityDetail, ActivityRecord, ActivitySummary, FetchedActivity } from "./types.js";
import type { SyncState } from "./sync-state.js";

export interface MergeResult {
  /** Every distinct fetched activity, ordered by start_date */
  records: ActivityRecord[];
  /** Records whose id is not in the SeenIdSet */
  newRecords: ActivityRecord[];
  /** Ids that were already persisted (update-in-place candidates) */
  seenIds: number[];
  /** Latest start_date among the merged records */
  latestStartDate: Date | null;
}

function prefer<T>(detailValue: T | null | undefined, summaryValue: T | null | undefined): T | null {
  if (detailValue !== null && detailValue !== undefined) return detailValue;
  if (summaryValue !== null && summaryValue !== undefined) return summaryValue;
  return null;
}

/**
 * Resolve one activity into its persistence shape.
 */
export function toActivityRecord(
  summary: ActivitySummary,
  detail: ActivityDetail | null,
  gearName: string | null = null,
  syncedAt: Date = new Date()
): ActivityRecord {
  const d: Partial<ActivityDetail> = detail ?? {};
  const start = prefer(d.start_latlng, summary.start_latlng);
  const end = prefer(d.end_latlng, summary.end_latlng);

  return {
    id: summary.id,
    name: prefer(d.name, summary.name),
    type: prefer(d.type, summary.type) ?? summary.type,
    sport_type: prefer(d.sport_type, summary.sport_type),
    start_date: prefer(d.start_date, summary.start_date) ?? summary.start_date,
    timezone: prefer(d.timezone, summary.timezone),
    utc_offset: prefer(d.utc_offset, summary.utc_offset),
    distance: prefer(d.distance, summary.distance),
    moving_time: prefer(d.moving_time, summary.moving_time),
    elapsed_time: prefer(d.elapsed_time, summary.elapsed_time),
    total_elevation_gain: prefer(d.total_elevation_gain, summary.total_elevation_gain),
    average_speed: prefer(d.average_speed, summary.average_speed),
    max_speed: prefer(d.max_speed, summary.max_speed),
    average_heartrate: prefer(d.average_heartrate, summary.average_heartrate),
    max_heartrate: prefer(d.max_heartrate, summary.max_heartrate),
    start_latitude: start?.[0] ?? null,
    start_longitude: start?.[1] ?? null,
    end_latitude: end?.[0] ?? null,
    end_longitude: end?.[1] ?? null,
    kudos_count: prefer(d.kudos_count, summary.kudos_count),
    comment_count: prefer(d.comment_count, summary.comment_count),
    athlete_count: prefer(d.athlete_count, summary.athlete_count),
    gear_id: prefer(d.gear_id, summary.gear_id),
    gear_name: gearName,
    trainer: prefer(d.trainer, summary.trainer),
    commute: prefer(d.commute, summary.commute),
    private: prefer(d.private, summary.private),
    description: prefer(d.description, summary.description),
    calories: d.calories ?? null,
    average_watts: prefer(d.average_watts, summary.average_watts),
    kilojoules: prefer(d.kilojoules, summary.kilojoules),
    suffer_score: prefer(d.suffer_score, summary.suffer_score),
    summary_polyline: prefer(d.map?.summary_polyline, summary.map?.summary_polyline),
    polyline: d.map?.polyline ?? null,
    best_efforts: d.best_efforts ?? null,
    synced_at: syncedAt.toISOString(),
  };
}

/**
 * Merge fetched activities with the local sync state.
 *
 * Duplicate ids within one fetch (pages shifting while a new activity is
 * uploaded) collapse to the last occurrence.
 */
export function merge(fetched: Iterable<FetchedActivity>, state: SyncState, syncedAt: Date = new Date()): MergeResult {
  const byId = new Map<number, ActivityRecord>();
  for (const item of fetched) {
    byId.set(item.summary.id, toActivityRecord(item.summary, item.detail, item.gearName, syncedAt));
  }

  const records = [...byId.values()].sort(
    (a, b) => Date.parse(a.start_date) - Date.parse(b.start_date) || a.id - b.id
  );

  const newRecords: ActivityRecord[] = [];
  const seenIds: number[] = [];
  for (const record of records) {
    if (state.seenIds.has(record.id)) {
      seenIds.push(record.id);
    } else {
      newRecords.push(record);
    }
  }

  return { records, newRecords, seenIds, latestStartDate: latestStartDate(records) };
}

export function latestStartDate(records: Iterable<{ start_date: string }>): Date | null {
  let latest: number | null = null;
  for (const record of records) {
    const time = Date.parse(record.start_date);
    if (Number.isNaN(time)) continue;
    if (latest === null || time > latest) latest = time;
  }
  return latest === null ? null : new Date(latest);
}
