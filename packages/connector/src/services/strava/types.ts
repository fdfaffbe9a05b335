/**
 * Strava - Type Definitions
 *
 * API payloads are validated with zod at the HTTP boundary; unknown fields
 * are stripped. ActivityRecord is the flattened persistence shape shared by
 * every sink.
 */

import { z } from "zod";

const latLng = z
  .array(z.number())
  .nullish()
  .transform((value): [number, number] | null =>
    value && value.length >= 2 ? [value[0], value[1]] : null
  );

// =============================================================================
// API payloads
// =============================================================================

export const activitySummarySchema = z.object({
  id: z.number().int(),
  name: z.string().nullish(),
  type: z.string(),
  sport_type: z.string().nullish(),
  start_date: z.string(),
  timezone: z.string().nullish(),
  utc_offset: z.number().nullish(),
  distance: z.number().nullish(),
  moving_time: z.number().nullish(),
  elapsed_time: z.number().nullish(),
  total_elevation_gain: z.number().nullish(),
  average_speed: z.number().nullish(),
  max_speed: z.number().nullish(),
  average_heartrate: z.number().nullish(),
  max_heartrate: z.number().nullish(),
  start_latlng: latLng,
  end_latlng: latLng,
  kudos_count: z.number().int().nullish(),
  comment_count: z.number().int().nullish(),
  athlete_count: z.number().int().nullish(),
  gear_id: z.string().nullish(),
  trainer: z.boolean().nullish(),
  commute: z.boolean().nullish(),
  private: z.boolean().nullish(),
  description: z.string().nullish(),
  average_watts: z.number().nullish(),
  kilojoules: z.number().nullish(),
  suffer_score: z.number().nullish(),
  map: z
    .object({
      summary_polyline: z.string().nullish(),
      polyline: z.string().nullish(),
    })
    .nullish(),
});

export const bestEffortSchema = z.object({
  name: z.string(),
  distance: z.number(),
  elapsed_time: z.number(),
  moving_time: z.number().nullish(),
  start_date: z.string().nullish(),
  pr_rank: z.number().int().nullish(),
});

export const activityDetailSchema = activitySummarySchema.extend({
  calories: z.number().nullish(),
  device_watts: z.boolean().nullish(),
  best_efforts: z.array(bestEffortSchema).nullish(),
});

export const activityPageSchema = z.array(activitySummarySchema);

export const gearSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  brand_name: z.string().nullish(),
  model_name: z.string().nullish(),
});

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_at: z.number().optional(),
  expires_in: z.number().optional(),
});

export type ActivitySummary = z.infer<typeof activitySummarySchema>;
export type ActivityDetail = z.infer<typeof activityDetailSchema>;
type BestEffort = z.infer<typeof bestEffortSchema>;
export type TokenResponse = z.infer<typeof tokenResponseSchema>;

/** A fetched activity, with its detail payload when one was obtained */
export interface FetchedActivity {
  summary: ActivitySummary;
  detail: ActivityDetail | null;
  gearName: string | null;
}

// =============================================================================
// Persistence shape
// =============================================================================

export interface ActivityRecord {
  id: number;
  name: string | null;
  type: string;
  sport_type: string | null;
  start_date: string;
  timezone: string | null;
  utc_offset: number | null;
  distance: number | null;
  moving_time: number | null;
  elapsed_time: number | null;
  total_elevation_gain: number | null;
  average_speed: number | null;
  max_speed: number | null;
  average_heartrate: number | null;
  max_heartrate: number | null;
  start_latitude: number | null;
  start_longitude: number | null;
  end_latitude: number | null;
  end_longitude: number | null;
  kudos_count: number | null;
  comment_count: number | null;
  athlete_count: number | null;
  gear_id: string | null;
  gear_name: string | null;
  trainer: boolean | null;
  commute: boolean | null;
  private: boolean | null;
  description: string | null;
  calories: number | null;
  average_watts: number | null;
  kilojoules: number | null;
  suffer_score: number | null;
  summary_polyline: string | null;
  polyline: string | null;
  best_efforts: BestEffort[] | null;
  synced_at: string;
}

/** Column order used by SQL sinks and the migration */
export const ACTIVITY_COLUMNS = [
  "id",
  "name",
  "type",
  "sport_type",
  "start_date",
  "timezone",
  "utc_offset",
  "distance",
  "moving_time",
  "elapsed_time",
  "total_elevation_gain",
  "average_speed",
  "max_speed",
  "average_heartrate",
  "max_heartrate",
  "start_latitude",
  "start_longitude",
  "end_latitude",
  "end_longitude",
  "kudos_count",
  "comment_count",
  "athlete_count",
  "gear_id",
  "gear_name",
  "trainer",
  "commute",
  "private",
  "description",
  "calories",
  "average_watts",
  "kilojoules",
  "suffer_score",
  "summary_polyline",
  "polyline",
  "best_efforts",
  "synced_at",
] as const satisfies ReadonlyArray<keyof ActivityRecord>;

export type ActivityColumn = (typeof ACTIVITY_COLUMNS)[number];

/**
 * Columns filled only by a detail or gear lookup. A record whose lookup did not
 * run carries null here, and upserts keep the stored value instead.
 */
export const ENRICHMENT_COLUMNS: readonly ActivityColumn[] = ["gear_name", "calories", "polyline", "best_efforts"];

/** Written when a row is inserted, left alone by updates */
export const INSERT_ONLY_COLUMNS: readonly ActivityColumn[] = ["synced_at"];

export const activityRecordSchema = z.object({
  id: z.number().int(),
  start_date: z.string(),
});

/** What a sink already holds: SeenIdSet and its latest start date */
export interface SinkState {
  ids: Set<number>;
  latestStartDate: Date | null;
}
