import type { ActivityRecord, ActivitySummary } from "../services/strava/types.js";

export const API_BASE = "https://strava.test/api/v3";
export const TOKEN_URL = "https://strava.test/oauth/token";

/** Raw list-endpoint payload for one activity */
export function summaryPayload(id: number, startDate: string, overrides: Record<string, unknown> = {}) {
  return {
    id,
    name: `Activity ${id}`,
    type: "Run",
    sport_type: "Run",
    start_date: startDate,
    distance: 5000,
    moving_time: 1500,
    elapsed_time: 1600,
    total_elevation_gain: 12.5,
    average_speed: 3.333,
    max_speed: 4.5,
    start_latlng: [35.68, 139.76],
    end_latlng: [35.69, 139.77],
    kudos_count: 1,
    map: { summary_polyline: "abc" },
    ...overrides,
  };
}

export function summary(id: number, startDate: string): ActivitySummary {
  return {
    id,
    name: `Activity ${id}`,
    type: "Run",
    start_date: startDate,
    start_latlng: null,
    end_latlng: null,
  };
}

export function record(id: number, startDate: string, overrides: Partial<ActivityRecord> = {}): ActivityRecord {
  return {
    id,
    name: `Activity ${id}`,
    type: "Run",
    sport_type: "Run",
    start_date: startDate,
    timezone: null,
    utc_offset: null,
    distance: 5000,
    moving_time: 1500,
    elapsed_time: 1600,
    total_elevation_gain: 12.5,
    average_speed: 3.333,
    max_speed: 4.5,
    average_heartrate: null,
    max_heartrate: null,
    start_latitude: null,
    start_longitude: null,
    end_latitude: null,
    end_longitude: null,
    kudos_count: null,
    comment_count: null,
    athlete_count: null,
    gear_id: null,
    gear_name: null,
    trainer: null,
    commute: null,
    private: null,
    description: null,
    calories: null,
    average_watts: null,
    kilojoules: null,
    suffer_score: null,
    summary_polyline: null,
    polyline: null,
    best_efforts: null,
    synced_at: "2024-06-01T00:00:00.000Z",
    ...overrides,
  };
}

/** Sequence of page sizes → list of payload pages with increasing ids and dates */
export function pages(sizes: number[], startId: number = 1): Array<Array<ReturnType<typeof summaryPayload>>> {
  let id = startId;
  return sizes.map((size) =>
    Array.from({ length: size }, () => {
      const current = id++;
      return summaryPayload(current, new Date(Date.UTC(2024, 0, 1) + current * 60_000).toISOString());
    })
  );
}
