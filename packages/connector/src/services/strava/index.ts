/**
 * Strava Service
 *
 * Incremental activity sync: token lifecycle, paginated fetch, merge,
 * multi-sink persistence.
 */

export { createSyncEngine, createCredentialStore, createSinks, createStateStore, syncStrava } from "./engine.js";
export { SyncOrchestrator } from "./orchestrator.js";
export { TokenManager, STRAVA_TOKEN_URL } from "./token-manager.js";
export { StravaApiClient, STRAVA_API_BASE } from "./api-client.js";
export { ActivityFetcher, MAX_PER_PAGE, WATERMARK_OVERLAP_SEC } from "./fetcher.js";
export { merge, toActivityRecord, latestStartDate } from "./merger.js";
export {
  SyncStateTracker,
  FileSyncStateStore,
  PostgresSyncStateStore,
  MemorySyncStateStore,
} from "./sync-state.js";
export { PostgresActivitySink } from "./sinks/postgres-sink.js";
export { SupabaseActivitySink, createSupabaseClient } from "./sinks/supabase-sink.js";
export { JsonFileSink } from "./sinks/json-file-sink.js";
export { CsvFileSink, CSV_HEADER } from "./sinks/csv-file-sink.js";
export { MemoryActivitySink, applyUpsert } from "./sinks/memory-sink.js";
export { ACTIVITY_COLUMNS, ENRICHMENT_COLUMNS, INSERT_ONLY_COLUMNS } from "./types.js";

// Types
export type { SyncEngine, EngineOverrides } from "./engine.js";
export type { SyncOptions, SyncReport, SinkReport, SyncPhase } from "./orchestrator.js";
export type { AccessTokenProvider, TokenManagerOptions } from "./token-manager.js";
export type { MergeResult } from "./merger.js";
export type { SyncState, SyncStateStore, LoadedState } from "./sync-state.js";
export type { ActivitySink, SinkMode, WriteResult } from "./sinks/types.js";
export type { ActivityColumn, ActivityRecord, ActivitySummary, ActivityDetail, FetchedActivity, SinkState } from "./types.js";
