/**
 * Strava - Engine wiring
 *
 * Builds the credential store, token manager, API client, fetcher, sinks
 * and state tracker from a validated SyncConfig.
 */

import { FileCredentialStore, MemoryCredentialStore, type CredentialStore } from "../../lib/credential-store.js";
import { VaultCredentialStore } from "../../lib/credentials-vault.js";
import type { SyncConfig } from "../../lib/config.js";
import { ConfigError } from "../../lib/errors.js";
import type { Sleep } from "../../lib/retry.js";
import { StravaApiClient } from "./api-client.js";
import { ActivityFetcher } from "./fetcher.js";
import { SyncOrchestrator, type SyncOptions, type SyncReport } from "./orchestrator.js";
import { FileSyncStateStore, PostgresSyncStateStore, SyncStateTracker, type SyncStateStore } from "./sync-state.js";
import { TokenManager } from "./token-manager.js";
import { CsvFileSink } from "./sinks/csv-file-sink.js";
import { JsonFileSink } from "./sinks/json-file-sink.js";
import { PostgresActivitySink } from "./sinks/postgres-sink.js";
import { SupabaseActivitySink, createSupabaseClient } from "./sinks/supabase-sink.js";
import type { ActivitySink } from "./sinks/types.js";

export interface SyncEngine {
  tokens: TokenManager;
  client: StravaApiClient;
  fetcher: ActivityFetcher;
  sinks: ActivitySink[];
  tracker: SyncStateTracker;
  orchestrator: SyncOrchestrator;
}

export interface EngineOverrides {
  credentialStore?: CredentialStore | null;
  stateStore?: SyncStateStore;
  sinks?: ActivitySink[];
  sleep?: Sleep;
}

export function createCredentialStore(config: SyncConfig): CredentialStore {
  switch (config.credentialStore) {
    case "vault":
      if (config.databaseUrl === null) {
        throw new ConfigError(["CREDENTIAL_STORE=vault requires DIRECT_DATABASE_URL"]);
      }
      return new VaultCredentialStore(config.databaseUrl);
    case "file":
      return new FileCredentialStore(config.credentialsFile);
    case "memory":
      return new MemoryCredentialStore();
  }
}

export function createSinks(config: SyncConfig): ActivitySink[] {
  const sinks: ActivitySink[] = [];

  if (config.activityStore === "supabase" && config.supabase !== null) {
    const client = createSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);
    sinks.push(new SupabaseActivitySink(client, config.activityTable));
  } else if (config.activityStore === "postgres" && config.databaseUrl !== null) {
    sinks.push(new PostgresActivitySink(config.databaseUrl, config.activityTable));
  }

  if (config.jsonFile !== null) {
    sinks.push(new JsonFileSink(config.jsonFile));
  }
  if (config.csvFile !== null) {
    sinks.push(new CsvFileSink(config.csvFile));
  }
  return sinks;
}

export function createStateStore(config: SyncConfig): SyncStateStore {
  return config.databaseUrl !== null
    ? new PostgresSyncStateStore(config.databaseUrl)
    : new FileSyncStateStore(config.syncStateFile);
}

export function createSyncEngine(config: SyncConfig, overrides: EngineOverrides = {}): SyncEngine {
  const store = overrides.credentialStore === undefined ? createCredentialStore(config) : overrides.credentialStore;

  const tokens = new TokenManager({
    clientId: config.strava.clientId,
    clientSecret: config.strava.clientSecret,
    store,
    seedRefreshToken: config.strava.seedRefreshToken,
    authCode: config.strava.authCode,
    redirectUri: config.strava.redirectUri,
    staticAccessToken: config.strava.staticAccessToken,
    tokenUrl: config.strava.tokenUrl,
    sleep: overrides.sleep,
  });

  const client = new StravaApiClient(tokens, {
    baseUrl: config.strava.apiBase,
    rateLimitWaitSec: config.rateLimitWaitSec,
    sleep: overrides.sleep,
  });

  const fetcher = new ActivityFetcher(client, {
    stopOnShortPage: config.stopOnShortPage,
    detailPauseMs: config.detailPauseMs,
    sleep: overrides.sleep,
  });

  const sinks = overrides.sinks ?? createSinks(config);
  const tracker = new SyncStateTracker(sinks, overrides.stateStore ?? createStateStore(config));
  const orchestrator = new SyncOrchestrator({ tokens, fetcher, tracker, sinks });

  return { tokens, client, fetcher, sinks, tracker, orchestrator };
}

/**
 * One sync run with the configured defaults; options override config.
 */
export async function syncStrava(config: SyncConfig, options: SyncOptions = {}): Promise<SyncReport> {
  const engine = createSyncEngine(config);
  return engine.orchestrator.run({
    daysBack: config.daysBack,
    fetchDetails: config.fetchDetails,
    fetchGear: config.fetchGear,
    ...options,
  });
}
