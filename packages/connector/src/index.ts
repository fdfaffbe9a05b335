/**
 * @activity-sync/connector
 *
 * Strava activity sync engine.
 * Syncs activities into PostgreSQL / Supabase tables and local backup files.
 */

export * as strava from "./services/strava/index.js";

// Re-export lib utilities
export * from "./lib/config.js";
export * from "./lib/credential-store.js";
export * from "./lib/credentials-vault.js";
export * from "./lib/errors.js";
export * from "./lib/logger.js";
export * from "./lib/retry.js";

// Re-export db utilities
export * from "./db/upsert.js";
