/**
 * Process configuration
 *
 * Reads environment-style key/value settings (process.env, with .env loaded
 * by dotenv for local development) and validates them once at startup.
 * Every problem is collected into a single ConfigError.
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { parseLogLevel, type LogLevel } from "./logger.js";

export type CredentialStoreKind = "vault" | "file" | "memory";
export type ActivityStoreKind = "supabase" | "postgres" | "none";

export interface SyncConfig {
  strava: {
    clientId: string | null;
    clientSecret: string | null;
    staticAccessToken: string | null;
    seedRefreshToken: string | null;
    authCode: string | null;
    redirectUri: string | null;
    apiBase: string;
    tokenUrl: string;
  };
  credentialStore: CredentialStoreKind;
  credentialsFile: string;
  databaseUrl: string | null;
  supabase: { url: string; serviceRoleKey: string } | null;
  activityStore: ActivityStoreKind;
  activityTable: string;
  syncStateFile: string;
  daysBack: number;
  csvFile: string | null;
  jsonFile: string | null;
  fetchDetails: boolean;
  fetchGear: boolean;
  detailPauseMs: number;
  rateLimitWaitSec: number;
  stopOnShortPage: boolean;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const flag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return defaultValue;
      const normalized = value.trim().toLowerCase();
      if (["1", "true", "yes", "on"].includes(normalized)) return true;
      if (["0", "false", "no", "off"].includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
      return z.NEVER;
    });

const nonNegativeInt = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return defaultValue;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a non-negative integer, got "${value}"` });
        return z.NEVER;
      }
      return parsed;
    });

// Unset means default path; an explicitly empty value disables the sink.
const outputPath = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value.trim() || null));

const envSchema = z.object({
  STRAVA_CLIENT_ID: optionalString,
  STRAVA_CLIENT_SECRET: optionalString,
  STRAVA_ACCESS_TOKEN: optionalString,
  STRAVA_REFRESH_TOKEN: optionalString,
  STRAVA_AUTH_CODE: optionalString,
  STRAVA_REDIRECT_URI: optionalString,
  STRAVA_API_BASE: z.string().url().default("https://www.strava.com/api/v3"),
  STRAVA_TOKEN_URL: z.string().url().default("https://www.strava.com/oauth/token"),
  CREDENTIAL_STORE: z.enum(["vault", "file", "memory"]).optional(),
  STRAVA_CREDENTIALS_FILE: z.string().default(".strava-credentials.json"),
  DIRECT_DATABASE_URL: optionalString,
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  ACTIVITY_STORE: z.enum(["supabase", "postgres", "none"]).optional(),
  ACTIVITY_TABLE: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, "must be a lowercase SQL identifier")
    .default("strava_activities"),
  SYNC_STATE_FILE: z.string().default(".sync-state.json"),
  DAYS_BACK: nonNegativeInt(30),
  CSV_FILE: outputPath("activities.csv"),
  JSON_FILE: outputPath("activities_raw.json"),
  FETCH_DETAILS: flag(false),
  FETCH_GEAR: flag(false),
  DETAIL_PAUSE_MS: nonNegativeInt(1000),
  RATE_LIMIT_WAIT_SEC: nonNegativeInt(60),
  STOP_ON_SHORT_PAGE: flag(true),
  LOG_LEVEL: z.string().optional(),
});

/**
 * Validate configuration from an environment map.
 *
 * @throws ConfigError listing every missing or malformed setting
 */
export function loadConfig(env: Env = process.env): SyncConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  const problems: string[] = [];

  const logLevel = e.LOG_LEVEL === undefined ? "info" : parseLogLevel(e.LOG_LEVEL);
  if (logLevel === null) {
    problems.push(`LOG_LEVEL: unknown level "${e.LOG_LEVEL}"`);
  }

  if (!e.STRAVA_ACCESS_TOKEN && (!e.STRAVA_CLIENT_ID || !e.STRAVA_CLIENT_SECRET)) {
    problems.push("STRAVA_CLIENT_ID and STRAVA_CLIENT_SECRET are required unless STRAVA_ACCESS_TOKEN is set");
  }

  const supabase =
    e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
      ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
      : null;

  const credentialStore: CredentialStoreKind =
    e.CREDENTIAL_STORE ?? (e.DIRECT_DATABASE_URL ? "vault" : "file");
  if (credentialStore === "vault" && !e.DIRECT_DATABASE_URL) {
    problems.push("CREDENTIAL_STORE=vault requires DIRECT_DATABASE_URL");
  }

  const activityStore: ActivityStoreKind =
    e.ACTIVITY_STORE ?? (supabase ? "supabase" : e.DIRECT_DATABASE_URL ? "postgres" : "none");
  if (activityStore === "supabase" && !supabase) {
    problems.push("ACTIVITY_STORE=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY");
  }
  if (activityStore === "postgres" && !e.DIRECT_DATABASE_URL) {
    problems.push("ACTIVITY_STORE=postgres requires DIRECT_DATABASE_URL");
  }

  const hasCredentialSource =
    e.STRAVA_ACCESS_TOKEN !== null ||
    e.STRAVA_REFRESH_TOKEN !== null ||
    e.STRAVA_AUTH_CODE !== null ||
    credentialStore !== "memory";
  if (!hasCredentialSource) {
    problems.push(
      "No credential source: set STRAVA_REFRESH_TOKEN, STRAVA_AUTH_CODE, STRAVA_ACCESS_TOKEN or a durable CREDENTIAL_STORE"
    );
  }

  if (activityStore === "none" && e.CSV_FILE === null && e.JSON_FILE === null) {
    problems.push("No sink configured: enable ACTIVITY_STORE, CSV_FILE or JSON_FILE");
  }

  if (problems.length > 0 || logLevel === null) {
    throw new ConfigError(problems);
  }

  return {
    strava: {
      clientId: e.STRAVA_CLIENT_ID,
      clientSecret: e.STRAVA_CLIENT_SECRET,
      staticAccessToken: e.STRAVA_ACCESS_TOKEN,
      seedRefreshToken: e.STRAVA_REFRESH_TOKEN,
      authCode: e.STRAVA_AUTH_CODE,
      redirectUri: e.STRAVA_REDIRECT_URI,
      apiBase: e.STRAVA_API_BASE.replace(/\/+$/, ""),
      tokenUrl: e.STRAVA_TOKEN_URL,
    },
    credentialStore,
    credentialsFile: e.STRAVA_CREDENTIALS_FILE,
    databaseUrl: e.DIRECT_DATABASE_URL,
    supabase,
    activityStore,
    activityTable: e.ACTIVITY_TABLE,
    syncStateFile: e.SYNC_STATE_FILE,
    daysBack: e.DAYS_BACK,
    csvFile: e.CSV_FILE,
    jsonFile: e.JSON_FILE,
    fetchDetails: e.FETCH_DETAILS,
    fetchGear: e.FETCH_GEAR,
    detailPauseMs: e.DETAIL_PAUSE_MS,
    rateLimitWaitSec: e.RATE_LIMIT_WAIT_SEC,
    stopOnShortPage: e.STOP_ON_SHORT_PAGE,
    logLevel,
  };
}

/**
 * Load .env (local development) and validate process.env.
 */
export function loadConfigFromProcess(): SyncConfig {
  loadDotenv();
  return loadConfig(process.env);
}
