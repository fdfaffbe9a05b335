#!/usr/bin/env npx tsx
/**
 * Strava CLI
 *
 * Usage:
 *   npx tsx src/services/strava/cli.ts [--days N | --full] [--details] [--gear] [--log-level debug|info|warn|error]
 *
 * Exit code 1 only for run-fatal errors (configuration, credentials, every sink failing).
 */

import { existsSync, realpathSync } from "fs";
import { pathToFileURL } from "url";
import { loadConfigFromProcess } from "../../lib/config.js";
import { ConfigError, describeError } from "../../lib/errors.js";
import { LOG_LEVELS, isLogLevel, setLogLevel, type LogLevel } from "../../lib/logger.js";
import { syncStrava } from "./engine.js";
import type { SyncOptions, SyncReport } from "./orchestrator.js";

function printUsage(): void {
  console.log(`Usage:
  npx tsx src/services/strava/cli.ts [options]

Incrementally syncs Strava activities into the configured sinks
(Supabase / PostgreSQL table, JSON backup, CSV backup).

Options:
  --days N           Lookback window when no watermark exists (0 = full history, default: DAYS_BACK or 30)
  --full             Ignore the watermark and fetch the full history
  --details          Fetch per-activity details for new activities
  --gear             Resolve gear names
  --log-level LEVEL  Log level: ${LOG_LEVELS.join(", ")} (default: LOG_LEVEL or info)
`);
}

interface ParsedArgs {
  options: SyncOptions;
  logLevel?: LogLevel;
}

export function parseArgs(args: string[]): ParsedArgs | { error: string } | "help" {
  const options: SyncOptions = {};
  let logLevel: LogLevel | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      return "help";
    } else if (arg === "--days") {
      const days = Number(args[i + 1]);
      if (args[i + 1] === undefined || !Number.isInteger(days) || days < 0) {
        return { error: "Invalid --days value" };
      }
      options.daysBack = days;
      i++;
    } else if (arg === "--full") {
      options.full = true;
    } else if (arg === "--details") {
      options.fetchDetails = true;
    } else if (arg === "--gear") {
      options.fetchGear = true;
    } else if (arg === "--log-level") {
      const level = args[i + 1];
      if (level === undefined || !isLogLevel(level)) {
        return { error: `Invalid --log-level value. Must be one of: ${LOG_LEVELS.join(", ")}` };
      }
      logLevel = level;
      i++;
    } else {
      return { error: `Unknown argument: ${arg}` };
    }
  }

  return { options, logLevel };
}

export function formatReport(report: SyncReport): string[] {
  const lines = [
    `  Fetched: ${report.fetchedCount} (${report.newCount} new, ${report.updatedCount} already synced)`,
  ];
  if (report.detailsFetched > 0) {
    lines.push(`  Details: ${report.detailsFetched}`);
  }
  for (const sink of report.sinks) {
    if (!sink.ok) {
      lines.push(`  ${sink.sink}: FAILED (${sink.error ?? "unknown error"})`);
    } else if (sink.mode === "append") {
      lines.push(`  ${sink.sink}: ${sink.written} appended, ${sink.skipped} already present`);
    } else {
      lines.push(`  ${sink.sink}: ${sink.written} upserted`);
    }
  }
  lines.push(`  Watermark: ${report.watermarkAfter?.toISOString() ?? "none"}`);
  for (const error of report.errors) {
    lines.push(`  Warning: ${error}`);
  }
  lines.push(`  Elapsed: ${(report.elapsedMs / 1000).toFixed(2)}s`);
  return lines;
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed === "help") {
    printUsage();
    process.exit(0);
  }
  if ("error" in parsed) {
    console.error(parsed.error);
    process.exit(1);
  }

  try {
    const config = loadConfigFromProcess();
    setLogLevel(parsed.logLevel ?? config.logLevel);

    const report = await syncStrava(config, parsed.options);

    if (report.status === "done") {
      const degraded = report.errors.length > 0 || report.sinks.some((s) => !s.ok);
      console.log(degraded ? "[WARN] Strava sync completed with warnings:" : "[OK] Strava sync completed:");
      formatReport(report).forEach((line) => console.log(line));
      process.exit(0);
    }

    console.error(`[ERROR] Strava sync failed: ${report.failure?.reason ?? "unknown"}`);
    formatReport(report).forEach((line) => console.error(line));
    process.exit(1);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error("[ERROR] Invalid configuration:");
      error.problems.forEach((problem) => console.error(`  - ${problem}`));
    } else {
      console.error(`[ERROR] Strava sync failed: ${describeError(error)}`);
    }
    process.exit(1);
  }
}

// Only run when executed directly (not when imported by tests)
const entry = process.argv[1];
if (entry !== undefined && existsSync(entry) && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  main().catch((error) => {
    console.error(`[ERROR] Strava sync failed: ${describeError(error)}`);
    process.exit(1);
  });
}
