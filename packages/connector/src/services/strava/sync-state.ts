/**
 * Strava - Sync State
 *
 * SeenIdSet and SyncWatermark, re-derived from durable state at the start of
 * every run; nothing in memory is trusted across runs.
 *
 * Watermark resolution:
 * - the stored watermark (strava_sync_state row or state file) when present
 * - else the earliest of the sinks' latest start dates, so a freshly added
 *   empty sink forces a backfill instead of being skipped
 * - else null (caller falls back to the lookback window)
 */

import pg from "pg";
import { z } from "zod";
import { setupLogger } from "../../lib/logger.js";
import { StorageError, describeError } from "../../lib/errors.js";
import { readFileIfExists, writeFileAtomic } from "../../lib/files.js";
import type { ActivitySink } from "./sinks/types.js";
import type { SinkState } from "./types.js";

const { Client } = pg;
const logger = setupLogger("strava-sync-state");

export interface SyncState {
  seenIds: Set<number>;
  watermark: Date | null;
}

export interface SyncStateStore {
  readonly name: string;
  loadWatermark(): Promise<Date | null>;
  /** Never lowers a stored watermark */
  saveWatermark(watermark: Date): Promise<void>;
}

// =============================================================================
// Stores
// =============================================================================

const stateFileSchema = z.object({
  watermark: z.string().nullable(),
  updated_at: z.string().optional(),
});

export class FileSyncStateStore implements SyncStateStore {
  readonly name = "state-file";

  constructor(private readonly filePath: string) {}

  async loadWatermark(): Promise<Date | null> {
    try {
      const raw = await readFileIfExists(this.filePath);
      if (raw === null || raw.trim() === "") return null;
      const parsed = stateFileSchema.parse(JSON.parse(raw));
      return parsed.watermark === null ? null : new Date(parsed.watermark);
    } catch (error) {
      throw new StorageError(this.name, `Failed to read ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
  }

  async saveWatermark(watermark: Date): Promise<void> {
    const current = await this.loadWatermark();
    if (current !== null && current.getTime() >= watermark.getTime()) {
      return;
    }
    try {
      const content = { watermark: watermark.toISOString(), updated_at: new Date().toISOString() };
      await writeFileAtomic(this.filePath, JSON.stringify(content, null, 2) + "\n");
    } catch (error) {
      throw new StorageError(this.name, `Failed to write ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
  }
}

export class PostgresSyncStateStore implements SyncStateStore {
  readonly name = "state-postgres";

  constructor(
    private readonly databaseUrl: string,
    private readonly source: string = "strava"
  ) {}

  private async withClient<T>(fn: (client: pg.Client) => Promise<T>): Promise<T> {
    const client = new Client({ connectionString: this.databaseUrl });
    try {
      await client.connect();
      return await fn(client);
    } catch (error) {
      throw new StorageError(this.name, describeError(error), { cause: error });
    } finally {
      await client.end();
    }
  }

  async loadWatermark(): Promise<Date | null> {
    return this.withClient(async (client) => {
      const result = await client.query<{ watermark: Date | null }>(
        "SELECT watermark FROM strava_sync_state WHERE source = $1",
        [this.source]
      );
      return result.rows[0]?.watermark ?? null;
    });
  }

  async saveWatermark(watermark: Date): Promise<void> {
    await this.withClient(async (client) => {
      await client.query(
        `INSERT INTO strava_sync_state (source, watermark, synced_at)
         VALUES ($1, $2, NOW())
         ON CONFLICT (source) DO UPDATE SET
           watermark = GREATEST(strava_sync_state.watermark, EXCLUDED.watermark),
           synced_at = EXCLUDED.synced_at`,
        [this.source, watermark.toISOString()]
      );
    });
    logger.debug(`Updated sync state watermark: ${watermark.toISOString()}`);
  }
}

export class MemorySyncStateStore implements SyncStateStore {
  readonly name = "state-memory";

  constructor(private watermark: Date | null = null) {}

  async loadWatermark(): Promise<Date | null> {
    return this.watermark;
  }

  async saveWatermark(watermark: Date): Promise<void> {
    if (this.watermark === null || watermark > this.watermark) {
      this.watermark = watermark;
    }
  }
}

// =============================================================================
// Tracker
// =============================================================================

export interface LoadedState extends SyncState {
  /** Per-sink state as read at the start of the run */
  sinks: Map<string, SinkState>;
  /** Sinks whose state could not be read */
  errors: string[];
}

export class SyncStateTracker {
  constructor(
    private readonly sinks: ActivitySink[],
    private readonly store: SyncStateStore
  ) {}

  async loadState(): Promise<LoadedState> {
    const seenIds = new Set<number>();
    const sinkStates = new Map<string, SinkState>();
    const errors: string[] = [];

    for (const sink of this.sinks) {
      try {
        const state = await sink.loadState();
        sinkStates.set(sink.name, state);
        for (const id of state.ids) seenIds.add(id);
        logger.debug(`${sink.name}: ${state.ids.size} ids, latest ${state.latestStartDate?.toISOString() ?? "none"}`);
      } catch (error) {
        logger.warn(`Could not read state from ${sink.name}: ${describeError(error)}`);
        errors.push(`${sink.name} state: ${describeError(error)}`);
      }
    }

    let watermark: Date | null = null;
    try {
      watermark = await this.store.loadWatermark();
    } catch (error) {
      logger.warn(`Could not read stored watermark: ${describeError(error)}`);
      errors.push(`${this.store.name}: ${describeError(error)}`);
    }

    if (watermark === null) {
      watermark = SyncStateTracker.deriveWatermark(this.sinks.map((sink) => sinkStates.get(sink.name)));
      if (watermark !== null) {
        logger.info(`Watermark derived from sinks: ${watermark.toISOString()}`);
      }
    }

    return { seenIds, watermark, sinks: sinkStates, errors };
  }

  /**
   * Earliest "latest start date" across sinks; null if any sink is empty or unreadable.
   */
  static deriveWatermark(states: Array<SinkState | undefined>): Date | null {
    if (states.length === 0) return null;
    let earliest: Date | null = null;
    for (const state of states) {
      if (state === undefined || state.latestStartDate === null) return null;
      if (earliest === null || state.latestStartDate < earliest) earliest = state.latestStartDate;
    }
    return earliest;
  }

  /**
   * Next watermark: never below the previous one.
   */
  static advance(previous: Date | null, latestAccepted: Date | null): Date | null {
    if (latestAccepted === null) return previous;
    if (previous === null || latestAccepted > previous) return latestAccepted;
    return previous;
  }

  async commit(previous: Date | null, latestAccepted: Date | null): Promise<Date | null> {
    const next = SyncStateTracker.advance(previous, latestAccepted);
    if (next !== null && (previous === null || next > previous)) {
      await this.store.saveWatermark(next);
      logger.info(`Watermark advanced to ${next.toISOString()}`);
    }
    return next;
  }
}
