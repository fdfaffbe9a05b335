/**
 * Strava - Supabase sink
 *
 * Upserts through the PostgREST interface (`on_conflict=id`,
 * merge-duplicates). PostgREST updates every column it is sent, so a payload
 * leaves out what must survive an update: synced_at (table default on insert)
 * and enrichment columns this run did not fill. Records sharing a column set
 * go in one request.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { StorageError } from "../../../lib/errors.js";
import { setupLogger } from "../../../lib/logger.js";
import {
  ACTIVITY_COLUMNS,
  ENRICHMENT_COLUMNS,
  INSERT_ONLY_COLUMNS,
  activityRecordSchema,
  type ActivityColumn,
  type ActivityRecord,
  type SinkState,
} from "../types.js";
import type { ActivitySink, WriteResult } from "./types.js";

const logger = setupLogger("strava-supabase-sink");

/** PostgREST default max-rows */
const PAGE_SIZE = 1000;

export function createSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

function payloadColumns(record: ActivityRecord): ActivityColumn[] {
  return ACTIVITY_COLUMNS.filter(
    (column) =>
      !INSERT_ONLY_COLUMNS.includes(column) && !(ENRICHMENT_COLUMNS.includes(column) && record[column] === null)
  );
}

export class SupabaseActivitySink implements ActivitySink {
  readonly name = "supabase";
  readonly mode = "upsert";

  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string = "strava_activities"
  ) {}

  async loadState(): Promise<SinkState> {
    const ids = new Set<number>();
    let latest: Date | null = null;

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.client
        .from(this.table)
        .select("id,start_date")
        .order("id", { ascending: true })
        .range(from, from + PAGE_SIZE - 1);

      if (error) {
        throw new StorageError(this.name, `loadState failed: ${error.message}`, { cause: error });
      }

      const rows = activityRecordSchema.array().safeParse(data ?? []);
      if (!rows.success) {
        throw new StorageError(this.name, `loadState returned unexpected rows from ${this.table}`);
      }

      for (const row of rows.data) {
        ids.add(row.id);
        const start = new Date(row.start_date);
        if (!Number.isNaN(start.getTime()) && (latest === null || start > latest)) {
          latest = start;
        }
      }

      if (rows.data.length < PAGE_SIZE) break;
    }

    logger.debug(`${this.table}: ${ids.size} existing activities`);
    return { ids, latestStartDate: latest };
  }

  async write(records: ActivityRecord[]): Promise<WriteResult> {
    if (records.length === 0) {
      return { written: 0, skipped: 0 };
    }

    const groups = new Map<string, Array<Record<string, unknown>>>();
    for (const record of records) {
      const columns = payloadColumns(record);
      const row = Object.fromEntries(columns.map((column) => [column, record[column]]));
      const key = columns.join(",");
      const group = groups.get(key);
      if (group) {
        group.push(row);
      } else {
        groups.set(key, [row]);
      }
    }

    for (const rows of groups.values()) {
      const { error } = await this.client.from(this.table).upsert(rows, { onConflict: "id" });
      if (error) {
        throw new StorageError(this.name, `upsert failed: ${error.message}`, { cause: error });
      }
    }

    logger.info(`Upserted ${records.length} records to ${this.table} in ${groups.size} request(s)`);
    return { written: records.length, skipped: 0 };
  }
}
