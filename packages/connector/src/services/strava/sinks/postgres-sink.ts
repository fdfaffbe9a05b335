/**
 * Strava - PostgreSQL sink
 *
 * Direct connection (DIRECT_DATABASE_URL). The table is created by the
 * migration; a rejected column fails the write loudly.
 *
 * Enrichment columns are COALESCEd so a run without detail calls does not
 * clear values stored by an earlier one; synced_at is set on insert only.
 */

import pg from "pg";
import { upsertRows } from "../../../db/upsert.js";
import { StorageError, describeError } from "../../../lib/errors.js";
import {
  ACTIVITY_COLUMNS,
  ENRICHMENT_COLUMNS,
  INSERT_ONLY_COLUMNS,
  type ActivityRecord,
  type SinkState,
} from "../types.js";
import type { ActivitySink, WriteResult } from "./types.js";

const { Client } = pg;

export class PostgresActivitySink implements ActivitySink {
  readonly name = "postgres";
  readonly mode = "upsert";

  constructor(
    private readonly databaseUrl: string,
    private readonly table: string = "strava_activities"
  ) {}

  private async withClient<T>(action: string, fn: (client: pg.Client) => Promise<T>): Promise<T> {
    const client = new Client({ connectionString: this.databaseUrl });
    try {
      await client.connect();
      return await fn(client);
    } catch (error) {
      throw new StorageError(this.name, `${action} failed: ${describeError(error)}`, { cause: error });
    } finally {
      await client.end();
    }
  }

  async loadState(): Promise<SinkState> {
    return this.withClient("loadState", async (client) => {
      // bigint comes back as text from node-postgres
      const result = await client.query<{ id: string; start_date: Date | null }>(
        `SELECT id, start_date FROM "${this.table}"`
      );

      const ids = new Set<number>();
      let latest: Date | null = null;
      for (const row of result.rows) {
        ids.add(Number(row.id));
        if (row.start_date !== null && (latest === null || row.start_date > latest)) {
          latest = row.start_date;
        }
      }
      return { ids, latestStartDate: latest };
    });
  }

  async write(records: ActivityRecord[]): Promise<WriteResult> {
    if (records.length === 0) {
      return { written: 0, skipped: 0 };
    }
    const result = await this.withClient("upsert", (client) =>
      upsertRows(client, this.table, ACTIVITY_COLUMNS, records, "id", {
        keepExisting: ENRICHMENT_COLUMNS,
        insertOnly: INSERT_ONLY_COLUMNS,
      })
    );
    return { written: result.total, skipped: 0 };
  }
}
