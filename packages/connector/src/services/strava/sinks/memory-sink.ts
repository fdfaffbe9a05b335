/**
 * Strava - In-memory sink
 *
 * Upsert-capable store held in a Map, following the same column rules as the
 * database sinks. Useful for dry runs and for embedding the engine.
 */

import { latestStartDate } from "../merger.js";
import {
  ENRICHMENT_COLUMNS,
  INSERT_ONLY_COLUMNS,
  type ActivityColumn,
  type ActivityRecord,
  type SinkState,
} from "../types.js";
import type { ActivitySink, WriteResult } from "./types.js";

function copyColumn<K extends ActivityColumn>(target: ActivityRecord, source: ActivityRecord, column: K): void {
  target[column] = source[column];
}

/** The row an upsert of `incoming` leaves behind when `stored` already exists */
export function applyUpsert(stored: ActivityRecord, incoming: ActivityRecord): ActivityRecord {
  const next = { ...incoming };
  for (const column of INSERT_ONLY_COLUMNS) {
    copyColumn(next, stored, column);
  }
  for (const column of ENRICHMENT_COLUMNS) {
    if (next[column] === null) copyColumn(next, stored, column);
  }
  return next;
}

export class MemoryActivitySink implements ActivitySink {
  readonly name = "memory";
  readonly mode = "upsert";
  readonly rows = new Map<number, ActivityRecord>();

  async loadState(): Promise<SinkState> {
    return { ids: new Set(this.rows.keys()), latestStartDate: latestStartDate(this.rows.values()) };
  }

  async write(records: ActivityRecord[]): Promise<WriteResult> {
    for (const record of records) {
      const stored = this.rows.get(record.id);
      this.rows.set(record.id, stored === undefined ? { ...record } : applyUpsert(stored, record));
    }
    return { written: records.length, skipped: 0 };
  }
}
