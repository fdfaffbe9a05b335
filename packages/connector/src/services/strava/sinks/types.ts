/**
 * Strava - Sink contract
 */

import type { ActivityRecord, SinkState } from "../types.js";

/**
 * "upsert": merge-on-id destination; every record is written, repeats update in place.
 * "append": flat file without merge-on-key; records whose id the file already
 * holds are skipped, based on the file itself.
 */
export type SinkMode = "upsert" | "append";

export interface WriteResult {
  /** Rows inserted or updated */
  written: number;
  /** Records skipped because the destination already held their id */
  skipped: number;
}

export interface ActivitySink {
  readonly name: string;
  readonly mode: SinkMode;
  /** Ids and latest start date already held by this destination */
  loadState(): Promise<SinkState>;
  /**
   * Persist records idempotently.
   *
   * @throws StorageError on I/O or connection failure
   */
  write(records: ActivityRecord[]): Promise<WriteResult>;
}
