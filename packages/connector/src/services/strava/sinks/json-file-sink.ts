/**
 * Strava - JSON backup sink
 *
 * One file holding a JSON array of every record ever synced. Append is a
 * read-modify-write of the whole file, replaced atomically. Ids already in
 * the file are skipped; the file is the only source of truth for that.
 */

import { z } from "zod";
import { StorageError, describeError } from "../../../lib/errors.js";
import { readFileIfExists, writeFileAtomic } from "../../../lib/files.js";
import { setupLogger } from "../../../lib/logger.js";
import { latestStartDate } from "../merger.js";
import type { ActivityRecord, SinkState } from "../types.js";
import type { ActivitySink, WriteResult } from "./types.js";

const logger = setupLogger("strava-json-sink");

const storedEntrySchema = z.object({ id: z.number().int(), start_date: z.string() }).passthrough();
type StoredEntry = z.infer<typeof storedEntrySchema>;

export class JsonFileSink implements ActivitySink {
  readonly name = "json-file";
  readonly mode = "append";

  constructor(private readonly filePath: string) {}

  private async readEntries(): Promise<StoredEntry[]> {
    let raw: string | null;
    try {
      raw = await readFileIfExists(this.filePath);
    } catch (error) {
      throw new StorageError(this.name, `Failed to read ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
    if (raw === null || raw.trim() === "") {
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      // Refuse to overwrite a backup we cannot read.
      throw new StorageError(this.name, `${this.filePath} is not valid JSON`, { cause: error });
    }

    const parsed = z.array(storedEntrySchema).safeParse(json);
    if (!parsed.success) {
      throw new StorageError(this.name, `${this.filePath} is not an array of activity records`);
    }
    return parsed.data;
  }

  async loadState(): Promise<SinkState> {
    const entries = await this.readEntries();
    return {
      ids: new Set(entries.map((entry) => entry.id)),
      latestStartDate: latestStartDate(entries),
    };
  }

  async write(records: ActivityRecord[]): Promise<WriteResult> {
    const entries = await this.readEntries();
    const existing = new Set(entries.map((entry) => entry.id));

    const fresh: ActivityRecord[] = [];
    for (const record of records) {
      if (!existing.has(record.id)) {
        existing.add(record.id);
        fresh.push(record);
      }
    }
    const skipped = records.length - fresh.length;

    if (fresh.length === 0) {
      logger.info(`No new records for ${this.filePath} (${skipped} already present)`);
      return { written: 0, skipped };
    }

    try {
      await writeFileAtomic(this.filePath, JSON.stringify([...entries, ...fresh]));
    } catch (error) {
      throw new StorageError(this.name, `Failed to write ${this.filePath}: ${describeError(error)}`, { cause: error });
    }

    logger.info(`Appended ${fresh.length} records to ${this.filePath} (${skipped} already present)`);
    return { written: fresh.length, skipped };
  }
}
