/**
 * Strava - CSV backup sink
 *
 * Delimited table for human inspection. Rows are appended; ids already in
 * the file (first column) are skipped. A file whose header differs from
 * CSV_HEADER is rejected rather than extended with mismatched columns.
 */

import fs from "fs";
import path from "path";
import { StorageError, describeError } from "../../../lib/errors.js";
import { readFileIfExists } from "../../../lib/files.js";
import { setupLogger } from "../../../lib/logger.js";
import type { ActivityRecord, SinkState } from "../types.js";
import type { ActivitySink, WriteResult } from "./types.js";

const logger = setupLogger("strava-csv-sink");

export const CSV_HEADER = [
  "ID",
  "Name",
  "Date",
  "Type",
  "Distance (km)",
  "Moving Time (min)",
  "Elapsed Time (min)",
  "Elevation Gain (m)",
  "Avg Speed (km/h)",
  "Max Speed (km/h)",
  "Avg Heart Rate",
  "Max Heart Rate",
] as const;

const ID_COLUMN = 0;
const DATE_COLUMN = 2;

function fixed(value: number | null, factor: number, digits: number): string {
  return value === null ? "" : (value * factor).toFixed(digits);
}

export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsvRow(record: ActivityRecord): string {
  return [
    String(record.id),
    record.name ?? "",
    record.start_date,
    record.type,
    fixed(record.distance, 1 / 1000, 2),
    fixed(record.moving_time, 1 / 60, 1),
    fixed(record.elapsed_time, 1 / 60, 1),
    fixed(record.total_elevation_gain, 1, 1),
    fixed(record.average_speed, 3.6, 2),
    fixed(record.max_speed, 3.6, 2),
    fixed(record.average_heartrate, 1, 1),
    fixed(record.max_heartrate, 1, 1),
  ]
    .map(escapeCsvField)
    .join(",");
}

/**
 * Parse RFC 4180 text (quoted fields, doubled quotes, CRLF or LF).
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += char;
    }
  }

  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows.filter((r) => !(r.length === 1 && r[0] === ""));
}

export class CsvFileSink implements ActivitySink {
  readonly name = "csv-file";
  readonly mode = "append";

  constructor(private readonly filePath: string) {}

  private async readRows(): Promise<{ rows: string[][]; raw: string | null }> {
    let raw: string | null;
    try {
      raw = await readFileIfExists(this.filePath);
    } catch (error) {
      throw new StorageError(this.name, `Failed to read ${this.filePath}: ${describeError(error)}`, { cause: error });
    }
    if (raw === null || raw.trim() === "") {
      return { rows: [], raw };
    }

    const [header, ...rows] = parseCsv(raw);
    if (header.join(",") !== CSV_HEADER.join(",")) {
      throw new StorageError(this.name, `${this.filePath} has an unexpected header: ${header.join(",")}`);
    }
    return { rows, raw };
  }

  async loadState(): Promise<SinkState> {
    const { rows } = await this.readRows();
    const ids = new Set<number>();
    let latest: Date | null = null;

    for (const row of rows) {
      const id = Number(row[ID_COLUMN]);
      if (Number.isInteger(id)) ids.add(id);
      const date = new Date(row[DATE_COLUMN] ?? "");
      if (!Number.isNaN(date.getTime()) && (latest === null || date > latest)) latest = date;
    }
    return { ids, latestStartDate: latest };
  }

  async write(records: ActivityRecord[]): Promise<WriteResult> {
    const { rows, raw } = await this.readRows();
    const existing = new Set(rows.map((row) => row[ID_COLUMN]));

    const lines: string[] = [];
    for (const record of records) {
      const id = String(record.id);
      if (!existing.has(id)) {
        existing.add(id);
        lines.push(toCsvRow(record));
      }
    }
    const skipped = records.length - lines.length;

    if (lines.length === 0) {
      logger.info(`No new rows for ${this.filePath} (${skipped} already present)`);
      return { written: 0, skipped };
    }

    let content = lines.join("\n") + "\n";
    if (raw === null || raw.trim() === "") {
      content = CSV_HEADER.map(escapeCsvField).join(",") + "\n" + content;
    } else if (!raw.endsWith("\n")) {
      content = "\n" + content;
    }

    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      if (raw === null || raw.trim() === "") {
        await fs.promises.writeFile(this.filePath, content, "utf8");
      } else {
        await fs.promises.appendFile(this.filePath, content, "utf8");
      }
    } catch (error) {
      throw new StorageError(this.name, `Failed to write ${this.filePath}: ${describeError(error)}`, { cause: error });
    }

    logger.info(`Appended ${lines.length} rows to ${this.filePath} (${skipped} already present)`);
    return { written: lines.length, skipped };
  }
}
