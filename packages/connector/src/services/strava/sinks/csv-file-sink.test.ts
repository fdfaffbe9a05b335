import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { record } from "../../../__tests__/fixtures.js";
import { StorageError } from "../../../lib/errors.js";
import { CSV_HEADER, CsvFileSink, escapeCsvField, parseCsv, toCsvRow } from "./csv-file-sink.js";

const HEADER_LINE =
  "ID,Name,Date,Type,Distance (km),Moving Time (min),Elapsed Time (min),Elevation Gain (m),Avg Speed (km/h),Max Speed (km/h),Avg Heart Rate,Max Heart Rate";

describe("toCsvRow", () => {
  it("should convert units and escape text", () => {
    const row = toCsvRow(record(42, "2024-05-01T06:00:00Z", { name: 'Run, "easy"', average_heartrate: 150.26 }));

    expect(row).toBe('42,"Run, ""easy""",2024-05-01T06:00:00Z,Run,5.00,25.0,26.7,12.5,12.00,16.20,150.3,');
  });

  it("should leave missing values empty", () => {
    const row = toCsvRow(record(1, "2024-05-01T06:00:00Z", { name: null, distance: null, moving_time: null }));

    expect(row.split(",").slice(0, 6)).toEqual(["1", "", "2024-05-01T06:00:00Z", "Run", "", ""]);
  });
});

describe("escapeCsvField", () => {
  it("should quote only when needed", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a\nb")).toBe('"a\nb"');
  });
});

describe("parseCsv", () => {
  it("should handle quoted fields, doubled quotes and CRLF", () => {
    expect(parseCsv('a,"b ""c""",d\r\n1,"x\ny",3\r\n')).toEqual([
      ["a", 'b "c"', "d"],
      ["1", "x\ny", "3"],
    ]);
  });

  it("should read a last line without a newline", () => {
    expect(parseCsv("a,b\n1,2")).toEqual([
      ["a", "b"],
      ["1", "2"],
    ]);
  });
});

describe("CsvFileSink", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "csv-sink-"));
    filePath = path.join(dir, "activities.csv");
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("should write the header once and append new rows only", async () => {
    const sink = new CsvFileSink(filePath);

    await expect(sink.write([record(42, "2024-05-01T06:00:00Z")])).resolves.toEqual({ written: 1, skipped: 0 });
    await expect(sink.write([record(42, "2024-05-01T06:00:00Z"), record(43, "2024-05-02T06:00:00Z")])).resolves.toEqual({
      written: 1,
      skipped: 1,
    });

    const lines = (await fs.promises.readFile(filePath, "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(HEADER_LINE);
    expect(lines.map((line) => line.split(",")[0])).toEqual(["ID", "42", "43"]);
  });

  it("should expose the header columns in order", () => {
    expect(CSV_HEADER.join(",")).toBe(HEADER_LINE);
  });

  it("should load ids and the latest date from the file", async () => {
    const sink = new CsvFileSink(filePath);
    await sink.write([record(7, "2024-05-03T06:00:00Z"), record(8, "2024-05-01T06:00:00Z")]);

    const state = await sink.loadState();

    expect([...state.ids]).toEqual([7, 8]);
    expect(state.latestStartDate).toEqual(new Date("2024-05-03T06:00:00Z"));
  });

  it("should append to a file written without a trailing newline", async () => {
    await fs.promises.writeFile(filePath, `${HEADER_LINE}\n1,a,2024-05-01T06:00:00Z,Run,,,,,,,,`, "utf8");

    await new CsvFileSink(filePath).write([record(2, "2024-05-02T06:00:00Z")]);

    const rows = parseCsv(await fs.promises.readFile(filePath, "utf8"));
    expect(rows.map((row) => row[0])).toEqual(["ID", "1", "2"]);
  });

  it("should reject a file with a different header", async () => {
    await fs.promises.writeFile(filePath, "id,name\n1,x\n", "utf8");

    await expect(new CsvFileSink(filePath).write([record(2, "2024-05-02T06:00:00Z")])).rejects.toBeInstanceOf(StorageError);
  });
});
