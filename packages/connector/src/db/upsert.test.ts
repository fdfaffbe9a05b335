import { describe, it, expect, vi } from "vitest";
import { MAX_BIND_PARAMS, buildUpsert, upsertRows } from "./upsert.js";

function fakeClient(failOn?: string) {
  const query = vi.fn(async (text: string, _values?: unknown[]) => {
    if (failOn !== undefined && text.includes(failOn)) {
      throw new Error("insert failed");
    }
    return { rows: [], rowCount: 0 };
  });
  return { query };
}

describe("buildUpsert", () => {
  it("should number placeholders across rows and skip the key in the update list", () => {
    const statement = buildUpsert(
      "strava_activities",
      ["id", "name"] as const,
      [
        { id: 1, name: "a" },
        { id: 2, name: "b" },
      ],
      "id"
    );

    expect(statement.values).toEqual([1, "a", 2, "b"]);
    expect(statement.text).toContain('INSERT INTO "strava_activities" ("id", "name")');
    expect(statement.text).toContain("VALUES ($1, $2), ($3, $4)");
    expect(statement.text).toContain('ON CONFLICT ("id") DO UPDATE SET');
    expect(statement.text).toContain('"name" = EXCLUDED."name"');
    expect(statement.text).not.toContain('"id" = EXCLUDED."id"');
  });

  it("should keep stored values for nullable columns and leave insert-only columns alone", () => {
    const statement = buildUpsert(
      "strava_activities",
      ["id", "name", "calories", "synced_at"] as const,
      [{ id: 1, name: "a", calories: null, synced_at: "2024-06-01T00:00:00.000Z" }],
      "id",
      { keepExisting: ["calories"], insertOnly: ["synced_at"] }
    );

    expect(statement.values).toEqual([1, "a", null, "2024-06-01T00:00:00.000Z"]);
    expect(statement.text).toContain('"name" = EXCLUDED."name"');
    expect(statement.text).toContain('"calories" = COALESCE(EXCLUDED."calories", "strava_activities"."calories")');
    expect(statement.text).not.toContain('"synced_at" = ');
  });

  it("should do nothing on conflict when no column is updatable", () => {
    const statement = buildUpsert("t", ["id", "synced_at"] as const, [{ id: 1, synced_at: "x" }], "id", {
      insertOnly: ["synced_at"],
    });

    expect(statement.text).toContain('ON CONFLICT ("id") DO NOTHING');
  });

  it("should bind objects as JSON text", () => {
    const statement = buildUpsert("t", ["id", "best_efforts"] as const, [{ id: 1, best_efforts: [{ name: "1k" }] }], "id");

    expect(statement.values).toEqual([1, '[{"name":"1k"}]']);
  });

  it("should reject unsafe identifiers", () => {
    expect(() => buildUpsert('t"; drop', ["id"] as const, [{ id: 1 }], "id")).toThrow('Invalid SQL identifier: t"; drop');
  });
});

describe("upsertRows", () => {
  it("should do nothing for zero rows", async () => {
    const client = fakeClient();

    const result = await upsertRows(client, "t", ["id"] as const, [], "id");

    expect(result).toEqual({ table: "t", total: 0, batches: 0 });
    expect(client.query).not.toHaveBeenCalled();
  });

  it("should split rows to stay under the bind parameter limit", async () => {
    const client = fakeClient();
    const columns = ["id", "a", "b"] as const;
    const perBatch = Math.floor(MAX_BIND_PARAMS / columns.length);
    const rows = Array.from({ length: perBatch + 5 }, (_, i) => ({ id: i, a: "x", b: null }));

    const result = await upsertRows(client, "t", columns, rows, "id");

    expect(result).toEqual({ table: "t", total: perBatch + 5, batches: 2 });
    expect(client.query.mock.calls.map((call) => call[0].trim().split(" ")[0])).toEqual([
      "BEGIN",
      "INSERT",
      "INSERT",
      "COMMIT",
    ]);
    expect(client.query.mock.calls[2][1]).toHaveLength(15);
  });

  it("should roll back and rethrow when a batch fails", async () => {
    const client = fakeClient("INSERT");

    await expect(upsertRows(client, "t", ["id"] as const, [{ id: 1 }], "id")).rejects.toThrow("insert failed");
    expect(client.query.mock.calls.map((call) => call[0])).toEqual(["BEGIN", expect.stringContaining("INSERT"), "ROLLBACK"]);
  });
});
