/**
 * PostgreSQL UPSERT helpers
 *
 * Multi-row INSERT .. ON CONFLICT DO UPDATE, split into batches so the
 * statement stays under PostgreSQL's 65535 bind-parameter limit.
 */

import { setupLogger } from "../lib/logger.js";

const logger = setupLogger("pg-upsert");

export const MAX_BIND_PARAMS = 65535;

export interface UpsertResult {
  table: string;
  total: number;
  batches: number;
}

/** The part of pg.Client used here */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

export interface UpsertColumnRules<K extends string> {
  /** On update, a NULL in the incoming row keeps the stored value */
  keepExisting?: readonly K[];
  /** Set on insert only; updates leave them unchanged */
  insertOnly?: readonly K[];
}

export interface UpsertStatement {
  text: string;
  values: unknown[];
}

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

function quoteIdentifier(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Invalid SQL identifier: ${name}`);
  }
  return `"${name}"`;
}

/**
 * Build one INSERT .. ON CONFLICT statement.
 * Objects and arrays are bound as JSON text (jsonb columns).
 */
export function buildUpsert<K extends string>(
  table: string,
  columns: readonly K[],
  rows: ReadonlyArray<Record<K, unknown>>,
  conflictKey: K,
  rules: UpsertColumnRules<K> = {}
): UpsertStatement {
  const values: unknown[] = [];
  const placeholders: string[] = [];
  let paramIndex = 1;

  for (const row of rows) {
    const slots: string[] = [];
    for (const column of columns) {
      const value = row[column];
      values.push(value !== null && typeof value === "object" ? JSON.stringify(value) : value);
      slots.push(`$${paramIndex++}`);
    }
    placeholders.push(`(${slots.join(", ")})`);
  }

  const quotedTable = quoteIdentifier(table);
  const keepExisting = rules.keepExisting ?? [];
  const insertOnly = rules.insertOnly ?? [];
  const updates = columns
    .filter((column) => column !== conflictKey && !insertOnly.includes(column))
    .map((column) => {
      const quoted = quoteIdentifier(column);
      return keepExisting.includes(column)
        ? `${quoted} = COALESCE(EXCLUDED.${quoted}, ${quotedTable}.${quoted})`
        : `${quoted} = EXCLUDED.${quoted}`;
    });

  const conflict = updates.length > 0
    ? `DO UPDATE SET
        ${updates.join(",\n        ")}`
    : "DO NOTHING";

  const text = `
      INSERT INTO ${quotedTable} (${columns.map(quoteIdentifier).join(", ")})
      VALUES ${placeholders.join(", ")}
      ON CONFLICT (${quoteIdentifier(conflictKey)}) ${conflict}
    `;

  return { text, values };
}

/**
 * UPSERT rows in batches over an open client, inside one transaction.
 */
export async function upsertRows<K extends string>(
  client: Queryable,
  table: string,
  columns: readonly K[],
  rows: ReadonlyArray<Record<K, unknown>>,
  conflictKey: K,
  rules: UpsertColumnRules<K> = {}
): Promise<UpsertResult> {
  if (rows.length === 0) {
    return { table, total: 0, batches: 0 };
  }

  const batchSize = Math.max(1, Math.floor(MAX_BIND_PARAMS / columns.length));
  let batches = 0;

  await client.query("BEGIN");
  try {
    for (let i = 0; i < rows.length; i += batchSize) {
      const statement = buildUpsert(table, columns, rows.slice(i, i + batchSize), conflictKey, rules);
      await client.query(statement.text, statement.values);
      batches++;
    }
    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }

  logger.info(`Upserted ${rows.length} records to ${table} (${batches} batch${batches === 1 ? "" : "es"})`);
  return { table, total: rows.length, batches };
}
