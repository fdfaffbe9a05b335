/**
 * Run SQL migration file
 * Usage: npx tsx src/lib/run-migration.ts path/to/migration.sql
 */

import fs from "fs";
import pg from "pg";
import { config } from "dotenv";
import { describeError } from "./errors.js";
import { setupLogger } from "./logger.js";

const { Client } = pg;
const logger = setupLogger("migration");

export async function runMigration(filePath: string, databaseUrl: string): Promise<void> {
  const sql = await fs.promises.readFile(filePath, "utf8");
  logger.info(`Running migration from: ${filePath}`);

  const client = new Client({ connectionString: databaseUrl });
  await client.connect();

  try {
    await client.query(sql);
    logger.info("Migration completed successfully");
  } finally {
    await client.end();
  }
}

async function main(): Promise<void> {
  config();

  const filePath = process.argv[2];
  const databaseUrl = process.env.DIRECT_DATABASE_URL;
  if (!filePath) {
    console.error("Usage: npx tsx src/lib/run-migration.ts <sql-file>");
    process.exit(1);
  }
  if (!databaseUrl) {
    console.error("DIRECT_DATABASE_URL is not set");
    process.exit(1);
  }

  await runMigration(filePath, databaseUrl);
}

if (process.argv[1]?.endsWith("run-migration.ts")) {
  main().catch((err) => {
    logger.error(`Migration failed: ${describeError(err)}`);
    process.exit(1);
  });
}
