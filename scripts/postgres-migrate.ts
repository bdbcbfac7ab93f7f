import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Pool } from "pg";
import { createLogger } from "../src/infra/logger.js";

const MIGRATIONS = ["001_payments.sql", "002_poll_rotation.sql"];

async function main(): Promise<void> {
  const logger = createLogger({ logLevel: "info" });
  const connectionString = process.env.DATABASE_URL?.trim();
  if (!connectionString) {
    throw new Error("DATABASE_URL is required.");
  }

  const pool = new Pool({ connectionString });
  try {
    for (const migration of MIGRATIONS) {
      const migrationPath = resolve(process.cwd(), "sql", migration);
      const sql = await readFile(migrationPath, "utf8");
      await pool.query(sql);
      logger.info({ migration: migrationPath }, "db:migrate applied");
    }
  } finally {
    await pool.end();
  }
}

await main();
