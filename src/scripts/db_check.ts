import dotenv from "dotenv";
import { Pool } from "pg";
import { ENGINE_TABLES } from "../persistence/postgres_persistence.js";

dotenv.config();

async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    console.error("DB_CHECK_FAIL: DATABASE_URL is not set");
    process.exitCode = 1;
    return;
  }

  const pool = new Pool({ connectionString: databaseUrl });
  try {
    await pool.query("SELECT 1");
    const missing: string[] = [];

    for (const table of ENGINE_TABLES) {
      const result = await pool.query<{ exists: string | null }>(
        "SELECT to_regclass($1) AS exists",
        [`public.${table}`]
      );
      if (!result.rows[0]?.exists) {
        missing.push(table);
      }
    }

    if (missing.length > 0) {
      console.error(`DB_CHECK_FAIL: Missing tables: ${missing.join(", ")}. Run npm run db:init`);
      process.exitCode = 1;
      return;
    }

    const { rows } = await pool.query<{ open_positions: string; orders: string }>(
      `SELECT
         (SELECT COUNT(*) FROM positions) AS open_positions,
         (SELECT COUNT(*) FROM orders) AS orders`
    );
    console.log(
      `DB_CHECK_OK: ${ENGINE_TABLES.length} tables present, ` +
        `orders=${rows[0]?.orders ?? 0} open_positions=${rows[0]?.open_positions ?? 0}`
    );
  } catch (err) {
    console.error("DB_CHECK_FAIL: Unable to connect or query database");
    console.error(err);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

await main();
