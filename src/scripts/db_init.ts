import dotenv from "dotenv";
import { ENGINE_TABLES, PostgresPersistence } from "../persistence/postgres_persistence.js";

dotenv.config();

async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    console.error("DB_INIT_FAIL: DATABASE_URL is not set");
    process.exitCode = 1;
    return;
  }

  const persistence = new PostgresPersistence(databaseUrl);
  try {
    await persistence.init();
    console.log(`DB_INIT_OK: ${ENGINE_TABLES.join(", ")} ready`);
  } catch (err) {
    console.error("DB_INIT_FAIL: Unable to initialize engine schema");
    console.error(err);
    process.exitCode = 1;
  } finally {
    await persistence.close();
  }
}

await main();
