import { createDatabasePool } from "../../src/db/connection";
import { migrateUp } from "../../src/db/migrations";
import { appLogger } from "../../src/security/logger";

async function main() {
  const pool = createDatabasePool();
  try {
    const applied = await migrateUp(pool);
    appLogger.info("migrations_applied", { count: applied.length, migrations: applied });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  appLogger.warn("migrations_failed", { error });
  process.exitCode = 1;
});
