import { createDatabasePool } from "../../src/db/connection";
import { migrateDown } from "../../src/db/migrations";
import { appLogger } from "../../src/security/logger";

function parseSteps(argv: string[]): number {
  if (argv.length < 3) {
    return 1;
  }

  const value = Number(argv[2]);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error("Usage: npm run db:migrate:down -- <positive-integer-steps>");
  }

  return value;
}

async function main() {
  const steps = parseSteps(process.argv);
  const pool = createDatabasePool();

  try {
    const rolledBack = await migrateDown(pool, steps);
    appLogger.info("migrations_rolled_back", { count: rolledBack.length, migrations: rolledBack });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  appLogger.warn("migrations_rollback_failed", { error });
  process.exitCode = 1;
});
