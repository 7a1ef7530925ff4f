import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import type { Pool } from "pg";

export interface Migration {
  name: string;
  upPath: string;
  downPath: string;
}

export const DEFAULT_MIGRATIONS_DIRECTORY = path.resolve(process.cwd(), "db/migrations");

const UP_SUFFIX = ".up.sql";
const DOWN_SUFFIX = ".down.sql";

/** Pairs every `<name>.up.sql` with its `<name>.down.sql`, ordered by name. */
export async function loadMigrations(directory = DEFAULT_MIGRATIONS_DIRECTORY): Promise<Migration[]> {
  const files = await readdir(directory);
  const upMigrationFiles = files
    .filter((fileName) => fileName.endsWith(UP_SUFFIX))
    .sort((left, right) => left.localeCompare(right));

  return upMigrationFiles.map((upFileName) => {
    const name = upFileName.slice(0, -UP_SUFFIX.length);
    const downFileName = `${name}${DOWN_SUFFIX}`;
    if (!files.includes(downFileName)) {
      throw new Error(`Missing down migration for ${name}`);
    }

    return {
      name,
      upPath: path.join(directory, upFileName),
      downPath: path.join(directory, downFileName)
    };
  });
}

async function ensureSchemaMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name text PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `);
}

async function runInTransaction(pool: Pool, sql: string, bookkeeping: { text: string; name: string }): Promise<void> {
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    await client.query(sql);
    await client.query(bookkeeping.text, [bookkeeping.name]);
    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

export async function migrateUp(pool: Pool, directory = DEFAULT_MIGRATIONS_DIRECTORY): Promise<string[]> {
  await ensureSchemaMigrationsTable(pool);

  const migrations = await loadMigrations(directory);
  const appliedResult = await pool.query<{ name: string }>("SELECT name FROM schema_migrations");
  const applied = new Set(appliedResult.rows.map((row) => row.name));

  const executed: string[] = [];
  for (const migration of migrations) {
    if (applied.has(migration.name)) {
      continue;
    }

    await runInTransaction(pool, await readFile(migration.upPath, "utf8"), {
      text: "INSERT INTO schema_migrations (name) VALUES ($1)",
      name: migration.name
    });
    executed.push(migration.name);
  }

  return executed;
}

export async function migrateDown(pool: Pool, steps = 1, directory = DEFAULT_MIGRATIONS_DIRECTORY): Promise<string[]> {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new Error("steps must be a positive integer");
  }

  await ensureSchemaMigrationsTable(pool);

  const migrations = await loadMigrations(directory);
  const migrationByName = new Map(migrations.map((migration) => [migration.name, migration]));

  const appliedResult = await pool.query<{ name: string }>(
    "SELECT name FROM schema_migrations ORDER BY applied_at DESC, name DESC"
  );

  const rolledBack: string[] = [];
  for (const target of appliedResult.rows.slice(0, steps)) {
    const migration = migrationByName.get(target.name);
    if (!migration) {
      throw new Error(`Applied migration ${target.name} has no files in ${directory}`);
    }

    await runInTransaction(pool, await readFile(migration.downPath, "utf8"), {
      text: "DELETE FROM schema_migrations WHERE name = $1",
      name: migration.name
    });
    rolledBack.push(migration.name);
  }

  return rolledBack;
}
