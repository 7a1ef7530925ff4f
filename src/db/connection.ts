import { Pool, type PoolConfig } from "pg";
import { parseBoolean, parsePositiveInteger } from "../config";

const DEFAULT_POOL_SIZE = 10;
const DEFAULT_IDLE_TIMEOUT_MS = 30_000;

export function buildDatabaseConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const connectionString = env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("DATABASE_URL is required");
  }

  const sslEnabled = parseBoolean(env.DATABASE_SSL, false);
  const rejectUnauthorized = parseBoolean(env.DATABASE_SSL_REJECT_UNAUTHORIZED, true);

  return {
    connectionString,
    ssl: sslEnabled ? { rejectUnauthorized } : undefined,
    max: parsePositiveInteger(env.DATABASE_POOL_MAX, DEFAULT_POOL_SIZE),
    idleTimeoutMillis: DEFAULT_IDLE_TIMEOUT_MS,
    application_name: "editorial-api"
  };
}

export function createDatabasePool(env: NodeJS.ProcessEnv = process.env): Pool {
  return new Pool(buildDatabaseConfig(env));
}
