import { createApp } from "./app";
import { PostgresUserRepository } from "./auth/repository";
import { loadConfig } from "./config";
import { createDatabasePool } from "./db/connection";
import { PostgresPostRepository } from "./posts/repository";
import { appLogger } from "./security/logger";

const config = loadConfig();
const databasePool = createDatabasePool();
const app = createApp(config, {
  logger: appLogger,
  userRepository: new PostgresUserRepository(databasePool),
  postRepository: new PostgresPostRepository(databasePool),
  healthCheck: async () => {
    await databasePool.query("SELECT 1");
  }
});

const server = app.listen(config.port, () => {
  appLogger.info("server_started", {
    port: config.port,
    slugStrategy: config.slugs.strategy
  });
});

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  appLogger.info("server_stopping", { signal });
  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
  await databasePool.end();
}

process.on("SIGINT", () => {
  shutdown("SIGINT").finally(() => process.exit(0));
});

process.on("SIGTERM", () => {
  shutdown("SIGTERM").finally(() => process.exit(0));
});
