import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppConfig } from "./config";
import { InMemoryUserRepository, type UserRepository } from "./auth/repository";
import { createAuthRouter } from "./auth/routes";
import { AuthService } from "./auth/service";
import { TokenService } from "./auth/tokens";
import { hydrateAuthFromBearer } from "./middleware/auth";
import { createAdminReviewRouter } from "./posts/admin-routes";
import { handleRouteError } from "./posts/http";
import { createPublicArticlesRouter } from "./posts/public-routes";
import { InMemoryPostRepository, type PostRepository } from "./posts/repository";
import { createPostsRouter } from "./posts/routes";
import { PostService } from "./posts/service";
import { createApiSecurityHeaders } from "./security/headers";
import { appLogger, type Logger } from "./security/logger";
import { InMemoryRateLimitStore, type RateLimitStore } from "./security/rate-limit";

export interface AppDependencies {
  logger?: Logger;
  userRepository?: UserRepository;
  postRepository?: PostRepository;
  rateLimitStore?: RateLimitStore;
  healthCheck?: () => Promise<void> | void;
  now?: () => Date;
}

/** Body parser failures carry a 4xx `status`; anything else is ours. */
function requestBodyErrorStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }

  const status = error.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(config: AppConfig, dependencies: AppDependencies = {}): Express {
  const app = express();
  const logger = dependencies.logger ?? appLogger;
  const userRepository = dependencies.userRepository ?? new InMemoryUserRepository();
  const postRepository = dependencies.postRepository ?? new InMemoryPostRepository();
  const clock = dependencies.now;
  const rateLimitStore =
    dependencies.rateLimitStore ?? new InMemoryRateLimitStore(clock ? () => clock().getTime() : undefined);
  const healthCheck = dependencies.healthCheck ?? (() => undefined);

  const authService = new AuthService({
    users: userRepository,
    tokens: new TokenService(config.auth),
    logger
  });
  const postService = new PostService({
    repository: postRepository,
    slugs: config.slugs,
    logger,
    now: dependencies.now
  });

  app.disable("x-powered-by");
  app.use(createApiSecurityHeaders(config));
  app.use(express.json({ limit: "128kb" }));

  app.get("/healthz", async (_req, res) => {
    try {
      await healthCheck();
      res.status(200).json({ ok: true });
      return;
    } catch (error) {
      logger.warn("health_check_failed", { error });
      res.status(503).json({ ok: false });
    }
  });

  app.use(hydrateAuthFromBearer(authService));

  app.use("/auth", createAuthRouter(config, authService, userRepository, logger, rateLimitStore));
  app.use("/posts", createPostsRouter(config, postService, logger, rateLimitStore));
  app.use("/admin", createAdminReviewRouter(config, postService, logger, rateLimitStore));
  app.use("/articles", createPublicArticlesRouter(config, postService, logger, rateLimitStore));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const bodyErrorStatus = requestBodyErrorStatus(error);
    if (bodyErrorStatus !== undefined) {
      res.status(bodyErrorStatus).json({ error: "Invalid request body" });
      return;
    }

    handleRouteError(res, error, logger, { route: `${req.method} ${req.path}` });
  });

  return app;
}
