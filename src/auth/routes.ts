import { Router, type Request, type Response } from "express";
import type { AppConfig } from "../config";
import { getActor, requireAuthenticated } from "../middleware/auth";
import { handleRouteError, normalizeOptionalString, requireString } from "../posts/http";
import { appLogger, type Logger } from "../security/logger";
import {
  createRateLimitMiddleware,
  InMemoryRateLimitStore,
  type RateLimitStore
} from "../security/rate-limit";
import { AuthenticationError } from "../errors";
import { toPublicUser, type UserRepository } from "./repository";
import type { AuthService } from "./service";

interface RegisterPayload {
  email?: unknown;
  password?: unknown;
  full_name?: unknown;
}

interface LoginPayload {
  email?: unknown;
  password?: unknown;
}

export function createAuthRouter(
  config: AppConfig,
  authService: AuthService,
  users: UserRepository,
  logger: Logger = appLogger,
  rateLimitStore: RateLimitStore = new InMemoryRateLimitStore()
): Router {
  const router = Router();
  const credentialRateLimiter = createRateLimitMiddleware(config, "credential", rateLimitStore);

  router.post("/register", credentialRateLimiter, async (req: Request, res: Response) => {
    try {
      const payload: RegisterPayload = req.body ?? {};
      const user = await authService.register({
        email: requireString("email", payload.email),
        password: requireString("password", payload.password),
        fullName: normalizeOptionalString("full_name", payload.full_name)
      });

      res.status(201).json(toPublicUser(user));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "register" });
    }
  });

  router.post("/login", credentialRateLimiter, async (req: Request, res: Response) => {
    try {
      const payload: LoginPayload = req.body ?? {};
      const token = await authService.login({
        email: requireString("email", payload.email),
        password: requireString("password", payload.password)
      });

      res.status(200).json({
        access_token: token.accessToken,
        token_type: token.tokenType,
        expires_in: token.expiresIn
      });
    } catch (error) {
      handleRouteError(res, error, logger, { route: "login" });
    }
  });

  router.get("/me", requireAuthenticated, async (req: Request, res: Response) => {
    let actorId: string | undefined;

    try {
      actorId = getActor(req).id;
      const user = await users.findById(actorId);
      if (!user) {
        throw new AuthenticationError("Could not validate credentials");
      }

      res.status(200).json(toPublicUser(user));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "current_user", actorId });
    }
  });

  return router;
}
