import { Router, type Request, type Response } from "express";
import type { AppConfig } from "../config";
import { appLogger, type Logger } from "../security/logger";
import {
  createRateLimitMiddleware,
  InMemoryRateLimitStore,
  type RateLimitStore
} from "../security/rate-limit";
import { handleRouteError, parsePagination, routeParam } from "./http";
import type { PostService } from "./service";

export function createPublicArticlesRouter(
  config: AppConfig,
  service: PostService,
  logger: Logger = appLogger,
  rateLimitStore: RateLimitStore = new InMemoryRateLimitStore()
): Router {
  const router = Router();
  const readRateLimiter = createRateLimitMiddleware(config, "read", rateLimitStore);

  router.use(readRateLimiter);

  router.get("/", async (req: Request, res: Response) => {
    try {
      const pagination = parsePagination(req);
      const articles = await service.listPublishedArticles(pagination);

      res.status(200).json(articles);
    } catch (error) {
      handleRouteError(res, error, logger, { route: "list_articles" });
    }
  });

  router.get("/:slug", async (req: Request, res: Response) => {
    const slug = routeParam(req, "slug");

    try {
      const article = await service.getPublishedArticle(slug);

      res.status(200).json(article);
    } catch (error) {
      handleRouteError(res, error, logger, { route: "get_article", slug });
    }
  });

  return router;
}
