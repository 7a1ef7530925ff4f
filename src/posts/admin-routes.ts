import { Router, type Request, type Response } from "express";
import type { AppConfig } from "../config";
import { getActor, requireRoles } from "../middleware/auth";
import { appLogger, type Logger } from "../security/logger";
import {
  createRateLimitMiddleware,
  InMemoryRateLimitStore,
  type RateLimitStore
} from "../security/rate-limit";
import { handleRouteError, routeParam } from "./http";
import { toPostRecord } from "./model";
import type { PostService } from "./service";

/** Review queue for admins; oldest submissions come first. */
export function createAdminReviewRouter(
  config: AppConfig,
  service: PostService,
  logger: Logger = appLogger,
  rateLimitStore: RateLimitStore = new InMemoryRateLimitStore()
): Router {
  const router = Router();
  const writeRateLimiter = createRateLimitMiddleware(config, "write", rateLimitStore);

  router.use(requireRoles("admin"));

  router.get("/reviews", async (req: Request, res: Response) => {
    let actorId: string | undefined;

    try {
      actorId = getActor(req).id;
      const posts = await service.listPendingPosts("submitted_at_asc");

      res.status(200).json(posts.map(toPostRecord));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "list_review_queue", actorId });
    }
  });

  router.post("/reviews/:id/approve", writeRateLimiter, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    const postId = routeParam(req, "id");

    try {
      const actor = getActor(req);
      actorId = actor.id;
      const post = await service.approvePost(actor, postId);

      res.status(200).json(toPostRecord(post));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "approve_review", actorId, postId });
    }
  });

  router.post("/reviews/:id/reject", writeRateLimiter, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    const postId = routeParam(req, "id");

    try {
      const actor = getActor(req);
      actorId = actor.id;
      const post = await service.rejectPost(actor, postId);

      res.status(200).json(toPostRecord(post));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "reject_review", actorId, postId });
    }
  });

  return router;
}
