import { Router, type Request, type Response } from "express";
import type { AppConfig } from "../config";
import { getActor, requireAuthenticated, requireRoles } from "../middleware/auth";
import { appLogger, type Logger } from "../security/logger";
import {
  createRateLimitMiddleware,
  InMemoryRateLimitStore,
  type RateLimitStore
} from "../security/rate-limit";
import {
  handleRouteError,
  normalizeOptionalString,
  parseOptionalStatusFilter,
  requireString,
  routeParam
} from "./http";
import { toPostRecord } from "./model";
import type { PostService } from "./service";

interface CreatePostPayload {
  title?: unknown;
  body?: unknown;
}

interface UpdatePostPayload {
  title?: unknown;
  body?: unknown;
}

export function createPostsRouter(
  config: AppConfig,
  service: PostService,
  logger: Logger = appLogger,
  rateLimitStore: RateLimitStore = new InMemoryRateLimitStore()
): Router {
  const router = Router();
  const writeRateLimiter = createRateLimitMiddleware(config, "write", rateLimitStore);

  router.use(requireAuthenticated);

  router.post("/", writeRateLimiter, async (req: Request, res: Response) => {
    let actorId: string | undefined;

    try {
      const actor = getActor(req);
      actorId = actor.id;
      const payload: CreatePostPayload = req.body ?? {};

      const post = await service.createPost(actor, {
        title: requireString("title", payload.title),
        body: requireString("body", payload.body)
      });

      res.status(201).json(toPostRecord(post));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "create_post", actorId });
    }
  });

  router.get("/me", async (req: Request, res: Response) => {
    let actorId: string | undefined;

    try {
      const actor = getActor(req);
      actorId = actor.id;
      const status = parseOptionalStatusFilter(req);
      const posts = await service.listOwnPosts(actor, { status });

      res.status(200).json(posts.map(toPostRecord));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "list_own_posts", actorId });
    }
  });

  router.get("/pending", requireRoles("admin"), async (req: Request, res: Response) => {
    let actorId: string | undefined;

    try {
      actorId = getActor(req).id;
      const posts = await service.listPendingPosts("submitted_at_desc");

      res.status(200).json(posts.map(toPostRecord));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "list_pending_posts", actorId });
    }
  });

  router.get("/:id", async (req: Request, res: Response) => {
    let actorId: string | undefined;
    const postId = routeParam(req, "id");

    try {
      const actor = getActor(req);
      actorId = actor.id;
      const post = await service.getPost(actor, postId);

      res.status(200).json(toPostRecord(post));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "get_post", actorId, postId });
    }
  });

  router.put("/:id", writeRateLimiter, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    const postId = routeParam(req, "id");

    try {
      const actor = getActor(req);
      actorId = actor.id;
      const payload: UpdatePostPayload = req.body ?? {};

      const post = await service.editPost(actor, postId, {
        title: normalizeOptionalString("title", payload.title),
        body: normalizeOptionalString("body", payload.body)
      });

      res.status(200).json(toPostRecord(post));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "update_post", actorId, postId });
    }
  });

  router.delete("/:id", writeRateLimiter, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    const postId = routeParam(req, "id");

    try {
      const actor = getActor(req);
      actorId = actor.id;
      await service.deletePost(actor, postId);

      res.status(204).end();
    } catch (error) {
      handleRouteError(res, error, logger, { route: "delete_post", actorId, postId });
    }
  });

  router.post("/:id/submit", writeRateLimiter, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    const postId = routeParam(req, "id");

    try {
      const actor = getActor(req);
      actorId = actor.id;
      const post = await service.submitPost(actor, postId);

      res.status(200).json(toPostRecord(post));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "submit_post", actorId, postId });
    }
  });

  router.post("/:id/publish", requireRoles("admin"), writeRateLimiter, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    const postId = routeParam(req, "id");

    try {
      const actor = getActor(req);
      actorId = actor.id;
      const post = await service.approvePost(actor, postId);

      res.status(200).json(toPostRecord(post));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "publish_post", actorId, postId });
    }
  });

  router.post("/:id/reject", requireRoles("admin"), writeRateLimiter, async (req: Request, res: Response) => {
    let actorId: string | undefined;
    const postId = routeParam(req, "id");

    try {
      const actor = getActor(req);
      actorId = actor.id;
      const post = await service.rejectPost(actor, postId);

      res.status(200).json(toPostRecord(post));
    } catch (error) {
      handleRouteError(res, error, logger, { route: "reject_post", actorId, postId });
    }
  });

  return router;
}
