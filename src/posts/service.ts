import type { SlugConfig } from "../config";
import { ConflictError, ForbiddenError, NotFoundError } from "../errors";
import { renderArticleHtml } from "../security/markdown";
import { appLogger, type Logger } from "../security/logger";
import { attemptTransition, authorizeAction, type PostContentChanges, type TransitionRequest } from "./lifecycle";
import { sanitizeBody, sanitizeTitle, type Actor, type Post, type PostStatus, type PublicArticle } from "./model";
import type { PaginationInput, PostOrder, PostRepository } from "./repository";
import { SlugAllocator } from "./slug";

export interface CreatePostInput {
  title: string;
  body: string;
}

export interface EditPostInput {
  title?: string;
  body?: string;
}

export interface PostServiceDependencies {
  repository: PostRepository;
  slugs: SlugConfig;
  logger?: Logger;
  now?: () => Date;
}

type PendingOrder = Extract<PostOrder, "submitted_at_desc" | "submitted_at_asc">;

type ReviewAction = Extract<TransitionRequest["action"], "submit" | "approve" | "reject">;

const REVIEW_EVENTS: Record<ReviewAction, string> = {
  submit: "post_submitted",
  approve: "post_published",
  reject: "post_rejected"
};

export function toPublicArticle(post: Post): PublicArticle {
  return {
    id: post.id,
    title: post.title,
    slug: post.slug,
    body: post.body,
    body_html: renderArticleHtml(post.body),
    published_at: post.publishedAt ?? post.updatedAt
  };
}

export class PostService {
  private readonly repository: PostRepository;
  private readonly slugAllocator: SlugAllocator;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(dependencies: PostServiceDependencies) {
    this.repository = dependencies.repository;
    this.logger = dependencies.logger ?? appLogger;
    this.now = dependencies.now ?? (() => new Date());
    this.slugAllocator = new SlugAllocator(this.repository, {
      strategy: dependencies.slugs.strategy,
      maxAttempts: dependencies.slugs.maxAttempts,
      logger: this.logger
    });
  }

  async createPost(actor: Actor, input: CreatePostInput): Promise<Post> {
    const title = sanitizeTitle(input.title);
    const body = sanitizeBody(input.body);
    const createdAt = this.now().toISOString();

    const post = await this.slugAllocator.persist(title, (slug) =>
      this.repository.insert({ title, slug, body, authorId: actor.id, createdAt })
    );

    this.logger.info("post_created", {
      actorId: actor.id,
      postId: post.id,
      slug: post.slug
    });

    return post;
  }

  async getPost(actor: Actor, id: string): Promise<Post> {
    const post = await this.loadPost(id);

    if (post.authorId !== actor.id && actor.role !== "admin") {
      throw new ForbiddenError();
    }

    return post;
  }

  async editPost(actor: Actor, id: string, input: EditPostInput): Promise<Post> {
    const existing = await this.loadPost(id);

    // Denials take precedence over payload validation.
    authorizeAction(existing, actor, "edit");

    const title = input.title === undefined ? undefined : sanitizeTitle(input.title);
    const body = input.body === undefined ? undefined : sanitizeBody(input.body);
    const changes: PostContentChanges = {};
    const changedFields: string[] = [];

    if (body !== undefined && body !== existing.body) {
      changes.body = body;
      changedFields.push("body");
    }

    let updated: Post;
    if (title !== undefined && title !== existing.title) {
      changedFields.push("title");
      updated = await this.slugAllocator.persist(
        title,
        (slug) => this.commit(existing, actor, { action: "edit", changes: { ...changes, title, slug } }),
        existing.id
      );
    } else if (changedFields.length > 0) {
      updated = await this.commit(existing, actor, { action: "edit", changes });
    } else {
      return existing;
    }

    this.logger.info("post_updated", {
      actorId: actor.id,
      postId: updated.id,
      changedFields,
      slug: updated.slug
    });

    return updated;
  }

  async deletePost(actor: Actor, id: string): Promise<void> {
    const existing = await this.loadPost(id);
    authorizeAction(existing, actor, "delete");

    const removed = await this.repository.delete(existing.id, existing.revision);
    if (!removed) {
      await this.raiseWriteMiss(existing.id);
    }

    this.logger.info("post_deleted", {
      actorId: actor.id,
      postId: existing.id
    });
  }

  async submitPost(actor: Actor, id: string): Promise<Post> {
    return this.review(actor, id, "submit");
  }

  async approvePost(actor: Actor, id: string): Promise<Post> {
    return this.review(actor, id, "approve");
  }

  async rejectPost(actor: Actor, id: string): Promise<Post> {
    return this.review(actor, id, "reject");
  }

  async listOwnPosts(actor: Actor, options: { status?: PostStatus } = {}): Promise<Post[]> {
    return this.repository.list({
      filter: { authorId: actor.id, status: options.status },
      order: "created_at_desc"
    });
  }

  async listPendingPosts(order: PendingOrder = "submitted_at_desc"): Promise<Post[]> {
    return this.repository.list({
      filter: { status: "pending_review" },
      order
    });
  }

  async listPublishedArticles(pagination: PaginationInput): Promise<PublicArticle[]> {
    const posts = await this.repository.list({
      filter: { status: "published" },
      order: "published_at_desc",
      pagination
    });

    return posts.map(toPublicArticle);
  }

  async getPublishedArticle(slug: string): Promise<PublicArticle> {
    const post = await this.repository.findPublishedBySlug(slug);
    if (!post) {
      throw new NotFoundError("Article not found or not published");
    }

    return toPublicArticle(post);
  }

  private async review(actor: Actor, id: string, action: ReviewAction): Promise<Post> {
    const existing = await this.loadPost(id);
    const updated = await this.commit(existing, actor, { action });

    this.logger.info(REVIEW_EVENTS[action], {
      actorId: actor.id,
      postId: updated.id,
      previousStatus: existing.status,
      newStatus: updated.status
    });

    return updated;
  }

  private async loadPost(id: string): Promise<Post> {
    const post = await this.repository.findById(id);
    if (!post) {
      throw new NotFoundError();
    }
    return post;
  }

  private async commit(existing: Post, actor: Actor, request: TransitionRequest): Promise<Post> {
    const outcome = attemptTransition(existing, actor, request, this.now());
    if (outcome.kind === "deleted") {
      throw new Error(`commit cannot apply ${request.action}`);
    }

    const updated = await this.repository.update(outcome.post, existing.revision);
    if (!updated) {
      return this.raiseWriteMiss(existing.id);
    }

    return updated;
  }

  private async raiseWriteMiss(id: string): Promise<never> {
    const current = await this.repository.findById(id);
    if (!current) {
      throw new NotFoundError();
    }

    throw new ConflictError("post was modified concurrently");
  }
}
