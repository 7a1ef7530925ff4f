import { ValidationError } from "../errors";
import type { UserRole } from "../types/context";

export type PostStatus = "draft" | "pending_review" | "published" | "rejected";

export const POST_STATUSES: readonly PostStatus[] = ["draft", "pending_review", "published", "rejected"];

export const TITLE_MAX_LENGTH = 300;
export const BODY_MAX_LENGTH = 50_000;

export interface Post {
  id: string;
  title: string;
  slug: string;
  body: string;
  status: PostStatus;
  authorId: string;
  createdAt: string;
  updatedAt: string;
  submittedAt: string | null;
  publishedAt: string | null;
  rejectedAt: string | null;
  revision: number;
}

export interface Actor {
  id: string;
  role: UserRole;
}

/** Wire shape for authors and admins. */
export interface PostRecord {
  id: string;
  title: string;
  slug: string;
  body: string;
  status: PostStatus;
  author_id: string;
  created_at: string;
  updated_at: string;
  submitted_at: string | null;
  published_at: string | null;
  rejected_at: string | null;
  revision: number;
}

/** Wire shape for anonymous readers. */
export interface PublicArticle {
  id: string;
  title: string;
  slug: string;
  body: string;
  body_html: string;
  published_at: string;
}

const STATUS_VALUES = new Set<string>(POST_STATUSES);

function isPostStatus(input: string): input is PostStatus {
  return STATUS_VALUES.has(input);
}

function normalizeWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

export function sanitizeTitle(input: string): string {
  const value = normalizeWhitespace(input);
  if (value.length === 0 || value.length > TITLE_MAX_LENGTH) {
    throw new ValidationError(`title must be between 1 and ${TITLE_MAX_LENGTH} characters`);
  }
  return value;
}

export function sanitizeBody(input: string): string {
  const value = input.trim();
  if (value.length === 0 || value.length > BODY_MAX_LENGTH) {
    throw new ValidationError(`body must be between 1 and ${BODY_MAX_LENGTH} characters`);
  }
  return value;
}

export function assertValidStatus(input: string): PostStatus {
  if (!isPostStatus(input)) {
    throw new ValidationError(`status must be one of: ${POST_STATUSES.join(", ")}`);
  }
  return input;
}

export function toPostRecord(post: Post): PostRecord {
  return {
    id: post.id,
    title: post.title,
    slug: post.slug,
    body: post.body,
    status: post.status,
    author_id: post.authorId,
    created_at: post.createdAt,
    updated_at: post.updatedAt,
    submitted_at: post.submittedAt,
    published_at: post.publishedAt,
    rejected_at: post.rejectedAt,
    revision: post.revision
  };
}
