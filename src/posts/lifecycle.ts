import { ForbiddenError, InvalidStateError } from "../errors";
import type { UserRole } from "../types/context";
import type { Actor, Post, PostStatus } from "./model";

export type PostAction = "edit" | "delete" | "submit" | "approve" | "reject";

export type DenialReason = "forbidden" | "invalid_state";

interface ActionRule {
  adminOnly: boolean;
  validFrom: readonly PostStatus[];
  /** null: the post is removed. */
  nextStatus: PostStatus | null;
}

export const ACTION_RULES: Record<PostAction, ActionRule> = {
  edit: {
    adminOnly: false,
    validFrom: ["draft"],
    nextStatus: "draft"
  },
  delete: {
    adminOnly: false,
    validFrom: ["draft"],
    nextStatus: null
  },
  submit: {
    adminOnly: false,
    validFrom: ["draft"],
    nextStatus: "pending_review"
  },
  approve: {
    adminOnly: true,
    validFrom: ["draft", "pending_review"],
    nextStatus: "published"
  },
  reject: {
    adminOnly: true,
    validFrom: ["pending_review"],
    nextStatus: "rejected"
  }
};

export interface PermissionInput {
  actorRole: UserRole;
  actorIsAuthor: boolean;
  action: PostAction;
  currentStatus: PostStatus;
}

export type PermissionDecision =
  | { allowed: true; nextStatus: PostStatus | null }
  | { allowed: false; reason: DenialReason };

export function hasRole(user: { role: UserRole }, roles: readonly UserRole[]): boolean {
  return roles.includes(user.role);
}

/**
 * Authorization is decided before the status rule, so an outsider never learns
 * anything about a post's state from the error kind.
 */
export function evaluatePermission(input: PermissionInput): PermissionDecision {
  const rule = ACTION_RULES[input.action];
  const isAdmin = input.actorRole === "admin";

  if (rule.adminOnly && !isAdmin) {
    return { allowed: false, reason: "forbidden" };
  }

  if (!isAdmin && !input.actorIsAuthor) {
    return { allowed: false, reason: "forbidden" };
  }

  if (!rule.validFrom.includes(input.currentStatus)) {
    return { allowed: false, reason: "invalid_state" };
  }

  return { allowed: true, nextStatus: rule.nextStatus };
}

export function authorizeAction(post: Post, actor: Actor, action: PostAction): PostStatus | null {
  const decision = evaluatePermission({
    actorRole: actor.role,
    actorIsAuthor: post.authorId === actor.id,
    action,
    currentStatus: post.status
  });

  if (!decision.allowed) {
    throw decision.reason === "forbidden" ? new ForbiddenError() : new InvalidStateError();
  }

  return decision.nextStatus;
}

export interface PostContentChanges {
  title?: string;
  body?: string;
  slug?: string;
}

export type TransitionRequest =
  | { action: "edit"; changes: PostContentChanges }
  | { action: "delete" }
  | { action: "submit" }
  | { action: "approve" }
  | { action: "reject" };

export type TransitionOutcome = { kind: "updated"; post: Post } | { kind: "deleted"; post: Post };

function stampFor(action: PostAction, timestamp: string): Partial<Post> {
  switch (action) {
    case "submit":
      return { submittedAt: timestamp };
    case "approve":
      return { publishedAt: timestamp };
    case "reject":
      return { rejectedAt: timestamp };
    default:
      return {};
  }
}

/**
 * Decides and applies one lifecycle step. The input post is never mutated;
 * callers persist the returned value with the original revision as the guard.
 */
export function attemptTransition(post: Post, actor: Actor, request: TransitionRequest, now: Date): TransitionOutcome {
  const nextStatus = authorizeAction(post, actor, request.action);

  if (nextStatus === null) {
    return { kind: "deleted", post };
  }

  const timestamp = now.toISOString();
  const content =
    request.action === "edit"
      ? {
          title: request.changes.title ?? post.title,
          body: request.changes.body ?? post.body,
          slug: request.changes.slug ?? post.slug
        }
      : {};

  return {
    kind: "updated",
    post: {
      ...post,
      ...content,
      ...stampFor(request.action, timestamp),
      status: nextStatus,
      updatedAt: timestamp,
      revision: post.revision + 1
    }
  };
}
