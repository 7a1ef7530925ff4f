export class ValidationError extends Error {
  override readonly name = "ValidationError";
}

export class AuthenticationError extends Error {
  override readonly name = "AuthenticationError";
}

export class ForbiddenError extends Error {
  override readonly name = "ForbiddenError";

  constructor(message = "Not allowed") {
    super(message);
  }
}

export class NotFoundError extends Error {
  override readonly name = "NotFoundError";

  constructor(message = "Post not found") {
    super(message);
  }
}

export class InvalidStateError extends Error {
  override readonly name = "InvalidStateError";

  constructor(message = "Invalid status for this action") {
    super(message);
  }
}

export class ConflictError extends Error {
  override readonly name: string = "ConflictError";
}

/** Unique violation on the post slug, raised by repositories so the allocator can retry. */
export class SlugConflictError extends ConflictError {
  override readonly name = "SlugConflictError";

  constructor(readonly slug: string) {
    super("slug already exists");
  }
}

export class StorageError extends Error {
  override readonly name = "StorageError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type ErrorKind =
  | "validation"
  | "authentication"
  | "forbidden"
  | "not_found"
  | "invalid_state"
  | "conflict"
  | "storage"
  | "internal";

export interface ErrorResponse {
  statusCode: number;
  errorType: ErrorKind;
  message: string;
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return { statusCode: 400, errorType: "validation", message: error.message };
  }

  if (error instanceof AuthenticationError) {
    return { statusCode: 401, errorType: "authentication", message: error.message };
  }

  if (error instanceof ForbiddenError) {
    return { statusCode: 403, errorType: "forbidden", message: error.message };
  }

  if (error instanceof NotFoundError) {
    return { statusCode: 404, errorType: "not_found", message: error.message };
  }

  if (error instanceof InvalidStateError) {
    return { statusCode: 400, errorType: "invalid_state", message: error.message };
  }

  if (error instanceof ConflictError) {
    return { statusCode: 409, errorType: "conflict", message: error.message };
  }

  if (error instanceof StorageError) {
    return { statusCode: 500, errorType: "storage", message: "Internal server error" };
  }

  return { statusCode: 500, errorType: "internal", message: "Internal server error" };
}
