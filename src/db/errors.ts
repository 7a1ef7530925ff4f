import {
  AuthenticationError,
  ConflictError,
  ForbiddenError,
  InvalidStateError,
  NotFoundError,
  StorageError,
  ValidationError
} from "../errors";

const UNIQUE_VIOLATION = "23505";

function errorCode(error: unknown): unknown {
  return typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
}

function errorConstraint(error: unknown): unknown {
  return typeof error === "object" && error !== null && "constraint" in error ? error.constraint : undefined;
}

export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (errorCode(error) !== UNIQUE_VIOLATION) {
    return false;
  }

  return constraint === undefined || errorConstraint(error) === constraint;
}

function isDomainError(error: unknown): boolean {
  return (
    error instanceof ValidationError ||
    error instanceof AuthenticationError ||
    error instanceof ForbiddenError ||
    error instanceof NotFoundError ||
    error instanceof InvalidStateError ||
    error instanceof ConflictError ||
    error instanceof StorageError
  );
}

/** Domain errors pass through; anything the driver raised is wrapped. */
export function toStorageError(error: unknown, operation: string): Error {
  if (error instanceof Error && isDomainError(error)) {
    return error;
  }

  return new StorageError(`storage operation failed: ${operation}`, { cause: error });
}
