import { describe, expect, it } from "vitest";
import { isUniqueViolation, toStorageError } from "../src/db/errors";
import { NotFoundError, StorageError } from "../src/errors";

describe("isUniqueViolation", () => {
  const violation = { code: "23505", constraint: "users_email_key" };

  it("matches the unique violation code", () => {
    expect(isUniqueViolation(violation)).toBe(true);
    expect(isUniqueViolation({ code: "23503" })).toBe(false);
    expect(isUniqueViolation("23505")).toBe(false);
  });

  it("optionally narrows to one constraint", () => {
    expect(isUniqueViolation(violation, "users_email_key")).toBe(true);
    expect(isUniqueViolation(violation, "posts_slug_key")).toBe(false);
  });
});

describe("toStorageError", () => {
  it("passes domain errors through", () => {
    const error = new NotFoundError();

    expect(toStorageError(error, "find_post_by_id")).toBe(error);
  });

  it("wraps driver errors", () => {
    const cause = new Error("socket hang up");
    const wrapped = toStorageError(cause, "list_posts");

    expect(wrapped).toBeInstanceOf(StorageError);
    expect(wrapped.message).toBe("storage operation failed: list_posts");
    expect(wrapped.cause).toBe(cause);
  });
});
