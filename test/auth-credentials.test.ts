import { describe, expect, it } from "vitest";
import { hashPassword, verifyPassword } from "../src/auth/passwords";
import { TokenService } from "../src/auth/tokens";
import { AuthenticationError } from "../src/errors";

const authConfig = {
  secretKey: "test-secret-test-secret-test-secret",
  issuer: "editorial-api-test",
  accessTokenExpireMinutes: 60
};

describe("password hashing", () => {
  it("stores a salted scrypt hash", async () => {
    const stored = await hashPassword("password-123");

    expect(stored).toMatch(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{128}$/);
    expect(await hashPassword("password-123")).not.toBe(stored);
  });

  it("verifies the right password only", async () => {
    const stored = await hashPassword("password-123");

    await expect(verifyPassword("password-123", stored)).resolves.toBe(true);
    await expect(verifyPassword("password-124", stored)).resolves.toBe(false);
  });

  it("treats unknown hash formats as a mismatch", async () => {
    await expect(verifyPassword("password-123", "plain-text")).resolves.toBe(false);
    await expect(verifyPassword("password-123", "scrypt$00$00")).resolves.toBe(false);
  });
});

describe("TokenService", () => {
  it("round-trips the subject and role", async () => {
    const tokens = new TokenService(authConfig);

    const issued = await tokens.issue({ userId: "7", role: "user" });

    expect(issued.tokenType).toBe("bearer");
    expect(issued.expiresIn).toBe(3600);
    await expect(tokens.verify(issued.accessToken)).resolves.toEqual({ userId: "7", role: "user" });
  });

  it("rejects expired tokens", async () => {
    const tokens = new TokenService(authConfig);
    const issued = await tokens.issue({ userId: "7", role: "user" }, new Date(Date.now() - 2 * 60 * 60 * 1000));

    await expect(tokens.verify(issued.accessToken)).rejects.toThrow(
      new AuthenticationError("Could not validate credentials")
    );
  });

  it("rejects tokens from another issuer", async () => {
    const issued = await new TokenService({ ...authConfig, issuer: "someone-else" }).issue({ userId: "7", role: "user" });

    await expect(new TokenService(authConfig).verify(issued.accessToken)).rejects.toThrow(AuthenticationError);
  });

  it("rejects tampered tokens", async () => {
    const tokens = new TokenService(authConfig);
    const issued = await tokens.issue({ userId: "7", role: "user" });
    const [header, , signature] = issued.accessToken.split(".");
    const payload = Buffer.from(JSON.stringify({ sub: "1", role: "admin", iss: "editorial-api-test" })).toString(
      "base64url"
    );

    await expect(tokens.verify(`${header}.${payload}.${signature}`)).rejects.toThrow(AuthenticationError);
  });
});
