import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("applies development defaults", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 3000,
      auth: {
        secretKey: "dev-secret-key-change-me",
        issuer: "editorial-api",
        accessTokenExpireMinutes: 60
      },
      slugs: { strategy: "exact", maxAttempts: 20 },
      rateLimit: { enabled: true, readPerMinute: 120, writePerMinute: 30, credentialPerMinute: 10 },
      securityHeaders: { isProduction: false }
    });
  });

  it("reads explicit settings", () => {
    const config = loadConfig({
      PORT: "8080",
      SECRET_KEY: "test-secret",
      ACCESS_TOKEN_EXPIRE_MINUTES: "15",
      TOKEN_ISSUER: "editorial-staging",
      SLUG_STRATEGY: "Prefix-Count",
      SLUG_MAX_ATTEMPTS: "5",
      RATE_LIMIT_ENABLED: "false",
      RATE_LIMIT_WRITE_PER_MIN: "3",
      RATE_LIMIT_CREDENTIAL_PER_MIN: "4"
    });

    expect(config.port).toBe(8080);
    expect(config.auth).toEqual({ secretKey: "test-secret", issuer: "editorial-staging", accessTokenExpireMinutes: 15 });
    expect(config.slugs).toEqual({ strategy: "prefix-count", maxAttempts: 5 });
    expect(config.rateLimit).toEqual({ enabled: false, readPerMinute: 120, writePerMinute: 3, credentialPerMinute: 4 });
  });

  it("falls back on unusable numbers and unknown strategies", () => {
    const config = loadConfig({
      ACCESS_TOKEN_EXPIRE_MINUTES: "-5",
      SLUG_MAX_ATTEMPTS: "many",
      SLUG_STRATEGY: "random"
    });

    expect(config.auth.accessTokenExpireMinutes).toBe(60);
    expect(config.slugs).toEqual({ strategy: "exact", maxAttempts: 20 });
  });

  it("requires a long secret key in production", () => {
    expect(() => loadConfig({ NODE_ENV: "production", SECRET_KEY: "short" })).toThrow(
      "SECRET_KEY must be at least 32 characters in production"
    );
    expect(() => loadConfig({ NODE_ENV: "production" })).toThrow(
      "SECRET_KEY must be at least 32 characters in production"
    );
  });

  it("accepts a long secret key in production and enables production headers", () => {
    const config = loadConfig({
      NODE_ENV: "production",
      SECRET_KEY: "test-secret-test-secret-test-secret"
    });

    expect(config.auth.secretKey).toBe("test-secret-test-secret-test-secret");
    expect(config.securityHeaders).toEqual({ isProduction: true });
  });
});
