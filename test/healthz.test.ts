import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../src/app";
import type { AppConfig } from "../src/config";
import type { LogMetadata, Logger } from "../src/security/logger";

function createConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 3000,
    auth: {
      secretKey: "test-secret-test-secret-test-secret",
      issuer: "editorial-api-test",
      accessTokenExpireMinutes: 60
    },
    slugs: { strategy: "exact", maxAttempts: 20 },
    rateLimit: { enabled: false },
    ...overrides
  };
}

describe("GET /healthz", () => {
  it("returns ok when health dependencies pass", async () => {
    const app = createApp(createConfig());

    const response = await request(app).get("/healthz");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true });
  });

  it("returns 503 and logs when health dependencies fail", async () => {
    const events: Array<{ event: string; metadata?: LogMetadata }> = [];
    const logger: Logger = {
      info(event, metadata) {
        events.push({ event, metadata });
      },
      warn(event, metadata) {
        events.push({ event, metadata });
      }
    };
    const app = createApp(createConfig(), {
      logger,
      healthCheck: async () => {
        throw new Error("db unavailable");
      }
    });

    const response = await request(app).get("/healthz");

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ ok: false });
    expect(events.map((entry) => entry.event)).toEqual(["health_check_failed"]);
  });
});
