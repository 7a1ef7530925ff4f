import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import type { Express } from "express";
import { createApp } from "../src/app";
import type { AppConfig } from "../src/config";
import { silentLogger } from "../src/security/logger";

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

async function registerAndLogin(app: Express, email: string): Promise<string> {
  const password = "password-123";
  await request(app).post("/auth/register").send({ email, password }).expect(201);
  const response = await request(app).post("/auth/login").send({ email, password }).expect(200);
  return response.body.access_token;
}

describe("posts API", () => {
  let clock: Date;
  let app: Express;
  let adminToken: string;
  let authorToken: string;
  let otherToken: string;

  beforeEach(async () => {
    clock = new Date("2026-03-01T10:00:00.000Z");
    app = createApp(createConfig(), { logger: silentLogger, now: () => clock });
    adminToken = await registerAndLogin(app, "admin@example.com");
    authorToken = await registerAndLogin(app, "author@example.com");
    otherToken = await registerAndLogin(app, "other@example.com");
  });

  async function createDraft(title: string, token = authorToken) {
    const response = await request(app)
      .post("/posts")
      .set("Authorization", `Bearer ${token}`)
      .send({ title, body: "Hello **world**" })
      .expect(201);
    return response.body;
  }

  it("creates a draft for the caller", async () => {
    const response = await request(app)
      .post("/posts")
      .set("Authorization", `Bearer ${authorToken}`)
      .send({ title: "Draft One", body: "Hello" });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({
      id: "1",
      title: "Draft One",
      slug: "draft-one",
      body: "Hello",
      status: "draft",
      author_id: "2",
      created_at: "2026-03-01T10:00:00.000Z",
      updated_at: "2026-03-01T10:00:00.000Z",
      submitted_at: null,
      published_at: null,
      rejected_at: null,
      revision: 1
    });
  });

  it("requires authentication", async () => {
    const response = await request(app).post("/posts").send({ title: "Draft One", body: "Hello" });

    expect(response.status).toBe(401);
    expect(response.headers["www-authenticate"]).toBe("Bearer");
    expect(response.body).toEqual({ error: "Authentication required" });
  });

  it("rejects invalid bearer tokens", async () => {
    const response = await request(app).get("/posts/me").set("Authorization", "Bearer not-a-token");

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: "Could not validate credentials" });
  });

  it("validates the payload", async () => {
    const response = await request(app)
      .post("/posts")
      .set("Authorization", `Bearer ${authorToken}`)
      .send({ body: "Hello" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "title is required" });
  });

  it("runs the submit, review and publish flow", async () => {
    const draft = await createDraft("Draft One");

    const submitted = await request(app)
      .post(`/posts/${draft.id}/submit`)
      .set("Authorization", `Bearer ${authorToken}`);
    expect(submitted.status).toBe(200);
    expect(submitted.body.status).toBe("pending_review");

    const pendingForUser = await request(app).get("/posts/pending").set("Authorization", `Bearer ${authorToken}`);
    expect(pendingForUser.status).toBe(403);
    expect(pendingForUser.body).toEqual({ error: "Insufficient permissions" });

    const pendingForAdmin = await request(app).get("/posts/pending").set("Authorization", `Bearer ${adminToken}`);
    expect(pendingForAdmin.status).toBe(200);
    expect(pendingForAdmin.body.map((post: { slug: string }) => post.slug)).toEqual(["draft-one"]);

    const approved = await request(app)
      .post(`/admin/reviews/${draft.id}/approve`)
      .set("Authorization", `Bearer ${adminToken}`);
    expect(approved.status).toBe(200);
    expect(approved.body.status).toBe("published");
    expect(approved.body.published_at).toBe("2026-03-01T10:00:00.000Z");

    const article = await request(app).get("/articles/draft-one");
    expect(article.status).toBe(200);
    expect(article.body).toEqual({
      id: draft.id,
      title: "Draft One",
      slug: "draft-one",
      body: "Hello **world**",
      body_html: "<p>Hello <strong>world</strong></p>",
      published_at: "2026-03-01T10:00:00.000Z"
    });

    const edit = await request(app)
      .put(`/posts/${draft.id}`)
      .set("Authorization", `Bearer ${authorToken}`)
      .send({ title: "Changed" });
    expect(edit.status).toBe(400);
    expect(edit.body).toEqual({ error: "Invalid status for this action" });
  });

  it("keeps publish and reject admin only", async () => {
    const draft = await createDraft("Draft One");

    const publish = await request(app)
      .post(`/posts/${draft.id}/publish`)
      .set("Authorization", `Bearer ${authorToken}`);
    const review = await request(app).get("/admin/reviews").set("Authorization", `Bearer ${authorToken}`);

    expect(publish.status).toBe(403);
    expect(review.status).toBe(403);
  });

  it("lets admins publish drafts directly and reject pending posts", async () => {
    const first = await createDraft("First");
    const second = await createDraft("Second");
    await request(app).post(`/posts/${second.id}/submit`).set("Authorization", `Bearer ${authorToken}`).expect(200);

    const published = await request(app)
      .post(`/posts/${first.id}/publish`)
      .set("Authorization", `Bearer ${adminToken}`);
    const rejected = await request(app)
      .post(`/posts/${second.id}/reject`)
      .set("Authorization", `Bearer ${adminToken}`);
    const rejectDraft = await request(app)
      .post(`/posts/${first.id}/reject`)
      .set("Authorization", `Bearer ${adminToken}`);

    expect(published.body.status).toBe("published");
    expect(rejected.body.status).toBe("rejected");
    expect(rejectDraft.status).toBe(400);
  });

  it("orders the admin review queue oldest submission first", async () => {
    const early = await createDraft("Early");
    const late = await createDraft("Late");
    await request(app).post(`/posts/${early.id}/submit`).set("Authorization", `Bearer ${authorToken}`).expect(200);
    clock = new Date("2026-03-01T11:00:00.000Z");
    await request(app).post(`/posts/${late.id}/submit`).set("Authorization", `Bearer ${authorToken}`).expect(200);

    const queue = await request(app).get("/admin/reviews").set("Authorization", `Bearer ${adminToken}`);

    expect(queue.status).toBe(200);
    expect(queue.body.map((post: { slug: string }) => post.slug)).toEqual(["early", "late"]);
  });

  it("hides posts from other users", async () => {
    const draft = await createDraft("Draft One");

    const response = await request(app).get(`/posts/${draft.id}`).set("Authorization", `Bearer ${otherToken}`);

    expect(response.status).toBe(403);
    expect(response.body).toEqual({ error: "Not allowed" });
  });

  it("deletes drafts", async () => {
    const draft = await createDraft("Draft One");

    const deleted = await request(app).delete(`/posts/${draft.id}`).set("Authorization", `Bearer ${authorToken}`);
    const lookup = await request(app).get(`/posts/${draft.id}`).set("Authorization", `Bearer ${authorToken}`);

    expect(deleted.status).toBe(204);
    expect(lookup.status).toBe(404);
    expect(lookup.body).toEqual({ error: "Post not found" });
  });

  it("lists the caller's posts filtered by status", async () => {
    const first = await createDraft("First");
    await createDraft("Second");
    await createDraft("Foreign", otherToken);
    await request(app).post(`/posts/${first.id}/submit`).set("Authorization", `Bearer ${authorToken}`).expect(200);

    const pending = await request(app)
      .get("/posts/me?status=pending_review")
      .set("Authorization", `Bearer ${authorToken}`);
    const invalid = await request(app).get("/posts/me?status=bogus").set("Authorization", `Bearer ${authorToken}`);

    expect(pending.status).toBe(200);
    expect(pending.body.map((post: { slug: string }) => post.slug)).toEqual(["first"]);
    expect(invalid.status).toBe(400);
    expect(invalid.body).toEqual({ error: "status must be one of: draft, pending_review, published, rejected" });
  });

  it("gives duplicate titles distinct slugs", async () => {
    const first = await createDraft("News");
    const second = await createDraft("News", otherToken);

    expect(first.slug).toBe("news");
    expect(second.slug).toBe("news-1");
  });
});

describe("public articles API", () => {
  it("validates pagination", async () => {
    const app = createApp(createConfig(), { logger: silentLogger });

    const zero = await request(app).get("/articles?limit=0");
    const tooMany = await request(app).get("/articles?limit=101");
    const notNumber = await request(app).get("/articles?offset=abc");
    const hugeOffset = await request(app).get("/articles?offset=99999999999999999999");

    expect(zero.status).toBe(400);
    expect(zero.body).toEqual({ error: "limit must be between 1 and 100" });
    expect(tooMany.status).toBe(400);
    expect(notNumber.body).toEqual({ error: "offset must be a non-negative integer" });
    expect(hugeOffset.status).toBe(400);
    expect(hugeOffset.body).toEqual({ error: "offset is too large" });
  });

  it("serves public reads to callers holding a stale token", async () => {
    const app = createApp(createConfig(), { logger: silentLogger });

    const list = await request(app).get("/articles").set("Authorization", "Bearer expired.or.garbage");
    const missing = await request(app).get("/articles/missing").set("Authorization", "Basic abc");

    expect(list.status).toBe(200);
    expect(list.body).toEqual([]);
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: "Article not found or not published" });
  });

  it("returns an empty list when nothing is published", async () => {
    const app = createApp(createConfig(), { logger: silentLogger });

    const response = await request(app).get("/articles");

    expect(response.status).toBe(200);
    expect(response.body).toEqual([]);
  });

  it("does not expose unpublished posts by slug", async () => {
    const app = createApp(createConfig(), { logger: silentLogger });

    const response = await request(app).get("/articles/missing");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "Article not found or not published" });
  });

  it("answers unknown routes with a JSON 404", async () => {
    const app = createApp(createConfig(), { logger: silentLogger });

    const response = await request(app).get("/nope");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "Not found" });
  });
});
