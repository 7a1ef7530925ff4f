import { readFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadMigrations } from "../src/db/migrations";

const migrationsDirectory = path.resolve(process.cwd(), "db/migrations");
const upSql = readFileSync(path.join(migrationsDirectory, "0001_users_and_posts.up.sql"), "utf8");
const downSql = readFileSync(path.join(migrationsDirectory, "0001_users_and_posts.down.sql"), "utf8");

describe("DB migration 0001_users_and_posts", () => {
  it("creates the users and posts tables", () => {
    expect(upSql).toContain("CREATE TABLE users");
    expect(upSql).toContain("CREATE TABLE posts");
  });

  it("declares the unique constraints the repositories translate", () => {
    expect(upSql).toContain("CONSTRAINT users_email_key UNIQUE (email)");
    expect(upSql).toContain("CONSTRAINT posts_slug_key UNIQUE (slug)");
  });

  it("ties publishedAt to the published status", () => {
    expect(upSql).toContain("CHECK ((status = 'published') = (published_at IS NOT NULL))");
    expect(upSql).toContain("CHECK (status IN ('draft', 'pending_review', 'published', 'rejected'))");
  });

  it("indexes the read paths", () => {
    expect(upSql).toContain("posts_status_published_at_idx");
    expect(upSql).toContain("posts_author_created_at_idx");
    expect(upSql).toContain("posts_status_submitted_at_idx");
  });

  it("drops posts before users on the way down", () => {
    expect(downSql.indexOf("DROP TABLE IF EXISTS posts")).toBeLessThan(downSql.indexOf("DROP TABLE IF EXISTS users"));
  });
});

describe("loadMigrations", () => {
  it("pairs every up file with its down file", async () => {
    const migrations = await loadMigrations(migrationsDirectory);

    expect(migrations).toEqual([
      {
        name: "0001_users_and_posts",
        upPath: path.join(migrationsDirectory, "0001_users_and_posts.up.sql"),
        downPath: path.join(migrationsDirectory, "0001_users_and_posts.down.sql")
      }
    ]);
  });
});
