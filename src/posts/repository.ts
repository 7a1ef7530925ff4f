import type { Pool } from "pg";
import { SlugConflictError } from "../errors";
import { isUniqueViolation, toStorageError } from "../db/errors";
import type { Post, PostStatus } from "./model";
import type { SlugLookup } from "./slug";

export type PostOrder = "created_at_desc" | "submitted_at_desc" | "submitted_at_asc" | "published_at_desc";

export interface PostListFilter {
  status?: PostStatus;
  authorId?: string;
}

export interface PaginationInput {
  limit: number;
  offset: number;
}

export interface ListPostsInput {
  filter: PostListFilter;
  order: PostOrder;
  pagination?: PaginationInput;
}

export interface NewPost {
  title: string;
  slug: string;
  body: string;
  authorId: string;
  createdAt: string;
}

export interface PostRepository extends SlugLookup {
  findById(id: string): Promise<Post | null>;
  findPublishedBySlug(slug: string): Promise<Post | null>;
  list(input: ListPostsInput): Promise<Post[]>;
  insert(input: NewPost): Promise<Post>;
  /** Writes `post` only if the stored revision still equals `expectedRevision`; null otherwise. */
  update(post: Post, expectedRevision: number): Promise<Post | null>;
  /** Same guard as `update`; false when nothing was removed. */
  delete(id: string, expectedRevision: number): Promise<boolean>;
}

interface PostRow {
  id: string;
  title: string;
  slug: string;
  body: string;
  status: PostStatus;
  author_id: string;
  created_at: Date;
  updated_at: Date;
  submitted_at: Date | null;
  published_at: Date | null;
  rejected_at: Date | null;
  revision: number;
}

const SLUG_CONSTRAINT = "posts_slug_key";
const ID_PATTERN = /^\d+$/;

const POST_COLUMNS = `
  id::text AS id,
  title,
  slug,
  body,
  status,
  author_id::text AS author_id,
  created_at,
  updated_at,
  submitted_at,
  published_at,
  rejected_at,
  revision
`;

const ORDER_SQL: Record<PostOrder, string> = {
  created_at_desc: "created_at DESC, id DESC",
  submitted_at_desc: "submitted_at DESC NULLS LAST, id DESC",
  submitted_at_asc: "submitted_at ASC NULLS LAST, id ASC",
  published_at_desc: "published_at DESC NULLS LAST, id DESC"
};

function toIsoOrNull(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

function toPost(row: PostRow): Post {
  return {
    id: row.id,
    title: row.title,
    slug: row.slug,
    body: row.body,
    status: row.status,
    authorId: row.author_id,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    submittedAt: toIsoOrNull(row.submitted_at),
    publishedAt: toIsoOrNull(row.published_at),
    rejectedAt: toIsoOrNull(row.rejected_at),
    revision: row.revision
  };
}

function toExcludedId(excludeId: string | undefined): string | null {
  return excludeId !== undefined && ID_PATTERN.test(excludeId) ? excludeId : null;
}

export class PostgresPostRepository implements PostRepository {
  constructor(private readonly pool: Pool) {}

  async findById(id: string): Promise<Post | null> {
    if (!ID_PATTERN.test(id)) {
      return null;
    }

    try {
      const result = await this.pool.query<PostRow>(`SELECT ${POST_COLUMNS} FROM posts WHERE id = $1`, [id]);
      const row = result.rows[0];
      return row ? toPost(row) : null;
    } catch (error) {
      throw toStorageError(error, "find_post_by_id");
    }
  }

  async findPublishedBySlug(slug: string): Promise<Post | null> {
    try {
      const result = await this.pool.query<PostRow>(
        `
          SELECT ${POST_COLUMNS}
          FROM posts
          WHERE slug = $1
            AND status = 'published'
          LIMIT 1
        `,
        [slug]
      );
      const row = result.rows[0];
      return row ? toPost(row) : null;
    } catch (error) {
      throw toStorageError(error, "find_published_post_by_slug");
    }
  }

  async list(input: ListPostsInput): Promise<Post[]> {
    const values: unknown[] = [];
    const where: string[] = [];

    if (input.filter.status) {
      values.push(input.filter.status);
      where.push(`status = $${values.length}`);
    }

    if (input.filter.authorId !== undefined) {
      if (!ID_PATTERN.test(input.filter.authorId)) {
        return [];
      }
      values.push(input.filter.authorId);
      where.push(`author_id = $${values.length}`);
    }

    let paginationSql = "";
    if (input.pagination) {
      values.push(input.pagination.limit);
      values.push(input.pagination.offset);
      paginationSql = `LIMIT $${values.length - 1} OFFSET $${values.length}`;
    }

    try {
      const result = await this.pool.query<PostRow>(
        `
          SELECT ${POST_COLUMNS}
          FROM posts
          ${where.length > 0 ? `WHERE ${where.join(" AND ")}` : ""}
          ORDER BY ${ORDER_SQL[input.order]}
          ${paginationSql}
        `,
        values
      );
      return result.rows.map(toPost);
    } catch (error) {
      throw toStorageError(error, "list_posts");
    }
  }

  async slugExists(slug: string, excludeId?: string): Promise<boolean> {
    try {
      const result = await this.pool.query<{ id: string }>(
        `
          SELECT id::text AS id
          FROM posts
          WHERE slug = $1
            AND ($2::bigint IS NULL OR id <> $2::bigint)
          LIMIT 1
        `,
        [slug, toExcludedId(excludeId)]
      );
      return result.rows.length > 0;
    } catch (error) {
      throw toStorageError(error, "probe_slug");
    }
  }

  async countSlugsWithPrefix(prefix: string, excludeId?: string): Promise<number> {
    try {
      const result = await this.pool.query<{ count: number }>(
        `
          SELECT count(*)::int AS count
          FROM posts
          WHERE left(slug, length($1)) = $1
            AND ($2::bigint IS NULL OR id <> $2::bigint)
        `,
        [prefix, toExcludedId(excludeId)]
      );
      return result.rows[0]?.count ?? 0;
    } catch (error) {
      throw toStorageError(error, "count_slug_prefix");
    }
  }

  async insert(input: NewPost): Promise<Post> {
    try {
      const result = await this.pool.query<PostRow>(
        `
          INSERT INTO posts (title, slug, body, status, author_id, created_at, updated_at, revision)
          VALUES ($1, $2, $3, 'draft', $4, $5, $5, 1)
          RETURNING ${POST_COLUMNS}
        `,
        [input.title, input.slug, input.body, input.authorId, input.createdAt]
      );
      return toPost(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error, SLUG_CONSTRAINT)) {
        throw new SlugConflictError(input.slug);
      }
      throw toStorageError(error, "insert_post");
    }
  }

  async update(post: Post, expectedRevision: number): Promise<Post | null> {
    try {
      const result = await this.pool.query<PostRow>(
        `
          UPDATE posts
          SET
            title = $1,
            slug = $2,
            body = $3,
            status = $4,
            updated_at = $5,
            submitted_at = $6,
            published_at = $7,
            rejected_at = $8,
            revision = $9
          WHERE id = $10
            AND revision = $11
          RETURNING ${POST_COLUMNS}
        `,
        [
          post.title,
          post.slug,
          post.body,
          post.status,
          post.updatedAt,
          post.submittedAt,
          post.publishedAt,
          post.rejectedAt,
          post.revision,
          post.id,
          expectedRevision
        ]
      );
      const row = result.rows[0];
      return row ? toPost(row) : null;
    } catch (error) {
      if (isUniqueViolation(error, SLUG_CONSTRAINT)) {
        throw new SlugConflictError(post.slug);
      }
      throw toStorageError(error, "update_post");
    }
  }

  async delete(id: string, expectedRevision: number): Promise<boolean> {
    if (!ID_PATTERN.test(id)) {
      return false;
    }

    try {
      const result = await this.pool.query("DELETE FROM posts WHERE id = $1 AND revision = $2", [id, expectedRevision]);
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      throw toStorageError(error, "delete_post");
    }
  }
}

function compareNullableDesc(left: string | null, right: string | null): number {
  if (left === right) {
    return 0;
  }
  if (left === null) {
    return 1;
  }
  if (right === null) {
    return -1;
  }
  return right.localeCompare(left);
}

function compareNullableAsc(left: string | null, right: string | null): number {
  if (left === right) {
    return 0;
  }
  if (left === null) {
    return 1;
  }
  if (right === null) {
    return -1;
  }
  return left.localeCompare(right);
}

function compareIdDesc(left: Post, right: Post): number {
  return Number(right.id) - Number(left.id);
}

const IN_MEMORY_ORDER: Record<PostOrder, (left: Post, right: Post) => number> = {
  created_at_desc: (left, right) => right.createdAt.localeCompare(left.createdAt) || compareIdDesc(left, right),
  submitted_at_desc: (left, right) =>
    compareNullableDesc(left.submittedAt, right.submittedAt) || compareIdDesc(left, right),
  submitted_at_asc: (left, right) =>
    compareNullableAsc(left.submittedAt, right.submittedAt) || compareIdDesc(right, left),
  published_at_desc: (left, right) =>
    compareNullableDesc(left.publishedAt, right.publishedAt) || compareIdDesc(left, right)
};

export type SeedPost = Omit<Post, "createdAt" | "updatedAt" | "submittedAt" | "publishedAt" | "rejectedAt" | "revision"> &
  Partial<Pick<Post, "createdAt" | "updatedAt" | "submittedAt" | "publishedAt" | "rejectedAt" | "revision">>;

export class InMemoryPostRepository implements PostRepository {
  private posts: Post[] = [];
  private nextId = 1;

  constructor(initialPosts: SeedPost[] = []) {
    const now = new Date().toISOString();
    this.posts = initialPosts.map((post) => ({
      ...post,
      createdAt: post.createdAt ?? now,
      updatedAt: post.updatedAt ?? post.createdAt ?? now,
      submittedAt: post.submittedAt ?? null,
      publishedAt: post.publishedAt ?? null,
      rejectedAt: post.rejectedAt ?? null,
      revision: post.revision ?? 1
    }));
    this.nextId = this.posts.reduce((max, post) => Math.max(max, Number(post.id) || 0), 0) + 1;
  }

  async findById(id: string): Promise<Post | null> {
    const post = this.posts.find((candidate) => candidate.id === id);
    return post ? { ...post } : null;
  }

  async findPublishedBySlug(slug: string): Promise<Post | null> {
    const post = this.posts.find((candidate) => candidate.slug === slug && candidate.status === "published");
    return post ? { ...post } : null;
  }

  async list(input: ListPostsInput): Promise<Post[]> {
    const matching = this.posts
      .filter((post) => !input.filter.status || post.status === input.filter.status)
      .filter((post) => input.filter.authorId === undefined || post.authorId === input.filter.authorId)
      .sort(IN_MEMORY_ORDER[input.order]);

    const page = input.pagination
      ? matching.slice(input.pagination.offset, input.pagination.offset + input.pagination.limit)
      : matching;

    return page.map((post) => ({ ...post }));
  }

  async slugExists(slug: string, excludeId?: string): Promise<boolean> {
    return this.posts.some((post) => post.slug === slug && post.id !== excludeId);
  }

  async countSlugsWithPrefix(prefix: string, excludeId?: string): Promise<number> {
    return this.posts.filter((post) => post.slug.startsWith(prefix) && post.id !== excludeId).length;
  }

  async insert(input: NewPost): Promise<Post> {
    if (this.posts.some((candidate) => candidate.slug === input.slug)) {
      throw new SlugConflictError(input.slug);
    }

    const post: Post = {
      id: String(this.nextId++),
      title: input.title,
      slug: input.slug,
      body: input.body,
      status: "draft",
      authorId: input.authorId,
      createdAt: input.createdAt,
      updatedAt: input.createdAt,
      submittedAt: null,
      publishedAt: null,
      rejectedAt: null,
      revision: 1
    };

    this.posts.push(post);
    return { ...post };
  }

  async update(post: Post, expectedRevision: number): Promise<Post | null> {
    const index = this.posts.findIndex((candidate) => candidate.id === post.id);
    if (index === -1 || this.posts[index].revision !== expectedRevision) {
      return null;
    }

    if (this.posts.some((candidate, candidateIndex) => candidateIndex !== index && candidate.slug === post.slug)) {
      throw new SlugConflictError(post.slug);
    }

    this.posts[index] = { ...post };
    return { ...post };
  }

  async delete(id: string, expectedRevision: number): Promise<boolean> {
    const index = this.posts.findIndex((candidate) => candidate.id === id);
    if (index === -1 || this.posts[index].revision !== expectedRevision) {
      return false;
    }

    this.posts.splice(index, 1);
    return true;
  }
}
