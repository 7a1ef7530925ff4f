import { ConflictError, SlugConflictError } from "../errors";
import type { Logger } from "../security/logger";

export type SlugStrategy = "exact" | "prefix-count";

export const FALLBACK_SLUG = "post";

export interface SlugLookup {
  slugExists(slug: string, excludeId?: string): Promise<boolean>;
  countSlugsWithPrefix(prefix: string, excludeId?: string): Promise<number>;
}

export interface SlugAllocatorOptions {
  strategy: SlugStrategy;
  maxAttempts: number;
  logger?: Logger;
}

export function slugify(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[^\x00-\x7f]/g, "")
    .replace(/[^a-zA-Z0-9\s-]/g, "")
    .toLowerCase()
    .replace(/[\s_-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function baseSlug(title: string): string {
  return slugify(title) || FALLBACK_SLUG;
}

function candidateFor(base: string, attempt: number): string {
  return attempt === 0 ? base : `${base}-${attempt}`;
}

/**
 * Picks the slug for a post title.
 *
 * `prefix-count` counts every slug that merely starts with the base, so
 * "cat" is suffixed once "category-x" exists, and two concurrent writers can
 * choose the same value. Only the storage unique index catches that case.
 *
 * `exact` probes `base`, `base-1`, `base-2`... until it finds a free slug and,
 * through `persist`, moves past a candidate whose write hits the unique index.
 * `maxAttempts` bounds those conflicting writes, not the probe.
 */
export class SlugAllocator {
  private readonly strategy: SlugStrategy;
  private readonly maxAttempts: number;
  private readonly logger?: Logger;

  constructor(
    private readonly lookup: SlugLookup,
    options: SlugAllocatorOptions
  ) {
    this.strategy = options.strategy;
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.logger = options.logger;
  }

  async allocate(title: string, excludeId?: string): Promise<string> {
    const base = baseSlug(title);

    if (this.strategy === "prefix-count") {
      const count = await this.lookup.countSlugsWithPrefix(base, excludeId);
      return count === 0 ? base : `${base}-${count}`;
    }

    const free = await this.nextFreeCandidate(base, 0, excludeId);
    return free.slug;
  }

  async persist<T>(title: string, write: (slug: string) => Promise<T>, excludeId?: string): Promise<T> {
    if (this.strategy === "prefix-count") {
      return write(await this.allocate(title, excludeId));
    }

    const base = baseSlug(title);
    let suffix = 0;

    for (let conflicts = 0; conflicts < this.maxAttempts; conflicts += 1) {
      const free = await this.nextFreeCandidate(base, suffix, excludeId);

      try {
        return await write(free.slug);
      } catch (error) {
        if (!(error instanceof SlugConflictError)) {
          throw error;
        }

        this.logger?.info("slug_conflict_retry", {
          slug: free.slug,
          attempt: conflicts + 1
        });
        suffix = free.suffix + 1;
      }
    }

    throw new ConflictError("unable to allocate a unique slug");
  }

  private async nextFreeCandidate(
    base: string,
    fromSuffix: number,
    excludeId?: string
  ): Promise<{ slug: string; suffix: number }> {
    let suffix = fromSuffix;
    while (await this.lookup.slugExists(candidateFor(base, suffix), excludeId)) {
      suffix += 1;
    }
    return { slug: candidateFor(base, suffix), suffix };
  }
}
