import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { AppConfig, RateLimitConfig } from "../config";

/**
 * Each route family has its own per-minute budget. Credential routes are keyed
 * by client IP only, so a caller cannot dodge the login budget by presenting a
 * token; read and write routes are keyed per account when one is known.
 */
export type RateLimitFamily = "read" | "write" | "credential";

export interface RateLimitWindow {
  count: number;
  resetInMs: number;
}

export interface RateLimitStore {
  increment(key: string, windowMs: number): RateLimitWindow;
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

const WINDOW_MS = 60_000;
const MAX_TRACKED_KEYS = 5_000;
const DEFAULT_RATE_LIMITS: RateLimitConfig = {
  enabled: true,
  readPerMinute: 120,
  writePerMinute: 30,
  credentialPerMinute: 10
};

function resolveIp(req: Request): string {
  const [forwarded] = req.ips;
  return forwarded ?? req.ip ?? "unknown";
}

export function resolveRateLimitConfig(config: AppConfig): RateLimitConfig {
  return {
    enabled: config.rateLimit?.enabled ?? DEFAULT_RATE_LIMITS.enabled,
    readPerMinute: config.rateLimit?.readPerMinute ?? DEFAULT_RATE_LIMITS.readPerMinute,
    writePerMinute: config.rateLimit?.writePerMinute ?? DEFAULT_RATE_LIMITS.writePerMinute,
    credentialPerMinute: config.rateLimit?.credentialPerMinute ?? DEFAULT_RATE_LIMITS.credentialPerMinute
  };
}

function limitFor(config: RateLimitConfig, family: RateLimitFamily): number {
  switch (family) {
    case "read":
      return config.readPerMinute;
    case "write":
      return config.writePerMinute;
    case "credential":
      return config.credentialPerMinute;
  }
}

export function resolveRateLimitIdentity(req: Request, family: RateLimitFamily): string {
  const userId = req.auth?.userId.trim();
  if (family !== "credential" && userId) {
    return `user:${userId}`;
  }

  return `ip:${resolveIp(req)}`;
}

export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly entries = new Map<string, RateLimitEntry>();

  constructor(private readonly now: () => number = () => Date.now()) {}

  increment(key: string, windowMs: number): RateLimitWindow {
    const nowMs = this.now();
    if (this.entries.size >= MAX_TRACKED_KEYS) {
      this.prune(nowMs);
    }

    const existing = this.entries.get(key);
    const entry =
      existing && existing.resetAt > nowMs
        ? { count: existing.count + 1, resetAt: existing.resetAt }
        : { count: 1, resetAt: nowMs + windowMs };

    this.entries.set(key, entry);

    return { count: entry.count, resetInMs: entry.resetAt - nowMs };
  }

  private prune(nowMs: number): void {
    for (const [entryKey, entry] of this.entries) {
      if (entry.resetAt <= nowMs) {
        this.entries.delete(entryKey);
      }
    }

    // Still full: evict the oldest keys in insertion order.
    for (const entryKey of this.entries.keys()) {
      if (this.entries.size < MAX_TRACKED_KEYS) {
        break;
      }
      this.entries.delete(entryKey);
    }
  }
}

export function createRateLimitMiddleware(
  config: AppConfig,
  family: RateLimitFamily,
  store: RateLimitStore
): RequestHandler {
  const rateLimitConfig = resolveRateLimitConfig(config);
  const limit = limitFor(rateLimitConfig, family);

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!rateLimitConfig.enabled) {
      next();
      return;
    }

    const window = store.increment(`${family}:${resolveRateLimitIdentity(req, family)}`, WINDOW_MS);
    const remaining = Math.max(0, limit - window.count);
    const resetInSeconds = Math.max(1, Math.ceil(window.resetInMs / 1000));

    res.setHeader("RateLimit-Limit", String(limit));
    res.setHeader("RateLimit-Remaining", String(remaining));
    res.setHeader("RateLimit-Reset", String(resetInSeconds));

    if (window.count > limit) {
      res.setHeader("Retry-After", String(resetInSeconds));
      res.status(429).json({ error: "Too many requests" });
      return;
    }

    next();
  };
}
