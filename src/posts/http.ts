import type { Request, Response } from "express";
import { ValidationError, toErrorResponse } from "../errors";
import { buildSafeRequestLogMetadata, type Logger } from "../security/logger";
import { assertValidStatus, type PostStatus } from "./model";
import type { PaginationInput } from "./repository";

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 100;

export interface RouteErrorMetadata {
  route: string;
  actorId?: string;
  postId?: string;
  slug?: string;
}

function firstQueryValue(rawValue: unknown): unknown {
  return Array.isArray(rawValue) ? rawValue[0] : rawValue;
}

function parseIntegerValue(name: string, rawValue: unknown): number | undefined {
  if (rawValue === undefined || rawValue === null) {
    return undefined;
  }

  const value = firstQueryValue(rawValue);
  if (typeof value !== "string" || !/^\d+$/.test(value.trim())) {
    throw new ValidationError(`${name} must be a non-negative integer`);
  }

  const parsed = Number(value.trim());
  if (!Number.isSafeInteger(parsed)) {
    throw new ValidationError(`${name} is too large`);
  }

  return parsed;
}

export function parsePagination(req: Request): PaginationInput {
  const limit = parseIntegerValue("limit", req.query.limit) ?? DEFAULT_LIMIT;
  if (limit < 1 || limit > MAX_LIMIT) {
    throw new ValidationError(`limit must be between 1 and ${MAX_LIMIT}`);
  }

  const offset = parseIntegerValue("offset", req.query.offset) ?? 0;

  return { limit, offset };
}

export function parseOptionalStatusFilter(req: Request): PostStatus | undefined {
  const rawStatus = req.query.status;
  if (rawStatus === undefined) {
    return undefined;
  }

  const status = firstQueryValue(rawStatus);
  if (typeof status !== "string") {
    throw new ValidationError("status filter is invalid");
  }

  return assertValidStatus(status.trim());
}

export function normalizeOptionalString(field: string, value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string`);
  }

  return value;
}

export function requireString(field: string, value: unknown): string {
  const normalized = normalizeOptionalString(field, value);
  if (normalized === undefined) {
    throw new ValidationError(`${field} is required`);
  }
  return normalized;
}

export function routeParam(req: Request, name: string): string {
  const raw: unknown = req.params[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return typeof value === "string" ? value : "";
}

export function handleRouteError(
  res: Response,
  error: unknown,
  logger: Logger,
  metadata: RouteErrorMetadata
): void {
  const response = toErrorResponse(error);
  const request = buildSafeRequestLogMetadata(res.req);

  if (response.statusCode >= 500) {
    logger.warn("request_failed", {
      ...metadata,
      request,
      statusCode: response.statusCode,
      errorType: response.errorType,
      error
    });
  } else {
    logger.info("request_failed", {
      ...metadata,
      request,
      statusCode: response.statusCode,
      errorType: response.errorType
    });
  }

  res.status(response.statusCode).json({ error: response.message });
}
