import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { AuthService } from "../auth/service";
import { AuthenticationError } from "../errors";
import { hasRole } from "../posts/lifecycle";
import type { Actor } from "../posts/model";
import type { AuthContext, UserRole } from "../types/context";

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;
const INVALID_CREDENTIALS = "Could not validate credentials";

function rejectUnauthenticated(req: Request, res: Response): void {
  res.setHeader("WWW-Authenticate", "Bearer");
  res.status(401).json({ error: req.authFailure ?? "Authentication required" });
}

export function readBearerToken(req: Request): string | undefined {
  const header = req.header("authorization");
  if (!header) {
    return undefined;
  }

  const match = BEARER_PATTERN.exec(header.trim());
  return match?.[1];
}

/**
 * Resolves `Authorization: Bearer <token>` into `req.auth`. A missing, malformed
 * or stale token leaves the request anonymous and records why in
 * `req.authFailure`; only the guards turn that into a 401, so public routes
 * still answer a caller holding an expired token.
 */
export function hydrateAuthFromBearer(authService: AuthService): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    req.auth = undefined;
    req.authFailure = undefined;

    if (!req.header("authorization")) {
      next();
      return;
    }

    const token = readBearerToken(req);
    if (!token) {
      req.authFailure = INVALID_CREDENTIALS;
      next();
      return;
    }

    try {
      const user = await authService.resolveActor(token);
      const authContext: AuthContext = {
        userId: user.id,
        email: user.email,
        role: user.role,
        isAuthenticated: true
      };
      req.auth = authContext;
      next();
    } catch (error) {
      if (error instanceof AuthenticationError) {
        req.authFailure = error.message;
        next();
        return;
      }
      next(error);
    }
  };
}

export function requireAuthenticated(req: Request, res: Response, next: NextFunction): void {
  if (!req.auth?.isAuthenticated) {
    rejectUnauthenticated(req, res);
    return;
  }

  next();
}

export function requireRoles(...roles: UserRole[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.auth?.isAuthenticated) {
      rejectUnauthenticated(req, res);
      return;
    }

    if (!hasRole(req.auth, roles)) {
      res.status(403).json({ error: "Insufficient permissions" });
      return;
    }

    next();
  };
}

export function getActor(req: Request): Actor {
  if (!req.auth?.isAuthenticated) {
    throw new AuthenticationError("Authentication required");
  }

  return { id: req.auth.userId, role: req.auth.role };
}
