import helmet from "helmet";
import type { RequestHandler } from "express";
import type { AppConfig, SecurityHeadersConfig } from "../config";

const PERMISSIONS_POLICY_VALUE = "geolocation=(), microphone=(), camera=(), payment=()";

function resolveSecurityHeadersConfig(config: AppConfig): SecurityHeadersConfig {
  return {
    isProduction: config.securityHeaders?.isProduction ?? false
  };
}

/** Headers for JSON responses: nothing here is ever rendered or framed by a browser. */
export function createApiSecurityHeaders(config: AppConfig): RequestHandler {
  const resolved = resolveSecurityHeadersConfig(config);
  const helmetMiddleware = helmet({
    contentSecurityPolicy: {
      useDefaults: false,
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"]
      }
    },
    referrerPolicy: { policy: "no-referrer" },
    xFrameOptions: { action: "deny" },
    crossOriginOpenerPolicy: { policy: "same-origin" },
    crossOriginResourcePolicy: { policy: "same-site" },
    crossOriginEmbedderPolicy: false,
    hsts: resolved.isProduction
      ? {
          maxAge: 31536000,
          includeSubDomains: true
        }
      : false
  });

  return (req, res, next) => {
    if (!res.getHeader("Permissions-Policy")) {
      res.setHeader("Permissions-Policy", PERMISSIONS_POLICY_VALUE);
    }
    helmetMiddleware(req, res, next);
  };
}
