import type { SlugStrategy } from "./posts/slug";

export interface SecurityHeadersConfig {
  isProduction: boolean;
}

export interface RateLimitConfig {
  enabled: boolean;
  readPerMinute: number;
  writePerMinute: number;
  credentialPerMinute: number;
}

export interface AuthConfig {
  secretKey: string;
  issuer: string;
  accessTokenExpireMinutes: number;
}

export interface SlugConfig {
  strategy: SlugStrategy;
  maxAttempts: number;
}

export interface AppConfig {
  port: number;
  auth: AuthConfig;
  slugs: SlugConfig;
  rateLimit?: Partial<RateLimitConfig>;
  securityHeaders?: Partial<SecurityHeadersConfig>;
}

const DEV_SECRET_KEY = "dev-secret-key-change-me";
const MIN_PRODUCTION_SECRET_LENGTH = 32;

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.toLowerCase();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }
  return defaultValue;
}

export function parsePositiveInteger(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return defaultValue;
  }

  return parsed;
}

function parseSlugStrategy(value: string | undefined): SlugStrategy {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "prefix-count") {
    return "prefix-count";
  }

  return "exact";
}

function resolveSecretKey(value: string | undefined, isProduction: boolean): string {
  const secretKey = value?.trim() ?? "";

  if (isProduction) {
    if (secretKey.length < MIN_PRODUCTION_SECRET_LENGTH) {
      throw new Error(`SECRET_KEY must be at least ${MIN_PRODUCTION_SECRET_LENGTH} characters in production`);
    }
    return secretKey;
  }

  return secretKey.length > 0 ? secretKey : DEV_SECRET_KEY;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const isProduction = (env.NODE_ENV ?? "").toLowerCase() === "production";
  const issuer = (env.TOKEN_ISSUER ?? "").trim() || "editorial-api";

  return {
    port: Number(env.PORT ?? 3000),
    auth: {
      secretKey: resolveSecretKey(env.SECRET_KEY, isProduction),
      issuer,
      accessTokenExpireMinutes: parsePositiveInteger(env.ACCESS_TOKEN_EXPIRE_MINUTES, 60)
    },
    slugs: {
      strategy: parseSlugStrategy(env.SLUG_STRATEGY),
      maxAttempts: parsePositiveInteger(env.SLUG_MAX_ATTEMPTS, 20)
    },
    rateLimit: {
      enabled: parseBoolean(env.RATE_LIMIT_ENABLED, true),
      readPerMinute: parsePositiveInteger(env.RATE_LIMIT_READ_PER_MIN, 120),
      writePerMinute: parsePositiveInteger(env.RATE_LIMIT_WRITE_PER_MIN, 30),
      credentialPerMinute: parsePositiveInteger(env.RATE_LIMIT_CREDENTIAL_PER_MIN, 10)
    },
    securityHeaders: {
      isProduction
    }
  };
}
