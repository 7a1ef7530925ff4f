import { jwtVerify, SignJWT, errors as joseErrors } from "jose";
import type { AuthConfig } from "../config";
import { AuthenticationError } from "../errors";
import type { UserRole } from "../types/context";

const ALGORITHM = "HS256";

export interface AccessTokenClaims {
  userId: string;
  role: UserRole;
}

export interface IssuedToken {
  accessToken: string;
  tokenType: "bearer";
  expiresIn: number;
}

function parseRole(value: unknown): UserRole | undefined {
  return value === "admin" || value === "user" ? value : undefined;
}

export class TokenService {
  private readonly key: Uint8Array;

  constructor(private readonly config: AuthConfig) {
    this.key = new TextEncoder().encode(config.secretKey);
  }

  async issue(claims: AccessTokenClaims, now = new Date()): Promise<IssuedToken> {
    const issuedAt = Math.floor(now.getTime() / 1000);
    const expiresIn = this.config.accessTokenExpireMinutes * 60;

    const accessToken = await new SignJWT({ role: claims.role })
      .setProtectedHeader({ alg: ALGORITHM })
      .setSubject(claims.userId)
      .setIssuer(this.config.issuer)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + expiresIn)
      .sign(this.key);

    return { accessToken, tokenType: "bearer", expiresIn };
  }

  async verify(token: string): Promise<AccessTokenClaims> {
    try {
      const { payload } = await jwtVerify(token, this.key, {
        issuer: this.config.issuer,
        algorithms: [ALGORITHM]
      });

      const role = parseRole(payload.role);
      if (!payload.sub || !role) {
        throw new AuthenticationError("Could not validate credentials");
      }

      return { userId: payload.sub, role };
    } catch (error) {
      if (error instanceof AuthenticationError || error instanceof joseErrors.JOSEError) {
        throw new AuthenticationError("Could not validate credentials");
      }
      throw error;
    }
  }
}
