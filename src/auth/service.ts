import { AuthenticationError, ValidationError } from "../errors";
import { appLogger, type Logger } from "../security/logger";
import { hashPassword, UNMATCHABLE_PASSWORD_HASH, verifyPassword } from "./passwords";
import { normalizeEmail, type User, type UserRepository } from "./repository";
import type { IssuedToken, TokenService } from "./tokens";

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 128;
const FULL_NAME_MAX_LENGTH = 255;
const EMAIL_MAX_LENGTH = 255;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export interface RegisterUserInput {
  email: string;
  password: string;
  fullName?: string | null;
}

export interface LoginInput {
  email: string;
  password: string;
}

export interface AuthServiceDependencies {
  users: UserRepository;
  tokens: TokenService;
  logger?: Logger;
}

function sanitizeEmail(input: string): string {
  const email = normalizeEmail(input);
  if (email.length > EMAIL_MAX_LENGTH || !EMAIL_PATTERN.test(email)) {
    throw new ValidationError("email must be a valid email address");
  }
  return email;
}

function assertValidPassword(password: string): void {
  if (password.length < PASSWORD_MIN_LENGTH || password.length > PASSWORD_MAX_LENGTH) {
    throw new ValidationError(
      `password must be between ${PASSWORD_MIN_LENGTH} and ${PASSWORD_MAX_LENGTH} characters`
    );
  }
}

function sanitizeFullName(input: string | null | undefined): string | null {
  if (input === undefined || input === null) {
    return null;
  }

  const value = input.replace(/\s+/g, " ").trim();
  if (value.length > FULL_NAME_MAX_LENGTH) {
    throw new ValidationError(`full_name must be ${FULL_NAME_MAX_LENGTH} characters or less`);
  }
  return value.length > 0 ? value : null;
}

export class AuthService {
  private readonly users: UserRepository;
  private readonly tokens: TokenService;
  private readonly logger: Logger;

  constructor(dependencies: AuthServiceDependencies) {
    this.users = dependencies.users;
    this.tokens = dependencies.tokens;
    this.logger = dependencies.logger ?? appLogger;
  }

  async register(input: RegisterUserInput): Promise<User> {
    const email = sanitizeEmail(input.email);
    assertValidPassword(input.password);
    const fullName = sanitizeFullName(input.fullName);

    const user = await this.users.createWithBootstrapRole({
      email,
      fullName,
      passwordHash: await hashPassword(input.password)
    });

    this.logger.info("user_registered", {
      userId: user.id,
      role: user.role
    });

    return user;
  }

  async login(input: LoginInput): Promise<IssuedToken> {
    const user = await this.users.findByEmail(input.email);
    // Unknown emails still pay for a hash so timing does not reveal registrations.
    const passwordMatches = await verifyPassword(input.password, user?.passwordHash ?? UNMATCHABLE_PASSWORD_HASH);
    if (!user || !passwordMatches) {
      throw new AuthenticationError("Incorrect email or password");
    }

    const token = await this.tokens.issue({ userId: user.id, role: user.role });

    this.logger.info("user_logged_in", {
      userId: user.id
    });

    return token;
  }

  /** Resolves the acting user behind a bearer token; the stored role wins over the token claim. */
  async resolveActor(accessToken: string): Promise<User> {
    const claims = await this.tokens.verify(accessToken);
    const user = await this.users.findById(claims.userId);
    if (!user) {
      throw new AuthenticationError("Could not validate credentials");
    }
    return user;
  }
}
