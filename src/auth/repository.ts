import type { Pool } from "pg";
import { ConflictError } from "../errors";
import { isUniqueViolation, toStorageError } from "../db/errors";
import type { UserRole } from "../types/context";

export interface User {
  id: string;
  email: string;
  fullName: string | null;
  passwordHash: string;
  role: UserRole;
  createdAt: string;
  updatedAt: string;
}

export interface PublicUser {
  id: string;
  email: string;
  full_name: string | null;
  role: UserRole;
}

export interface CreateUserInput {
  email: string;
  fullName: string | null;
  passwordHash: string;
}

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /**
   * Inserts the user as admin when no admin exists yet, otherwise as a
   * regular user. The check and the insert form one atomic step.
   */
  createWithBootstrapRole(input: CreateUserInput): Promise<User>;
}

interface UserRow {
  id: string;
  email: string;
  full_name: string | null;
  password_hash: string;
  role: UserRole;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = "id::text AS id, email, full_name, password_hash, role, created_at, updated_at";

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    full_name: user.fullName,
    role: user.role
  };
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    fullName: row.full_name,
    passwordHash: row.password_hash,
    role: row.role,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

export class PostgresUserRepository implements UserRepository {
  constructor(private readonly pool: Pool) {}

  async findById(id: string): Promise<User | null> {
    if (!/^\d+$/.test(id)) {
      return null;
    }

    try {
      const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
      const row = result.rows[0];
      return row ? toUser(row) : null;
    } catch (error) {
      throw toStorageError(error, "find_user_by_id");
    }
  }

  async findByEmail(email: string): Promise<User | null> {
    try {
      const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE email = $1`, [
        normalizeEmail(email)
      ]);
      const row = result.rows[0];
      return row ? toUser(row) : null;
    } catch (error) {
      throw toStorageError(error, "find_user_by_email");
    }
  }

  async createWithBootstrapRole(input: CreateUserInput): Promise<User> {
    const client = await this.pool.connect();

    try {
      await client.query("BEGIN");
      // Serialises concurrent first registrations so only one can see "no admin yet".
      await client.query("LOCK TABLE users IN SHARE ROW EXCLUSIVE MODE");

      const adminResult = await client.query<{ has_admin: boolean }>(
        "SELECT EXISTS (SELECT 1 FROM users WHERE role = 'admin') AS has_admin"
      );
      const role: UserRole = adminResult.rows[0]?.has_admin ? "user" : "admin";

      const insertResult = await client.query<UserRow>(
        `
          INSERT INTO users (email, full_name, password_hash, role)
          VALUES ($1, $2, $3, $4)
          RETURNING ${USER_COLUMNS}
        `,
        [normalizeEmail(input.email), input.fullName, input.passwordHash, role]
      );

      await client.query("COMMIT");
      return toUser(insertResult.rows[0]);
    } catch (error) {
      await client.query("ROLLBACK");
      if (isUniqueViolation(error, "users_email_key")) {
        throw new ConflictError("email already registered");
      }
      throw toStorageError(error, "create_user");
    } finally {
      client.release();
    }
  }
}

export class InMemoryUserRepository implements UserRepository {
  private readonly users: User[] = [];
  private nextId = 1;

  constructor(initialUsers: User[] = []) {
    this.users = initialUsers.map((user) => ({ ...user }));
    this.nextId = initialUsers.length + 1;
  }

  async findById(id: string): Promise<User | null> {
    const user = this.users.find((candidate) => candidate.id === id);
    return user ? { ...user } : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const normalized = normalizeEmail(email);
    const user = this.users.find((candidate) => candidate.email === normalized);
    return user ? { ...user } : null;
  }

  async createWithBootstrapRole(input: CreateUserInput): Promise<User> {
    const email = normalizeEmail(input.email);
    if (this.users.some((user) => user.email === email)) {
      throw new ConflictError("email already registered");
    }

    const now = new Date().toISOString();
    const user: User = {
      id: String(this.nextId++),
      email,
      fullName: input.fullName,
      passwordHash: input.passwordHash,
      role: this.users.some((candidate) => candidate.role === "admin") ? "user" : "admin",
      createdAt: now,
      updatedAt: now
    };

    this.users.push(user);
    return { ...user };
  }
}
