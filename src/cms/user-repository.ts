import type { Pool } from "pg";
import { isUniqueViolation } from "../db/transaction";
import { DatabaseError } from "./errors";

export interface UserRecord {
  id: number;
  email: string;
  username: string;
  passwordHash: string;
  firstName: string | null;
  lastName: string | null;
  isActive: boolean;
  isStaff: boolean;
  isSuperuser: boolean;
  createdAt: string;
  updatedAt: string;
  lastLogin: string | null;
}

export interface CreateUserInput {
  email: string;
  username: string;
  passwordHash: string;
  firstName?: string | null;
  lastName?: string | null;
}

export interface UserRepository {
  findById(id: number): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  emailExists(email: string): Promise<boolean>;
  usernameExists(username: string): Promise<boolean>;
  createUser(input: CreateUserInput): Promise<UserRecord>;
  recordLogin(id: number, at: string): Promise<void>;
  updatePasswordHash(id: number, passwordHash: string): Promise<void>;
}

export function fullName(user: Pick<UserRecord, "firstName" | "lastName">): string {
  return [user.firstName, user.lastName].filter((part): part is string => Boolean(part)).join(" ");
}

export function displayName(user: Pick<UserRecord, "firstName" | "lastName" | "username">): string {
  return fullName(user) || user.username;
}

function emptyToNull(value: string | null | undefined): string | null {
  return value && value.length > 0 ? value : null;
}

interface UserRow {
  id: number;
  email: string;
  username: string;
  password_hash: string;
  first_name: string | null;
  last_name: string | null;
  is_active: boolean;
  is_staff: boolean;
  is_superuser: boolean;
  created_at: Date;
  updated_at: Date;
  last_login: Date | null;
}

const USER_COLUMNS = `
  id,
  email,
  username,
  password_hash,
  first_name,
  last_name,
  is_active,
  is_staff,
  is_superuser,
  created_at,
  updated_at,
  last_login
`;

function toUserRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    passwordHash: row.password_hash,
    firstName: row.first_name,
    lastName: row.last_name,
    isActive: row.is_active,
    isStaff: row.is_staff,
    isSuperuser: row.is_superuser,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    lastLogin: row.last_login ? row.last_login.toISOString() : null
  };
}

export class PostgresUserRepository implements UserRepository {
  constructor(private readonly pool: Pool) {}

  async findById(id: number): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toUserRecord(row) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE email = $1`, [
      email.toLowerCase()
    ]);
    const row = result.rows[0];
    return row ? toUserRecord(row) : null;
  }

  async emailExists(email: string): Promise<boolean> {
    const result = await this.pool.query("SELECT 1 FROM users WHERE email = $1 LIMIT 1", [email.toLowerCase()]);
    return (result.rowCount ?? 0) > 0;
  }

  async usernameExists(username: string): Promise<boolean> {
    const result = await this.pool.query("SELECT 1 FROM users WHERE username = $1 LIMIT 1", [username]);
    return (result.rowCount ?? 0) > 0;
  }

  async createUser(input: CreateUserInput): Promise<UserRecord> {
    try {
      const result = await this.pool.query<UserRow>(
        `
          INSERT INTO users (email, username, password_hash, first_name, last_name)
          VALUES ($1, $2, $3, $4, $5)
          RETURNING ${USER_COLUMNS}
        `,
        [
          input.email.toLowerCase(),
          input.username,
          input.passwordHash,
          emptyToNull(input.firstName),
          emptyToNull(input.lastName)
        ]
      );
      return toUserRecord(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DatabaseError("Failed to create User", { details: { reason: "unique_violation" } });
      }
      throw error;
    }
  }

  async recordLogin(id: number, at: string): Promise<void> {
    await this.pool.query("UPDATE users SET last_login = $1::timestamptz, updated_at = now() WHERE id = $2", [at, id]);
  }

  async updatePasswordHash(id: number, passwordHash: string): Promise<void> {
    await this.pool.query("UPDATE users SET password_hash = $1, updated_at = now() WHERE id = $2", [
      passwordHash,
      id
    ]);
  }
}

export type InMemoryUserSeed = Omit<UserRecord, "createdAt" | "updatedAt" | "lastLogin" | "firstName" | "lastName"> &
  Partial<Pick<UserRecord, "createdAt" | "updatedAt" | "lastLogin" | "firstName" | "lastName">>;

export class InMemoryUserRepository implements UserRepository {
  private users: UserRecord[];
  private nextId: number;

  constructor(initialUsers: InMemoryUserSeed[] = []) {
    const now = new Date().toISOString();
    this.users = initialUsers.map((user) => ({
      ...user,
      firstName: user.firstName ?? null,
      lastName: user.lastName ?? null,
      createdAt: user.createdAt ?? now,
      updatedAt: user.updatedAt ?? now,
      lastLogin: user.lastLogin ?? null
    }));
    this.nextId = Math.max(0, ...this.users.map((user) => user.id)) + 1;
  }

  async findById(id: number): Promise<UserRecord | null> {
    const user = this.users.find((candidate) => candidate.id === id);
    return user ? { ...user } : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const normalized = email.toLowerCase();
    const user = this.users.find((candidate) => candidate.email === normalized);
    return user ? { ...user } : null;
  }

  async emailExists(email: string): Promise<boolean> {
    const normalized = email.toLowerCase();
    return this.users.some((candidate) => candidate.email === normalized);
  }

  async usernameExists(username: string): Promise<boolean> {
    return this.users.some((candidate) => candidate.username === username);
  }

  async createUser(input: CreateUserInput): Promise<UserRecord> {
    const email = input.email.toLowerCase();
    if (this.users.some((candidate) => candidate.email === email || candidate.username === input.username)) {
      throw new DatabaseError("Failed to create User", { details: { reason: "unique_violation" } });
    }

    const createdAt = new Date().toISOString();
    const user: UserRecord = {
      id: this.nextId++,
      email,
      username: input.username,
      passwordHash: input.passwordHash,
      firstName: emptyToNull(input.firstName),
      lastName: emptyToNull(input.lastName),
      isActive: true,
      isStaff: false,
      isSuperuser: false,
      createdAt,
      updatedAt: createdAt,
      lastLogin: null
    };

    this.users.push(user);
    return { ...user };
  }

  async recordLogin(id: number, at: string): Promise<void> {
    this.users = this.users.map((user) => (user.id === id ? { ...user, lastLogin: at, updatedAt: at } : user));
  }

  async updatePasswordHash(id: number, passwordHash: string): Promise<void> {
    const updatedAt = new Date().toISOString();
    this.users = this.users.map((user) => (user.id === id ? { ...user, passwordHash, updatedAt } : user));
  }
}
