import Database from "better-sqlite3";
import type { Db } from "./db.js";
import { HttpError } from "./errors.js";
import { offsetFor, pageOf, type Page } from "./pagination.js";

export type Role = "ADMIN" | "USER";

export interface UserRecord {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  role: Role;
  firstName: string | null;
  lastName: string | null;
  phone: string | null;
  isActive: boolean;
  createdAt: string;
  lastLogin: string | null;
}

/** What the API hands out. Never carries the password hash. */
export interface PublicUser {
  id: number;
  username: string;
  email: string;
  role: Role;
  firstName: string | null;
  lastName: string | null;
  phone: string | null;
  fullName: string;
  isActive: boolean;
  createdAt: string;
  lastLogin: string | null;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  role?: Role;
  firstName?: string | null;
  lastName?: string | null;
  phone?: string | null;
  isActive?: boolean;
  createdAt?: string;
  lastLogin?: string | null;
}

export interface ProfileFields {
  username: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  phone: string | null;
}

export interface AccessFields {
  role: Role;
  isActive: boolean;
}

export type RoleFilter = "all" | "admin" | "user";
export type StatusFilter = "all" | "active" | "inactive";

export interface UserFilter {
  search?: string;
  role?: RoleFilter;
  status?: StatusFilter;
  page: number;
  perPage: number;
}

interface UserRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  role: string;
  first_name: string | null;
  last_name: string | null;
  phone: string | null;
  is_active: number;
  created_at: string;
  last_login: string | null;
}

interface CountRow {
  total: number;
}

const COLUMNS =
  "id, username, email, password_hash, role, first_name, last_name, phone, is_active, created_at, last_login";

function toRole(value: string): Role {
  if (value === "ADMIN" || value === "USER") return value;
  throw new Error(`Unknown role in users table: ${value}`);
}

function toRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    role: toRole(row.role),
    firstName: row.first_name,
    lastName: row.last_name,
    phone: row.phone,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
    lastLogin: row.last_login,
  };
}

export function fullName(user: Pick<UserRecord, "username" | "firstName" | "lastName">): string {
  if (user.firstName && user.lastName) {
    return `${user.firstName} ${user.lastName}`;
  }
  return user.username;
}

export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    firstName: user.firstName,
    lastName: user.lastName,
    phone: user.phone,
    fullName: fullName(user),
    isActive: user.isActive,
    createdAt: user.createdAt,
    lastLogin: user.lastLogin,
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export type ConflictField = "email" | "username";

/** A UNIQUE violation on users; callers may reword the message for their context. */
export class UserConflictError extends HttpError {
  constructor(readonly field: ConflictField) {
    super(409, field === "email" ? "Email already registered!" : "Username already taken!");
    this.name = "UserConflictError";
  }
}

/** Turns a UNIQUE violation into a 409; anything else passes through. */
function toConflict(err: unknown): unknown {
  if (err instanceof Database.SqliteError && err.code === "SQLITE_CONSTRAINT_UNIQUE") {
    return new UserConflictError(err.message.includes("users.email") ? "email" : "username");
  }
  return err;
}

export class UserStore {
  private readonly stmtById: Database.Statement<[number], UserRow>;
  private readonly stmtByEmail: Database.Statement<[string], UserRow>;
  private readonly stmtByUsername: Database.Statement<[string], UserRow>;
  private readonly stmtInsert: Database.Statement<
    [string, string, string, string, string | null, string | null, string | null, number, string, string | null]
  >;
  private readonly stmtUpdateProfile: Database.Statement<
    [string, string, string | null, string | null, string | null, number]
  >;
  private readonly stmtUpdateAccess: Database.Statement<[string, number, number]>;
  private readonly stmtSetPassword: Database.Statement<[string, number]>;
  private readonly stmtTouchLogin: Database.Statement<[string, number]>;
  private readonly stmtDelete: Database.Statement<[number]>;
  private readonly stmtRecent: Database.Statement<[number], UserRow>;
  private readonly stmtCountAll: Database.Statement<[], CountRow>;
  private readonly stmtCountActive: Database.Statement<[], CountRow>;
  private readonly stmtCountAdmins: Database.Statement<[], CountRow>;
  private readonly stmtCountCreatedSince: Database.Statement<[string], CountRow>;
  private readonly stmtCountCreatedBetween: Database.Statement<[string, string], CountRow>;

  constructor(
    private readonly db: Db,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.stmtById = db.prepare<[number], UserRow>(`SELECT ${COLUMNS} FROM users WHERE id = ?`);
    this.stmtByEmail = db.prepare<[string], UserRow>(`SELECT ${COLUMNS} FROM users WHERE email = ?`);
    this.stmtByUsername = db.prepare<[string], UserRow>(`SELECT ${COLUMNS} FROM users WHERE username = ?`);
    this.stmtInsert = db.prepare<
      [string, string, string, string, string | null, string | null, string | null, number, string, string | null]
    >(`
      INSERT INTO users (username, email, password_hash, role, first_name, last_name, phone, is_active, created_at, last_login)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.stmtUpdateProfile = db.prepare<[string, string, string | null, string | null, string | null, number]>(`
      UPDATE users SET username = ?, email = ?, first_name = ?, last_name = ?, phone = ?
      WHERE id = ?
    `);
    this.stmtUpdateAccess = db.prepare<[string, number, number]>(`UPDATE users SET role = ?, is_active = ? WHERE id = ?`);
    this.stmtSetPassword = db.prepare<[string, number]>(`UPDATE users SET password_hash = ? WHERE id = ?`);
    this.stmtTouchLogin = db.prepare<[string, number]>(`UPDATE users SET last_login = ? WHERE id = ?`);
    this.stmtDelete = db.prepare<[number]>(`DELETE FROM users WHERE id = ?`);
    this.stmtRecent = db.prepare<[number], UserRow>(
      `SELECT ${COLUMNS} FROM users ORDER BY created_at DESC, id DESC LIMIT ?`
    );
    this.stmtCountAll = db.prepare<[], CountRow>(`SELECT COUNT(*) AS total FROM users`);
    this.stmtCountActive = db.prepare<[], CountRow>(`SELECT COUNT(*) AS total FROM users WHERE is_active = 1`);
    this.stmtCountAdmins = db.prepare<[], CountRow>(`SELECT COUNT(*) AS total FROM users WHERE role = 'ADMIN'`);
    this.stmtCountCreatedSince = db.prepare<[string], CountRow>(
      `SELECT COUNT(*) AS total FROM users WHERE created_at >= ?`
    );
    this.stmtCountCreatedBetween = db.prepare<[string, string], CountRow>(
      `SELECT COUNT(*) AS total FROM users WHERE created_at >= ? AND created_at < ?`
    );
  }

  findById(id: number): UserRecord | undefined {
    const row = this.stmtById.get(id);
    return row ? toRecord(row) : undefined;
  }

  findByEmail(email: string): UserRecord | undefined {
    const row = this.stmtByEmail.get(email);
    return row ? toRecord(row) : undefined;
  }

  findByUsername(username: string): UserRecord | undefined {
    const row = this.stmtByUsername.get(username);
    return row ? toRecord(row) : undefined;
  }

  /**
   * Which of email/username is already held by a user other than `excludeId`.
   * Email wins when both collide.
   */
  findConflict(email: string, username: string, excludeId?: number): ConflictField | null {
    const byEmail = this.stmtByEmail.get(email);
    if (byEmail && byEmail.id !== excludeId) return "email";
    const byUsername = this.stmtByUsername.get(username);
    if (byUsername && byUsername.id !== excludeId) return "username";
    return null;
  }

  create(input: NewUser): UserRecord {
    try {
      const result = this.stmtInsert.run(
        input.username,
        input.email,
        input.passwordHash,
        input.role ?? "USER",
        input.firstName ?? null,
        input.lastName ?? null,
        input.phone ?? null,
        input.isActive === false ? 0 : 1,
        input.createdAt ?? this.clock().toISOString(),
        input.lastLogin ?? null
      );
      return this.require(Number(result.lastInsertRowid));
    } catch (err) {
      throw toConflict(err);
    }
  }

  updateProfile(id: number, fields: ProfileFields): UserRecord {
    try {
      this.stmtUpdateProfile.run(fields.username, fields.email, fields.firstName, fields.lastName, fields.phone, id);
    } catch (err) {
      throw toConflict(err);
    }
    return this.require(id);
  }

  updateAccess(id: number, fields: AccessFields): UserRecord {
    this.stmtUpdateAccess.run(fields.role, fields.isActive ? 1 : 0, id);
    return this.require(id);
  }

  setPassword(id: number, passwordHash: string): void {
    this.stmtSetPassword.run(passwordHash, id);
  }

  touchLastLogin(id: number): UserRecord {
    this.stmtTouchLogin.run(this.clock().toISOString(), id);
    return this.require(id);
  }

  delete(id: number): boolean {
    return this.stmtDelete.run(id).changes > 0;
  }

  list(filter: UserFilter): Page<UserRecord> {
    const where: string[] = [];
    const values: Array<string | number> = [];

    const search = filter.search?.trim();
    if (search) {
      const pattern = `%${escapeLike(search)}%`;
      where.push(
        `(username LIKE ? ESCAPE '\\' OR email LIKE ? ESCAPE '\\' OR first_name LIKE ? ESCAPE '\\' OR last_name LIKE ? ESCAPE '\\')`
      );
      values.push(pattern, pattern, pattern, pattern);
    }

    if (filter.role === "admin") where.push(`role = 'ADMIN'`);
    else if (filter.role === "user") where.push(`role = 'USER'`);

    if (filter.status === "active") where.push(`is_active = 1`);
    else if (filter.status === "inactive") where.push(`is_active = 0`);

    const clause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";

    const total =
      this.db.prepare<Array<string | number>, CountRow>(`SELECT COUNT(*) AS total FROM users ${clause}`).get(...values)
        ?.total ?? 0;

    const rows = this.db
      .prepare<Array<string | number>, UserRow>(
        `SELECT ${COLUMNS} FROM users ${clause} ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`
      )
      .all(...values, filter.perPage, offsetFor(filter.page, filter.perPage));

    return pageOf(rows.map(toRecord), total, filter.page, filter.perPage);
  }

  recent(limit: number): UserRecord[] {
    return this.stmtRecent.all(limit).map(toRecord);
  }

  countAll(): number {
    return this.stmtCountAll.get()?.total ?? 0;
  }

  countActive(): number {
    return this.stmtCountActive.get()?.total ?? 0;
  }

  countAdmins(): number {
    return this.stmtCountAdmins.get()?.total ?? 0;
  }

  countCreatedSince(since: string): number {
    return this.stmtCountCreatedSince.get(since)?.total ?? 0;
  }

  /** `start` inclusive, `end` exclusive. */
  countCreatedBetween(start: string, end: string): number {
    return this.stmtCountCreatedBetween.get(start, end)?.total ?? 0;
  }

  private require(id: number): UserRecord {
    const user = this.findById(id);
    if (!user) throw new HttpError(404, "User not found");
    return user;
  }
}
