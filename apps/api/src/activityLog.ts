import type Database from "better-sqlite3";
import type { Db } from "./db.js";
import { logError } from "./logger.js";
import { offsetFor, pageOf, type Page } from "./pagination.js";

export const ActivityAction = {
  Registration: "Registration",
  Login: "Login",
  FailedLogin: "Failed Login",
  Logout: "Logout",
  ProfileUpdate: "Profile Update",
  PasswordChange: "Password Change",
  UserEdit: "User Edit",
  UserDelete: "User Delete",
} as const;

export type ActivityAction = (typeof ActivityAction)[keyof typeof ActivityAction];

export interface ActivityEntry {
  id: number;
  userId: number | null;
  /** Username of the acting user, null when anonymous or since deleted. */
  username: string | null;
  action: string;
  description: string | null;
  ipAddress: string | null;
  timestamp: string;
}

export interface NewActivity {
  userId: number | null;
  action: ActivityAction;
  description?: string | null;
  ipAddress?: string | null;
  timestamp?: string;
}

export interface ActionCount {
  action: string;
  count: number;
}

interface ActivityRow {
  id: number;
  user_id: number | null;
  username: string | null;
  action: string;
  description: string | null;
  ip_address: string | null;
  timestamp: string;
}

const SELECT_ENTRIES = `
  SELECT a.id, a.user_id, u.username, a.action, a.description, a.ip_address, a.timestamp
  FROM activity_log a
  LEFT JOIN users u ON u.id = a.user_id
`;

function toEntry(row: ActivityRow): ActivityEntry {
  return {
    id: row.id,
    userId: row.user_id,
    username: row.username,
    action: row.action,
    description: row.description,
    ipAddress: row.ip_address,
    timestamp: row.timestamp,
  };
}

/**
 * Append-only log of user actions. Rows are never updated; the schema trigger
 * enforces it.
 */
export class ActivityLog {
  private readonly stmtInsert: Database.Statement<[number | null, string, string | null, string | null, string]>;
  private readonly stmtById: Database.Statement<[number], ActivityRow>;
  private readonly stmtRecent: Database.Statement<[number], ActivityRow>;
  private readonly stmtForUser: Database.Statement<[number, number], ActivityRow>;
  private readonly stmtPage: Database.Statement<[number, number], ActivityRow>;
  private readonly stmtCount: Database.Statement<[], { total: number }>;
  private readonly stmtByAction: Database.Statement<[], ActionCount>;

  constructor(
    db: Db,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.stmtInsert = db.prepare<[number | null, string, string | null, string | null, string]>(`
      INSERT INTO activity_log (user_id, action, description, ip_address, timestamp)
      VALUES (?, ?, ?, ?, ?)
    `);
    this.stmtById = db.prepare<[number], ActivityRow>(`${SELECT_ENTRIES} WHERE a.id = ?`);
    this.stmtRecent = db.prepare<[number], ActivityRow>(
      `${SELECT_ENTRIES} ORDER BY a.timestamp DESC, a.id DESC LIMIT ?`
    );
    this.stmtForUser = db.prepare<[number, number], ActivityRow>(
      `${SELECT_ENTRIES} WHERE a.user_id = ? ORDER BY a.timestamp DESC, a.id DESC LIMIT ?`
    );
    this.stmtPage = db.prepare<[number, number], ActivityRow>(
      `${SELECT_ENTRIES} ORDER BY a.timestamp DESC, a.id DESC LIMIT ? OFFSET ?`
    );
    this.stmtCount = db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM activity_log`);
    this.stmtByAction = db.prepare<[], ActionCount>(`
      SELECT action, COUNT(*) AS count FROM activity_log
      GROUP BY action
      ORDER BY count DESC, action ASC
    `);
  }

  /** Best effort: a failed write is logged and returns null. */
  record(entry: NewActivity): ActivityEntry | null {
    try {
      const result = this.stmtInsert.run(
        entry.userId,
        entry.action,
        entry.description ?? null,
        entry.ipAddress ?? null,
        entry.timestamp ?? this.clock().toISOString()
      );
      const row = this.stmtById.get(Number(result.lastInsertRowid));
      return row ? toEntry(row) : null;
    } catch (err) {
      logError("Error logging activity", {
        action: entry.action,
        userId: entry.userId,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  recent(limit: number): ActivityEntry[] {
    return this.stmtRecent.all(limit).map(toEntry);
  }

  forUser(userId: number, limit: number): ActivityEntry[] {
    return this.stmtForUser.all(userId, limit).map(toEntry);
  }

  list(page: number, perPage: number): Page<ActivityEntry> {
    const rows = this.stmtPage.all(perPage, offsetFor(page, perPage));
    return pageOf(rows.map(toEntry), this.count(), page, perPage);
  }

  count(): number {
    return this.stmtCount.get()?.total ?? 0;
  }

  countByAction(): ActionCount[] {
    return this.stmtByAction.all();
  }
}
