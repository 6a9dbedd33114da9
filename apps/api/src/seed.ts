import { readFileSync } from "node:fs";
import bcrypt from "bcryptjs";
import { DateTime } from "luxon";
import { z } from "zod";
import { ActivityAction, ActivityLog, type NewActivity } from "./activityLog.js";
import type { Db } from "./db.js";
import { UserStore } from "./userStore.js";

const seedUserSchema = z.object({
  username: z.string(),
  email: z.string(),
  firstName: z.string().nullable(),
  lastName: z.string().nullable(),
  phone: z.string().nullable(),
  role: z.enum(["ADMIN", "USER"]),
  isActive: z.boolean(),
  createdDaysAgo: z.number().int().min(0),
});

export type SeedUser = z.infer<typeof seedUserSchema>;

export interface SeedOptions {
  adminPassword: string;
  userPassword: string;
  bcryptRounds: number;
  now: Date;
}

export interface SeedSummary {
  users: number;
  admins: number;
  active: number;
  activities: number;
}

const DEFAULT_SEED_FILE = new URL("../data/seed-users.json", import.meta.url);

export function loadSeedUsers(file: URL | string = DEFAULT_SEED_FILE): SeedUser[] {
  return z.array(seedUserSchema).parse(JSON.parse(readFileSync(file, "utf8")));
}

/**
 * Sample history per account: three logins, two logouts, and a profile
 * update for the first three accounts.
 */
export function sampleActivity(userId: number, index: number, now: Date): NewActivity[] {
  const base = DateTime.fromJSDate(now, { zone: "utc" });
  const at = (days: number, hours: number) => base.minus({ days, hours }).toJSDate().toISOString();
  const entries: NewActivity[] = [];

  for (let j = 0; j < 3; j++) {
    entries.push({
      userId,
      action: ActivityAction.Login,
      description: "User logged in successfully",
      ipAddress: `192.168.1.${10 + index + j}`,
      timestamp: at(j + 1, j * 2),
    });
  }

  if (index < 3) {
    entries.push({
      userId,
      action: ActivityAction.ProfileUpdate,
      description: "User updated profile information",
      ipAddress: `192.168.1.${20 + index}`,
      timestamp: at(index + 2, 5),
    });
  }

  for (let j = 0; j < 2; j++) {
    entries.push({
      userId,
      action: ActivityAction.Logout,
      description: "User logged out",
      ipAddress: `192.168.1.${30 + index + j}`,
      timestamp: at(j + 1, j * 3 + 1),
    });
  }

  return entries;
}

/**
 * Wipes both tables and loads the sample accounts and their activity.
 */
export async function seedDatabase(db: Db, seedUsers: SeedUser[], options: SeedOptions): Promise<SeedSummary> {
  const [adminHash, userHash] = await Promise.all([
    bcrypt.hash(options.adminPassword, options.bcryptRounds),
    bcrypt.hash(options.userPassword, options.bcryptRounds),
  ]);

  const users = new UserStore(db, () => options.now);
  const activity = new ActivityLog(db, () => options.now);
  const base = DateTime.fromJSDate(options.now, { zone: "utc" });
  const lastLogin = base.minus({ days: 1 }).toJSDate().toISOString();

  return db.transaction((): SeedSummary => {
    db.exec(`
      DELETE FROM activity_log;
      DELETE FROM users;
      DELETE FROM sqlite_sequence WHERE name IN ('users', 'activity_log');
    `);

    let activities = 0;
    seedUsers.forEach((seed, index) => {
      const { createdDaysAgo, ...profile } = seed;
      const user = users.create({
        ...profile,
        passwordHash: seed.role === "ADMIN" ? adminHash : userHash,
        createdAt: base.minus({ days: createdDaysAgo }).toJSDate().toISOString(),
        lastLogin: seed.isActive ? lastLogin : null,
      });

      for (const entry of sampleActivity(user.id, index, options.now)) {
        if (activity.record(entry)) activities++;
      }
    });

    return {
      users: users.countAll(),
      admins: users.countAdmins(),
      active: users.countActive(),
      activities,
    };
  })();
}
