import { DateTime } from "luxon";
import type { ActionCount, ActivityLog } from "./activityLog.js";
import type { UserStore } from "./userStore.js";

const NEW_USER_WINDOW_DAYS = 30;
const GROWTH_MONTHS = 12;

export interface MonthCount {
  /** e.g. "Mar 2026" */
  month: string;
  count: number;
}

export interface UserStats {
  totalUsers: number;
  activeUsers: number;
  adminUsers: number;
  newUsers: number;
  userGrowth: MonthCount[];
  totalActivities: number;
  activityByAction: ActionCount[];
}

/**
 * One bucket per calendar month (UTC), oldest first, ending with the month
 * that contains `now`.
 */
export function monthBuckets(now: Date, months = GROWTH_MONTHS): Array<{ label: string; start: string; end: string }> {
  const current = DateTime.fromJSDate(now, { zone: "utc" }).startOf("month");
  const buckets: Array<{ label: string; start: string; end: string }> = [];

  for (let i = months - 1; i >= 0; i--) {
    const start = current.minus({ months: i });
    const end = start.plus({ months: 1 });
    buckets.push({
      label: start.setLocale("en-US").toFormat("LLL yyyy"),
      start: start.toJSDate().toISOString(),
      end: end.toJSDate().toISOString(),
    });
  }
  return buckets;
}

export function getUserStats(users: UserStore, activity: ActivityLog, now: Date): UserStats {
  const since = DateTime.fromJSDate(now, { zone: "utc" }).minus({ days: NEW_USER_WINDOW_DAYS });

  return {
    totalUsers: users.countAll(),
    activeUsers: users.countActive(),
    adminUsers: users.countAdmins(),
    newUsers: users.countCreatedSince(since.toJSDate().toISOString()),
    userGrowth: monthBuckets(now).map((bucket) => ({
      month: bucket.label,
      count: users.countCreatedBetween(bucket.start, bucket.end),
    })),
    totalActivities: activity.count(),
    activityByAction: activity.countByAction(),
  };
}
