import { Router } from "express";
import type { ActivityEntry } from "./activityLog.js";
import type { AppContext } from "./context.js";
import { HttpError } from "./errors.js";
import { authUser, requireAuth } from "./middleware.js";
import { getUserStats, type UserStats } from "./stats.js";
import { toPublicUser, type PublicUser } from "./userStore.js";

const RECENT_USERS = 5;
const RECENT_ACTIVITIES = 10;

export interface AdminDashboard {
  kind: "admin";
  stats: UserStats;
  recentUsers: PublicUser[];
  recentActivities: ActivityEntry[];
}

export interface UserDashboard {
  kind: "user";
  user: PublicUser;
  activities: ActivityEntry[];
}

export function buildAdminDashboard(ctx: AppContext): AdminDashboard {
  return {
    kind: "admin",
    stats: getUserStats(ctx.users, ctx.activity, ctx.clock()),
    recentUsers: ctx.users.recent(RECENT_USERS).map(toPublicUser),
    recentActivities: ctx.activity.recent(RECENT_ACTIVITIES),
  };
}

export function buildUserDashboard(ctx: AppContext, userId: number): UserDashboard {
  const user = ctx.users.findById(userId);
  if (!user) throw new HttpError(404, "User not found");
  return {
    kind: "user",
    user: toPublicUser(user),
    activities: ctx.activity.forUser(userId, RECENT_ACTIVITIES),
  };
}

/**
 * GET /dashboard picks the view by role; /user/dashboard is open to anyone
 * signed in. The admin view also lives at /admin/dashboard.
 */
export function dashboardRouter(ctx: AppContext): Router {
  const router = Router();

  router.get("/dashboard", requireAuth(ctx), (req, res) => {
    const user = authUser(req);
    res.json(user.role === "ADMIN" ? buildAdminDashboard(ctx) : buildUserDashboard(ctx, user.userId));
  });

  router.get("/user/dashboard", requireAuth(ctx), (req, res) => {
    res.json(buildUserDashboard(ctx, authUser(req).userId));
  });

  return router;
}
