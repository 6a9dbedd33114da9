import { Router, type Request } from "express";
import { z } from "zod";
import { ActivityAction } from "./activityLog.js";
import type { AppContext } from "./context.js";
import { buildAdminDashboard } from "./dashboard.js";
import { HttpError } from "./errors.js";
import { authUser, clientIp, requireAuth, requireRole } from "./middleware.js";
import { mapPage } from "./pagination.js";
import { getUserStats } from "./stats.js";
import { UserConflictError, toPublicUser, type ConflictField, type UserRecord } from "./userStore.js";
import { idParam, pageParam, profileShape } from "./validation.js";

const USERS_PER_PAGE = 10;
const ACTIVITIES_PER_PAGE = 20;

const listUsersQuery = z.object({
  page: pageParam,
  search: z.string().catch(""),
  role: z.enum(["all", "admin", "user"]).catch("all"),
  status: z.enum(["all", "active", "inactive"]).catch("all"),
});

const listActivitiesQuery = z.object({
  page: pageParam,
});

const editUserSchema = z.object({
  ...profileShape,
  role: z.enum(["ADMIN", "USER"]),
  isActive: z.boolean(),
});

function takenByAnother(field: ConflictField): HttpError {
  return new HttpError(
    409,
    field === "email" ? "Email already exists for another user!" : "Username already exists for another user!"
  );
}

function targetId(req: Request): number {
  const parsed = idParam.safeParse(req.params.id);
  if (!parsed.success) throw new HttpError(404, "User not found");
  return parsed.data;
}

export function adminRouter(ctx: AppContext): Router {
  const router = Router();
  const { users, activity } = ctx;

  router.use(requireAuth(ctx), requireRole("ADMIN"));

  router.get("/dashboard", (_req, res) => {
    res.json(buildAdminDashboard(ctx));
  });

  router.get("/stats", (_req, res) => {
    res.json(getUserStats(users, activity, ctx.clock()));
  });

  // --- USERS ---
  router.get("/users", (req, res) => {
    const query = listUsersQuery.parse(req.query);
    const page = users.list({ ...query, perPage: USERS_PER_PAGE });
    res.json(mapPage(page, toPublicUser));
  });

  router.get("/users/:id", (req, res) => {
    const user = users.findById(targetId(req));
    if (!user) throw new HttpError(404, "User not found");
    res.json(toPublicUser(user));
  });

  router.put("/users/:id", (req, res) => {
    const id = targetId(req);
    const target = users.findById(id);
    if (!target) throw new HttpError(404, "User not found");

    const parsed = editUserSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ errors: parsed.error.flatten() });
      return;
    }

    const { role, isActive, ...profile } = parsed.data;
    const admin = authUser(req);

    if (id === admin.userId && (role !== "ADMIN" || !isActive)) {
      throw new HttpError(400, "You cannot remove your own admin access!");
    }

    const conflict = users.findConflict(profile.email, profile.username, id);
    if (conflict) throw takenByAnother(conflict);

    let saved: UserRecord;
    try {
      saved = ctx.db.transaction(() => {
        users.updateProfile(id, profile);
        return users.updateAccess(id, { role, isActive });
      })();
    } catch (err) {
      throw err instanceof UserConflictError ? takenByAnother(err.field) : err;
    }

    activity.record({
      userId: admin.userId,
      action: ActivityAction.UserEdit,
      description: `Edited user: ${saved.username}`,
      ipAddress: clientIp(req),
    });

    res.json(toPublicUser(saved));
  });

  router.delete("/users/:id", (req, res) => {
    const id = targetId(req);
    const admin = authUser(req);

    const target = users.findById(id);
    if (!target) throw new HttpError(404, "User not found");
    if (target.id === admin.userId) throw new HttpError(400, "You cannot delete your own account!");

    users.delete(id);
    activity.record({
      userId: admin.userId,
      action: ActivityAction.UserDelete,
      description: `Deleted user: ${target.username}`,
      ipAddress: clientIp(req),
    });

    res.json({ message: `User ${target.username} deleted successfully!` });
  });

  // --- ACTIVITY LOG ---
  router.get("/activities", (req, res) => {
    const { page } = listActivitiesQuery.parse(req.query);
    res.json(activity.list(page, ACTIVITIES_PER_PAGE));
  });

  return router;
}
