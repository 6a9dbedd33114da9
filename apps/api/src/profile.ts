import { Router } from "express";
import { z } from "zod";
import bcrypt from "bcryptjs";
import { ActivityAction } from "./activityLog.js";
import type { AppContext } from "./context.js";
import { HttpError } from "./errors.js";
import { authUser, clientIp, requireAuth } from "./middleware.js";
import { toPublicUser } from "./userStore.js";
import { passwordField, profileShape } from "./validation.js";

const profileSchema = z.object(profileShape);

const changePasswordSchema = z
  .object({
    currentPassword: z.string().min(1),
    newPassword: passwordField,
    confirmPassword: z.string(),
  })
  .refine((data) => data.newPassword === data.confirmPassword, {
    message: "Passwords must match !",
    path: ["confirmPassword"],
  });

export function profileRouter(ctx: AppContext): Router {
  const router = Router();
  const { users, activity, config } = ctx;

  router.use(requireAuth(ctx));

  router.get("/", (req, res) => {
    const user = users.findById(authUser(req).userId);
    if (!user) throw new HttpError(404, "User not found");
    res.json(toPublicUser(user));
  });

  router.put("/", (req, res) => {
    const parsed = profileSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ errors: parsed.error.flatten() });
      return;
    }

    const { userId } = authUser(req);
    const conflict = users.findConflict(parsed.data.email, parsed.data.username, userId);
    if (conflict === "email") throw new HttpError(409, "Email already registered!");
    if (conflict === "username") throw new HttpError(409, "Username already taken!");

    const user = users.updateProfile(userId, parsed.data);
    activity.record({
      userId,
      action: ActivityAction.ProfileUpdate,
      description: "User updated profile information",
      ipAddress: clientIp(req),
    });

    res.json(toPublicUser(user));
  });

  router.post("/password", async (req, res) => {
    const parsed = changePasswordSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ errors: parsed.error.flatten() });
      return;
    }

    const { userId } = authUser(req);
    const user = users.findById(userId);
    if (!user) throw new HttpError(404, "User not found");

    const ok = await bcrypt.compare(parsed.data.currentPassword, user.passwordHash);
    if (!ok) {
      res.status(400).json({ message: "Current password is incorrect!" });
      return;
    }

    users.setPassword(userId, await bcrypt.hash(parsed.data.newPassword, config.bcryptRounds));
    activity.record({
      userId,
      action: ActivityAction.PasswordChange,
      description: "User changed password",
      ipAddress: clientIp(req),
    });

    res.json({ message: "Password changed successfully!" });
  });

  return router;
}
