import { Router, type Response } from "express";
import { z } from "zod";
import bcrypt from "bcryptjs";
import jwt from "jsonwebtoken";
import { ActivityAction } from "./activityLog.js";
import type { AppConfig } from "./config.js";
import type { AppContext } from "./context.js";
import { HttpError } from "./errors.js";
import { ACCESS_COOKIE, authUser, clientIp, requireAuth } from "./middleware.js";
import { toPublicUser, type UserRecord } from "./userStore.js";
import { emailField, passwordField, profileShape } from "./validation.js";

const registerSchema = z
  .object({
    ...profileShape,
    password: passwordField,
    confirmPassword: z.string(),
  })
  .refine((data) => data.password === data.confirmPassword, {
    message: "Passwords must match !",
    path: ["confirmPassword"],
  });

const loginSchema = z.object({
  email: emailField,
  password: z.string().min(1),
});

export function signAccessToken(user: Pick<UserRecord, "id" | "role">, config: AppConfig): string {
  return jwt.sign({ userId: user.id, role: user.role }, config.jwtSecret, {
    expiresIn: config.accessTokenTtlSeconds,
  });
}

function setAccessCookie(res: Response, token: string, config: AppConfig) {
  res.cookie(ACCESS_COOKIE, token, {
    httpOnly: true,
    sameSite: "lax",
    secure: config.cookieSecure,
    path: "/",
    maxAge: config.accessTokenTtlSeconds * 1000,
  });
}

export function authRouter(ctx: AppContext): Router {
  const router = Router();
  const { users, activity, config } = ctx;

  router.post("/register", async (req, res) => {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ errors: parsed.error.flatten() });
      return;
    }

    const { password, confirmPassword: _confirm, ...profile } = parsed.data;

    const conflict = users.findConflict(profile.email, profile.username);
    if (conflict === "email") throw new HttpError(409, "Email already registered!");
    if (conflict === "username") throw new HttpError(409, "Username already taken!");

    const passwordHash = await bcrypt.hash(password, config.bcryptRounds);
    const user = users.create({ ...profile, passwordHash, role: "USER", isActive: true });

    activity.record({
      userId: user.id,
      action: ActivityAction.Registration,
      description: "New user account created",
      ipAddress: clientIp(req),
    });

    res.status(201).json(toPublicUser(user));
  });

  router.post("/login", async (req, res) => {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ errors: parsed.error.flatten() });
      return;
    }

    const { email, password } = parsed.data;

    const user = users.findByEmail(email);
    const ok = user ? await bcrypt.compare(password, user.passwordHash) : false;
    if (!user || !ok) {
      activity.record({
        userId: null,
        action: ActivityAction.FailedLogin,
        description: `Failed login attempt for email: ${email}`,
        ipAddress: clientIp(req),
      });
      res.status(401).json({ message: "Invalid email or password!" });
      return;
    }

    if (!user.isActive) {
      res.status(403).json({ message: "Your account has been deactivated. Please contact administrator." });
      return;
    }

    const updated = users.touchLastLogin(user.id);
    activity.record({
      userId: user.id,
      action: ActivityAction.Login,
      description: "User logged in successfully",
      ipAddress: clientIp(req),
    });

    setAccessCookie(res, signAccessToken(updated, config), config);
    res.json(toPublicUser(updated));
  });

  router.post("/logout", requireAuth(ctx), (req, res) => {
    const { userId } = authUser(req);
    activity.record({
      userId,
      action: ActivityAction.Logout,
      description: "User logged out",
      ipAddress: clientIp(req),
    });

    res.clearCookie(ACCESS_COOKIE, { path: "/" });
    res.json({ message: "Logged out" });
  });

  router.get("/me", requireAuth(ctx), (req, res) => {
    const { userId } = authUser(req);
    const user = users.findById(userId);
    if (!user) throw new HttpError(404, "User not found");
    res.json(toPublicUser(user));
  });

  return router;
}
