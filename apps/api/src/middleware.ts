import type { Request, RequestHandler } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import type { AppContext } from "./context.js";
import { HttpError } from "./errors.js";
import { logInfo } from "./logger.js";
import type { Role } from "./userStore.js";

export const ACCESS_COOKIE = "access_token";

export type AuthUser = { userId: number; role: Role };

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

const tokenPayloadSchema = z.object({
  userId: z.number().int().positive(),
  role: z.enum(["ADMIN", "USER"]),
});

/**
 * Verifies the session cookie and reloads the account, so deleted or
 * deactivated users lose access at once and role changes apply immediately.
 */
export function requireAuth(ctx: AppContext): RequestHandler {
  return (req, res, next) => {
    const token: unknown = req.cookies?.[ACCESS_COOKIE];
    if (typeof token !== "string" || token.length === 0) {
      res.status(401).json({ message: "Not authenticated" });
      return;
    }

    let claims: z.infer<typeof tokenPayloadSchema>;
    try {
      claims = tokenPayloadSchema.parse(jwt.verify(token, ctx.config.jwtSecret));
    } catch {
      res.status(401).json({ message: "Invalid or expired token" });
      return;
    }

    const account = ctx.users.findById(claims.userId);
    if (!account || !account.isActive) {
      res.status(401).json({ message: "Not authenticated" });
      return;
    }

    req.user = { userId: account.id, role: account.role };
    next();
  };
}

export function requireRole(role: Role): RequestHandler {
  return (req, res, next) => {
    const user = req.user;
    if (!user) {
      res.status(401).json({ message: "Not authenticated" });
      return;
    }
    if (user.role !== role) {
      res.status(403).json({ message: "Forbidden" });
      return;
    }
    next();
  };
}

/** The authenticated user; only valid behind `requireAuth`. */
export function authUser(req: Request): AuthUser {
  if (!req.user) throw new HttpError(401, "Not authenticated");
  return req.user;
}

export function clientIp(req: Request): string | null {
  return req.ip ?? null;
}

export const requestLogger: RequestHandler = (req, res, next) => {
  const started = process.hrtime.bigint();
  res.on("finish", () => {
    const ms = Number(process.hrtime.bigint() - started) / 1e6;
    logInfo(`${req.method} ${req.originalUrl} ${res.statusCode} ${ms.toFixed(1)}ms`);
  });
  next();
};
