import express, { type Express } from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import { adminRouter } from "./admin.js";
import { authRouter } from "./auth.js";
import type { AppContext } from "./context.js";
import { dashboardRouter } from "./dashboard.js";
import { errorHandler, notFound } from "./errors.js";
import { requestLogger } from "./middleware.js";
import { profileRouter } from "./profile.js";

export type { AppContext } from "./context.js";
export { createContext } from "./context.js";

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.use(requestLogger);
  app.use(express.json());
  app.use(cookieParser());

  app.use(
    cors({
      origin: ctx.config.corsOrigin,
      credentials: true,
    })
  );

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/auth", authRouter(ctx));
  app.use("/profile", profileRouter(ctx));
  app.use("/admin", adminRouter(ctx));
  app.use(dashboardRouter(ctx));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
