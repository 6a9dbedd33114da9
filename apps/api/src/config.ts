import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";

export interface AppConfig {
  port: number;
  databasePath: string;
  jwtSecret: string;
  /** Session lifetime, used for both the JWT and the cookie. */
  accessTokenTtlSeconds: number;
  corsOrigin: string;
  cookieSecure: boolean;
  bcryptRounds: number;
  logLevel: LogLevel;
}

const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/**
 * Parse "900", "15m", "12h" or "7d" into seconds.
 */
export function parseDuration(value: string): number | null {
  const match = /^(\d+)\s*([smhd])?$/.exec(value.trim());
  if (!match) return null;

  const amount = Number(match[1]);
  const unit = match[2] ?? "s";
  const seconds = amount * (DURATION_UNITS[unit] ?? 1);
  return seconds > 0 ? seconds : null;
}

/**
 * Accepts sqlite:///relative.db, sqlite:////abs/path.db and sqlite:///:memory:.
 */
export function resolveSqlitePath(url: string): string | null {
  const prefix = "sqlite:///";
  if (!url.startsWith(prefix)) return null;
  const rest = url.slice(prefix.length);
  return rest.length > 0 ? rest : null;
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  DATABASE_URL: z.string().default("sqlite:///database.db"),
  JWT_ACCESS_SECRET: z.string({ required_error: "JWT_ACCESS_SECRET is missing" }).min(1, "JWT_ACCESS_SECRET is missing"),
  JWT_ACCESS_EXPIRES_IN: z.string().default("60m"),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  COOKIE_SECURE: z.enum(["true", "false"]).default("false"),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const issues: string[] = [];

  const databasePath = resolveSqlitePath(vars.DATABASE_URL);
  if (databasePath === null) {
    issues.push("DATABASE_URL: only sqlite:/// URLs are supported");
  }

  const ttl = parseDuration(vars.JWT_ACCESS_EXPIRES_IN);
  if (ttl === null) {
    issues.push("JWT_ACCESS_EXPIRES_IN: expected seconds or a number followed by s, m, h or d");
  }

  if (databasePath === null || ttl === null) {
    throw new ConfigError(issues);
  }

  return {
    port: vars.PORT,
    databasePath,
    jwtSecret: vars.JWT_ACCESS_SECRET,
    accessTokenTtlSeconds: ttl,
    corsOrigin: vars.CORS_ORIGIN,
    cookieSecure: vars.COOKIE_SECURE === "true",
    bcryptRounds: vars.BCRYPT_ROUNDS,
    logLevel: vars.LOG_LEVEL,
  };
}
