import type { Server } from "node:http";
import bcrypt from "bcryptjs";
import { createApp } from "../app.js";
import type { AppConfig } from "../config.js";
import { createContext, type AppContext } from "../context.js";
import { openDatabase } from "../db.js";
import { setLogLevel } from "../logger.js";
import type { NewUser, UserRecord } from "../userStore.js";

export const NOW = new Date("2026-03-15T12:00:00.000Z");
export const TEST_PASSWORD = "test-password";

const hashes = new Map<string, string>();

function hashFor(password: string): string {
  let hash = hashes.get(password);
  if (!hash) {
    hash = bcrypt.hashSync(password, 4);
    hashes.set(password, hash);
  }
  return hash;
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    databasePath: ":memory:",
    jwtSecret: "test-secret",
    accessTokenTtlSeconds: 3600,
    corsOrigin: "http://localhost:5173",
    cookieSecure: false,
    bcryptRounds: 4,
    logLevel: "silent",
    ...overrides,
  };
}

export function createTestContext(now: Date = NOW): AppContext {
  setLogLevel("silent");
  return createContext(testConfig(), openDatabase(":memory:"), () => now);
}

type TestUser = Partial<Omit<NewUser, "passwordHash">> & { username: string; password?: string };

/** Usernames double as the email local part, so keep them lower-case. */
export function addUser(ctx: AppContext, user: TestUser): UserRecord {
  const { password = TEST_PASSWORD, ...rest } = user;
  return ctx.users.create({
    email: `${rest.username}@example.com`,
    passwordHash: hashFor(password),
    ...rest,
  });
}

export interface TestResponse<T> {
  status: number;
  body: T;
  headers: Headers;
}

export interface RequestOptions {
  method?: string;
  body?: unknown;
  cookie?: string;
}

export interface TestServer {
  baseUrl: string;
  request<T = unknown>(path: string, options?: RequestOptions): Promise<TestResponse<T>>;
  login(email: string, password?: string): Promise<string>;
  close(): Promise<void>;
}

export async function startServer(ctx: AppContext): Promise<TestServer> {
  const app = createApp(ctx);
  const server = await new Promise<Server>((resolve, reject) => {
    const s = app.listen(0, "127.0.0.1", (err?: Error) => (err ? reject(err) : resolve(s)));
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("server did not bind to a TCP port");
  }
  const baseUrl = `http://127.0.0.1:${address.port}`;

  async function request<T = unknown>(path: string, options: RequestOptions = {}): Promise<TestResponse<T>> {
    const headers: Record<string, string> = {};
    if (options.body !== undefined) headers["Content-Type"] = "application/json";
    if (options.cookie) headers.Cookie = options.cookie;

    const res = await fetch(`${baseUrl}${path}`, {
      method: options.method ?? "GET",
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    const text = await res.text();
    const body: T = text ? JSON.parse(text) : null;
    return { status: res.status, body, headers: res.headers };
  }

  async function login(email: string, password = TEST_PASSWORD): Promise<string> {
    const res = await request("/auth/login", { method: "POST", body: { email, password } });
    const cookie = res.headers.getSetCookie().find((c) => c.startsWith("access_token="));
    if (res.status !== 200 || !cookie) {
      throw new Error(`login failed for ${email}: ${res.status}`);
    }
    return cookie.split(";")[0] ?? cookie;
  }

  return {
    baseUrl,
    request,
    login,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      }),
  };
}
