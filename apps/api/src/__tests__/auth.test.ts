import { describe, it, expect, beforeEach, afterEach } from "vitest";
import bcrypt from "bcryptjs";
import jwt from "jsonwebtoken";
import type { AppContext } from "../context.js";
import type { PublicUser } from "../userStore.js";
import { TEST_PASSWORD, addUser, createTestContext, startServer, type TestServer } from "./helpers.js";

interface FieldErrors {
  errors: { fieldErrors: Record<string, string[] | undefined>; formErrors: string[] };
}

describe("auth routes", () => {
  let ctx: AppContext;
  let server: TestServer;

  beforeEach(async () => {
    ctx = createTestContext();
    server = await startServer(ctx);
  });

  afterEach(async () => {
    await server.close();
    ctx.db.close();
  });

  describe("POST /auth/register", () => {
    const valid = {
      username: "alice",
      email: "Alice@Example.com",
      password: "long-enough-pw",
      confirmPassword: "long-enough-pw",
      firstName: "Alice",
      lastName: "",
    };

    it("creates a regular, active user with a hashed password", async () => {
      const res = await server.request<PublicUser>("/auth/register", { method: "POST", body: valid });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        username: "alice",
        email: "alice@example.com",
        role: "USER",
        isActive: true,
        firstName: "Alice",
        lastName: null,
        fullName: "alice",
      });
      expect(res.body).not.toHaveProperty("passwordHash");

      const stored = ctx.users.findByEmail("alice@example.com");
      expect(stored?.passwordHash).not.toBe("long-enough-pw");
      expect(await bcrypt.compare("long-enough-pw", stored?.passwordHash ?? "")).toBe(true);

      const [entry] = ctx.activity.recent(1);
      expect(entry).toMatchObject({
        userId: stored?.id,
        action: "Registration",
        description: "New user account created",
        ipAddress: "127.0.0.1",
      });
    });

    it("ignores an attempt to self-assign the admin role", async () => {
      const res = await server.request<PublicUser>("/auth/register", {
        method: "POST",
        body: { ...valid, role: "ADMIN" },
      });

      expect(res.status).toBe(201);
      expect(res.body.role).toBe("USER");
    });

    it("rejects mismatched passwords", async () => {
      const res = await server.request<FieldErrors>("/auth/register", {
        method: "POST",
        body: { ...valid, confirmPassword: "something-else" },
      });

      expect(res.status).toBe(400);
      expect(res.body.errors.fieldErrors.confirmPassword).toEqual(["Passwords must match !"]);
    });

    it("rejects a malformed username", async () => {
      const res = await server.request<FieldErrors>("/auth/register", {
        method: "POST",
        body: { ...valid, username: "9lives" },
      });

      expect(res.status).toBe(400);
      expect(res.body.errors.fieldErrors.username).toEqual([
        "Usernames must have only letters, numbers, dots or underscores",
      ]);
    });

    it("rejects a short password", async () => {
      const res = await server.request<FieldErrors>("/auth/register", {
        method: "POST",
        body: { ...valid, password: "short", confirmPassword: "short" },
      });

      expect(res.status).toBe(400);
      expect(res.body.errors.fieldErrors.password).toEqual(["Password must be at least 8 characters"]);
    });

    it("reports a taken email before a taken username", async () => {
      addUser(ctx, { username: "alice" });

      const res = await server.request("/auth/register", { method: "POST", body: valid });

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ message: "Email already registered!" });
    });

    it("reports a taken username", async () => {
      addUser(ctx, { username: "alice", email: "someone@example.com" });

      const res = await server.request("/auth/register", { method: "POST", body: valid });

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ message: "Username already taken!" });
    });
  });

  describe("POST /auth/login", () => {
    it("sets an httpOnly session cookie and records the login", async () => {
      const alice = addUser(ctx, { username: "alice" });

      const res = await server.request<PublicUser>("/auth/login", {
        method: "POST",
        body: { email: "ALICE@example.com", password: TEST_PASSWORD },
      });

      expect(res.status).toBe(200);
      expect(res.body.id).toBe(alice.id);
      expect(res.body.lastLogin).toBe("2026-03-15T12:00:00.000Z");

      const cookie = res.headers.getSetCookie().find((c) => c.startsWith("access_token="));
      expect(cookie).toBeDefined();
      expect(cookie).toContain("HttpOnly");
      expect(cookie).toContain("SameSite=Lax");
      expect(cookie).toContain("Max-Age=3600");

      const token = cookie?.split(";")[0]?.slice("access_token=".length) ?? "";
      expect(jwt.verify(token, "test-secret")).toMatchObject({ userId: alice.id, role: "USER" });

      expect(ctx.activity.recent(1)[0]).toMatchObject({
        userId: alice.id,
        action: "Login",
        description: "User logged in successfully",
      });
    });

    it("logs a failed attempt without a user", async () => {
      addUser(ctx, { username: "alice" });

      const res = await server.request("/auth/login", {
        method: "POST",
        body: { email: "alice@example.com", password: "wrong-password" },
      });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ message: "Invalid email or password!" });
      expect(res.headers.getSetCookie()).toEqual([]);
      expect(ctx.activity.recent(1)[0]).toMatchObject({
        userId: null,
        action: "Failed Login",
        description: "Failed login attempt for email: alice@example.com",
      });
    });

    it("gives unknown emails the same answer", async () => {
      const res = await server.request("/auth/login", {
        method: "POST",
        body: { email: "ghost@example.com", password: TEST_PASSWORD },
      });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ message: "Invalid email or password!" });
    });

    it("turns away deactivated accounts", async () => {
      addUser(ctx, { username: "alice", isActive: false });

      const res = await server.request("/auth/login", {
        method: "POST",
        body: { email: "alice@example.com", password: TEST_PASSWORD },
      });

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ message: "Your account has been deactivated. Please contact administrator." });
      expect(ctx.activity.count()).toBe(0);
    });

    it("validates the body", async () => {
      const res = await server.request<FieldErrors>("/auth/login", {
        method: "POST",
        body: { email: "not-an-email", password: "" },
      });

      expect(res.status).toBe(400);
      expect(Object.keys(res.body.errors.fieldErrors).sort()).toEqual(["email", "password"]);
    });
  });

  describe("session", () => {
    it("returns the current user from /auth/me", async () => {
      addUser(ctx, { username: "alice" });
      const cookie = await server.login("alice@example.com");

      const res = await server.request<PublicUser>("/auth/me", { cookie });

      expect(res.status).toBe(200);
      expect(res.body.username).toBe("alice");
    });

    it("requires a cookie", async () => {
      const res = await server.request("/auth/me");

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ message: "Not authenticated" });
    });

    it("rejects a token signed with another secret", async () => {
      const alice = addUser(ctx, { username: "alice" });
      const forged = jwt.sign({ userId: alice.id, role: "ADMIN" }, "other-secret");

      const res = await server.request("/auth/me", { cookie: `access_token=${forged}` });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ message: "Invalid or expired token" });
    });

    it("ends a session once the account is deactivated", async () => {
      const alice = addUser(ctx, { username: "alice" });
      const cookie = await server.login("alice@example.com");

      ctx.users.updateAccess(alice.id, { role: "USER", isActive: false });

      const res = await server.request("/auth/me", { cookie });
      expect(res.status).toBe(401);
    });

    it("logs out and clears the cookie", async () => {
      const alice = addUser(ctx, { username: "alice" });
      const cookie = await server.login("alice@example.com");

      const res = await server.request("/auth/logout", { method: "POST", cookie });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: "Logged out" });
      expect(res.headers.getSetCookie()[0]).toMatch(/^access_token=;/);
      expect(ctx.activity.recent(1)[0]).toMatchObject({ userId: alice.id, action: "Logout" });
    });
  });

  it("answers unknown routes with 404", async () => {
    const res = await server.request("/nowhere");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ message: "Not found" });
  });

  it("reports health", async () => {
    const res = await server.request("/health");

    expect(res.body).toEqual({ ok: true });
  });
});
