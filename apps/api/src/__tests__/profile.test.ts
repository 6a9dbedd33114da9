import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { AppContext } from "../context.js";
import type { UserDashboard } from "../dashboard.js";
import type { PublicUser, UserRecord } from "../userStore.js";
import { TEST_PASSWORD, addUser, createTestContext, startServer, type TestServer } from "./helpers.js";

describe("profile and user dashboard", () => {
  let ctx: AppContext;
  let server: TestServer;
  let alice: UserRecord;
  let cookie: string;

  beforeEach(async () => {
    ctx = createTestContext();
    server = await startServer(ctx);
    alice = addUser(ctx, { username: "alice", firstName: "Alice", lastName: "Smith" });
    cookie = await server.login("alice@example.com");
  });

  afterEach(async () => {
    await server.close();
    ctx.db.close();
  });

  it("returns the signed-in user's profile", async () => {
    const res = await server.request<PublicUser>("/profile", { cookie });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ id: alice.id, fullName: "Alice Smith" });
  });

  it("updates the profile and logs it", async () => {
    const res = await server.request<PublicUser>("/profile", {
      method: "PUT",
      cookie,
      body: { username: "alice.s", email: "alice@example.com", firstName: "Alice", lastName: " ", phone: "+1-555-0199" },
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      username: "alice.s",
      lastName: null,
      fullName: "alice.s",
      phone: "+1-555-0199",
    });
    expect(ctx.activity.recent(1)[0]).toMatchObject({
      userId: alice.id,
      action: "Profile Update",
      description: "User updated profile information",
    });
  });

  it("refuses a username taken by someone else", async () => {
    addUser(ctx, { username: "bob" });

    const res = await server.request("/profile", {
      method: "PUT",
      cookie,
      body: { username: "bob", email: "alice@example.com" },
    });

    expect(res.status).toBe(409);
    expect(res.body).toEqual({ message: "Username already taken!" });
  });

  it("rejects a phone number that is too short", async () => {
    const res = await server.request("/profile", {
      method: "PUT",
      cookie,
      body: { username: "alice", email: "alice@example.com", phone: "12345" },
    });

    expect(res.status).toBe(400);
  });

  describe("password change", () => {
    it("replaces the hash after checking the current password", async () => {
      const res = await server.request("/profile/password", {
        method: "POST",
        cookie,
        body: { currentPassword: TEST_PASSWORD, newPassword: "brand-new-pw", confirmPassword: "brand-new-pw" },
      });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: "Password changed successfully!" });
      expect(ctx.activity.recent(1)[0]).toMatchObject({ userId: alice.id, action: "Password Change" });

      await expect(server.login("alice@example.com")).rejects.toThrow("login failed");
      await expect(server.login("alice@example.com", "brand-new-pw")).resolves.toMatch(/^access_token=/);
    });

    it("rejects a wrong current password", async () => {
      const res = await server.request("/profile/password", {
        method: "POST",
        cookie,
        body: { currentPassword: "not-my-password", newPassword: "brand-new-pw", confirmPassword: "brand-new-pw" },
      });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ message: "Current password is incorrect!" });
    });

    it("requires the confirmation to match", async () => {
      const res = await server.request("/profile/password", {
        method: "POST",
        cookie,
        body: { currentPassword: TEST_PASSWORD, newPassword: "brand-new-pw", confirmPassword: "brand-new-px" },
      });

      expect(res.status).toBe(400);
    });
  });

  describe("dashboard", () => {
    it("shows a regular user only their own activity", async () => {
      const bob = addUser(ctx, { username: "bob" });
      ctx.activity.record({ userId: bob.id, action: "Login" });

      const res = await server.request<UserDashboard>("/dashboard", { cookie });

      expect(res.status).toBe(200);
      expect(res.body.kind).toBe("user");
      expect(res.body.user.username).toBe("alice");
      expect(res.body.activities.map((e) => [e.action, e.userId])).toEqual([["Login", alice.id]]);
    });

    it("serves the same view at /user/dashboard", async () => {
      const res = await server.request<UserDashboard>("/user/dashboard", { cookie });

      expect(res.body.kind).toBe("user");
    });
  });
});
