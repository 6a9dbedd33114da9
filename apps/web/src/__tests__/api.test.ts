import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ApiError, api, errorMessage, type User } from "../api.js";

const alice: User = {
  id: 7,
  username: "alice",
  email: "alice@example.com",
  role: "USER",
  firstName: "Alice",
  lastName: null,
  phone: null,
  fullName: "Alice",
  isActive: true,
  createdAt: "2026-03-01T00:00:00.000Z",
  lastLogin: null,
};

function reply(status: number, body: unknown) {
  return new Response(typeof body === "string" ? body : JSON.stringify(body), { status });
}

describe("api client", () => {
  const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

  beforeEach(() => {
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  it("sends credentials and a JSON body", async () => {
    fetchMock.mockResolvedValue(reply(200, alice));

    const user = await api.login("alice@example.com", "test-password");

    expect(user).toEqual(alice);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:4000/auth/login");
    expect(init?.method).toBe("POST");
    expect(init?.credentials).toBe("include");
    expect(init?.body).toBe('{"email":"alice@example.com","password":"test-password"}');
    expect(new Headers(init?.headers).get("Content-Type")).toBe("application/json");
  });

  it("turns error responses into ApiError", async () => {
    fetchMock.mockResolvedValue(reply(401, { message: "Invalid email or password!" }));

    const failure = api.login("alice@example.com", "wrong");

    await expect(failure).rejects.toBeInstanceOf(ApiError);
    await expect(failure).rejects.toMatchObject({ status: 401, message: "Invalid email or password!" });
  });

  it("encodes the user filters in the query string", async () => {
    fetchMock.mockResolvedValue(reply(200, { items: [], page: 2, perPage: 10, total: 0, pages: 0, hasNext: false, hasPrev: true }));

    await api.listUsers({ page: 2, search: "al ice", role: "admin", status: "inactive" });

    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      "http://localhost:4000/admin/users?page=2&search=al+ice&role=admin&status=inactive"
    );
  });

  it("sends the full record when toggling access", async () => {
    fetchMock.mockResolvedValue(reply(200, { ...alice, isActive: false }));

    await api.updateUser(alice, { isActive: false });

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe("PUT");
    expect(JSON.parse(String(init?.body))).toEqual({
      username: "alice",
      email: "alice@example.com",
      firstName: "Alice",
      lastName: null,
      phone: null,
      role: "USER",
      isActive: false,
    });
  });

  it("accepts empty bodies", async () => {
    fetchMock.mockResolvedValue(reply(200, ""));

    await expect(api.logout()).resolves.toBeNull();
  });
});

describe("errorMessage", () => {
  it("prefers the server message", () => {
    expect(errorMessage({ message: "Forbidden" }, 403)).toBe("Forbidden");
  });

  it("reports the first field error", () => {
    const data = { errors: { formErrors: [], fieldErrors: { password: ["Password must be at least 8 characters"] } } };

    expect(errorMessage(data, 400)).toBe("password: Password must be at least 8 characters");
  });

  it("falls back to form errors, then text, then the status", () => {
    expect(errorMessage({ errors: { formErrors: ["Bad input"], fieldErrors: {} } }, 400)).toBe("Bad input");
    expect(errorMessage("Bad Gateway", 502)).toBe("Bad Gateway");
    expect(errorMessage(null, 500)).toBe("HTTP 500");
  });
});
