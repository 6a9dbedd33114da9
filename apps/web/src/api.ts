const configured: unknown = import.meta.env.VITE_API_URL;
export const API_BASE = typeof configured === "string" && configured ? configured : "http://localhost:4000";

export type Role = "ADMIN" | "USER";

export type User = {
  id: number;
  username: string;
  email: string;
  role: Role;
  firstName: string | null;
  lastName: string | null;
  phone: string | null;
  fullName: string;
  isActive: boolean;
  createdAt: string;
  lastLogin: string | null;
};

export type Activity = {
  id: number;
  userId: number | null;
  username: string | null;
  action: string;
  description: string | null;
  ipAddress: string | null;
  timestamp: string;
};

export type Page<T> = {
  items: T[];
  page: number;
  perPage: number;
  total: number;
  pages: number;
  hasNext: boolean;
  hasPrev: boolean;
};

export type Stats = {
  totalUsers: number;
  activeUsers: number;
  adminUsers: number;
  newUsers: number;
  userGrowth: { month: string; count: number }[];
  totalActivities: number;
  activityByAction: { action: string; count: number }[];
};

export type Dashboard =
  | { kind: "admin"; stats: Stats; recentUsers: User[]; recentActivities: Activity[] }
  | { kind: "user"; user: User; activities: Activity[] };

export type ProfileInput = {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  phone: string;
};

export type UserFilters = {
  page: number;
  search: string;
  role: "all" | "admin" | "user";
  status: "all" | "active" | "inactive";
};

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Server errors come as `{ message }` or as a flattened zod error
 * `{ errors: { formErrors, fieldErrors } }`.
 */
export function errorMessage(data: unknown, status: number): string {
  if (isRecord(data)) {
    if (typeof data.message === "string") return data.message;

    const errors = data.errors;
    if (isRecord(errors)) {
      const fieldErrors = errors.fieldErrors;
      if (isRecord(fieldErrors)) {
        for (const [field, messages] of Object.entries(fieldErrors)) {
          if (Array.isArray(messages) && typeof messages[0] === "string") {
            return `${field}: ${messages[0]}`;
          }
        }
      }
      const formErrors = errors.formErrors;
      if (Array.isArray(formErrors) && typeof formErrors[0] === "string") {
        return formErrors[0];
      }
    }
  }
  if (typeof data === "string" && data) return data;
  return `HTTP ${status}`;
}

function parseBody(text: string): unknown {
  try {
    return text ? JSON.parse(text) : null;
  } catch {
    return text;
  }
}

export async function apiFetch<T>(path: string, init: RequestInit = {}): Promise<T> {
  const headers = new Headers(init.headers);
  if (!headers.has("Content-Type")) headers.set("Content-Type", "application/json");

  const res = await fetch(`${API_BASE}${path}`, {
    ...init,
    headers,
    credentials: "include", // httpOnly session cookie
  });

  const text = await res.text();
  if (!res.ok) {
    throw new ApiError(res.status, errorMessage(parseBody(text), res.status));
  }

  const result: T = text ? JSON.parse(text) : null;
  return result;
}

const json = (method: string, body?: unknown): RequestInit => ({
  method,
  body: body === undefined ? undefined : JSON.stringify(body),
});

export const api = {
  login: (email: string, password: string) => apiFetch<User>("/auth/login", json("POST", { email, password })),
  logout: () => apiFetch<{ message: string }>("/auth/logout", json("POST")),
  me: () => apiFetch<User>("/auth/me"),
  dashboard: () => apiFetch<Dashboard>("/dashboard"),
  updateProfile: (input: ProfileInput) => apiFetch<User>("/profile", json("PUT", input)),
  changePassword: (currentPassword: string, newPassword: string, confirmPassword: string) =>
    apiFetch<{ message: string }>("/profile/password", json("POST", { currentPassword, newPassword, confirmPassword })),
  listUsers: (filters: UserFilters) => {
    const query = new URLSearchParams({
      page: String(filters.page),
      search: filters.search,
      role: filters.role,
      status: filters.status,
    });
    return apiFetch<Page<User>>(`/admin/users?${query.toString()}`);
  },
  updateUser: (user: User, changes: Partial<Pick<User, "role" | "isActive">>) =>
    apiFetch<User>(
      `/admin/users/${user.id}`,
      json("PUT", {
        username: user.username,
        email: user.email,
        firstName: user.firstName,
        lastName: user.lastName,
        phone: user.phone,
        role: changes.role ?? user.role,
        isActive: changes.isActive ?? user.isActive,
      })
    ),
  deleteUser: (id: number) => apiFetch<{ message: string }>(`/admin/users/${id}`, json("DELETE")),
  activities: (page: number) => apiFetch<Page<Activity>>(`/admin/activities?page=${page}`),
};
