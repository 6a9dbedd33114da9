import { useCallback, useEffect, useState } from "react";
import { api, type Activity, type Page, type Stats, type User, type UserFilters } from "./api.js";
import { ActivityTable, BarChart, Pager, Section, StatCard, box, button, formatDate, input } from "./ui.js";

type Props = {
  me: User;
  stats: Stats;
  recentUsers: User[];
  recentActivities: Activity[];
  onError: (message: string) => void;
  onStatus: (message: string) => void;
  onChanged: () => Promise<void>;
};

const emptyFilters: UserFilters = { page: 1, search: "", role: "all", status: "all" };

export function AdminPanel({ me, stats, recentUsers, recentActivities, onError, onStatus, onChanged }: Props) {
  const [filters, setFilters] = useState<UserFilters>(emptyFilters);
  const [search, setSearch] = useState("");
  const [users, setUsers] = useState<Page<User> | null>(null);
  const [activityPage, setActivityPage] = useState(1);
  const [activities, setActivities] = useState<Page<Activity> | null>(null);

  const fail = useCallback((e: unknown) => onError(e instanceof Error ? e.message : String(e)), [onError]);

  const loadUsers = useCallback(async () => {
    setUsers(await api.listUsers(filters));
  }, [filters]);

  useEffect(() => {
    loadUsers().catch(fail);
  }, [loadUsers, fail]);

  useEffect(() => {
    api.activities(activityPage).then(setActivities).catch(fail);
  }, [activityPage, fail]);

  async function change(user: User, changes: Partial<Pick<User, "role" | "isActive">>) {
    onError("");
    const updated = await api.updateUser(user, changes);
    onStatus(`Updated ${updated.username}.`);
    await loadUsers();
    await onChanged();
  }

  async function remove(user: User) {
    if (!window.confirm(`Delete ${user.username}? Their activity stays in the log.`)) return;
    onError("");
    const { message } = await api.deleteUser(user.id);
    onStatus(message);
    await loadUsers();
    await onChanged();
  }

  return (
    <>
      <div style={{ display: "flex", gap: 12, flexWrap: "wrap", marginTop: 16 }}>
        <StatCard label="Total users" value={stats.totalUsers} />
        <StatCard label="Active" value={stats.activeUsers} />
        <StatCard label="Admins" value={stats.adminUsers} />
        <StatCard label="New (30 days)" value={stats.newUsers} />
        <StatCard label="Activities" value={stats.totalActivities} />
      </div>

      <Section title="User growth">
        <BarChart compactLabels points={stats.userGrowth.map((g) => ({ label: g.month, value: g.count }))} />
      </Section>

      <Section title="Activity by action">
        <BarChart points={stats.activityByAction.map((a) => ({ label: a.action, value: a.count }))} />
      </Section>

      <div style={{ display: "grid", gridTemplateColumns: "1fr 2fr", gap: 16 }}>
        <Section title="Newest users">
          <ul style={{ paddingLeft: 18, margin: 0 }}>
            {recentUsers.map((u) => (
              <li key={u.id}>
                <strong>{u.fullName}</strong> <span style={{ color: "#666" }}>{formatDate(u.createdAt)}</span>
              </li>
            ))}
          </ul>
        </Section>
        <Section title="Latest activity">
          <ActivityTable showUser entries={recentActivities} />
        </Section>
      </div>

      <Section title="Users">
        <form
          style={{ display: "flex", gap: 8, marginBottom: 8 }}
          onSubmit={(e) => {
            e.preventDefault();
            setFilters({ ...filters, page: 1, search });
          }}
        >
          <input style={input} value={search} onChange={(e) => setSearch(e.target.value)} placeholder="Search" />
          <select
            value={filters.role}
            onChange={(e) => {
              const role = e.target.value;
              if (role === "all" || role === "admin" || role === "user") setFilters({ ...filters, page: 1, role });
            }}
          >
            <option value="all">All roles</option>
            <option value="admin">Admins</option>
            <option value="user">Users</option>
          </select>
          <select
            value={filters.status}
            onChange={(e) => {
              const status = e.target.value;
              if (status === "all" || status === "active" || status === "inactive") {
                setFilters({ ...filters, page: 1, status });
              }
            }}
          >
            <option value="all">Any status</option>
            <option value="active">Active</option>
            <option value="inactive">Inactive</option>
          </select>
          <button type="submit" style={button}>
            Filter
          </button>
        </form>

        {users && (
          <>
            <table style={{ width: "100%", borderCollapse: "collapse", fontSize: 14 }}>
              <thead>
                <tr style={{ textAlign: "left" }}>
                  <th>User</th>
                  <th>Email</th>
                  <th>Role</th>
                  <th>Status</th>
                  <th>Last login</th>
                  <th />
                </tr>
              </thead>
              <tbody>
                {users.items.map((u) => {
                  const self = u.id === me.id;
                  return (
                    <tr key={u.id} style={{ borderTop: "1px solid #eee" }}>
                      <td>
                        {u.fullName}
                        <div style={{ color: "#666", fontSize: 12 }}>@{u.username}</div>
                      </td>
                      <td>{u.email}</td>
                      <td>{u.role}</td>
                      <td style={{ color: u.isActive ? "green" : "crimson" }}>{u.isActive ? "Active" : "Inactive"}</td>
                      <td>{formatDate(u.lastLogin)}</td>
                      <td style={{ display: "flex", gap: 4 }}>
                        <button
                          type="button"
                          style={button}
                          disabled={self}
                          onClick={() => change(u, { role: u.role === "ADMIN" ? "USER" : "ADMIN" }).catch(fail)}
                        >
                          {u.role === "ADMIN" ? "Make user" : "Make admin"}
                        </button>
                        <button
                          type="button"
                          style={button}
                          disabled={self}
                          onClick={() => change(u, { isActive: !u.isActive }).catch(fail)}
                        >
                          {u.isActive ? "Deactivate" : "Activate"}
                        </button>
                        <button
                          type="button"
                          style={{ ...button, color: "crimson" }}
                          disabled={self}
                          onClick={() => remove(u).catch(fail)}
                        >
                          Delete
                        </button>
                      </td>
                    </tr>
                  );
                })}
              </tbody>
            </table>
            {users.items.length === 0 ? <em>No users match.</em> : null}
            <Pager {...users} onPage={(page) => setFilters({ ...filters, page })} />
          </>
        )}
      </Section>

      <Section title="Activity log">
        {activities ? (
          <>
            <ActivityTable showUser entries={activities.items} />
            <Pager {...activities} onPage={setActivityPage} />
          </>
        ) : (
          <div style={box}>Loading…</div>
        )}
      </Section>
    </>
  );
}
