import { useCallback, useEffect, useState } from "react";
import { API_BASE, ApiError, api, type Dashboard, type User } from "./api.js";
import { AdminPanel } from "./adminPanel.js";
import { PasswordForm, ProfileForm, UserPanel } from "./userPanel.js";
import { box, button, input } from "./ui.js";

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export default function App() {
  // auth
  const [email, setEmail] = useState("");
  const [password, setPassword] = useState("");
  const [me, setMe] = useState<User | null>(null);
  const [dashboard, setDashboard] = useState<Dashboard | null>(null);

  // ui feedback
  const [status, setStatus] = useState<string>("");
  const [err, setErr] = useState<string>("");

  const refresh = useCallback(async () => {
    try {
      const [user, board] = await Promise.all([api.me(), api.dashboard()]);
      setMe(user);
      setDashboard(board);
    } catch (e) {
      // no session yet
      if (e instanceof ApiError && e.status === 401) {
        setMe(null);
        setDashboard(null);
        return;
      }
      throw e;
    }
  }, []);

  // On load: pick up an existing session cookie
  useEffect(() => {
    refresh().catch((e: unknown) => setErr(messageOf(e)));
  }, [refresh]);

  async function login() {
    setErr("");
    setStatus("Signing in…");
    try {
      await api.login(email, password);
    } catch (e) {
      setStatus("");
      setErr(messageOf(e));
      return;
    }
    setPassword("");
    setStatus("Signed in.");
    await refresh();
  }

  async function logout() {
    await api.logout();
    setMe(null);
    setDashboard(null);
    setStatus("Signed out.");
  }

  return (
    <div style={{ fontFamily: "system-ui", padding: 24, maxWidth: 1100, margin: "0 auto" }}>
      <div style={{ display: "flex", justifyContent: "space-between", alignItems: "center" }}>
        <h1>Admin Dashboard</h1>
        {me ? (
          <div>
            Signed in as <strong>{me.username}</strong> ({me.role}){" "}
            <button type="button" style={button} onClick={() => logout().catch((e: unknown) => setErr(messageOf(e)))}>
              Sign out
            </button>
          </div>
        ) : null}
      </div>

      <p style={{ color: "#666" }}>
        API: <code>{API_BASE}</code>
      </p>

      {err && <p style={{ color: "crimson" }}>Error: {err}</p>}
      {status && <p>{status}</p>}

      {!me ? (
        <form
          style={{ ...box, display: "grid", gap: 8, maxWidth: 360 }}
          onSubmit={(e) => {
            e.preventDefault();
            login().catch((error: unknown) => setErr(messageOf(error)));
          }}
        >
          <h3 style={{ marginTop: 0 }}>Sign in</h3>
          <input style={input} value={email} onChange={(e) => setEmail(e.target.value)} placeholder="email" />
          <input
            style={input}
            value={password}
            onChange={(e) => setPassword(e.target.value)}
            placeholder="password"
            type="password"
          />
          <button type="submit" style={button}>
            Sign in
          </button>
        </form>
      ) : dashboard?.kind === "admin" ? (
        <>
          <AdminPanel
            me={me}
            stats={dashboard.stats}
            recentUsers={dashboard.recentUsers}
            recentActivities={dashboard.recentActivities}
            onError={setErr}
            onStatus={setStatus}
            onChanged={refresh}
          />
          <ProfileForm key={me.id} user={me} onError={setErr} onStatus={setStatus} onChanged={refresh} />
          <PasswordForm onError={setErr} onStatus={setStatus} onChanged={refresh} />
        </>
      ) : dashboard?.kind === "user" ? (
        <UserPanel
          key={me.id}
          user={dashboard.user}
          activities={dashboard.activities}
          onError={setErr}
          onStatus={setStatus}
          onChanged={refresh}
        />
      ) : (
        <p>Loading…</p>
      )}
    </div>
  );
}
