import type { CSSProperties, ReactNode } from "react";
import type { Activity } from "./api.js";
import { shortMonth, toBars } from "./chart.js";

export const box: CSSProperties = { padding: 12, border: "1px solid #ddd", borderRadius: 8 };
export const input: CSSProperties = { width: "100%", padding: 8, boxSizing: "border-box" };
export const button: CSSProperties = {
  padding: "8px 12px",
  borderRadius: 8,
  border: "1px solid #ccc",
  background: "white",
  cursor: "pointer",
};

export function formatDate(iso: string | null): string {
  if (!iso) return "Never";
  return new Date(iso).toLocaleString("en-GB", { dateStyle: "medium", timeStyle: "short" });
}

export function Section({ title, children }: { title: string; children: ReactNode }) {
  return (
    <section style={{ ...box, marginTop: 16 }}>
      <h3 style={{ marginTop: 0 }}>{title}</h3>
      {children}
    </section>
  );
}

export function StatCard({ label, value }: { label: string; value: number }) {
  return (
    <div style={{ ...box, minWidth: 120, flex: 1 }}>
      <div style={{ fontSize: 12, color: "#666" }}>{label}</div>
      <div style={{ fontSize: 28, fontWeight: 600 }}>{value}</div>
    </div>
  );
}

export function BarChart({ points, compactLabels }: { points: { label: string; value: number }[]; compactLabels?: boolean }) {
  const bars = toBars(points);
  if (bars.length === 0) return <em>No data yet.</em>;

  return (
    <div style={{ display: "flex", alignItems: "flex-end", gap: 6, height: 160 }}>
      {bars.map((b) => (
        <div key={b.label} style={{ flex: 1, display: "flex", flexDirection: "column", alignItems: "center", height: "100%" }}>
          <div style={{ flex: 1, width: "100%", display: "flex", alignItems: "flex-end" }}>
            <div
              title={`${b.label}: ${b.value}`}
              style={{ width: "100%", height: `${b.heightPct}%`, minHeight: b.value > 0 ? 2 : 0, background: "#4a6cf7", borderRadius: 4 }}
            />
          </div>
          <span style={{ fontSize: 11, marginTop: 4 }}>{compactLabels ? shortMonth(b.label) : b.label}</span>
        </div>
      ))}
    </div>
  );
}

export function ActivityTable({ entries, showUser }: { entries: Activity[]; showUser?: boolean }) {
  if (entries.length === 0) return <em>No activity recorded.</em>;

  return (
    <table style={{ width: "100%", borderCollapse: "collapse", fontSize: 14 }}>
      <thead>
        <tr style={{ textAlign: "left" }}>
          <th>When</th>
          {showUser ? <th>User</th> : null}
          <th>Action</th>
          <th>Description</th>
          <th>IP</th>
        </tr>
      </thead>
      <tbody>
        {entries.map((e) => (
          <tr key={e.id} style={{ borderTop: "1px solid #eee" }}>
            <td>{formatDate(e.timestamp)}</td>
            {showUser ? <td>{e.username ?? "(deleted)"}</td> : null}
            <td>{e.action}</td>
            <td>{e.description ?? ""}</td>
            <td>{e.ipAddress ?? ""}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}

export function Pager({
  page,
  pages,
  hasPrev,
  hasNext,
  onPage,
}: {
  page: number;
  pages: number;
  hasPrev: boolean;
  hasNext: boolean;
  onPage: (page: number) => void;
}) {
  return (
    <div style={{ marginTop: 8, display: "flex", gap: 8, alignItems: "center" }}>
      <button type="button" style={button} disabled={!hasPrev} onClick={() => onPage(page - 1)}>
        Previous
      </button>
      <span>
        Page {page} of {Math.max(pages, 1)}
      </span>
      <button type="button" style={button} disabled={!hasNext} onClick={() => onPage(page + 1)}>
        Next
      </button>
    </div>
  );
}
