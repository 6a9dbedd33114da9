export type Bar = {
  label: string;
  value: number;
  /** Share of the tallest bar, 0-100. */
  heightPct: number;
};

export function toBars(points: { label: string; value: number }[]): Bar[] {
  const max = points.reduce((m, p) => Math.max(m, p.value), 0);
  return points.map((p) => ({
    label: p.label,
    value: p.value,
    heightPct: max === 0 ? 0 : Math.round((p.value / max) * 1000) / 10,
  }));
}

/** "Mar 2026" -> "Mar" so twelve bars fit under one chart. */
export function shortMonth(label: string): string {
  return label.split(" ")[0] ?? label;
}
