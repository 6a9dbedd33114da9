import { describe, it, expect } from "vitest";
import { shortMonth, toBars } from "../chart.js";

describe("toBars", () => {
  it("scales every bar against the tallest one", () => {
    const bars = toBars([
      { label: "Jan 2026", value: 3 },
      { label: "Feb 2026", value: 6 },
      { label: "Mar 2026", value: 1 },
    ]);

    expect(bars.map((b) => b.heightPct)).toEqual([50, 100, 16.7]);
  });

  it("keeps all bars flat when there is nothing to show", () => {
    expect(toBars([{ label: "Jan 2026", value: 0 }])).toEqual([{ label: "Jan 2026", value: 0, heightPct: 0 }]);
    expect(toBars([])).toEqual([]);
  });
});

describe("shortMonth", () => {
  it("drops the year", () => {
    expect(shortMonth("Mar 2026")).toBe("Mar");
  });
});
