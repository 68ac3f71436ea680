import { describe, expect, test } from "vitest";
import type { Transaction } from "../engine/model.js";
import { buildReportSnapshot } from "./snapshot.js";

const transactions: Transaction[] = [
  { id: "1", userId: "user-1", date: "2025-03-05", amount: -600, category: "food" },
  { id: "2", userId: "user-1", date: "2025-03-10", amount: -200, category: "transport" },
  { id: "3", userId: "user-1", date: "2025-03-01", amount: 2000, category: "income" },
];

describe("buildReportSnapshot", () => {
  test("bundles summary, alerts, score and insights for one window", () => {
    const snapshot = buildReportSnapshot({
      userId: "user-1",
      transactions,
      budgets: [{ userId: "user-1", category: "food", period: "monthly", limit: 500 }],
      window: { start: "2025-03-01", end: "2025-03-31" },
      generatedAt: new Date("2025-04-01T08:00:00Z"),
    });

    expect(snapshot.generatedAt).toBe("2025-04-01T08:00:00.000Z");
    expect(snapshot.userId).toBe("user-1");
    expect(snapshot.window).toEqual({ start: "2025-03-01", end: "2025-03-31" });
    expect(snapshot.summary.netSavings).toBe(1200);
    expect(snapshot.alerts.map((a) => [a.category, a.overBy])).toEqual([["food", 100]]);
    expect(snapshot.score.value).toBe(68);
    expect(snapshot.insights).toHaveLength(2);
  });

  test("is plain data that survives JSON", () => {
    const snapshot = buildReportSnapshot({
      userId: "user-1",
      transactions,
      budgets: [],
      window: { start: "2025-03-01", end: "2025-03-31" },
      generatedAt: new Date("2025-04-01T08:00:00Z"),
    });
    expect(JSON.parse(JSON.stringify(snapshot))).toEqual(snapshot);
  });
});
