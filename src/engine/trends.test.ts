import { describe, expect, test } from "vitest";
import type { BudgetConfig, Transaction } from "./model.js";
import {
  cumulativeSavingsSeries,
  expenseTrend,
  monthlyExpenseSeries,
  scoreHistory,
  weekdayExpenseSeries,
} from "./trends.js";

function tx(overrides: Partial<Transaction> = {}): Transaction {
  return {
    id: overrides.id ?? "tx-1",
    userId: "user-1",
    date: overrides.date ?? "2025-01-15",
    amount: overrides.amount ?? -50,
    category: overrides.category ?? "food",
  };
}

describe("monthlyExpenseSeries", () => {
  test("returns an empty series for no transactions", () => {
    expect(monthlyExpenseSeries([])).toEqual([]);
  });

  test("totals expenses per month in date order", () => {
    const series = monthlyExpenseSeries([
      tx({ id: "1", date: "2025-02-03", amount: -40 }),
      tx({ id: "2", date: "2025-01-20", amount: -10.5 }),
      tx({ id: "3", date: "2025-01-02", amount: -20.25 }),
      tx({ id: "4", date: "2025-01-25", amount: 900 }),
    ]);

    expect(series).toEqual([
      { period: "2025-01", amount: 30.75 },
      { period: "2025-02", amount: 40 },
    ]);
  });
});

describe("cumulativeSavingsSeries", () => {
  test("accumulates net flow by date", () => {
    const series = cumulativeSavingsSeries([
      tx({ id: "1", date: "2025-01-02", amount: -30 }),
      tx({ id: "2", date: "2025-01-01", amount: 100 }),
      tx({ id: "3", date: "2025-01-02", amount: -20 }),
      tx({ id: "4", date: "2025-01-05", amount: -70 }),
    ]);

    expect(series).toEqual([
      { period: "2025-01-01", amount: 100 },
      { period: "2025-01-02", amount: 50 },
      { period: "2025-01-05", amount: -20 },
    ]);
  });
});

describe("cumulativeSavingsSeries with an opening balance", () => {
  test("starts from the net carried in", () => {
    const series = cumulativeSavingsSeries(
      [
        tx({ id: "1", date: "2025-03-01", amount: 2000 }),
        tx({ id: "2", date: "2025-03-05", amount: -600.5 }),
      ],
      1400.25,
    );

    expect(series).toEqual([
      { period: "2025-03-01", amount: 3400.25 },
      { period: "2025-03-05", amount: 2799.75 },
    ]);
  });
});

describe("weekdayExpenseSeries", () => {
  test("fills every day with zero when there is nothing to total", () => {
    expect(weekdayExpenseSeries([]).map((p) => [p.weekday, p.amount])).toEqual([
      ["Monday", 0],
      ["Tuesday", 0],
      ["Wednesday", 0],
      ["Thursday", 0],
      ["Friday", 0],
      ["Saturday", 0],
      ["Sunday", 0],
    ]);
  });

  test("totals expenses by the day of the week they fell on", () => {
    const series = weekdayExpenseSeries([
      // 2025-03-03 is a Monday, 2025-03-09 a Sunday
      tx({ id: "1", date: "2025-03-03", amount: -10.1 }),
      tx({ id: "2", date: "2025-03-10", amount: -0.2 }),
      tx({ id: "3", date: "2025-03-09", amount: -42 }),
      tx({ id: "4", date: "2025-03-05", amount: 1000 }),
    ]);

    expect(series).toEqual([
      { weekday: "Monday", amount: 10.3 },
      { weekday: "Tuesday", amount: 0 },
      { weekday: "Wednesday", amount: 0 },
      { weekday: "Thursday", amount: 0 },
      { weekday: "Friday", amount: 0 },
      { weekday: "Saturday", amount: 0 },
      { weekday: "Sunday", amount: 42 },
    ]);
  });
});

describe("expenseTrend", () => {
  test("detects increasing spending", () => {
    const trend = expenseTrend([
      { period: "2025-01", amount: 100 },
      { period: "2025-02", amount: 150 },
      { period: "2025-03", amount: 200 },
      { period: "2025-04", amount: 250 },
    ]);
    expect(trend.direction).toBe("increasing");
    expect(trend.changePercent).toBe(150);
  });

  test("detects decreasing spending", () => {
    const trend = expenseTrend([
      { period: "2025-01", amount: 400 },
      { period: "2025-02", amount: 300 },
      { period: "2025-03", amount: 200 },
    ]);
    expect(trend.direction).toBe("decreasing");
    expect(trend.changePercent).toBe(-50);
  });

  test("calls flat spending stable", () => {
    const trend = expenseTrend([
      { period: "2025-01", amount: 100 },
      { period: "2025-02", amount: 101 },
      { period: "2025-03", amount: 100 },
    ]);
    expect(trend.direction).toBe("stable");
  });

  test("calls a single point stable", () => {
    expect(expenseTrend([{ period: "2025-01", amount: 100 }]).direction).toBe("stable");
  });
});

describe("scoreHistory", () => {
  test("judges each month by the budget in force at its end", () => {
    const budgetsAt = (date: string): BudgetConfig[] => [
      {
        userId: "user-1",
        category: "food",
        period: "monthly",
        limit: date < "2025-02-01" ? 500 : 1000,
      },
    ];
    const transactions = [
      tx({ id: "1", date: "2025-01-01", amount: 2000, category: "salary" }),
      tx({ id: "2", date: "2025-01-10", amount: -600 }),
      tx({ id: "3", date: "2025-02-01", amount: 2000, category: "salary" }),
      tx({ id: "4", date: "2025-02-10", amount: -600 }),
    ];

    const history = scoreHistory(transactions, budgetsAt, ["2025-01", "2025-02", "2025-03"]);

    // savings 0.7 both months; January is over budget, February is not
    expect(history).toEqual([
      { month: "2025-01", value: 74 },
      { month: "2025-02", value: 89 },
      { month: "2025-03", value: 50 },
    ]);
  });
});
