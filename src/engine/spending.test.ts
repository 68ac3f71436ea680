import { describe, expect, test } from "vitest";
import type { Transaction } from "./model.js";
import { summarizeSpending } from "./spending.js";

const MARCH = { start: "2025-03-01", end: "2025-03-31" };

function tx(overrides: Partial<Transaction> = {}): Transaction {
  return {
    id: overrides.id ?? "tx-1",
    userId: "user-1",
    date: overrides.date ?? "2025-03-15",
    amount: overrides.amount ?? -50,
    category: overrides.category ?? "food",
  };
}

describe("summarizeSpending", () => {
  test("returns zeroed result for empty transactions", () => {
    const result = summarizeSpending([], MARCH);
    expect(result.totalIncome).toBe(0);
    expect(result.totalExpenses).toBe(0);
    expect(result.netSavings).toBe(0);
    expect(result.categories).toHaveLength(0);
    expect(result.dailyAverage).toBe(0);
  });

  test("separates income and expenses", () => {
    const result = summarizeSpending(
      [
        tx({ id: "1", amount: -600, category: "food" }),
        tx({ id: "2", amount: -200, category: "transport" }),
        tx({ id: "3", amount: 2000, category: "income" }),
      ],
      MARCH,
    );

    expect(result.totalIncome).toBe(2000);
    expect(result.totalExpenses).toBe(800);
    expect(result.netSavings).toBe(1200);
    expect(result.transactionCount).toBe(3);
    // 800 over 31 days
    expect(result.dailyAverage).toBe(25.81);
  });

  test("groups expenses by category with shares", () => {
    const result = summarizeSpending(
      [
        tx({ id: "1", amount: -100, category: "food" }),
        tx({ id: "2", amount: -75, category: "food" }),
        tx({ id: "3", amount: -25, category: "transport" }),
        tx({ id: "4", amount: -25, category: "books" }),
      ],
      MARCH,
    );

    expect(result.categories).toEqual([
      { category: "food", amount: 175, percentage: 77.78, transactionCount: 2 },
      { category: "books", amount: 25, percentage: 11.11, transactionCount: 1 },
      { category: "transport", amount: 25, percentage: 11.11, transactionCount: 1 },
    ]);
  });

  test("leaves out transactions outside the window", () => {
    const result = summarizeSpending(
      [
        tx({ id: "1", amount: -100, date: "2025-02-28" }),
        tx({ id: "2", amount: -40, date: "2025-03-02" }),
      ],
      MARCH,
    );
    expect(result.totalExpenses).toBe(40);
    expect(result.transactionCount).toBe(1);
  });

  test("averages over the days elapsed so far", () => {
    const expenses = [
      tx({ id: "1", amount: -500, date: "2025-03-02" }),
      tx({ id: "2", amount: -300, date: "2025-03-09" }),
    ];

    expect(summarizeSpending(expenses, MARCH, "2025-03-10").dailyAverage).toBe(80);
    expect(summarizeSpending(expenses, MARCH, "2025-04-02").dailyAverage).toBe(25.81);
    expect(summarizeSpending(expenses, MARCH, "2025-02-20").dailyAverage).toBe(25.81);
  });

  test("rejects a malformed as-of date", () => {
    expect(() => summarizeSpending([], MARCH, "10 March")).toThrow(
      "asOf: must be a calendar date in YYYY-MM-DD format",
    );
  });
});
