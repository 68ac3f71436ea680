import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  checkBudgets,
  healthScore,
  insights,
  loadLedger,
  report,
  spendingSummary,
  spendingTrends,
} from "./dashboard.js";
import { NotFoundError, ValidationError } from "./engine/errors.js";
import { logger } from "./logger.js";
import { closeStore, ensureUser, importTransactions, initStore, setBudget } from "./store/store.js";

let userId: string;

beforeEach(() => {
  logger.configure({ level: "error" });
  initStore(":memory:");
  userId = ensureUser("alice").id;
  importTransactions(userId, [
    { date: "2025-02-01", amount: 2000, category: "salary" },
    { date: "2025-02-10", amount: -600, category: "food" },
    { date: "2025-03-01", amount: 2000, category: "income" },
    { date: "2025-03-05", amount: -600, category: "food" },
    { date: "2025-03-10", amount: -200, category: "transport" },
  ]);
  setBudget(userId, { category: "food", limit: 500, effectiveFrom: "2025-01-01" });
  setBudget(userId, { category: "food", limit: 700, effectiveFrom: "2025-04-01" });
});

afterEach(() => {
  closeStore();
});

const march = { start: "2025-03-01", end: "2025-03-31", mode: "month" as const };

describe("loadLedger", () => {
  test("takes budgets in force at the window's end", () => {
    const ledger = loadLedger({ userId, ...march });
    expect(ledger.transactions).toHaveLength(3);
    expect(ledger.budgets.map((b) => b.limit)).toEqual([500]);
  });

  test("defaults to the month containing today", () => {
    const ledger = loadLedger({ userId, mode: "month", today: "2025-02-14" });
    expect(ledger.window).toEqual({ start: "2025-02-01", end: "2025-02-28" });
    expect(ledger.transactions).toHaveLength(2);
  });

  test("refuses unknown users", () => {
    expect(() => loadLedger({ userId: "ghost", mode: "month" })).toThrow(NotFoundError);
  });
});

describe("period queries", () => {
  test("check budgets for March", () => {
    expect(checkBudgets({ userId, ...march }).alerts).toEqual([
      { userId, category: "food", period: "monthly", spent: 600, limit: 500, overBy: 100 },
    ]);
  });

  test("reports where each limit stands beside the alerts", () => {
    expect(checkBudgets({ userId, ...march })).toEqual({
      window: { start: "2025-03-01", end: "2025-03-31" },
      alerts: [
        { userId, category: "food", period: "monthly", spent: 600, limit: 500, overBy: 100 },
      ],
      budgets: [
        { category: "food", period: "monthly", spent: 600, limit: 500, remaining: 0, percentUsed: 120 },
      ],
    });
  });

  test("averages the current month's spending over the days so far", () => {
    const summary = spendingSummary({ userId, mode: "month", today: "2025-03-10" });

    expect(summary.window).toEqual({ start: "2025-03-01", end: "2025-03-31" });
    expect(summary.dailyAverage).toBe(80);
    expect(report({ userId, mode: "month", today: "2025-03-10" }).summary.dailyAverage).toBe(80);
  });

  test("a later limit increase does not clear an earlier alert", () => {
    const april = checkBudgets({ userId, start: "2025-03-01", end: "2025-04-30", mode: "month" });
    // 600 spent against the 700 limit in force on 30 April
    expect(april.alerts).toEqual([]);
    expect(checkBudgets({ userId, ...march }).alerts).toHaveLength(1);
  });

  test("score, insights, summary and report agree", () => {
    expect(healthScore({ userId, ...march }).value).toBe(68);
    expect(insights({ userId, ...march }).insights[0]).toBe(
      "Spending on food is 100.00 over its monthly budget (600.00 of 500.00). Cut back on food for the rest of the period.",
    );
    expect(spendingSummary({ userId, ...march }).totalExpenses).toBe(800);
    expect(report({ userId, ...march }).score.value).toBe(68);
  });
});

describe("spendingTrends", () => {
  test("builds monthly series ending with today's month", () => {
    const trends = spendingTrends(userId, 3, "2025-03-20");

    expect(trends.months).toEqual(["2025-01", "2025-02", "2025-03"]);
    expect(trends.monthlyExpenses.dataPoints).toEqual([
      { period: "2025-02", amount: 600 },
      { period: "2025-03", amount: 800 },
    ]);
    expect(trends.cumulativeSavings.at(-1)).toEqual({ period: "2025-03-10", amount: 2600 });
    expect(trends.scoreHistory.map((p) => p.value)).toEqual([50, 74, 68]);
    expect(trends.weekdayExpenses.filter((p) => p.amount > 0)).toEqual([
      { weekday: "Monday", amount: 800 },
      { weekday: "Wednesday", amount: 600 },
    ]);
  });

  test("carries savings from before the first month into the running total", () => {
    const trends = spendingTrends(userId, 1, "2025-03-20");

    expect(trends.months).toEqual(["2025-03"]);
    expect(trends.cumulativeSavings).toEqual([
      { period: "2025-03-01", amount: 3400 },
      { period: "2025-03-05", amount: 2800 },
      { period: "2025-03-10", amount: 2600 },
    ]);
  });

  test("rejects a silly month count", () => {
    expect(() => spendingTrends(userId, 0)).toThrow(ValidationError);
  });
});
