// ── Trends ──────────────────────────────────────────────────────────
// Chart series derived from a transaction history: expenses per month,
// running savings, and the health score recomputed month by month.
// Nothing is stored; every series is rebuilt on demand.

import { computeHealthScore } from "./health.js";
import { fromCents, toCents } from "./money.js";
import { isExpense, type BudgetConfig, type Transaction } from "./model.js";
import { monthOf, monthWindow } from "./window.js";

export interface TrendPoint {
  period: string; // "YYYY-MM" or "YYYY-MM-DD"
  amount: number;
}

export interface ExpenseTrend {
  direction: "increasing" | "decreasing" | "stable";
  changePercent: number;
  dataPoints: TrendPoint[];
}

export type Weekday =
  | "Monday"
  | "Tuesday"
  | "Wednesday"
  | "Thursday"
  | "Friday"
  | "Saturday"
  | "Sunday";

export interface WeekdayPoint {
  weekday: Weekday;
  amount: number;
}

export interface ScorePoint {
  month: string; // "YYYY-MM"
  value: number;
}

/** Expense total per calendar month, oldest first. */
export function monthlyExpenseSeries(transactions: readonly Transaction[]): TrendPoint[] {
  const months = new Map<string, number>();
  for (const tx of transactions) {
    if (!isExpense(tx)) continue;
    const month = monthOf(tx.date);
    months.set(month, (months.get(month) ?? 0) + toCents(Math.abs(tx.amount)));
  }
  return toSeries(months);
}

/**
 * Running net (income minus expenses) at the end of each date with
 * activity, starting from `opening`, the net of everything earlier.
 */
export function cumulativeSavingsSeries(
  transactions: readonly Transaction[],
  opening = 0,
): TrendPoint[] {
  const daily = new Map<string, number>();
  for (const tx of transactions) {
    daily.set(tx.date, (daily.get(tx.date) ?? 0) + toCents(tx.amount));
  }

  let running = toCents(opening);
  return toSeries(daily).map((point) => {
    running += toCents(point.amount);
    return { period: point.period, amount: fromCents(running) };
  });
}

const WEEKDAYS: readonly Weekday[] = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
];

/** Expense total per day of the week, Monday first. Days without spending are 0. */
export function weekdayExpenseSeries(transactions: readonly Transaction[]): WeekdayPoint[] {
  const cents = WEEKDAYS.map(() => 0);
  for (const tx of transactions) {
    if (!isExpense(tx)) continue;
    // getUTCDay() is 0 for Sunday
    const index = (new Date(`${tx.date}T00:00:00Z`).getUTCDay() + 6) % 7;
    cents[index] = (cents[index] ?? 0) + toCents(Math.abs(tx.amount));
  }
  return WEEKDAYS.map((weekday, i) => ({ weekday, amount: fromCents(cents[i] ?? 0) }));
}

/**
 * Direction of a monthly series from its least-squares slope. Changes
 * under `stableThreshold` percent of the first fitted value are "stable".
 */
export function expenseTrend(
  dataPoints: TrendPoint[],
  stableThreshold = 5,
): ExpenseTrend {
  const n = dataPoints.length;
  if (n < 2) return { direction: "stable", changePercent: 0, dataPoints };

  const xs = dataPoints.map((_, i) => i);
  const ys = dataPoints.map((dp) => dp.amount);
  const slope = linearRegressionSlope(xs, ys);

  // fitted_first = intercept, fitted_last = intercept + slope*(n-1)
  const meanY = ys.reduce((s, v) => s + v, 0) / n;
  const firstFitted = meanY - slope * ((n - 1) / 2);
  const totalChange = slope * (n - 1);
  const changePercent =
    firstFitted !== 0 ? round((totalChange / Math.abs(firstFitted)) * 100) : 0;

  let direction: ExpenseTrend["direction"];
  if (Math.abs(changePercent) < stableThreshold) {
    direction = "stable";
  } else if (changePercent > 0) {
    direction = "increasing";
  } else {
    direction = "decreasing";
  }

  return { direction, changePercent, dataPoints };
}

/**
 * One health score per month. `budgetsAt` supplies the budgets that were
 * in force on a given date, so a limit changed later does not re-judge an
 * earlier month.
 */
export function scoreHistory(
  transactions: readonly Transaction[],
  budgetsAt: (date: string) => readonly BudgetConfig[],
  months: readonly string[],
): ScorePoint[] {
  return months.map((month) => {
    const window = monthWindow(month);
    const score = computeHealthScore(transactions, budgetsAt(window.end), window);
    return { month, value: score.value };
  });
}

// ── Helpers ─────────────────────────────────────────────────────────

function toSeries(cents: Map<string, number>): TrendPoint[] {
  return [...cents.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([period, amount]) => ({ period, amount: fromCents(amount) }));
}

/**
 * Ordinary least-squares slope for paired (x, y) arrays.
 * Returns 0 when input is empty or has no variance.
 */
function linearRegressionSlope(xs: number[], ys: number[]): number {
  const n = xs.length;
  if (n < 2) return 0;

  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumXX = 0;

  for (let i = 0; i < n; i++) {
    const x = xs[i] ?? 0;
    const y = ys[i] ?? 0;
    sumX += x;
    sumY += y;
    sumXY += x * y;
    sumXX += x * x;
  }

  const denominator = n * sumXX - sumX * sumX;
  if (denominator === 0) return 0;

  return (n * sumXY - sumX * sumY) / denominator;
}

function round(n: number): number {
  return Math.round(n * 100) / 100;
}
