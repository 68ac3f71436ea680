// ── Spending Summary ────────────────────────────────────────────────
// Pure functions that compute income, expense and per-category totals
// for one window. Feeds the dashboard metrics and the report snapshot.

import { expenseCentsByCategory } from "./budgets.js";
import { ValidationError } from "./errors.js";
import { fromCents, toCents } from "./money.js";
import {
  isExpense,
  validateEvaluationInput,
  type Transaction,
} from "./model.js";
import { daysInWindow, filterToWindow, isIsoDate, type DateWindow } from "./window.js";

export interface CategoryBreakdown {
  category: string;
  amount: number;
  percentage: number;
  transactionCount: number;
}

export interface SpendingSummary {
  window: DateWindow;
  totalIncome: number;
  totalExpenses: number;
  netSavings: number;
  categories: CategoryBreakdown[];
  /**
   * Expenses divided by the window's elapsed days, spending or not. Days
   * after `asOf` are not counted.
   */
  dailyAverage: number;
  transactionCount: number;
}

/**
 * Summarise the transactions inside `window`.
 *
 * Expenses are transactions with `amount < 0`, income those with
 * `amount > 0`. Categories are sorted by amount descending, then name.
 * With `asOf` inside the window, the daily average runs up to that day.
 */
export function summarizeSpending(
  transactions: readonly Transaction[],
  window: DateWindow,
  asOf?: string,
): SpendingSummary {
  const validWindow = validateEvaluationInput(transactions, [], window);
  if (asOf !== undefined && !isIsoDate(asOf)) {
    throw new ValidationError("asOf: must be a calendar date in YYYY-MM-DD format");
  }
  const windowed = filterToWindow(transactions, validWindow);

  let incomeCents = 0;
  let expenseCents = 0;
  const counts = new Map<string, number>();

  for (const tx of windowed) {
    if (isExpense(tx)) {
      expenseCents += toCents(Math.abs(tx.amount));
      counts.set(tx.category, (counts.get(tx.category) ?? 0) + 1);
    } else {
      incomeCents += toCents(tx.amount);
    }
  }

  const categories: CategoryBreakdown[] = [];
  for (const [category, cents] of expenseCentsByCategory(windowed)) {
    categories.push({
      category,
      amount: fromCents(cents),
      percentage: expenseCents > 0 ? round((cents / expenseCents) * 100) : 0,
      transactionCount: counts.get(category) ?? 0,
    });
  }
  categories.sort(
    (a, b) =>
      b.amount - a.amount ||
      (a.category < b.category ? -1 : a.category > b.category ? 1 : 0),
  );

  return {
    window: validWindow,
    totalIncome: fromCents(incomeCents),
    totalExpenses: fromCents(expenseCents),
    netSavings: fromCents(incomeCents - expenseCents),
    categories,
    dailyAverage: round(fromCents(expenseCents) / elapsedDays(validWindow, asOf)),
    transactionCount: windowed.length,
  };
}

function elapsedDays(window: DateWindow, asOf: string | undefined): number {
  if (asOf === undefined || asOf < window.start || asOf >= window.end) {
    return daysInWindow(window);
  }
  return daysInWindow({ start: window.start, end: asOf });
}

function round(n: number): number {
  return Math.round(n * 100) / 100;
}
