// ── Budget Alerts ───────────────────────────────────────────────────
// Compares expense totals per category against the configured limits
// and reports every category whose spend went past its cap.

import { fromCents, toCents } from "./money.js";
import {
  canonicalOrder,
  isExpense,
  validateEvaluationInput,
  type BudgetConfig,
  type BudgetPeriod,
  type Transaction,
} from "./model.js";
import { filterToWindow, type DateWindow } from "./window.js";

export interface Alert {
  userId: string;
  category: string;
  period: BudgetPeriod;
  spent: number;
  limit: number;
  overBy: number;
}

/**
 * Every budgeted category whose expenses within `window` exceed its limit.
 *
 * Spend exactly at the limit is within budget. Categories with no budget
 * are never flagged. Sorted by `overBy` descending, then category name.
 */
export function evaluateBudgets(
  transactions: readonly Transaction[],
  budgets: readonly BudgetConfig[],
  window: DateWindow,
): Alert[] {
  const validWindow = validateEvaluationInput(transactions, budgets, window);
  return collectAlerts(filterToWindow(transactions, validWindow), budgets);
}

/** How far into its limit each budget is, within or over. */
export interface BudgetStatus {
  category: string;
  period: BudgetPeriod;
  spent: number;
  limit: number;
  /** Zero once the limit is reached. */
  remaining: number;
  /** Whole percent of the limit spent; above 100 when over. */
  percentUsed: number;
}

/** Usage of every configured budget within `window`, sorted by category. */
export function budgetStatus(
  transactions: readonly Transaction[],
  budgets: readonly BudgetConfig[],
  window: DateWindow,
): BudgetStatus[] {
  const validWindow = validateEvaluationInput(transactions, budgets, window);
  const spent = expenseCentsByCategory(filterToWindow(transactions, validWindow));

  return budgets
    .map((budget) => {
      const spentCents = spent.get(budget.category) ?? 0;
      const limitCents = toCents(budget.limit);
      return {
        category: budget.category,
        period: budget.period,
        spent: fromCents(spentCents),
        limit: fromCents(limitCents),
        remaining: fromCents(Math.max(0, limitCents - spentCents)),
        percentUsed: Math.round((spentCents * 100) / limitCents),
      };
    })
    .sort((a, b) => (a.category < b.category ? -1 : a.category > b.category ? 1 : 0));
}

/** Alerts over transactions that are already validated and windowed. */
export function collectAlerts(
  windowed: readonly Transaction[],
  budgets: readonly BudgetConfig[],
): Alert[] {
  const spent = expenseCentsByCategory(windowed);
  const alerts: { alert: Alert; overCents: number }[] = [];

  for (const budget of budgets) {
    const spentCents = spent.get(budget.category) ?? 0;
    const limitCents = toCents(budget.limit);
    if (spentCents <= limitCents) continue;

    alerts.push({
      overCents: spentCents - limitCents,
      alert: {
        userId: budget.userId,
        category: budget.category,
        period: budget.period,
        spent: fromCents(spentCents),
        limit: fromCents(limitCents),
        overBy: fromCents(spentCents - limitCents),
      },
    });
  }

  alerts.sort(
    (a, b) =>
      b.overCents - a.overCents ||
      (a.alert.category < b.alert.category ? -1 : a.alert.category > b.alert.category ? 1 : 0),
  );
  return alerts.map((entry) => entry.alert);
}

/** Absolute expense total per category, in cents. */
export function expenseCentsByCategory(
  transactions: readonly Transaction[],
): Map<string, number> {
  const totals = new Map<string, number>();
  for (const tx of canonicalOrder(transactions)) {
    if (!isExpense(tx)) continue;
    totals.set(tx.category, (totals.get(tx.category) ?? 0) + toCents(Math.abs(tx.amount)));
  }
  return totals;
}
