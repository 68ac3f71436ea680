// ── Financial Health Score ───────────────────────────────────────────
// Computes a composite 0-100 score from four factors: savings rate,
// budget adherence, expense volatility and category diversity. Each
// factor is normalised to [-1, 1] before weighting, and a score of 50
// means "no judgment either way".

import { collectAlerts, expenseCentsByCategory } from "./budgets.js";
import { toCents } from "./money.js";
import {
  canonicalOrder,
  isExpense,
  validateEvaluationInput,
  type BudgetConfig,
  type Transaction,
} from "./model.js";
import { filterToWindow, type DateWindow } from "./window.js";

export type FactorName =
  | "savingsRate"
  | "budgetAdherence"
  | "expenseVolatility"
  | "categoryDiversity";

export interface FactorScore {
  raw: number; // -1..1
  weight: number;
  /** Points this factor moves the score away from 50. */
  contribution: number;
}

export interface HealthScore {
  value: number; // 0-100
  factors: Record<FactorName, FactorScore>;
  window: DateWindow;
  transactionCount: number;
}

// ── Factor weights ──────────────────────────────────────────────────
export const WEIGHTS: Readonly<Record<FactorName, number>> = {
  savingsRate: 40,
  budgetAdherence: 30,
  expenseVolatility: 20,
  categoryDiversity: 10,
};

/** Fixed factor order; also the tie-break wherever factors are ranked. */
export const FACTOR_ORDER: readonly FactorName[] = [
  "savingsRate",
  "budgetAdherence",
  "expenseVolatility",
  "categoryDiversity",
];

const TOTAL_WEIGHT = FACTOR_ORDER.reduce((sum, name) => sum + WEIGHTS[name], 0);

/**
 * Score the transactions that fall inside `window`.
 *
 * With no transactions in the window every factor is reported as 0 and
 * the score is exactly 50.
 */
export function computeHealthScore(
  transactions: readonly Transaction[],
  budgets: readonly BudgetConfig[],
  window: DateWindow,
): HealthScore {
  const validWindow = validateEvaluationInput(transactions, budgets, window);
  const windowed = canonicalOrder(filterToWindow(transactions, validWindow));

  if (windowed.length === 0) {
    return assemble(
      { savingsRate: 0, budgetAdherence: 0, expenseVolatility: 0, categoryDiversity: 0 },
      validWindow,
      0,
    );
  }

  return assemble(
    {
      savingsRate: savingsRate(windowed),
      budgetAdherence: budgetAdherence(windowed, budgets),
      expenseVolatility: expenseVolatility(windowed),
      categoryDiversity: categoryDiversity(windowed),
    },
    validWindow,
    windowed.length,
  );
}

function assemble(
  raw: Record<FactorName, number>,
  window: DateWindow,
  transactionCount: number,
): HealthScore {
  let weighted = 0;
  for (const name of FACTOR_ORDER) weighted += WEIGHTS[name] * raw[name];

  const factor = (name: FactorName): FactorScore => ({
    raw: raw[name],
    weight: WEIGHTS[name],
    contribution: (50 * WEIGHTS[name] * raw[name]) / TOTAL_WEIGHT,
  });

  return {
    value: clamp(Math.round(50 + (50 * weighted) / TOTAL_WEIGHT), 0, 100),
    factors: {
      savingsRate: factor("savingsRate"),
      budgetAdherence: factor("budgetAdherence"),
      expenseVolatility: factor("expenseVolatility"),
      categoryDiversity: factor("categoryDiversity"),
    },
    window,
    transactionCount,
  };
}

// ── Factors ─────────────────────────────────────────────────────────

/**
 * (income - expenses) / income, clamped to [-1, 1].
 * Spending with no income at all is the worst case, -1.
 */
function savingsRate(transactions: Transaction[]): number {
  let income = 0;
  let expenses = 0;
  for (const tx of transactions) {
    if (isExpense(tx)) expenses += toCents(Math.abs(tx.amount));
    else income += toCents(tx.amount);
  }

  if (income === 0) return expenses > 0 ? -1 : 0;
  return clamp((income - expenses) / income, -1, 1);
}

/** Share of budgeted categories that stayed within their limit. */
function budgetAdherence(
  transactions: Transaction[],
  budgets: readonly BudgetConfig[],
): number {
  if (budgets.length === 0) return 1;
  const over = collectAlerts(transactions, budgets).length;
  return 1 - over / budgets.length;
}

/**
 * 1 - coefficient of variation of the daily expense totals, floored at 0.
 * Only days with at least one expense count.
 */
function expenseVolatility(transactions: Transaction[]): number {
  const daily = new Map<string, number>();
  for (const tx of transactions) {
    if (!isExpense(tx)) continue;
    daily.set(tx.date, (daily.get(tx.date) ?? 0) + toCents(Math.abs(tx.amount)));
  }

  const totals = [...daily.values()];
  if (totals.length === 0) return 1;

  const mean = totals.reduce((s, v) => s + v, 0) / totals.length;
  if (mean === 0) return 1;

  const variance = totals.reduce((s, v) => s + (v - mean) ** 2, 0) / totals.length;
  return 1 - Math.min(1, Math.sqrt(variance) / mean);
}

/** 1 - the largest category's share of total spend. */
function categoryDiversity(transactions: Transaction[]): number {
  const byCategory = [...expenseCentsByCategory(transactions).values()];
  const total = byCategory.reduce((s, v) => s + v, 0);
  if (total === 0) return 1;
  return 1 - Math.max(...byCategory) / total;
}

// ── Utility ─────────────────────────────────────────────────────────

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
