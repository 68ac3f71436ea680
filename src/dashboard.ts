/**
 * Store-backed queries for the presentation layer.
 *
 * Each call fetches a fresh snapshot of one user's ledger and hands it to
 * the engine. The user is always an explicit argument; there is no
 * "current user" anywhere in the process.
 */

import {
  budgetStatus,
  computeHealthScore,
  cumulativeSavingsSeries,
  evaluateBudgets,
  expenseTrend,
  generateInsights,
  monthlyExpenseSeries,
  monthWindow,
  recentMonths,
  resolveWindow,
  scoreHistory,
  summarizeSpending,
  todayIso,
  ValidationError,
  weekdayExpenseSeries,
  type Alert,
  type BudgetConfig,
  type BudgetStatus,
  type DateWindow,
  type ExpenseTrend,
  type HealthScore,
  type ScorePoint,
  type SpendingSummary,
  type Transaction,
  type TrendPoint,
  type WeekdayPoint,
  type WindowMode,
} from "./engine/index.js";
import { buildReportSnapshot, type ReportSnapshot } from "./report/snapshot.js";
import { fetchBudgets, fetchTransactions, netBalanceBefore, requireUser } from "./store/store.js";

export interface PeriodQuery {
  userId: string;
  start?: string;
  end?: string;
  mode: WindowMode;
  /** Defaults to the current UTC date. */
  today?: string;
}

export interface Ledger {
  window: DateWindow;
  today: string;
  transactions: Transaction[];
  budgets: BudgetConfig[];
}

export interface SpendingTrends {
  months: string[];
  monthlyExpenses: ExpenseTrend;
  cumulativeSavings: TrendPoint[];
  weekdayExpenses: WeekdayPoint[];
  scoreHistory: ScorePoint[];
}

export interface BudgetCheck {
  window: DateWindow;
  alerts: Alert[];
  budgets: BudgetStatus[];
}

/** The window's transactions and the budgets in force on its last day. */
export function loadLedger(query: PeriodQuery): Ledger {
  requireUser(query.userId);
  const today = query.today ?? todayIso();
  const window = resolveWindow(query, today, query.mode);
  return {
    window,
    today,
    transactions: fetchTransactions(query.userId, window),
    budgets: fetchBudgets(query.userId, window.end),
  };
}

/** Alerts for the exceeded limits, and where every limit stands. */
export function checkBudgets(query: PeriodQuery): BudgetCheck {
  const { window, transactions, budgets } = loadLedger(query);
  return {
    window,
    alerts: evaluateBudgets(transactions, budgets, window),
    budgets: budgetStatus(transactions, budgets, window),
  };
}

export function healthScore(query: PeriodQuery): HealthScore {
  const { window, transactions, budgets } = loadLedger(query);
  return computeHealthScore(transactions, budgets, window);
}

export function insights(query: PeriodQuery): { window: DateWindow; insights: string[] } {
  const { window, transactions, budgets } = loadLedger(query);
  const alerts = evaluateBudgets(transactions, budgets, window);
  const score = computeHealthScore(transactions, budgets, window);
  return { window, insights: generateInsights(alerts, score) };
}

export function spendingSummary(query: PeriodQuery): SpendingSummary {
  const { window, today, transactions } = loadLedger(query);
  return summarizeSpending(transactions, window, today);
}

export function report(query: PeriodQuery): ReportSnapshot {
  const { window, today, transactions, budgets } = loadLedger(query);
  return buildReportSnapshot({ userId: query.userId, window, transactions, budgets, asOf: today });
}

/** Chart series over the last `monthCount` calendar months, this one included. */
export function spendingTrends(
  userId: string,
  monthCount: number,
  today: string = todayIso(),
): SpendingTrends {
  if (!Number.isInteger(monthCount) || monthCount < 1 || monthCount > 36) {
    throw new ValidationError(`months: must be an integer from 1 to 36, got ${monthCount}`);
  }
  requireUser(userId);
  const months = recentMonths(today, monthCount);
  const first = months[0] ?? today.slice(0, 7);
  const span: DateWindow = {
    start: monthWindow(first).start,
    end: monthWindow(today.slice(0, 7)).end,
  };
  const transactions = fetchTransactions(userId, span);

  return {
    months,
    monthlyExpenses: expenseTrend(monthlyExpenseSeries(transactions)),
    cumulativeSavings: cumulativeSavingsSeries(transactions, netBalanceBefore(userId, span.start)),
    weekdayExpenses: weekdayExpenseSeries(transactions),
    scoreHistory: scoreHistory(transactions, (date) => fetchBudgets(userId, date), months),
  };
}
