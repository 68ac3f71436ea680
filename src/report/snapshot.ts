// ── Report Snapshot ─────────────────────────────────────────────────
// Everything an exporter needs to render one period, as plain data.

import { evaluateBudgets, type Alert } from "../engine/budgets.js";
import { computeHealthScore, type HealthScore } from "../engine/health.js";
import { generateInsights } from "../engine/insights.js";
import type { BudgetConfig, Transaction } from "../engine/model.js";
import { summarizeSpending, type SpendingSummary } from "../engine/spending.js";
import type { DateWindow } from "../engine/window.js";

export interface ReportSnapshot {
  generatedAt: string;
  userId: string;
  window: DateWindow;
  summary: SpendingSummary;
  alerts: Alert[];
  score: HealthScore;
  insights: string[];
}

export interface ReportInput {
  userId: string;
  transactions: readonly Transaction[];
  budgets: readonly BudgetConfig[];
  window: DateWindow;
  /** Last day counted in the daily average. */
  asOf?: string;
  generatedAt?: Date;
}

export function buildReportSnapshot(input: ReportInput): ReportSnapshot {
  const { userId, transactions, budgets, window } = input;

  const alerts = evaluateBudgets(transactions, budgets, window);
  const score = computeHealthScore(transactions, budgets, window);

  return {
    generatedAt: (input.generatedAt ?? new Date()).toISOString(),
    userId,
    window: score.window,
    summary: summarizeSpending(transactions, window, input.asOf),
    alerts,
    score,
    insights: generateInsights(alerts, score),
  };
}
