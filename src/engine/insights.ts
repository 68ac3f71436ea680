// ── Insights ────────────────────────────────────────────────────────
// Turns alerts and a health score into short, ordered, human-readable
// tips for the dashboard.

import type { Alert } from "./budgets.js";
import { FACTOR_ORDER, type FactorName, type HealthScore } from "./health.js";
import { formatAmount } from "./money.js";

/**
 * One tip per alert (largest overspend first), followed by one tip for
 * the factor dragging the score down the most.
 */
export function generateInsights(
  alerts: readonly Alert[],
  score: HealthScore,
): string[] {
  const ordered = [...alerts].sort(
    (a, b) =>
      b.overBy - a.overBy ||
      (a.category < b.category ? -1 : a.category > b.category ? 1 : 0),
  );

  const tips = ordered.map(
    (alert) =>
      `Spending on ${alert.category} is ${formatAmount(alert.overBy)} over its ${alert.period} ` +
      `budget (${formatAmount(alert.spent)} of ${formatAmount(alert.limit)}). ` +
      `Cut back on ${alert.category} for the rest of the period.`,
  );

  if (score.transactionCount === 0) {
    tips.push(
      "No transactions in this period yet. Log your income and expenses to get a health score.",
    );
    return tips;
  }

  const weakest = weakestFactor(score);
  tips.push(FACTOR_TIPS[weakest](score.factors[weakest].raw));
  return tips;
}

/** The factor with the lowest contribution; earlier factors win ties. */
export function weakestFactor(score: HealthScore): FactorName {
  let weakest: FactorName = "savingsRate";
  for (const name of FACTOR_ORDER) {
    if (score.factors[name].contribution < score.factors[weakest].contribution) {
      weakest = name;
    }
  }
  return weakest;
}

const FACTOR_TIPS: Record<FactorName, (raw: number) => string> = {
  savingsRate: (raw) =>
    `Your savings rate is ${percent(raw)}%. Trim discretionary spending or add income to keep more of what you earn.`,
  budgetAdherence: (raw) =>
    `You stayed within budget in ${percent(raw)}% of your budgeted categories. Review the limits you keep exceeding.`,
  expenseVolatility: () =>
    "Your daily spending swings widely. Spreading out large purchases makes the month easier to plan.",
  categoryDiversity: (raw) =>
    `Your largest category takes ${percent(1 - raw)}% of your spending. Look there first for savings.`,
};

function percent(ratio: number): number {
  return Math.round(ratio * 100);
}
