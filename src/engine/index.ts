// ── Scoring & Alert Engine ───────────────────────────────────────────
// Barrel export for the engine modules.
// Pure functions only — no store, MCP or HTTP dependencies.

export { ValidationError, NotFoundError } from "./errors.js";

export {
  type Transaction,
  type BudgetConfig,
  type BudgetPeriod,
  BUDGET_PERIODS,
  budgetKey,
  transactionSchema,
  transactionInputSchema,
  type TransactionInput,
  budgetConfigSchema,
  amountSchema,
  categorySchema,
} from "./model.js";

export {
  type DateWindow,
  type WindowMode,
  isIsoDate,
  isoDateSchema,
  validateWindow,
  monthWindow,
  trailingWindow,
  defaultWindow,
  resolveWindow,
  recentMonths,
  todayIso,
} from "./window.js";

export { evaluateBudgets, budgetStatus, type Alert, type BudgetStatus } from "./budgets.js";

export {
  computeHealthScore,
  WEIGHTS,
  FACTOR_ORDER,
  type HealthScore,
  type FactorScore,
  type FactorName,
} from "./health.js";

export { generateInsights, weakestFactor } from "./insights.js";

export {
  summarizeSpending,
  type SpendingSummary,
  type CategoryBreakdown,
} from "./spending.js";

export {
  monthlyExpenseSeries,
  cumulativeSavingsSeries,
  weekdayExpenseSeries,
  expenseTrend,
  scoreHistory,
  type TrendPoint,
  type WeekdayPoint,
  type Weekday,
  type ExpenseTrend,
  type ScorePoint,
} from "./trends.js";
