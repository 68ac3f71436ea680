// ── Ledger Model ────────────────────────────────────────────────────
// The records the engine reads, and the contract checks it applies
// before touching them.

import { z } from "zod";
import { ValidationError } from "./errors.js";
import { hasCentPrecision } from "./money.js";
import { isoDateSchema, validateWindow, type DateWindow } from "./window.js";

export interface Transaction {
  id: string;
  userId: string;
  date: string; // "YYYY-MM-DD"
  amount: number; // negative = expense, positive = income
  category: string;
  note?: string;
}

export type BudgetPeriod = "monthly";

export const BUDGET_PERIODS: readonly BudgetPeriod[] = ["monthly"];

export interface BudgetConfig {
  userId: string;
  category: string;
  period: BudgetPeriod;
  /** Positive spending cap for the period. */
  limit: number;
  /** Date this limit took effect. Set by the store; ignored by the engine. */
  effectiveFrom?: string;
}

export const amountSchema = z
  .number()
  .finite()
  .refine((amount) => amount !== 0, "must not be zero")
  .refine(hasCentPrecision, "must not have more than two decimal places");

export const limitSchema = z
  .number()
  .finite()
  .positive()
  .refine(hasCentPrecision, "must not have more than two decimal places");

export const categorySchema = z
  .string()
  .refine((category) => category.trim().length > 0, "must not be empty");

export const transactionSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  date: isoDateSchema,
  amount: amountSchema,
  category: categorySchema,
  note: z.string().optional(),
});

/** A transaction as entered or imported, before the store assigns ids. */
export const transactionInputSchema = z.object({
  date: isoDateSchema,
  amount: amountSchema,
  category: categorySchema,
  note: z.string().max(500).optional(),
});

export type TransactionInput = z.infer<typeof transactionInputSchema>;

export const budgetConfigSchema = z.object({
  userId: z.string().min(1),
  category: categorySchema,
  period: z.enum(["monthly"]),
  limit: limitSchema,
  effectiveFrom: isoDateSchema.optional(),
});

export function budgetKey(category: string, period: BudgetPeriod): string {
  return `${period}:${category}`;
}

/**
 * Check everything an evaluation reads. Returns the window as validated;
 * the transaction and budget arrays are never modified.
 */
export function validateEvaluationInput(
  transactions: readonly Transaction[],
  budgets: readonly BudgetConfig[],
  window: DateWindow,
): DateWindow {
  const validWindow = validateWindow(window);

  transactions.forEach((tx, i) => {
    const parsed = transactionSchema.safeParse(tx);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, `transactions.${i}`);
    }
  });

  const keys = new Set<string>();
  budgets.forEach((budget, i) => {
    const parsed = budgetConfigSchema.safeParse(budget);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, `budgets.${i}`);
    }
    const key = budgetKey(budget.category, budget.period);
    if (keys.has(key)) {
      throw new ValidationError(
        `budgets.${i}: duplicate ${budget.period} budget for category "${budget.category}"`,
      );
    }
    keys.add(key);
  });

  const users = new Set<string>();
  for (const tx of transactions) users.add(tx.userId);
  for (const budget of budgets) users.add(budget.userId);
  if (users.size > 1) {
    throw new ValidationError(
      `transactions and budgets must belong to one user, found ${users.size}`,
    );
  }

  return validWindow;
}

/**
 * A stable ordering of transactions, so aggregates come out bit-identical
 * however the caller ordered its input.
 */
export function canonicalOrder(transactions: readonly Transaction[]): Transaction[] {
  return [...transactions].sort(
    (a, b) =>
      compare(a.date, b.date) ||
      compare(a.category, b.category) ||
      a.amount - b.amount ||
      compare(a.id, b.id),
  );
}

export function isExpense(tx: Transaction): boolean {
  return tx.amount < 0;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
