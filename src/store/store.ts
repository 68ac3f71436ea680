import sqlite3 from "node-sqlite3-wasm";
import crypto from "node:crypto";
import { z } from "zod";
import { NotFoundError, ValidationError } from "../engine/errors.js";
import { fromCents, toCents } from "../engine/money.js";
import {
  categorySchema,
  limitSchema,
  transactionInputSchema,
  type BudgetConfig,
  type Transaction,
  type TransactionInput,
} from "../engine/model.js";
import { isoDateSchema, todayIso, validateWindow, type DateWindow } from "../engine/window.js";
import { logger } from "../logger.js";

// ── Types ───────────────────────────────────────────────────────────────────

export interface User {
  id: string;
  username: string;
  displayName: string;
  createdAt: string;
}

export const budgetInputSchema = z.object({
  category: categorySchema,
  limit: limitSchema,
  period: z.enum(["monthly"]).default("monthly"),
  effectiveFrom: isoDateSchema.optional(),
});

export type BudgetInput = z.input<typeof budgetInputSchema>;

const usernameSchema = z
  .string()
  .trim()
  .min(1, "must not be empty")
  .max(64, "must be at most 64 characters");

// Rows come back as loosely typed records; each is checked on the way out.

const userRowSchema = z.object({
  id: z.string(),
  username: z.string(),
  display_name: z.string(),
  created_at: z.string(),
});

const transactionRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  date: z.string(),
  amount_cents: z.number().int(),
  category: z.string(),
  note: z.string().nullable(),
});

const budgetRowSchema = z.object({
  user_id: z.string(),
  category: z.string(),
  period: z.enum(["monthly"]),
  limit_cents: z.number().int(),
  effective_from: z.string(),
});

const categoryRowSchema = z.object({ category: z.string() });
const totalRowSchema = z.object({ total: z.number() });

type UserRow = z.infer<typeof userRowSchema>;
type TransactionRow = z.infer<typeof transactionRowSchema>;
type BudgetRow = z.infer<typeof budgetRowSchema>;

// ── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_CATEGORIES = [
  "Food",
  "Rent",
  "Transport",
  "Entertainment",
  "Utilities",
  "Shopping",
  "Health",
  "Other",
] as const;

const log = logger.child({ component: "store" });

// ── Database singleton ──────────────────────────────────────────────────────

type Database = InstanceType<typeof sqlite3.Database>;

let db: Database | null = null;

export function initStore(dbPath = "finance.db"): void {
  closeStore();
  db = new sqlite3.Database(dbPath);
  db.exec("PRAGMA foreign_keys = ON");

  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      username TEXT UNIQUE NOT NULL,
      display_name TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL REFERENCES users(id),
      date TEXT NOT NULL,
      amount_cents INTEGER NOT NULL CHECK(amount_cents != 0),
      category TEXT NOT NULL,
      note TEXT,
      created_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_transactions_user_date ON transactions(user_id, date)
  `);

  // One row per revision: a limit change is a new row effective from its date.
  db.exec(`
    CREATE TABLE IF NOT EXISTS budgets (
      user_id TEXT NOT NULL REFERENCES users(id),
      category TEXT NOT NULL,
      period TEXT NOT NULL CHECK(period IN ('monthly')),
      limit_cents INTEGER NOT NULL CHECK(limit_cents > 0),
      effective_from TEXT NOT NULL,
      created_at TEXT NOT NULL,
      PRIMARY KEY (user_id, category, period, effective_from)
    )
  `);

  log.debug("store initialised", { dbPath });
}

export function closeStore(): void {
  if (db) {
    db.close();
    db = null;
  }
}

function getDb(): Database {
  if (!db) {
    throw new Error("Store not initialized. Call initStore() first.");
  }
  return db;
}

/** Run `work` inside BEGIN/COMMIT, rolling back if it throws. */
function inTransaction<T>(work: (store: Database) => T): T {
  const store = getDb();
  store.exec("BEGIN");
  try {
    const result = work(store);
    store.exec("COMMIT");
    return result;
  } catch (error) {
    store.exec("ROLLBACK");
    throw error;
  }
}

// ── Users ───────────────────────────────────────────────────────────────────

/**
 * Look a user up by username, creating them on first sight. This is the
 * whole of "login": the returned id is what every other call takes.
 */
export function ensureUser(username: string, displayName?: string): User {
  const parsed = usernameSchema.safeParse(username);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error, "username");

  const store = getDb();
  const name = parsed.data;

  const inserted = store.run(
    `INSERT OR IGNORE INTO users (id, username, display_name, created_at) VALUES (?, ?, ?, ?)`,
    [crypto.randomUUID(), name, displayName?.trim() || name, new Date().toISOString()]
  );

  const row = store.get("SELECT * FROM users WHERE username = ?", [name]);
  if (!row) throw new Error(`User ${name} vanished after insert`);
  const user = toUser(userRowSchema.parse(row));

  if (inserted.changes > 0) log.info("user created", { userId: user.id });
  return user;
}

export function getUser(userId: string): User | null {
  const row = getDb().get("SELECT * FROM users WHERE id = ?", [userId]);
  return row ? toUser(userRowSchema.parse(row)) : null;
}

export function requireUser(userId: string): User {
  const user = getUser(userId);
  if (!user) throw new NotFoundError(`Unknown user: ${userId}`);
  return user;
}

// ── Transactions ────────────────────────────────────────────────────────────

export function addTransaction(userId: string, input: TransactionInput): Transaction {
  return importTransactions(userId, [input])[0] ?? fail("insert returned nothing");
}

/**
 * Store a batch of transactions atomically. Every row is validated first;
 * a single bad row rejects the whole batch.
 */
export function importTransactions(
  userId: string,
  inputs: readonly TransactionInput[],
): Transaction[] {
  requireUser(userId);

  const issues: string[] = [];
  const valid: TransactionInput[] = [];
  inputs.forEach((input, i) => {
    const parsed = transactionInputSchema.safeParse(input);
    if (parsed.success) valid.push(parsed.data);
    else issues.push(...ValidationError.fromZod(parsed.error, `transactions.${i}`).issues);
  });
  if (issues.length > 0) throw new ValidationError(issues);

  const stored = inTransaction((store) => {
    const now = new Date().toISOString();
    return valid.map((row) => {
      const tx: Transaction = {
        id: crypto.randomUUID(),
        userId,
        date: row.date,
        amount: fromCents(toCents(row.amount)),
        category: row.category.trim(),
        ...(row.note ? { note: row.note } : {}),
      };
      store.run(
        `INSERT INTO transactions (id, user_id, date, amount_cents, category, note, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [tx.id, userId, tx.date, toCents(tx.amount), tx.category, tx.note ?? null, now]
      );
      return tx;
    });
  });

  log.info("transactions stored", { userId, count: stored.length });
  return stored;
}

/** The user's transactions, oldest first; only those inside `window` when given. */
export function fetchTransactions(userId: string, window?: DateWindow): Transaction[] {
  const store = getDb();

  if (!window) {
    return store
      .all(
        `SELECT id, user_id, date, amount_cents, category, note FROM transactions
         WHERE user_id = ? ORDER BY date ASC, created_at ASC, id ASC`,
        [userId]
      )
      .map((row) => toTransaction(transactionRowSchema.parse(row)));
  }

  const { start, end } = validateWindow(window);
  return store
    .all(
      `SELECT id, user_id, date, amount_cents, category, note FROM transactions
       WHERE user_id = ? AND date >= ? AND date <= ?
       ORDER BY date ASC, created_at ASC, id ASC`,
      [userId, start, end]
    )
    .map((row) => toTransaction(transactionRowSchema.parse(row)));
}

/** Net of every transaction dated before `date`: income minus expenses. */
export function netBalanceBefore(userId: string, date: string): number {
  const parsed = isoDateSchema.safeParse(date);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error, "date");

  const row = getDb().get(
    `SELECT COALESCE(SUM(amount_cents), 0) AS total FROM transactions
     WHERE user_id = ? AND date < ?`,
    [userId, date]
  );
  return fromCents(totalRowSchema.parse(row).total);
}

export function deleteTransaction(userId: string, transactionId: string): boolean {
  const result = getDb().run("DELETE FROM transactions WHERE id = ? AND user_id = ?", [
    transactionId,
    userId,
  ]);
  return result.changes > 0;
}

// ── Budgets ─────────────────────────────────────────────────────────────────

/**
 * Record a budget limit effective from `effectiveFrom` (today by default).
 * Earlier periods keep the limit that applied to them.
 */
export function setBudget(userId: string, input: BudgetInput): BudgetConfig {
  requireUser(userId);

  const parsed = budgetInputSchema.safeParse(input);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error, "budget");
  const { category, limit, period } = parsed.data;
  const effectiveFrom = parsed.data.effectiveFrom ?? todayIso();

  getDb().run(
    `INSERT INTO budgets (user_id, category, period, limit_cents, effective_from, created_at)
     VALUES (?, ?, ?, ?, ?, ?)
     ON CONFLICT (user_id, category, period, effective_from)
     DO UPDATE SET limit_cents = excluded.limit_cents, created_at = excluded.created_at`,
    [userId, category.trim(), period, toCents(limit), effectiveFrom, new Date().toISOString()]
  );

  log.info("budget set", { userId, category, period, effectiveFrom });
  return { userId, category: category.trim(), period, limit: fromCents(toCents(limit)), effectiveFrom };
}

/** Per (category, period), the newest budget revision in force on `asOf`. */
export function fetchBudgets(userId: string, asOf: string = todayIso()): BudgetConfig[] {
  const date = isoDateSchema.safeParse(asOf);
  if (!date.success) throw ValidationError.fromZod(date.error, "asOf");

  return getDb()
    .all(
      `SELECT b.user_id, b.category, b.period, b.limit_cents, b.effective_from
       FROM budgets b
       WHERE b.user_id = ?
         AND b.effective_from = (
           SELECT MAX(r.effective_from) FROM budgets r
           WHERE r.user_id = b.user_id AND r.category = b.category
             AND r.period = b.period AND r.effective_from <= ?
         )
       ORDER BY b.category ASC, b.period ASC`,
      [userId, asOf]
    )
    .map((row) => toBudget(budgetRowSchema.parse(row)));
}

/** Categories the user has used or budgeted, followed by the defaults. */
export function listCategories(userId: string): string[] {
  const rows = getDb()
    .all(
      `SELECT category FROM transactions WHERE user_id = ?
       UNION
       SELECT category FROM budgets WHERE user_id = ?
       ORDER BY category ASC`,
      [userId, userId]
    )
    .map((row) => categoryRowSchema.parse(row));

  const seen = new Set(rows.map((r) => r.category));
  return [...seen, ...DEFAULT_CATEGORIES.filter((c) => !seen.has(c))];
}

// ── Row mapping ─────────────────────────────────────────────────────────────

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    displayName: row.display_name,
    createdAt: row.created_at,
  };
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    userId: row.user_id,
    date: row.date,
    amount: fromCents(row.amount_cents),
    category: row.category,
    ...(row.note !== null ? { note: row.note } : {}),
  };
}

function toBudget(row: BudgetRow): BudgetConfig {
  return {
    userId: row.user_id,
    category: row.category,
    period: row.period,
    limit: fromCents(row.limit_cents),
    effectiveFrom: row.effective_from,
  };
}

function fail(message: string): never {
  throw new Error(message);
}
