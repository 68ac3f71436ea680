import { Hono, type Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";
import {
  checkBudgets,
  healthScore,
  insights,
  report,
  type PeriodQuery,
} from "../dashboard.js";
import { NotFoundError, ValidationError } from "../engine/errors.js";
import { transactionInputSchema } from "../engine/model.js";
import { resolveWindow, todayIso, type WindowMode } from "../engine/window.js";
import { errorFields, logger } from "../logger.js";
import { formatTransactionsCsv, parseTransactionsCsv } from "../report/csv.js";
import {
  addTransaction,
  budgetInputSchema,
  deleteTransaction,
  ensureUser,
  fetchBudgets,
  fetchTransactions,
  importTransactions,
  requireUser,
  setBudget,
} from "../store/store.js";

export interface ApiOptions {
  defaultWindow: WindowMode;
}

const log = logger.child({ component: "api" });

const signInSchema = z.object({
  username: z.string(),
  displayName: z.string().optional(),
});

/** ValidationError → 400, NotFoundError → 404, anything else → 500. */
export function errorResponse(error: Error, c: Context): Response {
  if (error instanceof HTTPException) return error.getResponse();
  if (error instanceof ValidationError) {
    return c.json({ error: "validation_error", error_description: error.message }, 400);
  }
  if (error instanceof NotFoundError) {
    return c.json({ error: "not_found", error_description: error.message }, 404);
  }
  log.error("unhandled error", { method: c.req.method, path: c.req.path, ...errorFields(error) });
  return c.json({ error: "server_error", error_description: "Internal server error" }, 500);
}

async function readJson<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError("body: must be valid JSON");
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error, "body");
  return parsed.data;
}

/** REST routes under /api/v1/users. */
export function createApiRouter(options: ApiOptions): Hono {
  const users = new Hono();
  users.onError(errorResponse);

  const period = (c: Context, userId: string): PeriodQuery => ({
    userId,
    start: c.req.query("start"),
    end: c.req.query("end"),
    mode: options.defaultWindow,
  });

  users.post("/", async (c) => {
    const { username, displayName } = await readJson(c, signInSchema);
    return c.json(ensureUser(username, displayName));
  });

  // ── Transactions ──

  users.get("/:userId/transactions", (c) => {
    const userId = c.req.param("userId");
    requireUser(userId);
    const window = resolveWindow(
      { start: c.req.query("start"), end: c.req.query("end") },
      todayIso(),
      options.defaultWindow
    );
    return c.json({ window, transactions: fetchTransactions(userId, window) });
  });

  users.post("/:userId/transactions", async (c) => {
    const input = await readJson(c, transactionInputSchema);
    return c.json(addTransaction(c.req.param("userId"), input), 201);
  });

  users.post("/:userId/transactions/import", async (c) => {
    const { rows, errors } = parseTransactionsCsv(await c.req.text());
    const stored = importTransactions(c.req.param("userId"), rows);
    return c.json({ imported: stored.length, errors });
  });

  users.get("/:userId/transactions/export", (c) => {
    const userId = c.req.param("userId");
    requireUser(userId);
    const start = c.req.query("start");
    const end = c.req.query("end");
    const window =
      start || end ? resolveWindow({ start, end }, todayIso(), options.defaultWindow) : undefined;
    return c.body(formatTransactionsCsv(fetchTransactions(userId, window)), 200, {
      "Content-Type": "text/csv; charset=utf-8",
      "Content-Disposition": 'attachment; filename="transactions.csv"',
    });
  });

  users.delete("/:userId/transactions/:id", (c) => {
    const userId = c.req.param("userId");
    const id = c.req.param("id");
    requireUser(userId);
    if (!deleteTransaction(userId, id)) {
      throw new NotFoundError(`Unknown transaction: ${id}`);
    }
    return c.body(null, 204);
  });

  // ── Budgets ──

  users.get("/:userId/budgets", (c) => {
    const userId = c.req.param("userId");
    requireUser(userId);
    return c.json(fetchBudgets(userId, c.req.query("asOf") ?? todayIso()));
  });

  users.put("/:userId/budgets", async (c) => {
    const input = await readJson(c, budgetInputSchema);
    return c.json(setBudget(c.req.param("userId"), input));
  });

  // ── Engine output ──

  users.get("/:userId/alerts", (c) => c.json(checkBudgets(period(c, c.req.param("userId")))));
  users.get("/:userId/score", (c) => c.json(healthScore(period(c, c.req.param("userId")))));
  users.get("/:userId/insights", (c) => c.json(insights(period(c, c.req.param("userId")))));
  users.get("/:userId/report", (c) => c.json(report(period(c, c.req.param("userId")))));

  return users;
}
