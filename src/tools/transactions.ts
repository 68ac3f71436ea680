import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { resolveWindow, todayIso } from "../engine/window.js";
import { formatTransactionsCsv, parseTransactionsCsv } from "../report/csv.js";
import {
  addTransaction,
  deleteTransaction,
  fetchTransactions,
  importTransactions,
  requireUser,
} from "../store/store.js";
import { periodParams, runTool, userIdParam, type ToolContext } from "./result.js";

export function registerTransactionTools(server: McpServer, context: ToolContext) {
  server.registerTool(
    "add_transaction",
    {
      description:
        "Record one income or expense. Use a negative amount for an expense and a positive amount for income. Returns the stored transaction with its id.",
      inputSchema: {
        userId: userIdParam,
        date: z.string().describe("Transaction date in YYYY-MM-DD format."),
        amount: z
          .number()
          .describe("Signed amount: negative for an expense (e.g. -42.50), positive for income."),
        category: z.string().describe("Category label, e.g. 'Food' or 'Salary'."),
        note: z.string().optional().describe("Optional free-text note."),
      },
    },
    ({ userId, date, amount, category, note }) =>
      runTool("add_transaction", () =>
        addTransaction(userId, { date, amount, category, ...(note ? { note } : {}) })
      )
  );

  server.registerTool(
    "get_transactions",
    {
      description:
        "List a user's transactions within a date window, oldest first. Use this to browse recent spending or to check what was imported.",
      inputSchema: periodParams,
      annotations: { readOnlyHint: true },
    },
    ({ userId, startDate, endDate }) =>
      runTool("get_transactions", () => {
        requireUser(userId);
        const window = resolveWindow(
          { start: startDate, end: endDate },
          todayIso(),
          context.defaultWindow
        );
        return { window, transactions: fetchTransactions(userId, window) };
      })
  );

  server.registerTool(
    "delete_transaction",
    {
      description: "Delete one of the user's transactions by id.",
      inputSchema: {
        userId: userIdParam,
        transactionId: z.string().describe("Id of the transaction to delete."),
      },
      annotations: { destructiveHint: true },
    },
    ({ userId, transactionId }) =>
      runTool("delete_transaction", () => ({
        deleted: deleteTransaction(userId, transactionId),
      }))
  );

  server.registerTool(
    "import_transactions_csv",
    {
      description:
        "Import transactions from CSV text. Requires a header row with date, amount and category columns; optional type (income/expense) and note columns. Valid rows are stored; invalid rows are reported by line number.",
      inputSchema: {
        userId: userIdParam,
        csv: z.string().describe("The CSV file contents, header row included."),
      },
    },
    ({ userId, csv }) =>
      runTool("import_transactions_csv", () => {
        const { rows, errors } = parseTransactionsCsv(csv);
        const stored = importTransactions(userId, rows);
        return { imported: stored.length, errors };
      })
  );

  server.registerTool(
    "export_transactions_csv",
    {
      description:
        "Export a user's transactions as CSV (id, date, type, amount, category, note). Omit both dates to export the whole ledger.",
      inputSchema: periodParams,
      annotations: { readOnlyHint: true },
    },
    ({ userId, startDate, endDate }) =>
      runTool("export_transactions_csv", () => {
        requireUser(userId);
        const window =
          startDate || endDate
            ? resolveWindow({ start: startDate, end: endDate }, todayIso(), context.defaultWindow)
            : undefined;
        return formatTransactionsCsv(fetchTransactions(userId, window));
      })
  );
}
