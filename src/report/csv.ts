// ── CSV Import / Export ─────────────────────────────────────────────
// Transactions in and out of RFC 4180 CSV. Import accepts either signed
// amounts or unsigned amounts with an income/expense `type` column, so a
// file written by `formatTransactionsCsv` imports back unchanged.

import { ValidationError } from "../engine/errors.js";
import { formatAmount } from "../engine/money.js";
import {
  transactionInputSchema,
  type Transaction,
  type TransactionInput,
} from "../engine/model.js";

export interface CsvRowError {
  line: number;
  message: string;
}

export interface CsvImportResult {
  rows: TransactionInput[];
  errors: CsvRowError[];
}

interface CsvRecord {
  line: number;
  fields: string[];
}

const REQUIRED_COLUMNS = ["date", "amount", "category"] as const;
const EXPORT_COLUMNS = ["id", "date", "type", "amount", "category", "note"] as const;

/**
 * Parse a transactions CSV. The header row is required; column names are
 * matched case-insensitively. Rows that fail validation are reported with
 * their line number and left out of `rows`.
 */
export function parseTransactionsCsv(text: string): CsvImportResult {
  const [header, ...records] = parseCsv(text);
  if (!header) {
    throw new ValidationError("CSV is empty");
  }

  const columns = header.fields.map((name) => name.trim().toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((name) => !columns.includes(name));
  if (missing.length > 0) {
    throw new ValidationError(`CSV must have columns: ${REQUIRED_COLUMNS.join(", ")} (missing ${missing.join(", ")})`);
  }

  const rows: TransactionInput[] = [];
  const errors: CsvRowError[] = [];

  for (const record of records) {
    const cell = (name: string): string | undefined => {
      const idx = columns.indexOf(name);
      return idx === -1 ? undefined : record.fields[idx]?.trim();
    };

    const amount = parseAmount(cell("amount") ?? "", cell("type"));
    if (typeof amount === "string") {
      errors.push({ line: record.line, message: amount });
      continue;
    }

    const note = cell("note");
    const parsed = transactionInputSchema.safeParse({
      date: (cell("date") ?? "").slice(0, 10),
      amount,
      category: cell("category") ?? "",
      ...(note ? { note } : {}),
    });

    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      errors.push({
        line: record.line,
        message: ValidationError.fromZod(parsed.error).message,
      });
    }
  }

  return { rows, errors };
}

/** `id,date,type,amount,category,note` with unsigned amounts. */
export function formatTransactionsCsv(transactions: readonly Transaction[]): string {
  const lines = [EXPORT_COLUMNS.join(",")];
  for (const tx of transactions) {
    lines.push(
      [
        tx.id,
        tx.date,
        tx.amount < 0 ? "expense" : "income",
        formatAmount(Math.abs(tx.amount)),
        tx.category,
        tx.note ?? "",
      ]
        .map(escapeField)
        .join(","),
    );
  }
  return lines.join("\n") + "\n";
}

// ── Helpers ─────────────────────────────────────────────────────────

/** Signed amount, or an error message. */
function parseAmount(raw: string, type: string | undefined): number | string {
  const value = Number(raw.replace(/,/g, ""));
  if (raw === "" || !Number.isFinite(value)) {
    return `amount: "${raw}" is not a number`;
  }
  if (!type) return value;

  switch (type.toLowerCase()) {
    case "income":
      return Math.abs(value);
    case "expense":
      return -Math.abs(value);
    default:
      return `type: "${type}" must be income or expense`;
  }
}

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Split CSV text into records. Quoted fields may contain commas, doubled
 * quotes and line breaks. Blank lines are skipped.
 */
export function parseCsv(text: string): CsvRecord[] {
  const records: CsvRecord[] = [];
  const input = text.startsWith("\uFEFF") ? text.slice(1) : text;

  let fields: string[] = [];
  let field = "";
  let quoted = false;
  let line = 1;
  let recordLine = 1;
  let touched = false;

  const endRecord = () => {
    fields.push(field);
    if (touched) records.push({ line: recordLine, fields });
    fields = [];
    field = "";
    touched = false;
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input.charAt(i);

    if (quoted) {
      if (ch === '"') {
        if (input.charAt(i + 1) === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        if (ch === "\n") line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      quoted = true;
      touched = true;
    } else if (ch === ",") {
      fields.push(field);
      field = "";
      touched = true;
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && input.charAt(i + 1) === "\n") i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      field += ch;
      touched = true;
    }
  }

  if (quoted) {
    throw new ValidationError(`CSV has an unterminated quoted field starting on line ${recordLine}`);
  }
  endRecord();
  return records;
}
