// ── Evaluation Windows ──────────────────────────────────────────────
// A window is a closed interval of calendar dates ("YYYY-MM-DD", both ends
// inclusive). Dates are compared as strings, which orders ISO dates
// correctly, and shifted through UTC so no local offset leaks in.

import { z } from "zod";
import { ValidationError } from "./errors.js";

export interface DateWindow {
  start: string;
  end: string;
}

/** How a window is picked when the caller gives no explicit dates. */
export type WindowMode = "month" | "trailing30";

const MS_PER_DAY = 86_400_000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_MONTH = /^(\d{4})-(\d{2})$/;

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

export const isoDateSchema = z
  .string()
  .refine(isIsoDate, "must be a calendar date in YYYY-MM-DD format");

export const windowSchema = z
  .object({ start: isoDateSchema, end: isoDateSchema })
  .refine((w) => w.start <= w.end, {
    message: "start must not be after end",
    path: ["start"],
  });

export function validateWindow(window: DateWindow): DateWindow {
  const parsed = windowSchema.safeParse(window);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error, "window");
  return parsed.data;
}

export function inWindow(date: string, window: DateWindow): boolean {
  return date >= window.start && date <= window.end;
}

export function filterToWindow<T extends { date: string }>(
  items: readonly T[],
  window: DateWindow,
): T[] {
  return items.filter((item) => inWindow(item.date, window));
}

/** Number of calendar days the window spans, both ends included. */
export function daysInWindow(window: DateWindow): number {
  return Math.round((toUtc(window.end) - toUtc(window.start)) / MS_PER_DAY) + 1;
}

export function addDays(date: string, days: number): string {
  return fromUtc(toUtc(date) + days * MS_PER_DAY);
}

export function todayIso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

export function monthOf(date: string): string {
  return date.slice(0, 7);
}

/** The calendar month `"YYYY-MM"` as a window. */
export function monthWindow(month: string): DateWindow {
  const match = ISO_MONTH.exec(month);
  const monthIndex = match ? Number(match[2]) - 1 : -1;
  if (!match || monthIndex < 0 || monthIndex > 11) {
    throw new ValidationError(`month: "${month}" is not in YYYY-MM format`);
  }
  const year = Number(match[1]);
  const lastDay = new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
  return {
    start: `${month}-01`,
    end: `${month}-${String(lastDay).padStart(2, "0")}`,
  };
}

/** The `days` days ending on `today`, inclusive. */
export function trailingWindow(today: string, days = 30): DateWindow {
  if (!Number.isInteger(days) || days < 1) {
    throw new ValidationError(`days: must be a positive integer, got ${days}`);
  }
  validateWindow({ start: today, end: today });
  return { start: addDays(today, -(days - 1)), end: today };
}

export function defaultWindow(today: string, mode: WindowMode): DateWindow {
  return mode === "month" ? monthWindow(monthOf(today)) : trailingWindow(today);
}

/**
 * Pick the evaluation window from optional caller-supplied bounds.
 * A lone `start` runs to today; a lone `end` takes the default window
 * that ends on it.
 */
export function resolveWindow(
  bounds: { start?: string; end?: string },
  today: string,
  mode: WindowMode,
): DateWindow {
  const { start, end } = bounds;
  if (start && end) return validateWindow({ start, end });
  if (start) return validateWindow({ start, end: today });
  if (end) {
    validateWindow({ start: end, end });
    return mode === "month"
      ? { start: `${monthOf(end)}-01`, end }
      : trailingWindow(end);
  }
  return defaultWindow(today, mode);
}

/** The `count` calendar months ending with the month of `today`, oldest first. */
export function recentMonths(today: string, count: number): string[] {
  const year = Number(today.slice(0, 4));
  const month = Number(today.slice(5, 7)) - 1;
  const months: string[] = [];
  for (let i = count - 1; i >= 0; i--) {
    const d = new Date(Date.UTC(year, month - i, 1));
    months.push(d.toISOString().slice(0, 7));
  }
  return months;
}

function toUtc(date: string): number {
  return Date.parse(`${date}T00:00:00Z`);
}

function fromUtc(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}
