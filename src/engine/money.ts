// ── Money ───────────────────────────────────────────────────────────
// Amounts are aggregated in integer cents so sums are exact and do not
// depend on the order transactions arrive in.

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/** True when `amount` has no more than two decimal places. */
export function hasCentPrecision(amount: number): boolean {
  return Math.abs(amount * 100 - Math.round(amount * 100)) < 1e-6;
}

export function formatAmount(amount: number): string {
  return amount.toFixed(2);
}
