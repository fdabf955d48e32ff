/**
 * @fundledger/ledger — Amount helpers.
 *
 * The persisted schema stores REAL columns, so amounts are numbers.
 * Tolerance checks carry a small float guard: 1000.10 - 1000 is
 * 0.10000000000002274 in IEEE 754 and must still count as 0.10.
 */

import { LedgerError } from "./types.js";

const FLOAT_GUARD = 1e-9;

const EMPTY_MARKERS = new Set(["", "nan", "none", "null"]);

/**
 * Parse a financial value such as "$1,234.56", "-300" or "(none)".
 * Currency symbols, commas and whitespace are ignored.
 * Returns null for empty markers and anything non-numeric.
 */
export function parseAmount(raw: string | number | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;

  const cleaned = raw.replace(/[$,\s]/g, "");
  if (EMPTY_MARKERS.has(cleaned.toLowerCase())) return null;
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(cleaned)) return null;

  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

/**
 * Like parseAmount(), but throws LedgerError when the value is unusable.
 */
export function requireAmount(raw: string | number, label = "amount"): number {
  const value = parseAmount(raw);
  if (value === null) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid ${label}: "${String(raw)}"`);
  }
  return value;
}

/** Round half away from zero to whole cents. Never returns -0. */
export function roundCents(value: number): number {
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * 100)) / 100;
  return rounded === 0 ? 0 : rounded;
}

/** "$1,234.56" / "-$1,234.56" */
export function formatCurrency(value: number): string {
  const cents = roundCents(value);
  const [whole = "0", fraction = "00"] = Math.abs(cents).toFixed(2).split(".");
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return `${cents < 0 ? "-" : ""}$${grouped}.${fraction}`;
}

/** "12.34%" for 0.1234; "n/a" for null. */
export function formatPercent(value: number | null, digits = 2): string {
  if (value === null) return "n/a";
  return `${(value * 100).toFixed(digits)}%`;
}

/**
 * True when |delta| is strictly greater than the tolerance.
 * A delta equal to the tolerance is within it.
 */
export function exceedsTolerance(delta: number, tolerance: number): boolean {
  return Math.abs(delta) - tolerance > FLOAT_GUARD;
}

/** numerator / denominator, or null when the denominator is null or zero. */
export function safeDivide(numerator: number, denominator: number | null): number | null {
  if (denominator === null || denominator === 0) return null;
  return numerator / denominator;
}
