/**
 * @fundledger/ledger — Calendar dates.
 *
 * Dates are stored as `MM/DD/YYYY` strings. That form does not sort
 * lexically across years, so every ordering goes through parseDate().
 */

import type { DateString } from "@fundledger/types";
import { LedgerError } from "./types.js";

export interface CalendarDate {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
}

const CANONICAL = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const LOOSE_US = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const LONG_FORM = /^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/;

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
] as const;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

/**
 * Parse a canonical `MM/DD/YYYY` string.
 * Returns null for any other shape and for impossible dates (02/30/2023).
 */
export function parseDate(text: string): CalendarDate | null {
  const match = CANONICAL.exec(text);
  if (match === null) return null;
  return toCalendarDate(Number(match[3]), Number(match[1]), Number(match[2]));
}

export function isValidDate(text: string): boolean {
  return parseDate(text) !== null;
}

export function formatDate(date: CalendarDate): DateString {
  const mm = String(date.month).padStart(2, "0");
  const dd = String(date.day).padStart(2, "0");
  return `${mm}/${dd}/${String(date.year)}`;
}

/**
 * Accept `MM/DD/YYYY` (one or two digit fields), `YYYY-MM-DD` or
 * `January 5, 2023` and return the canonical `MM/DD/YYYY` form.
 */
export function normalizeDate(text: string): DateString | null {
  const trimmed = text.trim();

  const us = LOOSE_US.exec(trimmed);
  if (us !== null) {
    const date = toCalendarDate(Number(us[3]), Number(us[1]), Number(us[2]));
    return date === null ? null : formatDate(date);
  }

  const iso = ISO.exec(trimmed);
  if (iso !== null) {
    const date = toCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    return date === null ? null : formatDate(date);
  }

  const long = LONG_FORM.exec(trimmed);
  if (long !== null) {
    const name = (long[1] ?? "").toLowerCase();
    const index = MONTH_NAMES.findIndex((month) => month === name);
    if (index === -1) return null;
    const date = toCalendarDate(Number(long[3]), index + 1, Number(long[2]));
    return date === null ? null : formatDate(date);
  }

  return null;
}

/** Numeric sort key: 20230115 for 01/15/2023. */
export function dateKey(date: CalendarDate): number {
  return date.year * 10_000 + date.month * 100 + date.day;
}

/** "2023-01" style key identifying the calendar month. */
export function monthKey(date: CalendarDate): string {
  return `${String(date.year)}-${String(date.month).padStart(2, "0")}`;
}

function requireDate(text: string): CalendarDate {
  const parsed = parseDate(text);
  if (parsed === null) {
    throw new LedgerError("INVALID_DATE", `Invalid date "${text}". Expected MM/DD/YYYY`);
  }
  return parsed;
}

/**
 * Compare two `MM/DD/YYYY` strings by calendar value.
 * Throws LedgerError for malformed input.
 */
export function compareDates(a: DateString, b: DateString): number {
  return dateKey(requireDate(a)) - dateKey(requireDate(b));
}

/**
 * Return a new array sorted ascending by calendar value.
 * Throws LedgerError for malformed input.
 */
export function sortDates(dates: Iterable<DateString>): DateString[] {
  return [...dates].sort(compareDates);
}
