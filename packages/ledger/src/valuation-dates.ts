/**
 * @fundledger/ledger — Period tracking.
 *
 * A valuation date resets the period-starting NAV. Valuation dates are
 * the first known date of each calendar month plus every date the user
 * designated in the valuation overrides.
 */

import type { DateString } from "@fundledger/types";
import { dateKey, monthKey, parseDate } from "./dates.js";

/**
 * First date, in calendar order, of each (year, month) present.
 * Malformed dates are ignored.
 */
export function firstDatesOfMonth(dates: Iterable<DateString>): Set<DateString> {
  const parsed: { text: DateString; key: number; month: string }[] = [];
  for (const text of dates) {
    const date = parseDate(text);
    if (date === null) continue;
    parsed.push({ text, key: dateKey(date), month: monthKey(date) });
  }
  parsed.sort((a, b) => a.key - b.key);

  const seen = new Set<string>();
  const firsts = new Set<DateString>();
  for (const { text, month } of parsed) {
    if (seen.has(month)) continue;
    seen.add(month);
    firsts.add(text);
  }
  return firsts;
}

/**
 * The full valuation-date set: first-of-month dates ∪ override dates.
 */
export function computeValuationDates(
  dates: Iterable<DateString>,
  overrideDates: Iterable<DateString>,
): Set<DateString> {
  const result = firstDatesOfMonth(dates);
  for (const date of overrideDates) {
    result.add(date);
  }
  return result;
}
