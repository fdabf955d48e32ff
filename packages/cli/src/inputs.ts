/**
 * @fundledger/cli — Input file schemas.
 *
 * Broker statements, other transactions and valuation dates arrive as
 * JSON, one object or an array of them. Dates may be MM/DD/YYYY, YYYY-MM-DD or
 * "January 15, 2023"; amounts may be numbers or strings such as
 * "$1,234.56".
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { normalizeDate, parseAmount } from "@fundledger/ledger";
import { CliError, formatZodError } from "./errors.js";

// =============================================================================
// Fields
// =============================================================================

export const DateField = z.string().transform((value, ctx) => {
  const date = normalizeDate(value);
  if (date === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date "${value}"` });
    return z.NEVER;
  }
  return date;
});

/** Missing and unparseable amounts become null. */
const OptionalAmount = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((value) => parseAmount(value));

const RequiredAmount = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const amount = parseAmount(value);
  if (amount === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid amount "${String(value)}"` });
    return z.NEVER;
  }
  return amount;
});

// =============================================================================
// Records
// =============================================================================

export const BrokerStatementSchema = z.object({
  date: DateField,
  startingValue: OptionalAmount,
  endingValue: OptionalAmount,
  depositsWithdrawals: OptionalAmount,
  markToMarket: OptionalAmount,
  interest: OptionalAmount,
  dividends: OptionalAmount,
  changeInInterestAccruals: OptionalAmount,
  changeInDividendAccruals: OptionalAmount,
  commissions: OptionalAmount,
  cumulativePnl: OptionalAmount,
});

export type BrokerStatementInput = z.output<typeof BrokerStatementSchema>;

export const OtherTransactionSchema = z.object({
  date: DateField,
  amount: RequiredAmount,
  accountDescription: z.string().default(""),
  transactionDescription: z.string().default(""),
  countedInPnl: z.boolean().default(false),
  overnight: z.boolean().default(false),
  additionalInfo: z.string().nullable().default(null),
});

export type OtherTransactionInput = z.output<typeof OtherTransactionSchema>;

/** A date with no fund value only marks a period boundary. */
export const ValuationOverrideSchema = z.object({
  date: DateField,
  fundValue: OptionalAmount,
});

export type ValuationOverrideInput = z.output<typeof ValuationOverrideSchema>;

// =============================================================================
// Loading
// =============================================================================

/**
 * Parse JSON text holding one record or an array of records.
 *
 * @throws {CliError} INVALID_INPUT for malformed JSON or records
 */
export function parseRecords<S extends z.ZodTypeAny>(
  text: string,
  schema: S,
  source = "input",
): z.output<S>[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new CliError("INVALID_INPUT", `${source} is not valid JSON: ${describeCause(err)}`);
  }

  const items: unknown[] = Array.isArray(json) ? json : [json];
  const result = z.array(schema).safeParse(items);
  if (!result.success) {
    throw new CliError("INVALID_INPUT", `${source}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

export async function readRecords<S extends z.ZodTypeAny>(
  path: string,
  schema: S,
): Promise<z.output<S>[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new CliError("INVALID_INPUT", `Cannot read ${path}: ${describeCause(err)}`);
  }
  return parseRecords(text, schema, path);
}

function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
