/**
 * @fundledger/cli — Errors.
 */

import { ZodError } from "zod";

export type CliErrorCode =
  | "USAGE"          // Unknown command, missing or malformed argument
  | "INVALID_INPUT"; // An input file that cannot be read or validated

export class CliError extends Error {
  constructor(
    public readonly code: CliErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "CliError";
  }
}

/** One line per Zod issue: `path: message`. */
export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** The message shown for any error reaching the command dispatcher. */
export function describeError(err: unknown): string {
  if (err instanceof ZodError) return `Invalid input: ${formatZodError(err)}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
