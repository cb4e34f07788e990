/**
 * Input Validation
 *
 * Zod schemas for the path and query tokens of price requests.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Validation Schema Constants
// ---------------------------------------------------------------------------

/**
 * Maximum length for a trading symbol ("BTC", "ETH", "SOLUSDT").
 * 10 characters covers base/quote pairs written without a separator.
 */
export const SYMBOL_MAX_LENGTH = 10;

// ---------------------------------------------------------------------------
// Reusable schemas
// ---------------------------------------------------------------------------

/**
 * Trading symbol path token. Checks run in order, so the first issue is
 * the most basic one (missing, then too long, then bad characters).
 * Accepted symbols are upper-cased.
 */
export const symbolSchema = z
  .string()
  .min(1, "symbol is required")
  .max(SYMBOL_MAX_LENGTH, "symbol is too long")
  .regex(/^[A-Za-z0-9]+$/, "symbol must be alphanumeric")
  .transform((symbol) => symbol.toUpperCase());

/** Query parameters accepted on price routes */
export const priceQuerySchema = z.object({
  period: z.string().optional(),
});

/**
 * Message of the first issue in a failed parse, or the fallback.
 */
export function firstIssueMessage(error: z.ZodError, fallback: string): string {
  return error.issues[0]?.message ?? fallback;
}
