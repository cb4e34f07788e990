/**
 * Standardized Error Handling
 *
 * Provides consistent error response format across all API routes.
 * Format: { error: string, code: string }
 */

import type { Context } from "hono";

export interface ApiError {
  error: string;
  code: string;
}

/**
 * Standard error codes mapped to HTTP status codes and default messages
 */
export const ErrorCodes = {
  // 400 Bad Request
  INVALID_PATH: { status: 400, code: "invalid_path", message: "Invalid path" },
  INVALID_SYMBOL: { status: 400, code: "invalid_symbol", message: "invalid symbol" },
  UNKNOWN_EXCHANGE: { status: 400, code: "unknown_exchange", message: "unknown exchange" },
  PERIOD_NOT_APPLICABLE: {
    status: 400,
    code: "period_not_applicable",
    message: "Period parameter is not applicable for LatestPrice",
  },
  INVALID_PERIOD_FORMAT: {
    status: 400,
    code: "invalid_period_format",
    message: "invalid period format",
  },
  INVALID_PERIOD: { status: 400, code: "invalid_period", message: "period must be positive" },
  PERIOD_REQUIRES_EXCHANGE: {
    status: 400,
    code: "period_requires_exchange",
    message: "Cannot get average by period without exchange",
  },

  // 404 Not Found
  NOT_FOUND: { status: 404, code: "not_found", message: "Not found" },

  // 500 Internal Server Error
  INTERNAL_ERROR: { status: 500, code: "internal_error", message: "Internal server error" },
} as const;

export type ErrorCodeKey = keyof typeof ErrorCodes;

/**
 * Create a standardized API error response. The table's default message is
 * used unless a more specific one is given.
 */
export function apiError(c: Context, errorCode: ErrorCodeKey, message?: string): Response {
  const { status, code } = ErrorCodes[errorCode];
  const response: ApiError = {
    error: message ?? ErrorCodes[errorCode].message,
    code,
  };
  return c.json(response, status);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
