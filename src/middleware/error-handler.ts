/**
 * Global Error Handler Middleware
 *
 * Catches unhandled errors in any route and returns a consistent
 * structured JSON response. Unexpected errors are logged in full but
 * reach the client only as a generic 500.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ErrorCodes, type ApiError } from "../lib/errors.ts";
import { logger } from "../services/structured-logger.ts";

// ---------------------------------------------------------------------------
// Custom application error class
// ---------------------------------------------------------------------------

/**
 * An error with a client-facing status and message. Raised by the data
 * service client for upstream rejections and surfaced verbatim.
 */
export class AppError extends Error {
  public readonly statusCode: ContentfulStatusCode;
  public readonly errorCode: string;

  constructor(statusCode: number, errorCode: string, message: string) {
    super(message);
    if (!Number.isInteger(statusCode) || statusCode < 400 || statusCode > 599) {
      throw new RangeError(`AppError status must be 4xx or 5xx, got ${statusCode}`);
    }
    this.name = "AppError";
    this.statusCode = statusCode as ContentfulStatusCode;
    this.errorCode = errorCode;
  }
}

// ---------------------------------------------------------------------------
// Error mapper: known error types → structured response
// ---------------------------------------------------------------------------

interface MappedError {
  body: ApiError;
  status: ContentfulStatusCode;
}

function mapErrorToResponse(err: unknown): MappedError {
  if (err instanceof AppError) {
    return {
      body: { error: err.message, code: err.errorCode },
      status: err.statusCode,
    };
  }

  const { status, code, message } = ErrorCodes.INTERNAL_ERROR;
  return { body: { error: message, code }, status };
}

// ---------------------------------------------------------------------------
// Hono onError handler
// ---------------------------------------------------------------------------

/**
 * Global error handler for Hono's app.onError().
 *
 * Usage:
 *   app.onError(globalErrorHandler);
 */
export function globalErrorHandler(err: Error, c: Context): Response {
  logger.error("http", "Unhandled route error", err, {
    method: c.req.method,
    path: c.req.path,
  });

  const { body, status } = mapErrorToResponse(err);
  return c.json(body, status);
}

// ---------------------------------------------------------------------------
// 404 Not Found handler
// ---------------------------------------------------------------------------

/**
 * Global 404 handler for Hono's app.notFound().
 */
export function notFoundHandler(c: Context): Response {
  return c.json(
    {
      error: `Route ${c.req.method} ${c.req.path} not found`,
      code: ErrorCodes.NOT_FOUND.code,
    },
    404,
  );
}
