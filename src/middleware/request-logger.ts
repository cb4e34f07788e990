import { createMiddleware } from "hono/factory";
import { randomUUID } from "crypto";
import { logger, withLogContext } from "../services/structured-logger.ts";

export type TraceEnv = {
  Variables: {
    traceId: string;
  };
};

export const TRACE_HEADER = "X-Trace-Id";

/**
 * Request logging middleware.
 *
 * Reuses the caller's X-Trace-Id or mints one, echoes it on the response,
 * and runs the rest of the chain inside a log context so every entry the
 * request produces carries the trace id. Writes one line per request with
 * the final status and duration.
 */
export const requestLogger = createMiddleware<TraceEnv>(async (c, next) => {
  const traceId = c.req.header(TRACE_HEADER) || randomUUID();
  const startedAt = Date.now();

  c.set("traceId", traceId);
  c.header(TRACE_HEADER, traceId);

  await withLogContext({ traceId }, async () => {
    await next();
    logger.info("http", `${c.req.method} ${c.req.path}`, {
      status: c.res.status,
      durationMs: Date.now() - startedAt,
    });
  });
});
