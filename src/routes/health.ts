import { Hono } from "hono";
import type { AggregateService } from "../services/aggregate-service.ts";
import { logger, toError } from "../services/structured-logger.ts";

/**
 * GET /health - Plain-text liveness check backed by the data service.
 *
 * Returns "OK" (200) when the data service reports healthy, otherwise
 * "Service Unavailable" (503).
 */
export function createHealthRoutes(service: AggregateService): Hono {
  const healthRoutes = new Hono();

  healthRoutes.get("/", async (c) => {
    logger.debug("health", "Health check requested");

    try {
      await service.healthCheck({ signal: c.req.raw.signal });
    } catch (err) {
      logger.error("health", "Health check failed", toError(err));
      return c.text("Service Unavailable", 503);
    }

    return c.text("OK", 200);
  });

  return healthRoutes;
}
