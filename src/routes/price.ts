import { Hono, type Context } from "hono";
import { apiError } from "../lib/errors.ts";
import { priceQuerySchema } from "../middleware/validation.ts";
import { logger, toError } from "../services/structured-logger.ts";
import {
  PRICE_STATISTICS,
  callLogData,
  type PriceResolver,
  type PriceStatistic,
} from "../services/price-resolver.ts";

const SERVICE = "price";

/**
 * Price statistic routes, mounted under /price.
 *
 *   GET /{statistic}/{symbol}
 *   GET /{statistic}/{exchange}/{symbol}
 *
 * Path shape, symbol, exchange and period are all checked by the resolver,
 * so each statistic takes every sub-path and lets it decide.
 */
export function createPriceRoutes(resolver: PriceResolver): Hono {
  const priceRoutes = new Hono();

  const handle = (statistic: PriceStatistic) => async (c: Context) => {
    const { period } = priceQuerySchema.parse(c.req.query());

    const resolution = resolver.resolve(statistic, { path: c.req.path, period });
    if (!resolution.ok) {
      const { kind, message } = resolution.error;
      logger.warn(SERVICE, `Rejected ${statistic} request: ${message}`, {
        kind,
        path: c.req.path,
        ...(period && { period }),
      });
      return apiError(c, kind, message);
    }

    const call = resolution.value;
    const outcome = await resolver.execute(call, { signal: c.req.raw.signal });
    if (outcome.ok) {
      return c.json(outcome.data, 200);
    }

    const { failure } = outcome;
    switch (failure.kind) {
      case "domain":
        logger.warn(SERVICE, `${statistic} read failed: ${failure.error.message}`, {
          ...callLogData(call),
          status: failure.error.statusCode,
        });
        return c.json(
          { error: failure.error.message, code: failure.error.errorCode },
          failure.error.statusCode,
        );
      case "internal":
        logger.error(SERVICE, "Unexpected data service error", toError(failure.cause), callLogData(call));
        return apiError(c, "INTERNAL_ERROR");
    }
  };

  for (const statistic of PRICE_STATISTICS) {
    priceRoutes.get(`/${statistic}`, handle(statistic));
    priceRoutes.get(`/${statistic}/*`, handle(statistic));
  }

  return priceRoutes;
}
