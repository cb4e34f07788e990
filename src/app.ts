import { Hono } from "hono";
import { createHealthRoutes } from "./routes/health.ts";
import { createModeRoutes } from "./routes/mode.ts";
import { createPriceRoutes } from "./routes/price.ts";
import { createPageRoutes } from "./routes/pages.ts";
import { requestLogger, type TraceEnv } from "./middleware/request-logger.ts";
import { globalErrorHandler, notFoundHandler } from "./middleware/error-handler.ts";
import { createPriceResolver } from "./services/price-resolver.ts";
import type { AggregateService } from "./services/aggregate-service.ts";
import type { ExchangeDirectory } from "./services/exchange-directory.ts";

export interface AppDependencies {
  service: AggregateService;
  exchanges: ExchangeDirectory;
}

export function createApp({ service, exchanges }: AppDependencies): Hono<TraceEnv> {
  const app = new Hono<TraceEnv>();

  app.use("*", requestLogger);

  // Health check (plain text)
  app.route("/health", createHealthRoutes(service));

  // Data-source mode switch, redirects back to the index page
  app.route("/mode", createModeRoutes(service));

  // Price statistics
  app.route("/price", createPriceRoutes(createPriceResolver({ service, exchanges })));

  // Index page
  app.route("/", createPageRoutes(exchanges));

  app.onError(globalErrorHandler);
  app.notFound(notFoundHandler);

  return app;
}
