import { serve } from "@hono/node-server";
import { loadEnv } from "./config/env.ts";
import { createApp } from "./app.ts";
import { createExchangeDirectory } from "./services/exchange-directory.ts";
import { MarketDataClient } from "./services/market-data-client.ts";
import { configureLogger, logger } from "./services/structured-logger.ts";

export const env = loadEnv();

if (env.LOG_LEVEL) {
  configureLogger({ minLevel: env.LOG_LEVEL });
}

const exchanges = createExchangeDirectory(env.EXCHANGES);

const service = new MarketDataClient({
  baseUrl: env.DATA_SERVICE_URL,
  timeoutMs: env.DATA_SERVICE_TIMEOUT_MS,
});

const app = createApp({ service, exchanges });

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  (info) => {
    logger.info("server", `Price query API listening on port ${info.port}`, {
      dataService: env.DATA_SERVICE_URL,
      exchanges: exchanges.entries().length,
    });
  },
);

function shutdown(signal: string): void {
  logger.info("server", `${signal} received, closing server`);
  server.close();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

export default app;
