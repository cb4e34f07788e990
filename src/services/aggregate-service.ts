/**
 * Aggregate data service contract.
 *
 * The backing service computes price statistics; this API only selects
 * which read to make. Reads resolve to a single market-data record or
 * reject. A rejection with an AppError is a client-facing failure
 * (unknown symbol, no data in the window); anything else is internal.
 */

import { z } from "zod";

export type ServiceMode = "test" | "live";

export const SERVICE_MODES = ["test", "live"] as const satisfies readonly ServiceMode[];

export function isServiceMode(value: string): value is ServiceMode {
  return SERVICE_MODES.some((mode) => mode === value);
}

export const marketDataSchema = z.object({
  symbol: z.string(),
  /** Canonical address from the service, short identifier once it leaves this API */
  exchange: z.string(),
  price: z.number(),
  /** Unix milliseconds */
  timestamp: z.number(),
});

export type MarketData = z.infer<typeof marketDataSchema>;

export interface CallOptions {
  /** Aborts the read when the inbound request goes away */
  signal?: AbortSignal;
}

export interface AggregateService {
  getLatestAggregate(symbol: string, options?: CallOptions): Promise<MarketData>;
  getLatestByExchange(exchange: string, symbol: string, options?: CallOptions): Promise<MarketData>;

  getHighestAggregate(symbol: string, options?: CallOptions): Promise<MarketData>;
  getHighestByExchange(exchange: string, symbol: string, options?: CallOptions): Promise<MarketData>;
  /** An empty exchange means all exchanges */
  getHighestByPeriod(
    exchange: string,
    symbol: string,
    periodMs: number,
    options?: CallOptions,
  ): Promise<MarketData>;

  getLowestAggregate(symbol: string, options?: CallOptions): Promise<MarketData>;
  getLowestByExchange(exchange: string, symbol: string, options?: CallOptions): Promise<MarketData>;
  /** An empty exchange means all exchanges */
  getLowestByPeriod(
    exchange: string,
    symbol: string,
    periodMs: number,
    options?: CallOptions,
  ): Promise<MarketData>;

  getAverageAggregate(symbol: string, options?: CallOptions): Promise<MarketData>;
  getAverageByExchange(exchange: string, symbol: string, options?: CallOptions): Promise<MarketData>;
  getAverageByPeriod(
    exchange: string,
    symbol: string,
    periodMs: number,
    options?: CallOptions,
  ): Promise<MarketData>;

  /** Rejects when the service or its dependencies are unhealthy */
  healthCheck(options?: CallOptions): Promise<void>;
  setMode(mode: ServiceMode): Promise<void>;
}
