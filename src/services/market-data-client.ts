/**
 * Market Data Service Client
 *
 * HTTP implementation of the AggregateService contract.
 *
 *   GET  {base}/v1/aggregates/{statistic}?symbol=&exchange=&periodMs=
 *   GET  {base}/health
 *   POST {base}/v1/mode   { "mode": "test" | "live" }
 *
 * 4xx responses become AppErrors carrying the upstream status and message,
 * so they reach the client verbatim. 5xx responses, malformed bodies and
 * transport failures are plain errors.
 */

import { z } from "zod";
import { AppError } from "../middleware/error-handler.ts";
import {
  marketDataSchema,
  type AggregateService,
  type CallOptions,
  type MarketData,
  type ServiceMode,
} from "./aggregate-service.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MarketDataClientConfig {
  baseUrl: string;
  /** Upper bound for every request, combined with the caller's signal */
  timeoutMs: number;
  /** Injected in tests */
  fetch?: typeof fetch;
}

interface AggregateParams {
  symbol: string;
  exchange?: string;
  periodMs?: number;
}

const errorBodySchema = z.object({
  error: z.string(),
  code: z.string().optional(),
});

/** errorCode used when an upstream rejection does not name one */
const UPSTREAM_REJECTED = "upstream_rejected";

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class MarketDataClient implements AggregateService {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: MarketDataClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = config.fetch ?? fetch;
  }

  getLatestAggregate(symbol: string, options?: CallOptions): Promise<MarketData> {
    return this.readAggregate("latest", { symbol }, options);
  }

  getLatestByExchange(exchange: string, symbol: string, options?: CallOptions): Promise<MarketData> {
    return this.readAggregate("latest", { symbol, exchange }, options);
  }

  getHighestAggregate(symbol: string, options?: CallOptions): Promise<MarketData> {
    return this.readAggregate("highest", { symbol }, options);
  }

  getHighestByExchange(exchange: string, symbol: string, options?: CallOptions): Promise<MarketData> {
    return this.readAggregate("highest", { symbol, exchange }, options);
  }

  getHighestByPeriod(
    exchange: string,
    symbol: string,
    periodMs: number,
    options?: CallOptions,
  ): Promise<MarketData> {
    return this.readAggregate("highest", { symbol, exchange, periodMs }, options);
  }

  getLowestAggregate(symbol: string, options?: CallOptions): Promise<MarketData> {
    return this.readAggregate("lowest", { symbol }, options);
  }

  getLowestByExchange(exchange: string, symbol: string, options?: CallOptions): Promise<MarketData> {
    return this.readAggregate("lowest", { symbol, exchange }, options);
  }

  getLowestByPeriod(
    exchange: string,
    symbol: string,
    periodMs: number,
    options?: CallOptions,
  ): Promise<MarketData> {
    return this.readAggregate("lowest", { symbol, exchange, periodMs }, options);
  }

  getAverageAggregate(symbol: string, options?: CallOptions): Promise<MarketData> {
    return this.readAggregate("average", { symbol }, options);
  }

  getAverageByExchange(exchange: string, symbol: string, options?: CallOptions): Promise<MarketData> {
    return this.readAggregate("average", { symbol, exchange }, options);
  }

  getAverageByPeriod(
    exchange: string,
    symbol: string,
    periodMs: number,
    options?: CallOptions,
  ): Promise<MarketData> {
    return this.readAggregate("average", { symbol, exchange, periodMs }, options);
  }

  async healthCheck(options?: CallOptions): Promise<void> {
    const res = await this.fetchImpl(`${this.baseUrl}/health`, {
      method: "GET",
      signal: this.signal(options?.signal),
    });

    if (!res.ok) {
      const body = await res.text().catch(() => "no body");
      throw new Error(`market_data_unhealthy: HTTP ${res.status} – ${body}`);
    }
  }

  async setMode(mode: ServiceMode): Promise<void> {
    const res = await this.fetchImpl(`${this.baseUrl}/v1/mode`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ mode }),
      signal: this.signal(),
    });

    if (!res.ok) {
      const body = await res.text().catch(() => "no body");
      throw new Error(`market_data_set_mode_failed: HTTP ${res.status} – ${body}`);
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async readAggregate(
    statistic: string,
    params: AggregateParams,
    options?: CallOptions,
  ): Promise<MarketData> {
    const url = new URL(`${this.baseUrl}/v1/aggregates/${statistic}`);
    url.searchParams.set("symbol", params.symbol);
    // Empty exchange means all exchanges: the parameter is omitted
    if (params.exchange) url.searchParams.set("exchange", params.exchange);
    if (params.periodMs !== undefined) url.searchParams.set("periodMs", String(params.periodMs));

    const res = await this.fetchImpl(url.toString(), {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: this.signal(options?.signal),
    });

    if (!res.ok) {
      throw await this.toError(res);
    }

    const parsed = marketDataSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(
        `market_data_invalid_response: ${parsed.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ")}`,
      );
    }

    return parsed.data;
  }

  private async toError(res: Response): Promise<Error> {
    const text = await res.text().catch(() => "");

    let message = text || res.statusText || `HTTP ${res.status}`;
    let code = UPSTREAM_REJECTED;
    const body = errorBodySchema.safeParse(parseJson(text));
    if (body.success) {
      message = body.data.error;
      code = body.data.code ?? UPSTREAM_REJECTED;
    }

    if (res.status >= 400 && res.status < 500) {
      return new AppError(res.status, code, message);
    }
    return new Error(`market_data_request_failed: HTTP ${res.status} – ${message}`);
  }

  private signal(caller?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return caller ? AbortSignal.any([caller, timeout]) : timeout;
  }
}
