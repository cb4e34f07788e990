/**
 * Integration tests for the price routes
 *
 * Drives the full app (request logger, resolver, error handlers) with an
 * in-process fake data service:
 * - GET /price/{statistic}/{symbol}
 * - GET /price/{statistic}/{exchange}/{symbol}
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createApp } from "../app.ts";
import { AppError } from "../middleware/error-handler.ts";
import { createExchangeDirectory, DEFAULT_EXCHANGES } from "../services/exchange-directory.ts";
import { getRecentLogs, resetLogger } from "../services/structured-logger.ts";
import {
  BTC_RECORD,
  createFakeService,
  readCallCount,
  type FakeService,
} from "../services/__tests__/fake-aggregate-service.ts";

let service: FakeService;
let app: ReturnType<typeof createApp>;

async function get(path: string) {
  const res = await app.request(`http://localhost${path}`);
  const body: unknown = await res.json();
  return { status: res.status, body };
}

beforeEach(() => {
  resetLogger();
  service = createFakeService(BTC_RECORD);
  app = createApp({ service, exchanges: createExchangeDirectory(DEFAULT_EXCHANGES) });
});

// =========================================================================
// Successful reads
// =========================================================================

describe("GET /price: successful reads", () => {
  it("should serve highest-by-period across all exchanges", async () => {
    const { status, body } = await get("/price/highest/BTC?period=5m");

    expect(status).toBe(200);
    expect(body).toEqual({ ...BTC_RECORD, exchange: "exchange2" });
    expect(service.getHighestByPeriod).toHaveBeenCalledTimes(1);
    expect(service.getHighestByPeriod.mock.calls[0].slice(0, 3)).toEqual(["", "BTC", 300_000]);
    expect(readCallCount(service)).toBe(1);
  });

  it("should serve average-by-exchange with the canonical address", async () => {
    const { status } = await get("/price/average/exchange1/eth");

    expect(status).toBe(200);
    expect(service.getAverageByExchange.mock.calls[0].slice(0, 2)).toEqual([
      "exchange1:40101",
      "ETH",
    ]);
  });

  it("should serve the latest aggregate", async () => {
    const { status } = await get("/price/latest/btc");

    expect(status).toBe(200);
    expect(service.getLatestAggregate.mock.calls[0][0]).toBe("BTC");
  });

  it("should serve lowest-by-period for one exchange", async () => {
    const { status } = await get("/price/lowest/EXCHANGE3/SOL?period=1h30m");

    expect(status).toBe(200);
    expect(service.getLowestByPeriod.mock.calls[0].slice(0, 3)).toEqual([
      "exchange3:40103",
      "SOL",
      5_400_000,
    ]);
  });

  it("should forward the request's abort signal", async () => {
    await get("/price/highest/exchange2/BTC");

    const [, , options] = service.getHighestByExchange.mock.calls[0];
    expect(options).toHaveProperty("signal");
  });

  it("should tolerate a trailing slash", async () => {
    const { status } = await get("/price/lowest/BTC/");

    expect(status).toBe(200);
    expect(service.getLowestAggregate).toHaveBeenCalledTimes(1);
  });

  it("should pass unmapped exchange values through unchanged", async () => {
    service.getLatestAggregate.mockResolvedValueOnce({ ...BTC_RECORD, exchange: "otc-desk" });

    const { body } = await get("/price/latest/BTC");

    expect(body).toHaveProperty("exchange", "otc-desk");
  });
});

// =========================================================================
// Validation failures
// =========================================================================

describe("GET /price: validation", () => {
  it("should reject an unknown exchange without calling the service", async () => {
    const { status, body } = await get("/price/latest/xyz/BTC");

    expect(status).toBe(400);
    expect(body).toEqual({ error: "unknown exchange", code: "unknown_exchange" });
    expect(readCallCount(service)).toBe(0);
  });

  it("should reject a period on latest", async () => {
    const { status, body } = await get("/price/latest/exchange1/BTC?period=5m");

    expect(status).toBe(400);
    expect(body).toEqual({
      error: "Period parameter is not applicable for LatestPrice",
      code: "period_not_applicable",
    });
    expect(readCallCount(service)).toBe(0);
  });

  it("should reject paths with the wrong number of segments", async () => {
    for (const path of ["/price/highest", "/price/highest/exchange1/BTC/extra"]) {
      const { status, body } = await get(path);
      expect(status).toBe(400);
      expect(body).toEqual({ error: "Invalid path", code: "invalid_path" });
    }
    expect(readCallCount(service)).toBe(0);
  });

  it("should reject invalid symbols with a specific message", async () => {
    const tooLong = await get("/price/lowest/ABCDEFGHIJK");
    expect(tooLong.status).toBe(400);
    expect(tooLong.body).toEqual({ error: "symbol is too long", code: "invalid_symbol" });

    const punctuated = await get("/price/lowest/BTC_USD");
    expect(punctuated.body).toHaveProperty("error", "symbol must be alphanumeric");
  });

  it("should distinguish malformed and non-positive periods", async () => {
    const malformed = await get("/price/highest/BTC?period=abc");
    expect(malformed.status).toBe(400);
    expect(malformed.body).toEqual({ error: "invalid period format", code: "invalid_period_format" });

    const zero = await get("/price/highest/BTC?period=0s");
    expect(zero.status).toBe(400);
    expect(zero.body).toEqual({ error: "period must be positive", code: "invalid_period" });

    const subNanosecond = await get("/price/highest/BTC?period=0.1ns");
    expect(subNanosecond.status).toBe(400);
    expect(subNanosecond.body).toEqual({ error: "period must be positive", code: "invalid_period" });

    const overflow = await get("/price/highest/BTC?period=3000000h");
    expect(overflow.status).toBe(400);
    expect(overflow.body).toEqual({ error: "invalid period format", code: "invalid_period_format" });
    expect(readCallCount(service)).toBe(0);
  });

  it("should refuse an average period without an exchange", async () => {
    const { status, body } = await get("/price/average/ETH?period=5m");

    expect(status).toBe(400);
    expect(body).toEqual({
      error: "Cannot get average by period without exchange",
      code: "period_requires_exchange",
    });
    expect(readCallCount(service)).toBe(0);
  });

  it("should log rejected requests as warnings", async () => {
    await get("/price/latest/xyz/BTC");

    const [entry] = getRecentLogs(10, "WARN");
    expect(entry.service).toBe("price");
    expect(entry.message).toBe("Rejected latest request: unknown exchange");
    expect(entry.data).toEqual({ kind: "UNKNOWN_EXCHANGE", path: "/price/latest/xyz/BTC" });
  });
});

// =========================================================================
// Data service failures
// =========================================================================

describe("GET /price: data service failures", () => {
  it("should surface application errors with their status and message", async () => {
    service.getHighestAggregate.mockRejectedValueOnce(
      new AppError(404, "no_data", "no data for symbol DOGE"),
    );

    const { status, body } = await get("/price/highest/DOGE");

    expect(status).toBe(404);
    expect(body).toEqual({ error: "no data for symbol DOGE", code: "no_data" });
  });

  it("should hide unexpected errors behind a generic 500", async () => {
    service.getAverageByPeriod.mockRejectedValueOnce(new Error("pq: connection refused at 10.0.0.5"));

    const { status, body } = await get("/price/average/exchange1/ETH?period=10m");

    expect(status).toBe(500);
    expect(body).toEqual({ error: "Internal server error", code: "internal_error" });
  });

  it("should log unexpected errors with full detail", async () => {
    service.getAverageByPeriod.mockRejectedValueOnce(new Error("pq: connection refused at 10.0.0.5"));

    await get("/price/average/exchange1/ETH?period=10m");

    const [entry] = getRecentLogs(10, "ERROR");
    expect(entry.message).toBe("Unexpected data service error");
    expect(entry.error?.message).toBe("pq: connection refused at 10.0.0.5");
    expect(entry.data).toEqual({
      operation: "average-by-period",
      symbol: "ETH",
      exchange: "exchange1:40101",
      period: "10m",
    });
    expect(entry.traceId).toBeTruthy();
  });
});
