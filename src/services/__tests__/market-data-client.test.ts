/**
 * Market Data Client Tests
 *
 * Drives the HTTP client against a stubbed fetch:
 * - URL and query construction for each read
 * - Upstream 4xx → AppError, 5xx / bad bodies → plain Error
 * - Health and mode calls
 */

import { describe, it, expect, vi } from "vitest";
import { MarketDataClient } from "../market-data-client.ts";
import { AppError } from "../../middleware/error-handler.ts";
import { BTC_RECORD } from "./fake-aggregate-service.ts";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function makeClient(response: () => Response) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response());
  const client = new MarketDataClient({
    baseUrl: "http://data.test/",
    timeoutMs: 1000,
    fetch: fetchMock,
  });
  return { client, fetchMock };
}

function requestedUrl(fetchMock: ReturnType<typeof makeClient>["fetchMock"]): URL {
  const [input] = fetchMock.mock.calls[0];
  return new URL(String(input));
}

describe("MarketDataClient", () => {
  describe("reads", () => {
    it("should request the aggregate with only the symbol", async () => {
      const { client, fetchMock } = makeClient(() => jsonResponse(BTC_RECORD));

      const data = await client.getLatestAggregate("BTC");

      expect(data).toEqual(BTC_RECORD);
      const url = requestedUrl(fetchMock);
      expect(url.pathname).toBe("/v1/aggregates/latest");
      expect([...url.searchParams]).toEqual([["symbol", "BTC"]]);
    });

    it("should send exchange and period for period reads", async () => {
      const { client, fetchMock } = makeClient(() => jsonResponse(BTC_RECORD));

      await client.getAverageByPeriod("exchange1:40101", "ETH", 300_000);

      const url = requestedUrl(fetchMock);
      expect(url.pathname).toBe("/v1/aggregates/average");
      expect(url.searchParams.get("symbol")).toBe("ETH");
      expect(url.searchParams.get("exchange")).toBe("exchange1:40101");
      expect(url.searchParams.get("periodMs")).toBe("300000");
    });

    it("should omit an empty exchange", async () => {
      const { client, fetchMock } = makeClient(() => jsonResponse(BTC_RECORD));

      await client.getHighestByPeriod("", "BTC", 60_000);

      const url = requestedUrl(fetchMock);
      expect(url.searchParams.has("exchange")).toBe(false);
      expect(url.searchParams.get("periodMs")).toBe("60000");
    });

    it("should pass an abort signal on every request", async () => {
      const { client, fetchMock } = makeClient(() => jsonResponse(BTC_RECORD));
      const controller = new AbortController();

      await client.getLowestByExchange("exchange3:40103", "SOL", { signal: controller.signal });

      const [, init] = fetchMock.mock.calls[0];
      expect(init?.signal).toBeInstanceOf(AbortSignal);
      expect(init?.signal?.aborted).toBe(false);
    });

    it("should drop unknown fields from the record", async () => {
      const { client } = makeClient(() => jsonResponse({ ...BTC_RECORD, volume: 12 }));

      expect(await client.getHighestAggregate("BTC")).toEqual(BTC_RECORD);
    });
  });

  describe("errors", () => {
    it("should turn a 4xx JSON error into an AppError", async () => {
      const { client } = makeClient(() =>
        jsonResponse({ error: "no data for DOGE", code: "no_data" }, 404),
      );

      const err = await client.getLatestAggregate("DOGE").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(AppError);
      expect(err).toMatchObject({ statusCode: 404, errorCode: "no_data", message: "no data for DOGE" });
    });

    it("should use the raw text of a non-JSON 4xx body", async () => {
      const { client } = makeClient(() => new Response("symbol not tracked", { status: 422 }));

      const err = await client.getLatestAggregate("DOGE").catch((e: unknown) => e);

      expect(err).toMatchObject({
        statusCode: 422,
        errorCode: "upstream_rejected",
        message: "symbol not tracked",
      });
    });

    it("should treat a 5xx as an internal error", async () => {
      const { client } = makeClient(() => jsonResponse({ error: "db down" }, 503));

      const err = await client.getLatestAggregate("BTC").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(Error);
      expect(err).not.toBeInstanceOf(AppError);
      expect(err).toHaveProperty("message", "market_data_request_failed: HTTP 503 – db down");
    });

    it("should reject a malformed record", async () => {
      const { client } = makeClient(() => jsonResponse({ symbol: "BTC", exchange: "x" }));

      await expect(client.getLatestAggregate("BTC")).rejects.toThrow("market_data_invalid_response");
    });

    it("should propagate transport failures", async () => {
      const client = new MarketDataClient({
        baseUrl: "http://data.test",
        timeoutMs: 1000,
        fetch: vi.fn(async () => {
          throw new TypeError("fetch failed");
        }),
      });

      await expect(client.getLatestAggregate("BTC")).rejects.toThrow("fetch failed");
    });
  });

  describe("health and mode", () => {
    it("should resolve when the service is healthy", async () => {
      const { client, fetchMock } = makeClient(() => new Response("OK", { status: 200 }));

      await expect(client.healthCheck()).resolves.toBeUndefined();
      expect(requestedUrl(fetchMock).pathname).toBe("/health");
    });

    it("should reject when the service is unhealthy", async () => {
      const { client } = makeClient(() => new Response("redis unreachable", { status: 500 }));

      await expect(client.healthCheck()).rejects.toThrow(
        "market_data_unhealthy: HTTP 500 – redis unreachable",
      );
    });

    it("should post the selected mode", async () => {
      const { client, fetchMock } = makeClient(() => new Response(null, { status: 204 }));

      await client.setMode("live");

      const [, init] = fetchMock.mock.calls[0];
      expect(requestedUrl(fetchMock).pathname).toBe("/v1/mode");
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe(JSON.stringify({ mode: "live" }));
    });
  });
});
