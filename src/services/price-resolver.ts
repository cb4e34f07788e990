/**
 * Price Request Resolver
 *
 * Turns a price request (path plus optional `period` query value) into
 * exactly one read on the aggregate data service, runs it, and classifies
 * the outcome.
 *
 * Path shapes (after trimming slashes):
 *   /price/{statistic}/{symbol}             all exchanges
 *   /price/{statistic}/{exchange}/{symbol}  one exchange
 *
 * Validation order: period applicability, path shape, exchange, symbol,
 * period value. Every check finishes before the service is called.
 */

import { AppError } from "../middleware/error-handler.ts";
import { firstIssueMessage, symbolSchema } from "../middleware/validation.ts";
import { ErrorCodes } from "../lib/errors.ts";
import { formatDuration, parseDuration } from "../lib/duration.ts";
import type { AggregateService, CallOptions, MarketData } from "./aggregate-service.ts";
import type { ExchangeDirectory } from "./exchange-directory.ts";

// ---------------------------------------------------------------------------
// Statistics and their capabilities
// ---------------------------------------------------------------------------

export type PriceStatistic = "latest" | "highest" | "lowest" | "average";

export const PRICE_STATISTICS = [
  "latest",
  "highest",
  "lowest",
  "average",
] as const satisfies readonly PriceStatistic[];

export interface StatisticCapabilities {
  /** Whether a `period` query parameter may be supplied at all */
  acceptsPeriod: boolean;
  /** Whether a period may be combined with "all exchanges" */
  periodWithoutExchange: boolean;
}

export const STATISTIC_CAPABILITIES: Readonly<Record<PriceStatistic, StatisticCapabilities>> =
  Object.freeze({
    latest: { acceptsPeriod: false, periodWithoutExchange: false },
    highest: { acceptsPeriod: true, periodWithoutExchange: true },
    lowest: { acceptsPeriod: true, periodWithoutExchange: true },
    // The service has no cross-exchange windowed average
    average: { acceptsPeriod: true, periodWithoutExchange: false },
  });

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RequestErrorKind =
  | "INVALID_PATH"
  | "INVALID_SYMBOL"
  | "UNKNOWN_EXCHANGE"
  | "PERIOD_NOT_APPLICABLE"
  | "INVALID_PERIOD_FORMAT"
  | "INVALID_PERIOD"
  | "PERIOD_REQUIRES_EXCHANGE";

export interface RequestError {
  kind: RequestErrorKind;
  message: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: RequestError };

export interface PriceRequest {
  /** Full request path, e.g. "/price/highest/exchange1/BTC" */
  path: string;
  /** Raw `period` query value; empty counts as absent */
  period?: string;
}

export interface PriceQuery {
  statistic: PriceStatistic;
  /** Upper-cased */
  symbol: string;
  /** Canonical address; undefined means all exchanges */
  exchange?: string;
  periodMs?: number;
}

type PeriodStatistic = Exclude<PriceStatistic, "latest">;

export type AggregateCall =
  | { kind: "aggregate"; statistic: PriceStatistic; symbol: string }
  | { kind: "byExchange"; statistic: PriceStatistic; exchange: string; symbol: string }
  | {
      kind: "byPeriod";
      statistic: PeriodStatistic;
      /** "" for all exchanges */
      exchange: string;
      symbol: string;
      periodMs: number;
    };

export type ServiceFailure =
  | { kind: "domain"; error: AppError }
  | { kind: "internal"; cause: unknown };

export type Outcome = { ok: true; data: MarketData } | { ok: false; failure: ServiceFailure };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

function reject<T>(kind: RequestErrorKind, message: string = ErrorCodes[kind].message): Result<T> {
  return { ok: false, error: { kind, message } };
}

export function splitPath(path: string): string[] {
  return path.replace(/^\/+|\/+$/g, "").split("/");
}

// ---------------------------------------------------------------------------
// Token validation
// ---------------------------------------------------------------------------

export function validateSymbol(raw: string): Result<string> {
  const parsed = symbolSchema.safeParse(raw);
  if (!parsed.success) {
    return reject("INVALID_SYMBOL", firstIssueMessage(parsed.error, ErrorCodes.INVALID_SYMBOL.message));
  }
  return ok(parsed.data);
}

/**
 * Resolve a short exchange token to its canonical address. An empty token
 * means all exchanges and resolves to undefined.
 */
export function resolveExchange(
  token: string,
  exchanges: ExchangeDirectory,
): Result<string | undefined> {
  if (token === "") return ok(undefined);

  const address = exchanges.toAddress(token);
  if (address === undefined) return reject("UNKNOWN_EXCHANGE");
  return ok(address);
}

/**
 * Parse the `period` query value into milliseconds. Absent or empty yields
 * undefined; otherwise it must be a well-formed, strictly positive duration.
 */
export function parsePeriod(raw: string | undefined): Result<number | undefined> {
  if (raw === undefined || raw === "") return ok(undefined);

  const periodMs = parseDuration(raw);
  if (periodMs === null) return reject("INVALID_PERIOD_FORMAT");
  if (periodMs <= 0) return reject("INVALID_PERIOD");
  return ok(periodMs);
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export function parsePriceQuery(
  statistic: PriceStatistic,
  request: PriceRequest,
  exchanges: ExchangeDirectory,
): Result<PriceQuery> {
  const hasPeriod = request.period !== undefined && request.period !== "";
  if (hasPeriod && !STATISTIC_CAPABILITIES[statistic].acceptsPeriod) {
    return reject("PERIOD_NOT_APPLICABLE");
  }

  const segments = splitPath(request.path);
  let exchangeToken: string;
  let symbolToken: string;
  switch (segments.length) {
    case 3:
      exchangeToken = "";
      symbolToken = segments[2];
      break;
    case 4:
      exchangeToken = segments[2];
      symbolToken = segments[3];
      break;
    default:
      return reject("INVALID_PATH");
  }

  const exchange = resolveExchange(exchangeToken, exchanges);
  if (!exchange.ok) return exchange;

  const symbol = validateSymbol(symbolToken);
  if (!symbol.ok) return symbol;

  const period = parsePeriod(request.period);
  if (!period.ok) return period;

  return ok<PriceQuery>({
    statistic,
    symbol: symbol.value,
    ...(exchange.value !== undefined && { exchange: exchange.value }),
    ...(period.value !== undefined && { periodMs: period.value }),
  });
}

/**
 * Pick the single service read for a validated query.
 *
 *                no period     period
 *   all exch.    aggregate     byPeriod("")  (rejected for average)
 *   one exch.    byExchange    byPeriod(exchange)
 *
 * A period on a statistic that takes none is rejected here as well, for
 * callers that build a query without going through parsePriceQuery.
 */
export function selectOperation(query: PriceQuery): Result<AggregateCall> {
  const { statistic, symbol, exchange, periodMs } = query;

  if (periodMs !== undefined) {
    const { acceptsPeriod, periodWithoutExchange } = STATISTIC_CAPABILITIES[statistic];
    if (!acceptsPeriod) return reject("PERIOD_NOT_APPLICABLE");
    if (exchange === undefined && !periodWithoutExchange) {
      return reject("PERIOD_REQUIRES_EXCHANGE");
    }
    return ok<AggregateCall>({ kind: "byPeriod", statistic, exchange: exchange ?? "", symbol, periodMs });
  }

  if (exchange === undefined) {
    return ok<AggregateCall>({ kind: "aggregate", statistic, symbol });
  }
  return ok<AggregateCall>({ kind: "byExchange", statistic, exchange, symbol });
}

export function resolvePriceRequest(
  statistic: PriceStatistic,
  request: PriceRequest,
  exchanges: ExchangeDirectory,
): Result<AggregateCall> {
  const query = parsePriceQuery(statistic, request, exchanges);
  if (!query.ok) return query;
  return selectOperation(query.value);
}

/** Operation name for logs, e.g. "highest-by-period" */
export function describeCall(call: AggregateCall): string {
  switch (call.kind) {
    case "aggregate":
      return `${call.statistic}-aggregate`;
    case "byExchange":
      return `${call.statistic}-by-exchange`;
    case "byPeriod":
      return `${call.statistic}-by-period`;
  }
}

/** Structured log fields for a call */
export function callLogData(call: AggregateCall): Record<string, unknown> {
  return {
    operation: describeCall(call),
    symbol: call.symbol,
    ...(call.kind !== "aggregate" && { exchange: call.exchange }),
    ...(call.kind === "byPeriod" && { period: formatDuration(call.periodMs) }),
  };
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export function invokeAggregate(
  service: AggregateService,
  call: AggregateCall,
  options: CallOptions = {},
): Promise<MarketData> {
  switch (call.kind) {
    case "aggregate":
      return readAggregate(service, call.statistic, call.symbol, options);
    case "byExchange":
      return readByExchange(service, call.statistic, call.exchange, call.symbol, options);
    case "byPeriod":
      return readByPeriod(service, call.statistic, call.exchange, call.symbol, call.periodMs, options);
  }
}

function readAggregate(
  service: AggregateService,
  statistic: PriceStatistic,
  symbol: string,
  options: CallOptions,
): Promise<MarketData> {
  switch (statistic) {
    case "latest":
      return service.getLatestAggregate(symbol, options);
    case "highest":
      return service.getHighestAggregate(symbol, options);
    case "lowest":
      return service.getLowestAggregate(symbol, options);
    case "average":
      return service.getAverageAggregate(symbol, options);
  }
}

function readByExchange(
  service: AggregateService,
  statistic: PriceStatistic,
  exchange: string,
  symbol: string,
  options: CallOptions,
): Promise<MarketData> {
  switch (statistic) {
    case "latest":
      return service.getLatestByExchange(exchange, symbol, options);
    case "highest":
      return service.getHighestByExchange(exchange, symbol, options);
    case "lowest":
      return service.getLowestByExchange(exchange, symbol, options);
    case "average":
      return service.getAverageByExchange(exchange, symbol, options);
  }
}

function readByPeriod(
  service: AggregateService,
  statistic: PeriodStatistic,
  exchange: string,
  symbol: string,
  periodMs: number,
  options: CallOptions,
): Promise<MarketData> {
  switch (statistic) {
    case "highest":
      return service.getHighestByPeriod(exchange, symbol, periodMs, options);
    case "lowest":
      return service.getLowestByPeriod(exchange, symbol, periodMs, options);
    case "average":
      return service.getAverageByPeriod(exchange, symbol, periodMs, options);
  }
}

export function classifyServiceError(err: unknown): ServiceFailure {
  if (err instanceof AppError) {
    return { kind: "domain", error: err };
  }
  return { kind: "internal", cause: err };
}

/**
 * Replace a canonical exchange address with its short identifier. Unknown
 * addresses are returned unchanged.
 */
export function rewriteExchange(record: MarketData, exchanges: ExchangeDirectory): MarketData {
  const shortId = exchanges.toShortId(record.exchange);
  return shortId === undefined ? record : { ...record, exchange: shortId };
}

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

export interface PriceResolverDeps {
  service: AggregateService;
  exchanges: ExchangeDirectory;
}

export interface PriceResolver {
  resolve(statistic: PriceStatistic, request: PriceRequest): Result<AggregateCall>;
  execute(call: AggregateCall, options?: CallOptions): Promise<Outcome>;
}

export function createPriceResolver({ service, exchanges }: PriceResolverDeps): PriceResolver {
  return {
    resolve: (statistic, request) => resolvePriceRequest(statistic, request, exchanges),

    async execute(call, options) {
      try {
        const data = await invokeAggregate(service, call, options);
        return { ok: true, data: rewriteExchange(data, exchanges) };
      } catch (err) {
        return { ok: false, failure: classifyServiceError(err) };
      }
    },
  };
}
