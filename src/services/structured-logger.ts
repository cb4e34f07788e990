/**
 * Structured Logging
 *
 * JSON-line logging with per-request context propagation. Replaces ad-hoc
 * console.log calls with structured events that can be queried and filtered.
 *
 * Features:
 * - JSON structured logs in production, compact lines in development
 * - Log levels: DEBUG, INFO, WARN, ERROR, FATAL
 * - Request context (traceId) carried across awaits via AsyncLocalStorage
 * - Ring buffer for recent logs (in-memory access)
 */

import { AsyncLocalStorage } from "node:async_hooks";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR", "FATAL"] as const satisfies readonly LogLevel[];

export interface LogContext {
  /** Trace ID for request correlation */
  traceId?: string;
}

export interface StructuredLogEntry extends LogContext {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Module that generated the log */
  service: string;
  message: string;
  /** Additional structured data */
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** Minimum log level to output (default: INFO in production, DEBUG otherwise) */
  minLevel: LogLevel;
  /** Whether to output as JSON (true in production) */
  jsonOutput: boolean;
  /** Whether to write to the console at all */
  consoleOutput: boolean;
  /** Whether to include stack traces in errors */
  includeStackTraces: boolean;
  /** Maximum number of logs to keep in memory ring buffer */
  ringBufferSize: number;
}

export interface LoggerStats {
  totalLogs: number;
  logsByLevel: Record<LogLevel, number>;
  errorsLogged: number;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

const isProduction = process.env.NODE_ENV === "production";

function defaultConfig(): LoggerConfig {
  return {
    minLevel: isProduction ? "INFO" : "DEBUG",
    jsonOutput: isProduction,
    consoleOutput: process.env.NODE_ENV !== "test",
    includeStackTraces: !isProduction,
    ringBufferSize: 500,
  };
}

let config: LoggerConfig = defaultConfig();

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

const ringBuffer: StructuredLogEntry[] = [];

let stats: LoggerStats = emptyStats();

function emptyStats(): LoggerStats {
  return {
    totalLogs: 0,
    logsByLevel: { DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
    errorsLogged: 0,
  };
}

const contextStore = new AsyncLocalStorage<LogContext>();

// ---------------------------------------------------------------------------
// Context Management
// ---------------------------------------------------------------------------

/**
 * Execute a function with a specific logging context. Every log written
 * while `fn` runs, including after awaits, carries the context fields.
 */
export function withLogContext<T>(ctx: LogContext, fn: () => Promise<T>): Promise<T> {
  const parent = contextStore.getStore() ?? {};
  return contextStore.run({ ...parent, ...ctx }, fn);
}

export function getLogContext(): LogContext {
  return contextStore.getStore() ?? {};
}

export function configureLogger(overrides: Partial<LoggerConfig>): void {
  config = { ...config, ...overrides };
}

// ---------------------------------------------------------------------------
// Core Logging
// ---------------------------------------------------------------------------

function log(
  level: LogLevel,
  service: string,
  message: string,
  data?: Record<string, unknown>,
  error?: Error,
): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[config.minLevel]) {
    return;
  }

  const entry: StructuredLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service,
    message,
    ...getLogContext(),
    ...(data && { data }),
  };

  if (error) {
    entry.error = {
      name: error.name,
      message: error.message,
      stack: config.includeStackTraces ? error.stack : undefined,
    };
    stats.errorsLogged++;
  }

  stats.totalLogs++;
  stats.logsByLevel[level]++;

  ringBuffer.push(entry);
  if (ringBuffer.length > config.ringBufferSize) {
    ringBuffer.splice(0, ringBuffer.length - config.ringBufferSize);
  }

  if (!config.consoleOutput) return;

  let output: string;
  if (config.jsonOutput) {
    output = JSON.stringify(entry);
  } else {
    const trace = entry.traceId ? ` (trace:${entry.traceId.slice(0, 8)})` : "";
    const dataStr = data ? ` ${JSON.stringify(data)}` : "";
    const errorStr = error ? ` ERROR: ${error.message}` : "";
    output = `[${level}][${service}]${trace} ${message}${dataStr}${errorStr}`;
  }

  if (level === "ERROR" || level === "FATAL") {
    console.error(output);
  } else if (level === "WARN") {
    console.warn(output);
  } else {
    console.log(output);
  }
}

// ---------------------------------------------------------------------------
// Log Level Methods
// ---------------------------------------------------------------------------

export const logger = {
  debug(service: string, message: string, data?: Record<string, unknown>): void {
    log("DEBUG", service, message, data);
  },

  info(service: string, message: string, data?: Record<string, unknown>): void {
    log("INFO", service, message, data);
  },

  warn(service: string, message: string, data?: Record<string, unknown>): void {
    log("WARN", service, message, data);
  },

  error(service: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    log("ERROR", service, message, data, error);
  },

  fatal(service: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    log("FATAL", service, message, data, error);
  },
};

/**
 * Normalize a thrown value so it can be attached to an ERROR entry.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ---------------------------------------------------------------------------
// Inspection
// ---------------------------------------------------------------------------

/**
 * Most recent entries, oldest first, optionally filtered by level.
 */
export function getRecentLogs(limit = 50, level?: LogLevel): StructuredLogEntry[] {
  const filtered = level ? ringBuffer.filter((e) => e.level === level) : ringBuffer;
  return filtered.slice(-limit);
}

export function getLoggerStats(): LoggerStats {
  return {
    ...stats,
    logsByLevel: { ...stats.logsByLevel },
  };
}

/**
 * Clear buffers, counters and overrides. Used between tests.
 */
export function resetLogger(): void {
  ringBuffer.length = 0;
  stats = emptyStats();
  config = defaultConfig();
}
