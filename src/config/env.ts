import { z } from "zod";
import {
  DEFAULT_EXCHANGES,
  parseExchangeList,
  type ExchangeEntry,
} from "../services/exchange-directory.ts";
import { LOG_LEVELS } from "../services/structured-logger.ts";
import { errorMessage } from "../lib/errors.ts";

const DEFAULT_EXCHANGE_LIST = DEFAULT_EXCHANGES.map((e) => `${e.id}=${e.address}`).join(",");

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Overrides the logger's environment-based default
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),

  // Aggregate data service
  DATA_SERVICE_URL: z.url().default("http://localhost:9090"),
  DATA_SERVICE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // Short exchange ids and the canonical addresses they stand for
  EXCHANGES: z
    .string()
    .default(DEFAULT_EXCHANGE_LIST)
    .transform((raw, ctx): ExchangeEntry[] => {
      try {
        return parseExchangeList(raw);
      } catch (err) {
        ctx.addIssue({ code: "custom", message: errorMessage(err) });
        return z.NEVER;
      }
    }),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  return result.data;
}
