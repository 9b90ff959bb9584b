import { z } from "zod";

const clockSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Expected HH:mm");

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  // CORS allow-list; every origin is accepted when unset
  APP_ORIGIN: z.string().url().optional(),

  // Market data
  MARKET_SOURCE: z.enum(["yahoo", "mock"]).default("yahoo"),
  MARKET_SYMBOL: z.string().min(1).default("MNQ=F"),
  YAHOO_BASE_URL: z.string().url().default("https://query1.finance.yahoo.com"),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().min(500).max(60000).default(10000),

  // Exchange-local trading window
  MARKET_TIMEZONE: z.string().min(1).default("America/Los_Angeles"),
  SESSION_OPEN: clockSchema.default("06:30"),
  SESSION_CLOSE: clockSchema.default("13:00"),

  WINRATE_LOOKBACK_DAYS: z.coerce.number().int().min(1).max(30).default(7),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(env: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    console.error("❌ Environment validation failed:");
    console.error(result.error.format());
    throw new Error("Invalid environment variables");
  }

  return result.data;
}
