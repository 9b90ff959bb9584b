import { validateEnv } from "@shared/env";
import { createServer } from "http";

import { createApp } from "./app";
import { WinRateEvaluator } from "./backtest/winrate";
import { TimeframeEngine } from "./chart/timeframes";
import { setServerReady } from "./health";
import { SessionBarsService } from "./history/service";
import { logger } from "./logger";
import { createMarketSource } from "./market/bootstrap";
import { TradingCalendar } from "./market/calendar";

const env = validateEnv(process.env);

// Not ready until the listener is bound
setServerReady(false);

const calendar = new TradingCalendar({
  timeZone: env.MARKET_TIMEZONE,
  open: env.SESSION_OPEN,
  close: env.SESSION_CLOSE,
});
const engine = new TimeframeEngine({ baseTimeframe: "1m" });
const source = createMarketSource(env);
const sessions = new SessionBarsService({ source, calendar, engine, symbol: env.MARKET_SYMBOL });
const winRate = new WinRateEvaluator({ sessions, calendar, engine });

const app = createApp({
  sessions,
  winRate,
  calendar,
  winRateLookbackDays: env.WINRATE_LOOKBACK_DAYS,
  appOrigin: env.APP_ORIGIN,
  production: env.NODE_ENV === "production",
});
const server = createServer(app);

server.keepAliveTimeout = 75000;
server.headersTimeout = 80000;

server.listen(env.PORT, "0.0.0.0", () => {
  setServerReady(true);
  logger.info(
    {
      port: env.PORT,
      env: env.NODE_ENV,
      source: source.name,
      symbol: env.MARKET_SYMBOL,
      timeZone: calendar.timeZone,
      window: `${calendar.open}-${calendar.close}`,
    },
    "✅ Server running",
  );
});

// Global process error handlers for crash visibility
process.on("uncaughtException", (error) => {
  logger.fatal({ err: error }, "[CRITICAL] Uncaught Exception");
  setServerReady(false);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "[CRITICAL] Unhandled Rejection");
  setServerReady(false);
  process.exit(1);
});

// Graceful shutdown handlers
function shutdown(signal: string) {
  logger.info(`[Server] ${signal} received, closing server gracefully...`);
  setServerReady(false);
  server.close(() => {
    logger.info("[Server] Closed");
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
