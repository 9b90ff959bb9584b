import compression from "compression";
import express, { type Express } from "express";

import type { WinRateEvaluator } from "./backtest/winrate";
import { setupSecurity } from "./config/security";
import { healthz, liveness, readiness } from "./health";
import type { SessionBarsService } from "./history/service";
import { createHttpLogger } from "./logger";
import type { TradingCalendar } from "./market/calendar";
import { errorHandler, notFound } from "./middleware/error";
import { createMarketDataRouter } from "./routes/marketData";
import { createWinRateRouter } from "./routes/winrate";

export interface AppDeps {
  sessions: SessionBarsService;
  winRate: WinRateEvaluator;
  calendar: TradingCalendar;
  winRateLookbackDays: number;
  appOrigin?: string;
  production: boolean;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(compression());
  app.use(express.json());
  setupSecurity(app, { appOrigin: deps.appOrigin, production: deps.production });
  app.use(createHttpLogger());

  // Health and readiness probes
  app.get(["/health", "/api/health"], healthz);
  app.get("/api/livez", liveness);
  app.get("/api/readyz", readiness);

  app.use("/api", createMarketDataRouter(deps.sessions, deps.calendar));
  app.use("/api", createWinRateRouter(deps.winRate, deps.calendar, deps.winRateLookbackDays));

  // Error middleware - must be last
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
