import { logger } from "@server/logger";
import type { Env } from "@shared/env";

import { MockBarSource } from "./mockBars";
import type { MarketDataSource } from "./source";
import { YahooChartSource } from "./yahoo";

// The source is chosen once from config and injected; nothing probes for it at import time
export function createMarketSource(env: Env): MarketDataSource {
  if (env.MARKET_SOURCE === "mock") {
    logger.warn("🎭 Using mock market data (MARKET_SOURCE=mock)");
    return new MockBarSource();
  }

  logger.info({ baseUrl: env.YAHOO_BASE_URL }, "Using Yahoo chart data");
  return new YahooChartSource({
    baseUrl: env.YAHOO_BASE_URL,
    timeoutMs: env.UPSTREAM_TIMEOUT_MS,
  });
}
