import type { Express } from "express";
import type { Server } from "http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { z } from "zod";

import { createApp } from "./app";
import { WinRateEvaluator } from "./backtest/winrate";
import { TimeframeEngine } from "./chart/timeframes";
import { SessionBarsService } from "./history/service";
import { TradingCalendar } from "./market/calendar";
import { MockBarSource } from "./market/mockBars";
import type { MarketDataSource } from "./market/source";

const barRecordSchema = z.object({ timestamp: z.string() }).passthrough();

const chartBodySchema = z.object({
  date: z.string(),
  session: z.string(),
  message: z.string().optional(),
  market_hours: z.object({ open: z.string(), close: z.string(), timezone: z.string() }),
  data: z.object({
    "30s": z.array(barRecordSchema),
    "5m": z.array(barRecordSchema),
    "15m": z.array(barRecordSchema),
  }),
});

const winRateBodySchema = z.object({
  symbol: z.string(),
  reference_date: z.string(),
  lookback_days: z.number(),
  total_days: z.number(),
  daily_breakdown: z.array(z.object({ date: z.string() })),
});

const errorBodySchema = z.object({
  ok: z.literal(false),
  error: z.object({ code: z.string(), message: z.string() }),
});

const healthBodySchema = z.object({ status: z.string(), message: z.string() });

function buildApp(source: MarketDataSource): Express {
  const calendar = new TradingCalendar();
  const engine = new TimeframeEngine();
  const sessions = new SessionBarsService({ source, calendar, engine, symbol: "MNQ=F" });
  const winRate = new WinRateEvaluator({ sessions, calendar, engine });
  return createApp({ sessions, winRate, calendar, winRateLookbackDays: 7, production: false });
}

async function listen(app: Express): Promise<{ server: Server; baseUrl: string }> {
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("Server has no TCP address");
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function close(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    ({ server, baseUrl } = await listen(buildApp(new MockBarSource())));
  });

  afterAll(() => close(server));

  it("should serve every chart timeframe for a date", async () => {
    const res = await fetch(`${baseUrl}/api/mnq-data?date=2024-03-15`);
    const body = chartBodySchema.parse(await res.json());

    expect(res.status).toBe(200);
    expect(res.headers.get("x-request-id")).toHaveLength(10);
    expect(body.date).toBe("2024-03-15");
    expect(body.session).toBe("regular");
    expect(body.market_hours).toEqual({ open: "06:30:00", close: "13:00:00", timezone: "America/Los_Angeles" });
    // 06:30 through 13:00 inclusive is 391 minute bars
    expect(body.data["30s"]).toHaveLength(782);
    expect(body.data["5m"]).toHaveLength(79);
    expect(body.data["15m"]).toHaveLength(27);
    expect(body.data["5m"][0]?.timestamp).toBe("2024-03-15T06:30:00-07:00");
  });

  it("should reject a malformed date", async () => {
    const res = await fetch(`${baseUrl}/api/mnq-data?date=15-03-2024`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      ok: false,
      error: {
        code: "INVALID_DATE",
        message: 'Invalid date format: "15-03-2024" (expected YYYY-MM-DD)',
        details: { input: "15-03-2024" },
      },
    });
  });

  it("should evaluate the win rate over the requested days", async () => {
    const res = await fetch(`${baseUrl}/api/winrate?date=2024-03-15&days=2`);
    const body = winRateBodySchema.parse(await res.json());

    expect(res.status).toBe(200);
    expect(body.symbol).toBe("MNQ=F");
    expect(body.reference_date).toBe("2024-03-15");
    expect(body.lookback_days).toBe(2);
    expect(body.total_days).toBe(2);
    expect(body.daily_breakdown.map((d) => d.date)).toEqual(["2024-03-14", "2024-03-15"]);
  });

  it("should reject an out-of-range lookback", async () => {
    const res = await fetch(`${baseUrl}/api/winrate?days=0`);
    const body = errorBodySchema.parse(await res.json());

    expect(res.status).toBe(400);
    expect(body.error.code).toBe("INVALID_REQUEST");
  });

  it.each(["/health", "/api/health"])("should answer the health check at %s", async (path) => {
    const res = await fetch(`${baseUrl}${path}`);
    const body = healthBodySchema.parse(await res.json());

    expect(res.status).toBe(200);
    expect(body.status).toBe("healthy");
    expect(body.message).toBe("API is working");
  });

  it("should return 404 for unknown routes", async () => {
    const res = await fetch(`${baseUrl}/api/unknown`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      ok: false,
      error: { code: "NOT_FOUND", message: "Route not found: GET /api/unknown" },
    });
  });
});

describe("HTTP API without upstream data", () => {
  const emptySource: MarketDataSource = {
    name: "empty",
    fetchMinuteBars: async () => [],
  };
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    ({ server, baseUrl } = await listen(buildApp(emptySource)));
  });

  afterAll(() => close(server));

  it("should keep every timeframe key, each empty, when the provider has nothing", async () => {
    const res = await fetch(`${baseUrl}/api/mnq-data?date=2024-03-15`);
    const body = chartBodySchema.parse(await res.json());

    expect(res.status).toBe(200);
    expect(body.session).toBe("none");
    expect(body.message).toBe(
      "No data found for MNQ=F on 2024-03-15. Intraday 1-minute data is usually only available for recent days.",
    );
    expect(body.data).toEqual({ "30s": [], "5m": [], "15m": [] });
  });

  it("should report an empty win rate rather than an error", async () => {
    const res = await fetch(`${baseUrl}/api/winrate?date=2024-03-15&days=3`);
    const body = winRateBodySchema.parse(await res.json());

    expect(res.status).toBe(200);
    expect(body.total_days).toBe(0);
    expect(body.daily_breakdown).toEqual([]);
  });
});
