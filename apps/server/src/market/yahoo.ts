import { UpstreamError } from "@server/errors";
import { componentLogger } from "@server/logger";
import type { Bar } from "@shared/types/market";
import type { Logger } from "pino";
import { z } from "zod";

import type { MarketDataSource, MinuteBarQuery } from "./source";

const priceColumn = z.array(z.number().nullable()).optional();

// Yahoo v8 chart payload; only the fields we read
const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: priceColumn,
                high: priceColumn,
                low: priceColumn,
                close: priceColumn,
                volume: priceColumn,
              }),
            ),
          }),
        }),
      )
      .nullable(),
    error: z
      .object({
        code: z.string(),
        description: z.string(),
      })
      .nullable()
      .optional(),
  }),
});

type ChartResponse = z.infer<typeof chartResponseSchema>;

export interface YahooChartSourceOptions {
  baseUrl: string;
  timeoutMs: number;
  logger?: Logger;
}

const MINUTE_MS = 60_000;

// Status codes Yahoo uses for "no 1m data for that range"
const NO_DATA_STATUSES = new Set([404, 422]);

/**
 * 1-minute bars from the Yahoo Finance chart endpoint
 */
export class YahooChartSource implements MarketDataSource {
  readonly name = "yahoo";
  private readonly log: Logger;

  constructor(private readonly options: YahooChartSourceOptions) {
    this.log = componentLogger("yahoo", options.logger);
  }

  async fetchMinuteBars(query: MinuteBarQuery): Promise<Bar[]> {
    const { symbol, fromMs, toMs, includePrePost } = query;
    const url = `${this.options.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}`;
    const params = new URLSearchParams({
      period1: String(Math.floor(fromMs / 1000)),
      period2: String(Math.floor(toMs / 1000)),
      interval: "1m",
      includePrePost: String(includePrePost),
    });

    let response: Response;
    try {
      response = await fetch(`${url}?${params.toString()}`, {
        headers: { Accept: "application/json", "User-Agent": "Mozilla/5.0" },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new UpstreamError(`Yahoo request failed for ${symbol}: ${err instanceof Error ? err.message : String(err)}`, {
        symbol,
        stage: "fetch",
      });
    }

    const raw = await response.text();
    const payload = this.parse(raw, symbol, response.status);

    if (!response.ok) {
      const description = payload?.chart.error?.description ?? raw.slice(0, 300);
      if (NO_DATA_STATUSES.has(response.status)) {
        this.log.warn({ symbol, status: response.status, description }, "No chart data for range");
        return [];
      }
      throw new UpstreamError(`Yahoo chart error ${response.status} for ${symbol}: ${description}`, {
        symbol,
        status: response.status,
        stage: "fetch",
      });
    }

    if (!payload) {
      throw new UpstreamError(`Unreadable Yahoo chart response for ${symbol}`, { symbol, stage: "parse" });
    }

    const bars = toBars(payload, fromMs, toMs);
    this.log.debug({ symbol, count: bars.length, fromMs, toMs }, "Fetched 1m bars");
    return bars;
  }

  private parse(raw: string, symbol: string, status: number): ChartResponse | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.log.warn({ symbol, status }, "Yahoo response is not JSON");
      return null;
    }

    const parsed = chartResponseSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn({ symbol, status, issues: parsed.error.issues.slice(0, 3) }, "Unexpected Yahoo chart shape");
      return null;
    }
    return parsed.data;
  }
}

/**
 * Zip Yahoo's column arrays into bars.
 * Rows with a missing price are dropped; a missing volume counts as 0.
 * Timestamps are floored to the minute (the trailing live point is stamped at
 * quote time) and a row landing on an already-emitted minute is dropped.
 * Output is strictly increasing, minute-aligned and clipped to [fromMs, toMs).
 */
export function toBars(payload: ChartResponse, fromMs: number, toMs: number): Bar[] {
  const result = payload.chart.result?.[0];
  const quote = result?.indicators.quote[0];
  const timestamps = result?.timestamp ?? [];
  if (!quote) return [];

  const bars: Bar[] = [];
  let lastTs = -Infinity;

  timestamps.forEach((seconds, i) => {
    const timestamp = Math.floor(seconds / 60) * MINUTE_MS;
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];

    if (open == null || high == null || low == null || close == null) return;
    if (timestamp < fromMs || timestamp >= toMs || timestamp <= lastTs) return;

    bars.push({ timestamp, open, high, low, close, volume: quote.volume?.[i] ?? 0 });
    lastTs = timestamp;
  });

  return bars;
}
