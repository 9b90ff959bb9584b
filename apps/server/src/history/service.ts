import type { TimeframeEngine } from "@server/chart/timeframes";
import { AppError, UpstreamError } from "@server/errors";
import { componentLogger } from "@server/logger";
import type { TradingCalendar } from "@server/market/calendar";
import type { MarketDataSource } from "@server/market/source";
import type {
  Bar,
  BarRecord,
  MarketDataResponse,
  SessionKind,
  TimeframeSeries,
  TradingWindow,
} from "@shared/types/market";
import type { Logger } from "pino";

export interface SessionBarsDeps {
  source: MarketDataSource;
  calendar: TradingCalendar;
  engine: TimeframeEngine;
  symbol: string;
  logger?: Logger;
}

export interface SessionBars {
  date: string;
  window: TradingWindow;
  session: SessionKind;
  bars: Bar[]; // 1m base bars, empty when the provider had nothing
}

/**
 * Loads one trading date's 1m bars and turns them into chart series.
 * Every call fetches fresh; nothing is shared between requests.
 */
export class SessionBarsService {
  private readonly log: Logger;

  constructor(private readonly deps: SessionBarsDeps) {
    this.log = componentLogger("history", deps.logger);
  }

  get symbol(): string {
    return this.deps.symbol;
  }

  /**
   * Fetch the whole exchange-local day (pre/post market included) and keep the
   * regular window. When the window is empty but the day is not, the whole day
   * is used and the session is reported as "extended".
   */
  async loadSession(date: string): Promise<SessionBars> {
    const { source, calendar, symbol } = this.deps;
    const window = calendar.windowFor(date);
    const { startMs, endMs } = calendar.dayBounds(date);

    let dayBars: Bar[];
    try {
      dayBars = await source.fetchMinuteBars({ symbol, fromMs: startMs, toMs: endMs, includePrePost: true });
    } catch (err) {
      if (err instanceof AppError) {
        throw new UpstreamError(`${err.message} (date ${date})`, { ...err.details, date, stage: "fetch" });
      }
      throw new UpstreamError(
        `Error fetching ${symbol} bars for ${date}: ${err instanceof Error ? err.message : String(err)}`,
        { date, symbol, source: source.name, stage: "fetch" },
      );
    }

    const regular = dayBars.filter((bar) => calendar.isWithinWindow(bar.timestamp, window));
    const session: SessionKind = dayBars.length === 0 ? "none" : regular.length > 0 ? "regular" : "extended";
    const bars = session === "extended" ? dayBars : regular;

    this.log.debug({ date, fetched: dayBars.length, kept: bars.length, session }, "Loaded session bars");
    return { date, window, session, bars };
  }

  async getChartData(date: string): Promise<MarketDataResponse> {
    const { calendar, engine, symbol } = this.deps;
    const { window, session, bars } = await this.loadSession(date);

    // An empty day still yields all three keys, each an empty series
    const series = engine.buildTimeframes(bars, window.startMs);
    this.log.info(
      { date, session, "30s": series["30s"].length, "5m": series["5m"].length, "15m": series["15m"].length },
      "Built chart timeframes",
    );

    return {
      date,
      symbol,
      market_hours: calendar.marketHours,
      session,
      ...(session === "none" ? { message: noDataMessage(date, symbol) } : {}),
      data: serializeSeries(series, calendar),
    };
  }
}

export function noDataMessage(date: string, symbol: string): string {
  return `No data found for ${symbol} on ${date}. Intraday 1-minute data is usually only available for recent days.`;
}

export function toBarRecord(bar: Bar, calendar: TradingCalendar): BarRecord {
  return {
    timestamp: calendar.formatTimestamp(bar.timestamp),
    open: bar.open,
    high: bar.high,
    low: bar.low,
    close: bar.close,
    volume: Math.trunc(bar.volume),
  };
}

export function serializeSeries(series: TimeframeSeries, calendar: TradingCalendar): TimeframeSeries<BarRecord> {
  return {
    "30s": series["30s"].map((bar) => toBarRecord(bar, calendar)),
    "5m": series["5m"].map((bar) => toBarRecord(bar, calendar)),
    "15m": series["15m"].map((bar) => toBarRecord(bar, calendar)),
  };
}
