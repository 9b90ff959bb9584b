// Market data types shared by the chart API and its consumers

export type Timeframe = "30s" | "1m" | "5m" | "15m";

// Bar duration per timeframe
export const TIMEFRAME_TO_MS = {
  "30s": 30_000,
  "1m": 60_000,
  "5m": 300_000,
  "15m": 900_000,
} as const satisfies Record<Timeframe, number>;

// Timeframes served to the chart, in display order
export const CHART_TIMEFRAMES = ["30s", "5m", "15m"] as const;

export type ChartTimeframe = (typeof CHART_TIMEFRAMES)[number];

// One OHLCV candle; timestamp is the bar start in epoch ms
export interface Bar {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

// Wire form of a bar: zone-qualified ISO timestamp, integer volume
export interface BarRecord {
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type TimeframeSeries<T = Bar> = Record<ChartTimeframe, T[]>;

export interface MarketHours {
  open: string; // HH:mm:ss, exchange-local
  close: string;
  timezone: string;
}

// "extended" when the regular window had no bars and the whole day was used,
// "none" when the provider had nothing for the day
export type SessionKind = "regular" | "extended" | "none";

export interface TradingWindow {
  date: string; // YYYY-MM-DD, exchange-local
  timeZone: string;
  startMs: number;
  endMs: number;
}

export interface MarketDataResponse {
  date: string;
  symbol: string;
  market_hours: MarketHours;
  session: SessionKind;
  message?: string; // set when session is "none"
  data: TimeframeSeries<BarRecord>; // every key present, empty when there is no data
}
