// First-candle breakout statistics

export type CandleDirection = "up" | "down";

export interface FirstCandle {
  open: number;
  high: number;
  low: number;
  close: number;
}

export interface DailyStrategyResult {
  readonly date: string;
  readonly first_candle: Readonly<FirstCandle>;
  readonly range: number;
  readonly direction: CandleDirection;
  readonly wins: number;
  readonly losses: number;
  readonly total_trades: number;
  readonly winrate: number; // percent, 0 when no trades
}

export interface WinRateSummary {
  overall_winrate: number; // unweighted mean of daily win rates
  winning_days: number;
  total_days: number;
  total_wins: number;
  total_losses: number;
  daily_breakdown: DailyStrategyResult[];
}

export interface WinRateResponse extends WinRateSummary {
  symbol: string;
  reference_date: string;
  lookback_days: number;
}
