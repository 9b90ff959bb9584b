import type { Bar } from "@shared/types/market";

export interface MinuteBarQuery {
  symbol: string;
  fromMs: number; // inclusive
  toMs: number; // exclusive
  includePrePost: boolean;
}

/**
 * Upstream provider of 1-minute bars.
 * An empty array means "no data for that range"; failures are thrown.
 */
export interface MarketDataSource {
  readonly name: string;
  fetchMinuteBars(query: MinuteBarQuery): Promise<Bar[]>;
}
