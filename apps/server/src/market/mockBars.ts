import type { Bar } from "@shared/types/market";

import type { MarketDataSource, MinuteBarQuery } from "./source";

interface MockBarConfig {
  basePrice: number;
  volatility: number; // max per-minute move as a fraction of price
  baseVolume: number;
}

const DEFAULT_CONFIGS: Record<string, MockBarConfig> = {
  "MNQ=F": { basePrice: 18000, volatility: 0.0006, baseVolume: 400 },
  "NQ=F": { basePrice: 18000, volatility: 0.0006, baseVolume: 150 },
  "ES=F": { basePrice: 5200, volatility: 0.0004, baseVolume: 900 },
};

const FALLBACK_CONFIG: MockBarConfig = { basePrice: 100, volatility: 0.001, baseVolume: 100 };
const MINUTE_MS = 60_000;

// mulberry32: small seeded PRNG so the same range always yields the same bars
function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function hashSeed(symbol: string, fromMs: number): number {
  let hash = Math.floor(fromMs / MINUTE_MS);
  for (const ch of symbol) {
    hash = Math.imul(hash ^ ch.charCodeAt(0), 16777619);
  }
  return hash >>> 0;
}

/**
 * Offline stand-in for the upstream provider.
 * Emits one bar per minute across the whole requested range, with a
 * mean-reverting random walk that is deterministic per symbol and range.
 */
export class MockBarSource implements MarketDataSource {
  readonly name = "mock";

  constructor(private readonly configs: Record<string, MockBarConfig> = DEFAULT_CONFIGS) {}

  async fetchMinuteBars(query: MinuteBarQuery): Promise<Bar[]> {
    const config = this.configs[query.symbol] ?? FALLBACK_CONFIG;
    const random = seededRandom(hashSeed(query.symbol, query.fromMs));
    const firstMinute = Math.ceil(query.fromMs / MINUTE_MS) * MINUTE_MS;

    const bars: Bar[] = [];
    let price = config.basePrice;

    for (let ts = firstMinute; ts < query.toMs; ts += MINUTE_MS) {
      const drift = (config.basePrice - price) * 0.01;
      const move = (random() - 0.5) * 2 * config.volatility * price;

      const open = price;
      const close = open + drift + move;
      const spread = Math.abs(move) * (0.3 + random() * 0.7);
      const high = Math.max(open, close) + spread * random();
      const low = Math.min(open, close) - spread * random();
      const volume = Math.floor(config.baseVolume * (0.5 + random()));

      bars.push({
        timestamp: ts,
        open: round2(open),
        high: round2(high),
        low: round2(low),
        close: round2(close),
        volume,
      });

      price = close;
    }

    return bars;
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
