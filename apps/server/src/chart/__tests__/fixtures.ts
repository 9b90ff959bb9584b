import type { Bar } from "@shared/types/market";

export const MINUTE_MS = 60_000;

// 06:30 PDT on 2024-03-15
export const SESSION_OPEN_MS = Date.parse("2024-03-15T13:30:00Z");

export function minuteBar(
  minute: number,
  open: number,
  high: number,
  low: number,
  close: number,
  volume: number,
  anchorMs: number = SESSION_OPEN_MS,
): Bar {
  return { timestamp: anchorMs + minute * MINUTE_MS, open, high, low, close, volume };
}

/**
 * Deterministic random walk of consecutive 1m bars (LCG, fixed seed)
 */
export function randomWalkBars(count: number, seed = 42, anchorMs: number = SESSION_OPEN_MS): Bar[] {
  let state = seed;
  const next = () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };

  const bars: Bar[] = [];
  let price = 18000;

  for (let i = 0; i < count; i++) {
    const open = price;
    const close = open + (next() - 0.5) * 20;
    const high = Math.max(open, close) + next() * 5;
    const low = Math.min(open, close) - next() * 5;
    const volume = Math.floor(next() * 500);
    bars.push({ timestamp: anchorMs + i * MINUTE_MS, open, high, low, close, volume });
    price = close;
  }

  return bars;
}

export function satisfiesOhlc(bar: Bar): boolean {
  return bar.high >= Math.max(bar.open, bar.close) && bar.low <= Math.min(bar.open, bar.close);
}

export function isStrictlyIncreasing(bars: readonly Bar[]): boolean {
  return bars.slice(1).every((bar, i) => bar.timestamp > (bars[i]?.timestamp ?? Infinity));
}
