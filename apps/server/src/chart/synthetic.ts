// Synthetic sub-bars: each base bar is split into two half-duration bars.
//
// The provider has no ticks below 1 minute, so the split point is approximated
// by mid = (o + h + l + c) / 4. This is an interpolation, not a sample of the
// price at the half-way mark.

import { TimeframeConfigError } from "@server/errors";
import type { Bar } from "@shared/types/market";

export function midPrice(bar: Bar): number {
  return (bar.open + bar.high + bar.low + bar.close) / 4;
}

export function synthesizeHalfBars(bar: Bar, baseIntervalMs: number): [Bar, Bar] {
  if (!Number.isInteger(baseIntervalMs) || baseIntervalMs <= 0 || baseIntervalMs % 2 !== 0) {
    throw new TimeframeConfigError(`Cannot split a ${baseIntervalMs}ms bar into two whole-ms halves`, {
      baseIntervalMs,
    });
  }

  const mid = midPrice(bar);
  const high = Math.max(bar.high, mid);
  const low = Math.min(bar.low, mid);
  // Odd volumes lose one unit; the remainder is not redistributed
  const volume = Math.floor(bar.volume / 2);

  return [
    {
      timestamp: bar.timestamp,
      open: bar.open,
      high,
      low,
      close: mid,
      volume,
    },
    {
      timestamp: bar.timestamp + baseIntervalMs / 2,
      open: mid,
      high,
      low,
      close: bar.close,
      volume,
    },
  ];
}

// N base bars → 2N half bars, input order preserved
export function synthesizeSeries(bars: readonly Bar[], baseIntervalMs: number): Bar[] {
  return bars.flatMap((bar) => synthesizeHalfBars(bar, baseIntervalMs));
}
