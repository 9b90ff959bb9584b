// Deterministic roll-up engine: 1m → 5m/15m
// Buckets are anchored on the trading-window open, not on the UTC hour

import { TimeframeConfigError } from "@server/errors";
import type { Bar } from "@shared/types/market";
import { floorToSessionBucket } from "@shared/utils/time";

export interface RollupOptions {
  baseIntervalMs: number;
  targetIntervalMs: number;
  // Bucket boundaries fall on anchorMs + k * targetIntervalMs
  anchorMs: number;
}

/**
 * Reject intervals that cannot be built from the base bars.
 * Runs before any bucketing so a bad config never yields a partial result.
 */
export function assertRollupInterval(baseIntervalMs: number, targetIntervalMs: number): void {
  if (!Number.isInteger(baseIntervalMs) || baseIntervalMs <= 0) {
    throw new TimeframeConfigError(`Base interval must be a positive whole number of ms, got ${baseIntervalMs}`, {
      baseIntervalMs,
    });
  }
  if (!Number.isInteger(targetIntervalMs) || targetIntervalMs <= 0) {
    throw new TimeframeConfigError(`Target interval must be a positive whole number of ms, got ${targetIntervalMs}`, {
      targetIntervalMs,
    });
  }
  if (targetIntervalMs % baseIntervalMs !== 0) {
    throw new TimeframeConfigError(
      `Target interval ${targetIntervalMs}ms is not a multiple of the base interval ${baseIntervalMs}ms`,
      { baseIntervalMs, targetIntervalMs },
    );
  }
}

// Roll base bars up into coarser bars; empty buckets are dropped, not gap-filled
export function aggregateBars(bars: readonly Bar[], options: RollupOptions): Bar[] {
  const { baseIntervalMs, targetIntervalMs, anchorMs } = options;
  assertRollupInterval(baseIntervalMs, targetIntervalMs);

  // Identity: same interval in, same bars out
  if (targetIntervalMs === baseIntervalMs) {
    return bars.map((bar) => ({ ...bar }));
  }

  if (bars.length === 0) return [];

  // Group bars by bucket, keeping arrival order inside each bucket
  const buckets = new Map<number, Bar[]>();

  for (const bar of bars) {
    const bucketStart = floorToSessionBucket(bar.timestamp, anchorMs, targetIntervalMs);
    const bucket = buckets.get(bucketStart);
    if (bucket) {
      bucket.push(bar);
    } else {
      buckets.set(bucketStart, [bar]);
    }
  }

  const sortedBuckets = Array.from(buckets.entries()).sort((a, b) => a[0] - b[0]);
  const rolled: Bar[] = [];

  for (const [bucketStart, barsInBucket] of sortedBuckets) {
    const [first, ...rest] = barsInBucket;
    if (!first) continue;

    let high = first.high;
    let low = first.low;
    let close = first.close;
    let volume = first.volume;

    for (const bar of rest) {
      high = Math.max(high, bar.high);
      low = Math.min(low, bar.low);
      close = bar.close;
      volume += bar.volume;
    }

    rolled.push({
      timestamp: bucketStart,
      open: first.open,
      high,
      low,
      close,
      volume,
    });
  }

  return rolled;
}
