// Timeframe dispatch: one base series in, every chart timeframe out.
// Finer-than-base timeframes are synthesized, coarser ones rolled up.
// All roll-ups read the original base bars, never the synthetic 30s series.

import { TimeframeConfigError } from "@server/errors";
import {
  CHART_TIMEFRAMES,
  TIMEFRAME_TO_MS,
  type Bar,
  type Timeframe,
  type TimeframeSeries,
} from "@shared/types/market";

import { aggregateBars, assertRollupInterval } from "./rollups";
import { synthesizeSeries } from "./synthetic";

export interface TimeframeEngineOptions {
  baseTimeframe: Timeframe;
}

type ResampleStrategy = "synthesize" | "identity" | "rollup";

const DEFAULT_OPTIONS: TimeframeEngineOptions = { baseTimeframe: "1m" };

export class TimeframeEngine {
  readonly baseTimeframe: Timeframe;
  readonly baseIntervalMs: number;

  constructor(options: TimeframeEngineOptions = DEFAULT_OPTIONS) {
    this.baseTimeframe = options.baseTimeframe;
    this.baseIntervalMs = TIMEFRAME_TO_MS[options.baseTimeframe];

    // Fail at construction if any chart timeframe is unreachable from the base
    for (const timeframe of CHART_TIMEFRAMES) {
      this.strategyFor(timeframe);
    }
  }

  private strategyFor(timeframe: Timeframe): ResampleStrategy {
    const targetMs = TIMEFRAME_TO_MS[timeframe];

    if (targetMs < this.baseIntervalMs) {
      // Only a single halving is supported
      if (targetMs * 2 !== this.baseIntervalMs) {
        throw new TimeframeConfigError(
          `Cannot synthesize ${timeframe} from ${this.baseTimeframe} bars: only half-interval bars can be synthesized`,
          { timeframe, baseTimeframe: this.baseTimeframe },
        );
      }
      return "synthesize";
    }

    assertRollupInterval(this.baseIntervalMs, targetMs);
    return targetMs === this.baseIntervalMs ? "identity" : "rollup";
  }

  /**
   * Re-express base bars at `timeframe`.
   *
   * @param anchorMs - trading-window open; roll-up buckets align to it
   */
  resample(bars: readonly Bar[], timeframe: Timeframe, anchorMs: number): Bar[] {
    switch (this.strategyFor(timeframe)) {
      case "synthesize":
        return synthesizeSeries(bars, this.baseIntervalMs);
      case "identity":
        return bars.map((bar) => ({ ...bar }));
      case "rollup":
        return aggregateBars(bars, {
          baseIntervalMs: this.baseIntervalMs,
          targetIntervalMs: TIMEFRAME_TO_MS[timeframe],
          anchorMs,
        });
    }
  }

  // Every chart timeframe from the same base; empty base → empty arrays, never missing keys
  buildTimeframes(bars: readonly Bar[], anchorMs: number): TimeframeSeries {
    return {
      "30s": this.resample(bars, "30s", anchorMs),
      "5m": this.resample(bars, "5m", anchorMs),
      "15m": this.resample(bars, "15m", anchorMs),
    };
  }
}
