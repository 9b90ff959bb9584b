import { describe, it, expect } from "vitest";

import { TimeframeConfigError } from "@server/errors";

import { aggregateBars } from "../rollups";
import {
  MINUTE_MS,
  SESSION_OPEN_MS,
  isStrictlyIncreasing,
  minuteBar,
  randomWalkBars,
  satisfiesOhlc,
} from "./fixtures";

const FIVE_MIN = 5 * MINUTE_MS;
const FIFTEEN_MIN = 15 * MINUTE_MS;

function rollup(bars: Parameters<typeof aggregateBars>[0], targetIntervalMs: number, anchorMs = SESSION_OPEN_MS) {
  return aggregateBars(bars, { baseIntervalMs: MINUTE_MS, targetIntervalMs, anchorMs });
}

describe("aggregateBars", () => {
  it("should combine two 1m bars in one bucket with first/max/min/last/sum", () => {
    const bars = [minuteBar(0, 100, 105, 98, 102, 1000), minuteBar(1, 102, 107, 101, 106, 800)];

    expect(rollup(bars, FIVE_MIN)).toEqual([
      { timestamp: SESSION_OPEN_MS, open: 100, high: 107, low: 98, close: 106, volume: 1800 },
    ]);
  });

  it("should drop empty buckets instead of gap-filling", () => {
    const bars = [
      minuteBar(0, 100, 101, 99, 100, 10),
      minuteBar(1, 100, 102, 99, 101, 10),
      minuteBar(7, 101, 103, 100, 102, 10),
      minuteBar(16, 102, 104, 101, 103, 10),
    ];

    const fiveMin = rollup(bars, FIVE_MIN);
    expect(fiveMin.map((b) => b.timestamp)).toEqual([
      SESSION_OPEN_MS,
      SESSION_OPEN_MS + FIVE_MIN,
      SESSION_OPEN_MS + 3 * FIVE_MIN,
    ]);
    expect(fiveMin.map((b) => b.volume)).toEqual([20, 10, 10]);

    const fifteenMin = rollup(bars, FIFTEEN_MIN);
    expect(fifteenMin).toEqual([
      { timestamp: SESSION_OPEN_MS, open: 100, high: 103, low: 99, close: 102, volume: 30 },
      { timestamp: SESSION_OPEN_MS + FIFTEEN_MIN, open: 102, high: 104, low: 101, close: 103, volume: 10 },
    ]);
  });

  it("should align buckets to the anchor", () => {
    const bars = [0, 1, 2, 3, 4].map((m) => minuteBar(m, 100, 101, 99, 100, 1));
    const shiftedAnchor = SESSION_OPEN_MS + 2 * MINUTE_MS;

    const rolled = rollup(bars, FIVE_MIN, shiftedAnchor);
    expect(rolled.map((b) => b.timestamp)).toEqual([shiftedAnchor - FIVE_MIN, shiftedAnchor]);
    expect(rolled.map((b) => b.volume)).toEqual([2, 3]);
  });

  it("should return the input unchanged when the target equals the base interval", () => {
    const bars = randomWalkBars(12);
    const result = rollup(bars, MINUTE_MS);

    expect(result).toEqual(bars);
    expect(result).not.toBe(bars);
  });

  it("should return an empty array for empty input", () => {
    expect(rollup([], FIVE_MIN)).toEqual([]);
  });

  it.each([0, -FIVE_MIN, 90_000, 1.5])("should reject target interval %s", (target) => {
    expect(() => rollup([], target)).toThrow(TimeframeConfigError);
    expect(() => rollup(randomWalkBars(3), target)).toThrow(TimeframeConfigError);
  });

  it("should keep the OHLC invariant, volume total and strict ordering", () => {
    const bars = randomWalkBars(390);

    for (const target of [FIVE_MIN, FIFTEEN_MIN]) {
      const rolled = rollup(bars, target);

      expect(rolled).toHaveLength(390 / (target / MINUTE_MS));
      expect(rolled.every(satisfiesOhlc)).toBe(true);
      expect(isStrictlyIncreasing(rolled)).toBe(true);

      const totalIn = bars.reduce((sum, b) => sum + b.volume, 0);
      const totalOut = rolled.reduce((sum, b) => sum + b.volume, 0);
      expect(totalOut).toBe(totalIn);
    }
  });
});
