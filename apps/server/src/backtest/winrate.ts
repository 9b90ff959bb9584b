/**
 * First-candle breakout win rate.
 *
 * The first 30s bar of the session is the reference. Every later 30s bar that
 * breaks its high counts as a win for an up candle and a loss for a down one;
 * breaking its low counts the other way round. The high check runs first, so
 * a bar that breaks both sides is classified once, by its high.
 */

import type { TimeframeEngine } from "@server/chart/timeframes";
import type { SessionBarsService } from "@server/history/service";
import { componentLogger } from "@server/logger";
import type { TradingCalendar } from "@server/market/calendar";
import type { Bar } from "@shared/types/market";
import type { DailyStrategyResult, WinRateResponse, WinRateSummary } from "@shared/types/winrate";
import type { Logger } from "pino";

const MIN_BARS = 2;

/**
 * Replay one day's 30s bars against the first candle.
 * Returns null when there are fewer than two bars to work with.
 */
export function evaluateFirstCandle(date: string, bars30s: readonly Bar[]): DailyStrategyResult | null {
  const [reference, ...rest] = bars30s;
  if (!reference || bars30s.length < MIN_BARS) return null;

  const direction = reference.close >= reference.open ? "up" : "down";
  let wins = 0;
  let losses = 0;

  for (const bar of rest) {
    if (bar.high > reference.high) {
      if (direction === "up") wins++;
      else losses++;
    } else if (bar.low < reference.low) {
      if (direction === "down") wins++;
      else losses++;
    }
  }

  const totalTrades = wins + losses;

  return Object.freeze({
    date,
    first_candle: Object.freeze({
      open: reference.open,
      high: reference.high,
      low: reference.low,
      close: reference.close,
    }),
    range: reference.high - reference.low,
    direction,
    wins,
    losses,
    total_trades: totalTrades,
    winrate: totalTrades > 0 ? (wins / totalTrades) * 100 : 0,
  });
}

// Overall rate is the plain mean of daily rates, not wins / trades across days
export function summarizeWinRate(results: readonly DailyStrategyResult[]): WinRateSummary {
  const totalDays = results.length;
  const rateSum = results.reduce((sum, r) => sum + r.winrate, 0);

  return {
    overall_winrate: totalDays > 0 ? rateSum / totalDays : 0,
    winning_days: results.filter((r) => r.winrate > 50).length,
    total_days: totalDays,
    total_wins: results.reduce((sum, r) => sum + r.wins, 0),
    total_losses: results.reduce((sum, r) => sum + r.losses, 0),
    daily_breakdown: [...results],
  };
}

export interface WinRateEvaluatorDeps {
  sessions: SessionBarsService;
  calendar: TradingCalendar;
  engine: TimeframeEngine;
  logger?: Logger;
}

export class WinRateEvaluator {
  private readonly log: Logger;

  constructor(private readonly deps: WinRateEvaluatorDeps) {
    this.log = componentLogger("winrate", deps.logger);
  }

  /**
   * Evaluate the `days` business days ending at `referenceDate`, one at a time.
   * A day that fails to load or has too little data is logged and left out of
   * both the breakdown and the averages; the remaining days still run.
   */
  async evaluate(referenceDate: string, days: number): Promise<WinRateResponse> {
    const { sessions, calendar, engine } = this.deps;
    const dates = calendar.previousBusinessDays(referenceDate, days);
    const results: DailyStrategyResult[] = [];

    for (const date of dates) {
      let result: DailyStrategyResult | null;
      try {
        const { bars, window } = await sessions.loadSession(date);
        const bars30s = engine.resample(bars, "30s", window.startMs);
        result = evaluateFirstCandle(date, bars30s);
      } catch (err) {
        this.log.warn({ date, err }, "Skipping day: session could not be loaded");
        continue;
      }

      if (!result) {
        this.log.debug({ date }, "Skipping day: not enough 30s bars");
        continue;
      }
      results.push(result);
    }

    const summary = summarizeWinRate(results);
    this.log.info(
      { referenceDate, requested: dates.length, evaluated: summary.total_days, overall: summary.overall_winrate },
      "Win rate evaluated",
    );

    return {
      symbol: sessions.symbol,
      reference_date: referenceDate,
      lookback_days: days,
      ...summary,
    };
  }
}
