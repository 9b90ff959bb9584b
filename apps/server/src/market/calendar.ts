import { InvalidDateError } from "@server/errors";
import type { MarketHours, TradingWindow } from "@shared/types/market";
import {
  addCalendarDays,
  isValidTradingDate,
  rollBackToBusinessDay,
  trailingBusinessDays,
} from "@shared/utils/sessionTime";
import { exchangeDateOf, formatExchangeTimestamp, zonedWallTimeToUtc } from "@shared/utils/time";

export interface TradingCalendarOptions {
  timeZone: string;
  open: string; // HH:mm, exchange-local
  close: string;
}

export const DEFAULT_CALENDAR: TradingCalendarOptions = {
  timeZone: "America/Los_Angeles",
  open: "06:30",
  close: "13:00",
};

/**
 * Exchange timezone and trading-hours context.
 * Injected wherever dates or timestamps are interpreted, so nothing depends on
 * the host timezone.
 */
export class TradingCalendar {
  readonly timeZone: string;
  readonly open: string;
  readonly close: string;

  constructor(options: TradingCalendarOptions = DEFAULT_CALENDAR) {
    this.timeZone = options.timeZone;
    this.open = options.open;
    this.close = options.close;
  }

  get marketHours(): MarketHours {
    return {
      open: `${this.open}:00`,
      close: `${this.close}:00`,
      timezone: this.timeZone,
    };
  }

  parseDate(input: string): string {
    if (!isValidTradingDate(input)) {
      throw new InvalidDateError(input);
    }
    return input;
  }

  // Today in exchange time; weekends fall back to Friday
  defaultDate(nowMs: number = Date.now()): string {
    return rollBackToBusinessDay(exchangeDateOf(nowMs, this.timeZone));
  }

  windowFor(date: string): TradingWindow {
    return {
      date,
      timeZone: this.timeZone,
      startMs: zonedWallTimeToUtc(date, this.open, this.timeZone),
      endMs: zonedWallTimeToUtc(date, this.close, this.timeZone),
    };
  }

  // Local midnight to the next local midnight (23h or 25h on DST days)
  dayBounds(date: string): { startMs: number; endMs: number } {
    return {
      startMs: zonedWallTimeToUtc(date, "00:00", this.timeZone),
      endMs: zonedWallTimeToUtc(addCalendarDays(date, 1), "00:00", this.timeZone),
    };
  }

  // Both ends inclusive: the bar stamped at the close minute is kept
  isWithinWindow(tsMs: number, window: TradingWindow): boolean {
    return tsMs >= window.startMs && tsMs <= window.endMs;
  }

  previousBusinessDays(date: string, count: number): string[] {
    return trailingBusinessDays(date, count);
  }

  formatTimestamp(tsMs: number): string {
    return formatExchangeTimestamp(tsMs, this.timeZone);
  }
}
