// GET /api/winrate?date=YYYY-MM-DD&days=N - first-candle breakout win rate over trailing business days

import { Router, type Router as ExpressRouter } from "express";

import type { WinRateEvaluator } from "@server/backtest/winrate";
import type { TradingCalendar } from "@server/market/calendar";
import { winRateQuerySchema } from "@shared/schemas";

export function createWinRateRouter(
  evaluator: WinRateEvaluator,
  calendar: TradingCalendar,
  defaultDays: number,
): ExpressRouter {
  const router: ExpressRouter = Router();

  router.get("/winrate", async (req, res, next) => {
    try {
      const query = winRateQuerySchema.parse(req.query);
      const referenceDate = query.date ? calendar.parseDate(query.date) : calendar.defaultDate();

      res.json(await evaluator.evaluate(referenceDate, query.days ?? defaultDays));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
