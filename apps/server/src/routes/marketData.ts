// GET /api/mnq-data?date=YYYY-MM-DD - 30s/5m/15m bars for one trading date

import { Router, type Router as ExpressRouter } from "express";

import type { SessionBarsService } from "@server/history/service";
import type { TradingCalendar } from "@server/market/calendar";
import { marketDataQuerySchema } from "@shared/schemas";

export function createMarketDataRouter(sessions: SessionBarsService, calendar: TradingCalendar): ExpressRouter {
  const router: ExpressRouter = Router();

  router.get("/mnq-data", async (req, res, next) => {
    try {
      const query = marketDataQuerySchema.parse(req.query);
      const date = query.date ? calendar.parseDate(query.date) : calendar.defaultDate();

      res.json(await sessions.getChartData(date));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
