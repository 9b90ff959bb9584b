import { z } from 'zod';

// Shape only; calendar validity is checked by the trading calendar
const dateParam = z.string().trim().min(1).optional();

export const marketDataQuerySchema = z.object({
  date: dateParam,
});

export const winRateQuerySchema = z.object({
  date: dateParam,
  days: z.coerce.number().int().min(1).max(30).optional(),
});
