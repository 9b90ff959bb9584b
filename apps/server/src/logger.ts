import type { NextFunction, Request, Response } from "express";
import { nanoid } from "nanoid";
import pino, { type Logger } from "pino";
import { validateEnv } from "@shared/env";

const env = validateEnv(process.env);

// Root logger; level from LOG_LEVEL, pretty output only in development
export const logger: Logger = pino({
  level: env.LOG_LEVEL,
  base: { service: "futures-bars", symbol: env.MARKET_SYMBOL },
  ...(env.NODE_ENV === "development"
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
});

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

// HTTP request logger middleware
export function createHttpLogger(log: Logger = logger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const requestId = nanoid(10);
    res.setHeader("X-Request-Id", requestId);

    res.on("finish", () => {
      const duration = Date.now() - start;
      const entry = {
        requestId,
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        duration,
        userAgent: req.headers["user-agent"],
      };

      if (res.statusCode >= 500) {
        log.error(entry, "HTTP request error");
      } else if (res.statusCode >= 400) {
        log.warn(entry, "HTTP request warning");
      } else {
        log.debug(entry, "HTTP request");
      }
    });
    next();
  };
}
