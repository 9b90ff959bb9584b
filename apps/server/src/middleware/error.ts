import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";

import { AppError } from "@server/errors";
import { logger } from "@server/logger";

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ZodError) {
    res.status(400).json({
      ok: false,
      error: {
        code: "INVALID_REQUEST",
        message: "Invalid request parameters",
        details: err.errors,
      },
    });
    return;
  }

  const status = err instanceof AppError ? err.status : 500;
  const code = err instanceof AppError ? err.code : "INTERNAL_ERROR";
  const message = err instanceof Error ? err.message : "Unexpected server error";
  const details = err instanceof AppError ? err.details : undefined;

  const entry = {
    status,
    code,
    message,
    details,
    path: req.path,
    method: req.method,
    stack: status >= 500 && err instanceof Error ? err.stack : undefined,
  };
  if (status >= 500) {
    logger.error(entry, "[API Error]");
  } else {
    logger.warn(entry, "[API Error]");
  }

  res.status(status).json({
    ok: false,
    error: {
      code,
      message,
      ...(details ? { details } : {}),
    },
  });
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({
    ok: false,
    error: {
      code: "NOT_FOUND",
      message: `Route not found: ${req.method} ${req.path}`,
    },
  });
}
