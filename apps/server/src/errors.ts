/**
 * Errors that map onto an HTTP response.
 * `errorHandler` reads `status`, `code` and `details` when rendering them.
 */
export class AppError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, status: number, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "AppError";
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export class InvalidDateError extends AppError {
  constructor(input: string) {
    super(`Invalid date format: "${input}" (expected YYYY-MM-DD)`, 400, "INVALID_DATE", { input });
    this.name = "InvalidDateError";
  }
}

export class UpstreamError extends AppError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 502, "UPSTREAM_ERROR", details);
    this.name = "UpstreamError";
  }
}

export class TimeframeConfigError extends AppError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 500, "TIMEFRAME_CONFIG", details);
    this.name = "TimeframeConfigError";
  }
}
