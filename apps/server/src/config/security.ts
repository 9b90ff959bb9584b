import cors from "cors";
import { type Express } from "express";
import helmet from "helmet";

export interface SecurityOptions {
  // Accept every origin when undefined (the chart page may be opened from file://)
  appOrigin?: string;
  production: boolean;
}

export function setupSecurity(app: Express, options: SecurityOptions) {
  app.use(
    helmet({
      contentSecurityPolicy: options.production
        ? {
            useDefaults: true,
            directives: {
              "script-src": ["'self'"],
              "connect-src": ["'self'", ...(options.appOrigin ? [options.appOrigin] : [])],
            },
          }
        : false,
      crossOriginEmbedderPolicy: false,
    }),
  );

  const allowedOrigin = options.appOrigin;
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || !allowedOrigin || origin === allowedOrigin) {
          return callback(null, true);
        }
        return callback(new Error(`Origin ${origin} not allowed by CORS`));
      },
      methods: ["GET", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
      exposedHeaders: ["X-Request-Id"],
    }),
  );
}
