import type { Request, Response } from "express";

let serverReady = true;
const startedAt = Date.now();

export function setServerReady(ready: boolean) {
  serverReady = ready;
}

export function liveness(_req: Request, res: Response) {
  res.status(200).json({ ok: true, status: "live" });
}

export function readiness(_req: Request, res: Response) {
  const status = serverReady ? 200 : 503;
  res.status(status).json({
    ok: serverReady,
    status: serverReady ? "ready" : "starting",
  });
}

export function healthz(_req: Request, res: Response) {
  res.status(200).json({
    ok: true,
    status: "healthy",
    message: "API is working",
    startedAt: new Date(startedAt).toISOString(),
    uptimeSec: Math.round(process.uptime()),
    timestamp: new Date().toISOString(),
  });
}
