import type { Request, Response, NextFunction } from "express";
import { auditApiCall } from "../infra/auditLogger";

/** One `api_call` audit line per finished response. */
export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const started = performance.now();
  res.on("finish", () => {
    const durationMs = Math.round((performance.now() - started) * 10) / 10;
    auditApiCall(`${req.method} ${req.path}`, res.statusCode, durationMs, req.requestId);
  });
  next();
}
