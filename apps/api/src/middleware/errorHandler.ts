import type { Request, Response, NextFunction } from "express";
import { logAudit } from "../infra/auditLogger";

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

/**
 * Last middleware: body-parser failures keep their 4xx status, anything else is a 500.
 * Once headers are out, Express's default handler closes the connection.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  const status = statusOf(err);
  const detail = err instanceof Error ? err.message : "Unknown error";
  logAudit({
    level: status >= 500 ? "error" : "warn",
    event: "request_error",
    route: `${req.method} ${req.path}`,
    requestId: req.requestId,
    status,
    detail,
  });
  if (res.headersSent) {
    next(err);
    return;
  }
  res.status(status).json({ error: status >= 500 ? "Internal server error" : detail });
}
