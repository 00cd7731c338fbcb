import type { Request, Response, Router } from "express";
import type { Env } from "../env";
import { registerTracerRoutes, type TracerDeps } from "./tracer";

export function registerAllRoutes(router: Router, env: Env, deps: TracerDeps) {
  // Health check
  router.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true, service: "@neon/api", ts: new Date().toISOString() });
  });

  // Domain routes
  registerTracerRoutes(router, env, deps);
}
