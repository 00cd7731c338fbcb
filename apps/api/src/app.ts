import cors from "cors";
import express from "express";
import type { Env } from "./env";
import { errorHandler } from "./middleware/errorHandler";
import { requestIdMiddleware } from "./middleware/requestId";
import { requestLoggerMiddleware } from "./middleware/requestLogger";
import { registerAllRoutes } from "./routes/index";
import type { TracerDeps } from "./routes/tracer";
import { CurveRegistry } from "./services/curveRegistry";
import { HeartRateStore } from "./services/heartRate";

export function createDeps(env: Env): TracerDeps {
  return {
    curves: new CurveRegistry({
      curveSegments: env.TRACER_CURVE_SEGMENTS,
      patternSize: env.TRACER_PATTERN_SIZE,
      cacheTtlMs: env.TRACER_CURVE_CACHE_TTL_MS,
    }),
    heartRate: new HeartRateStore(),
  };
}

export function createApp(env: Env, deps: TracerDeps = createDeps(env)) {
  const app = express();
  app.use(requestIdMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(express.json({ limit: "1mb" }));
  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      credentials: true
    })
  );

  registerAllRoutes(app, env, deps);

  app.use(errorHandler);
  return app;
}
