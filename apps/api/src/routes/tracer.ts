import type { Request, Response, Router } from "express";
import { z } from "zod";
import type {
  CurveResponse,
  PatternCommandsResponse,
  PatternListResponse,
  PathCommand,
  TrailFrameResponse,
} from "@neon/types";
import {
  createPattern,
  describePattern,
  extractTracePath,
  fitToSize,
  isPatternNumber,
  parsePathData,
  PATTERN_NUMBERS,
} from "@neon/tracer";
import type { Env } from "../env";
import { isReservedCurveId, type CurveRegistry, type RegisteredCurve } from "../services/curveRegistry";
import type { HeartRateStore } from "../services/heartRate";
import { renderFrame } from "../services/frames";
import { parseOr400 } from "./validation";

export type TracerDeps = {
  curves: CurveRegistry;
  heartRate: HeartRateStore;
};

const MAX_PARTICLES = 200;

const PatternParam = z.coerce.number().refine(isPatternNumber, { message: "Pattern must be an integer from 1 to 9" });
const SizeParam = z.coerce.number().finite().positive();

const PatternCommandsQuery = z.object({
  n: PatternParam,
  size: SizeParam.optional(),
});

const FrameQuery = z.object({
  curve: z.string().min(1).optional(),
  pattern: PatternParam.default(1),
  bpm: z.coerce.number().finite().optional(),
  now: z.coerce.number().finite().optional(),
  count: z.coerce.number().int().min(0).max(MAX_PARTICLES).optional(),
});

type FrameQuery = z.output<typeof FrameQuery>;

const CurveBody = z
  .object({
    id: z
      .string()
      .regex(/^[A-Za-z0-9_-]{1,64}$/, "Id must be 1-64 letters, digits, '-' or '_'")
      .refine((id) => !isReservedCurveId(id), "Ids starting with 'pattern-' are reserved")
      .optional(),
    d: z.string().min(1).optional(),
    svg: z.string().min(1).optional(),
    mode: z.enum(["traceable", "perimeter"]).default("traceable"),
    size: z.number().finite().positive().optional(),
  })
  .refine((b) => (b.d === undefined) !== (b.svg === undefined), { message: "Provide exactly one of d or svg" });

const HeartRateBody = z.object({
  bpm: z.number(),
});

export function registerTracerRoutes(router: Router, env: Env, deps: TracerDeps) {
  const { curves, heartRate } = deps;

  const resolveCurve = (query: FrameQuery, res: Response): RegisteredCurve | undefined => {
    if (query.curve === undefined) return curves.pattern(query.pattern);
    const entry = curves.get(query.curve);
    if (!entry) res.status(404).json({ error: "Curve not found" });
    return entry;
  };

  // ── Patterns ──
  router.get("/api/tracer/patterns", (_req: Request, res: Response) => {
    const body: PatternListResponse = {
      generatedAt: new Date().toISOString(),
      patterns: PATTERN_NUMBERS.map((n) => ({ number: n, description: describePattern(n) })),
    };
    res.json(body);
  });

  router.get("/api/tracer/patterns/:n/commands", (req: Request, res: Response) => {
    const query = parseOr400(PatternCommandsQuery, { ...req.query, n: req.params.n }, res);
    if (!query) return;
    const size = query.size ?? env.TRACER_PATTERN_SIZE;
    const body: PatternCommandsResponse = {
      number: query.n,
      size,
      commands: createPattern(query.n, { width: size, height: size }),
    };
    res.json(body);
  });

  // ── Curves ──
  router.post("/api/tracer/curves", (req: Request, res: Response) => {
    const body = parseOr400(CurveBody, req.body, res);
    if (!body) return;
    const size = body.size === undefined ? undefined : { width: body.size, height: body.size };

    let commands: PathCommand[];
    if (body.svg !== undefined) {
      commands = extractTracePath(body.svg, { mode: body.mode, size });
    } else {
      commands = parsePathData(body.d ?? "");
      if (commands.length === 0) {
        res.status(400).json({ error: "Invalid request", issues: ["d: Path data contains no drawable commands"] });
        return;
      }
      if (size) commands = fitToSize(commands, size);
    }

    const entry = curves.register(commands, body.svg !== undefined ? "svg" : "path", body.id);
    const response: CurveResponse = { curve: entry.summary };
    res.status(201).json(response);
  });

  router.get("/api/tracer/curves", (_req: Request, res: Response) => {
    res.json({ curves: curves.list() });
  });

  router.get("/api/tracer/curves/:id", (req: Request, res: Response) => {
    const entry = curves.get(req.params.id);
    if (!entry) {
      res.status(404).json({ error: "Curve not found" });
      return;
    }
    const response: CurveResponse = { curve: entry.summary };
    res.json(response);
  });

  // ── Frames ──
  router.get("/api/tracer/frame", (req: Request, res: Response) => {
    const query = parseOr400(FrameQuery, req.query, res);
    if (!query) return;
    const entry = resolveCurve(query, res);
    if (!entry) return;
    const frame: TrailFrameResponse = renderFrame(
      entry,
      { bpm: query.bpm ?? heartRate.current(), now: query.now, particleCount: query.count },
      env,
    );
    res.json(frame);
  });

  // ── SSE stream (server-push) ──
  router.get("/api/tracer/stream", (req: Request, res: Response) => {
    const query = parseOr400(FrameQuery, req.query, res);
    if (!query) return;
    const entry = resolveCurve(query, res);
    if (!entry) return;

    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });

    // A fixed bpm pins the rate; otherwise each frame follows the live reading.
    const sendFrame = () => {
      const frame = renderFrame(entry, { bpm: query.bpm ?? heartRate.current(), particleCount: query.count }, env);
      res.write(`data: ${JSON.stringify(frame)}\n\n`);
    };

    sendFrame();
    const timer = setInterval(sendFrame, 1000 / env.TRACER_STREAM_FPS);

    req.on("close", () => {
      clearInterval(timer);
    });
  });

  // ── Heart rate ──
  router.get("/api/tracer/heart-rate", (_req: Request, res: Response) => {
    res.json(heartRate.snapshot());
  });

  router.post("/api/tracer/heart-rate", (req: Request, res: Response) => {
    const body = parseOr400(HeartRateBody, req.body, res);
    if (!body) return;
    res.json(heartRate.record(body.bpm));
  });
}
