import type { TrailConfig, TrailFrameResponse } from "@neon/types";
import { animateTrail } from "@neon/tracer";
import type { Env } from "../env";
import type { RegisteredCurve } from "./curveRegistry";

export type FrameRequest = {
  bpm: number;
  /** Seconds; wall clock when omitted. */
  now?: number;
  particleCount?: number;
};

export function trailConfigFromEnv(env: Env): TrailConfig {
  return {
    bpmFloor: env.TRACER_BPM_FLOOR,
    beatsPerCycle: env.TRACER_BEATS_PER_CYCLE,
    spacing: env.TRACER_SPACING,
    baseSize: env.TRACER_BASE_SIZE,
    sizeDecay: env.TRACER_SIZE_DECAY,
  };
}

export function renderFrame(entry: RegisteredCurve, request: FrameRequest, env: Env): TrailFrameResponse {
  const now = request.now ?? Date.now() / 1000;
  const frame = animateTrail(
    entry.curve,
    request.bpm,
    now,
    request.particleCount ?? env.TRACER_PARTICLE_COUNT,
    trailConfigFromEnv(env),
  );
  return {
    ...frame,
    curveId: entry.summary.id,
    bpm: request.bpm,
    now,
    generatedAt: new Date().toISOString(),
  };
}
