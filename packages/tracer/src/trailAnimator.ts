import type { SampledCurve, TrailConfig, TrailFrame, TrailParticle } from "@neon/types";
import { pointAt } from "./pathSampler";

// ────────────────────────────────────────────
// Trail Animator
//
// (curve, bpm, now, count) → particles
//
// Stateless: every frame is re-derived from its inputs,
// so frames can be computed out of order or repeated.
// ────────────────────────────────────────────

export const DEFAULT_TRAIL_CONFIG: Readonly<TrailConfig> = Object.freeze({
  bpmFloor: 40,
  beatsPerCycle: 4,
  spacing: 0.015,
  baseSize: 16,
  sizeDecay: 1.2,
});

export const DEFAULT_PARTICLE_COUNT = 10;

/** Lead opacity falls to 1 - (n-1)/(1.2n) at the tail, never 0. */
const OPACITY_FALLOFF = 1.2;

export function resolveTrailConfig(overrides: Partial<TrailConfig> = {}): TrailConfig {
  const pick = (key: keyof TrailConfig, min: number): number => {
    const value = overrides[key];
    return value != null && Number.isFinite(value) && value >= min ? value : DEFAULT_TRAIL_CONFIG[key];
  };

  const beatsPerCycle = pick("beatsPerCycle", 0);
  return {
    bpmFloor: pick("bpmFloor", Number.MIN_VALUE),
    beatsPerCycle: beatsPerCycle > 0 ? beatsPerCycle : DEFAULT_TRAIL_CONFIG.beatsPerCycle,
    spacing: pick("spacing", 0),
    baseSize: pick("baseSize", 0),
    sizeDecay: pick("sizeDecay", 0),
  };
}

/** x - floor(x); always in [0, 1) for finite x. */
export function fract(x: number): number {
  return x - Math.floor(x);
}

export function effectiveBpm(bpm: number, bpmFloor: number = DEFAULT_TRAIL_CONFIG.bpmFloor): number {
  return Number.isFinite(bpm) ? Math.max(bpm, bpmFloor) : bpmFloor;
}

/** Seconds for one traversal: (60 / bpm) * beatsPerCycle. */
export function cycleSeconds(bpm: number, config: TrailConfig = DEFAULT_TRAIL_CONFIG): number {
  return (60 / effectiveBpm(bpm, config.bpmFloor)) * config.beatsPerCycle;
}

export function baseProgress(nowSeconds: number, cycle: number): number {
  if (!Number.isFinite(nowSeconds) || !(cycle > 0)) return 0;
  const p = fract(nowSeconds / cycle);
  // fract can round up to exactly 1 for tiny negative quotients
  return p >= 1 ? 0 : p;
}

export function particleProgress(base: number, index: number, spacing: number): number {
  const p = fract(base - index * spacing);
  return p >= 1 ? 0 : p;
}

export function particleWeight(
  index: number,
  count: number,
  config: TrailConfig = DEFAULT_TRAIL_CONFIG,
): { opacity: number; size: number } {
  return {
    opacity: 1 - index / (count * OPACITY_FALLOFF),
    size: Math.max(0, config.baseSize - index * config.sizeDecay),
  };
}

function normaliseCount(count: number): number {
  return Number.isFinite(count) && count > 0 ? Math.floor(count) : 0;
}

/**
 * Compute one frame of the trail.
 *
 * @param now seconds since an epoch (any epoch; only the phase matters)
 */
export function animateTrail(
  curve: SampledCurve,
  bpm: number,
  now: number,
  particleCount: number = DEFAULT_PARTICLE_COUNT,
  config: Partial<TrailConfig> = {},
): TrailFrame {
  const resolved = resolveTrailConfig(config);
  const cycle = cycleSeconds(bpm, resolved);
  const base = baseProgress(now, cycle);
  const count = normaliseCount(particleCount);

  const particles: TrailParticle[] = [];
  for (let index = 0; index < count; index++) {
    const progress = particleProgress(base, index, resolved.spacing);
    const { opacity, size } = particleWeight(index, count, resolved);
    particles.push({
      index,
      progress,
      point: pointAt(curve, progress),
      opacity,
      size,
      isLead: index === 0,
    });
  }

  return { cycleSeconds: cycle, baseProgress: base, particles };
}
