import { timer, type Timer } from "d3-timer";
import type { SampledCurve, TrailConfig, TrailFrame } from "@neon/types";
import { animateTrail, DEFAULT_PARTICLE_COUNT } from "./trailAnimator";

export type TrailTickerOptions = {
  curve: SampledCurve;
  /** Read once per tick, so a live heart-rate source can be passed directly. */
  bpm: () => number;
  particleCount?: number;
  config?: Partial<TrailConfig>;
  /** Seconds since an epoch. Defaults to wall-clock Unix time. */
  clock?: () => number;
  onFrame: (frame: TrailFrame) => void;
};

export type TrailTicker = {
  stop: () => void;
};

const wallClockSeconds = () => Date.now() / 1000;

/**
 * Drive `animateTrail` from a d3 timer, one frame per tick.
 * The ticker holds nothing but the timer handle; stopping it is the only cleanup.
 */
export function startTrailTicker(options: TrailTickerOptions): TrailTicker {
  const clock = options.clock ?? wallClockSeconds;
  const count = options.particleCount ?? DEFAULT_PARTICLE_COUNT;
  let handle: Timer | null = timer(() => {
    options.onFrame(animateTrail(options.curve, options.bpm(), clock(), count, options.config));
  });

  return {
    stop() {
      handle?.stop();
      handle = null;
    },
  };
}
