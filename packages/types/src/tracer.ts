import type { Point } from "./geometry";

export type TrailConfig = {
  /** Lowest BPM used for timing; also replaces missing or invalid readings. */
  bpmFloor: number;
  /** Heartbeats per full traversal of the path. */
  beatsPerCycle: number;
  /** Normalised distance between consecutive particles. */
  spacing: number;
  baseSize: number;
  sizeDecay: number;
};

export type TrailParticle = {
  index: number;
  progress: number;
  point: Point;
  opacity: number;
  size: number;
  isLead: boolean;
};

export type TrailFrame = {
  cycleSeconds: number;
  baseProgress: number;
  particles: TrailParticle[];
};

export type PatternNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export type TraceMode = "traceable" | "perimeter";
