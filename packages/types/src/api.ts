import type { PathCommand } from "./geometry";
import type { PatternNumber, TrailFrame } from "./tracer";

export type PatternSummary = {
  number: PatternNumber;
  description: string;
};

export type PatternListResponse = {
  generatedAt: string;
  patterns: PatternSummary[];
};

export type PatternCommandsResponse = {
  number: PatternNumber;
  size: number;
  commands: PathCommand[];
};

export type CurveSource = "pattern" | "path" | "svg";

export type CurveSummary = {
  id: string;
  source: CurveSource;
  segmentCount: number;
  totalLength: number;
  createdAt: string;
};

export type CurveResponse = {
  curve: CurveSummary;
};

export type TrailFrameResponse = TrailFrame & {
  curveId: string;
  bpm: number;
  now: number;
  generatedAt: string;
};

export type HeartRateReading = {
  current: number;
  lastValid: number | null;
  updatedAt: string | null;
};
