export type Point = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

/** One step of a vector path, as produced by a shape generator or an SVG extractor. */
export type PathCommand =
  | { kind: "moveTo"; to: Point }
  | { kind: "lineTo"; to: Point }
  | { kind: "curveTo"; to: Point; controlA: Point; controlB: Point }
  | { kind: "closePath" };

export type Segment = {
  readonly start: Point;
  readonly end: Point;
  readonly length: number;
};

/**
 * Arc-length parametrised polyline built from a command list.
 *
 * `offsets[i]` is the cumulative length at the end of `segments[i]`,
 * so `offsets[offsets.length - 1] === totalLength` for a non-empty curve.
 * `origin` is returned for every query on a zero-length curve.
 */
export type SampledCurve = {
  readonly segments: readonly Segment[];
  readonly offsets: readonly number[];
  readonly totalLength: number;
  readonly origin: Point;
};

export type BuildCurveOptions = {
  /** Chords per cubic command; 1 keeps the start-to-end chord. */
  curveSegments?: number;
};
