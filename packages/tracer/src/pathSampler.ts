import type { BuildCurveOptions, PathCommand, Point, SampledCurve, Segment } from "@neon/types";

// ────────────────────────────────────────────
// Path Sampler
//
// PathCommand[] → straight segments with cumulative
// arc length → point at normalised position t.
//
// Cubic commands are approximated by chords. With the
// default of one chord per curve the control points are
// ignored entirely; raise `curveSegments` to flatten.
// ────────────────────────────────────────────

const ORIGIN: Point = Object.freeze({ x: 0, y: 0 });

export function distance(a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function lerpPoint(a: Point, b: Point, t: number): Point {
  return {
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
  };
}

/** Frozen copy; curves never hold a caller's point objects. */
function freezePoint(p: Point): Point {
  return Object.freeze({ x: p.x, y: p.y });
}

function isFinitePoint(p: Point): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y);
}

function cubicAt(p0: Point, c1: Point, c2: Point, p1: Point, t: number): Point {
  const mt = 1 - t;
  const a = mt * mt * mt;
  const b = 3 * mt * mt * t;
  const c = 3 * mt * t * t;
  const d = t * t * t;
  return {
    x: a * p0.x + b * c1.x + c * c2.x + d * p1.x,
    y: a * p0.y + b * c1.y + c * c2.y + d * p1.y,
  };
}

function commandIsFinite(command: PathCommand): boolean {
  switch (command.kind) {
    case "moveTo":
    case "lineTo":
      return isFinitePoint(command.to);
    case "curveTo":
      return isFinitePoint(command.to) && isFinitePoint(command.controlA) && isFinitePoint(command.controlB);
    case "closePath":
      return true;
  }
}

function normaliseCurveSegments(value: number | undefined): number {
  if (value == null || !Number.isFinite(value) || value < 1) return 1;
  return Math.floor(value);
}

/**
 * Build an arc-length parametrised curve from path commands.
 *
 * Never throws: an empty or zero-length path yields a curve with
 * `totalLength === 0` whose queries all resolve to `origin`.
 */
export function buildCurve(commands: readonly PathCommand[], options: BuildCurveOptions = {}): SampledCurve {
  const curveSegments = normaliseCurveSegments(options.curveSegments);
  const segments: Segment[] = [];
  const offsets: number[] = [];
  let pen = ORIGIN;
  let origin: Point | undefined;
  let totalLength = 0;

  const emit = (start: Point, end: Point) => {
    const length = distance(start, end);
    segments.push(Object.freeze({ start, end, length }));
    totalLength += length;
    offsets.push(totalLength);
  };

  for (const command of commands) {
    if (!commandIsFinite(command)) continue;

    switch (command.kind) {
      case "moveTo":
        pen = freezePoint(command.to);
        origin ??= pen;
        break;

      case "lineTo": {
        origin ??= pen;
        const to = freezePoint(command.to);
        emit(pen, to);
        pen = to;
        break;
      }

      case "curveTo": {
        origin ??= pen;
        const to = freezePoint(command.to);
        let prev = pen;
        for (let i = 1; i < curveSegments; i++) {
          const next = freezePoint(cubicAt(pen, command.controlA, command.controlB, to, i / curveSegments));
          emit(prev, next);
          prev = next;
        }
        emit(prev, to);
        pen = to;
        break;
      }

      case "closePath": {
        const first = segments[0];
        if (!first) break;
        // Zero-length closing chords are skipped.
        if (distance(pen, first.start) > 0) emit(pen, first.start);
        pen = first.start;
        break;
      }
    }
  }

  return Object.freeze({
    segments: Object.freeze(segments),
    offsets: Object.freeze(offsets),
    totalLength,
    origin: origin ?? ORIGIN,
  });
}

/** Alias matching the sampler's `build` operation. */
export const build = buildCurve;

export function isDegenerate(curve: SampledCurve): boolean {
  return curve.segments.length === 0 || !(curve.totalLength > 0);
}

function clampUnit(t: number): number {
  if (!Number.isFinite(t) || t <= 0) return 0;
  return t >= 1 ? 1 : t;
}

/** Index of the first segment whose end offset reaches `target`, or -1 past the end. */
function findSegmentIndex(offsets: readonly number[], target: number): number {
  let lo = 0;
  let hi = offsets.length - 1;
  let ans = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (offsets[mid] >= target) {
      ans = mid;
      hi = mid - 1;
    } else {
      lo = mid + 1;
    }
  }
  return ans;
}

export type SegmentHit = {
  index: number;
  localT: number;
};

/**
 * Locate the segment holding normalised position `t`.
 * Returns null for degenerate curves.
 */
export function segmentAt(curve: SampledCurve, t: number): SegmentHit | null {
  if (isDegenerate(curve)) return null;

  const unit = clampUnit(t);
  if (unit === 1) return { index: curve.segments.length - 1, localT: 1 };

  const targetLength = unit * curve.totalLength;
  const index = findSegmentIndex(curve.offsets, targetLength);
  if (index < 0) {
    return { index: curve.segments.length - 1, localT: 1 };
  }

  const segment = curve.segments[index];
  if (segment.length === 0) return { index, localT: 0 };

  const accumulated = index > 0 ? curve.offsets[index - 1] : 0;
  const localT = (targetLength - accumulated) / segment.length;
  return { index, localT: Math.min(1, Math.max(0, localT)) };
}

/** Point at normalised arc-length position `t`; `t` is clamped into [0, 1]. Always a fresh object. */
export function pointAt(curve: SampledCurve, t: number): Point {
  const hit = segmentAt(curve, t);
  if (!hit) return { ...curve.origin };

  const segment = curve.segments[hit.index];
  if (hit.localT === 1) return { ...segment.end };
  return lerpPoint(segment.start, segment.end, hit.localT);
}

/** Arc length from the start of the curve to normalised position `t`. */
export function lengthAt(curve: SampledCurve, t: number): number {
  const hit = segmentAt(curve, t);
  if (!hit) return 0;
  const accumulated = hit.index > 0 ? curve.offsets[hit.index - 1] : 0;
  return accumulated + curve.segments[hit.index].length * hit.localT;
}
