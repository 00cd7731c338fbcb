import type { PathCommand, Point, Size, TraceMode } from "@neon/types";
import { circleCommands } from "./patterns";

// ────────────────────────────────────────────
// SVG Path Extraction
//
// <svg> document → <path d> strings → best candidate
//   → PathCommand[] → fitted to a target box
// ────────────────────────────────────────────

const COMMAND_RE = /([MmLlHhVvCcSsQqTtAaZz])([^MmLlHhVvCcSsQqTtAaZz]*)/g;
const NUMBER_RE = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/g;
const PATH_ELEMENT_RE = /<path[^>]*\s+d\s*=\s*["']([^"']+)["'][^>]*>/gi;

const ARITY: Record<string, number> = {
  m: 2, l: 2, h: 1, v: 1, c: 6, s: 4, q: 4, t: 2, a: 7, z: 0,
};

export const DEFAULT_TRACE_SIZE: Size = { width: 300, height: 300 };

function parseNumbers(raw: string): number[] {
  return (raw.match(NUMBER_RE) ?? []).map(Number).filter(Number.isFinite);
}

function reflect(pivot: Point, p: Point): Point {
  return { x: 2 * pivot.x - p.x, y: 2 * pivot.y - p.y };
}

/** Degree elevation: the cubic with the same shape as quadratic (p0, q, p1). */
function quadToCubic(p0: Point, q: Point, p1: Point): PathCommand {
  return {
    kind: "curveTo",
    to: p1,
    controlA: { x: p0.x + (2 / 3) * (q.x - p0.x), y: p0.y + (2 / 3) * (q.y - p0.y) },
    controlB: { x: p1.x + (2 / 3) * (q.x - p1.x), y: p1.y + (2 / 3) * (q.y - p1.y) },
  };
}

/**
 * Parse an SVG path `d` attribute.
 *
 * Quadratics become cubics; arcs become a straight line to their
 * endpoint. Trailing argument groups that are too short are dropped.
 */
export function parsePathData(d: string): PathCommand[] {
  const out: PathCommand[] = [];
  let pen: Point = { x: 0, y: 0 };
  let subpathStart: Point = pen;
  let lastCubicControl: Point | null = null;
  let lastQuadControl: Point | null = null;

  for (const match of d.trim().matchAll(COMMAND_RE)) {
    const letter = match[1];
    const lower = letter.toLowerCase();
    const relative = letter !== letter.toUpperCase();
    const arity = ARITY[lower];

    if (lower === "z") {
      out.push({ kind: "closePath" });
      pen = subpathStart;
      lastCubicControl = null;
      lastQuadControl = null;
      continue;
    }

    const args = parseNumbers(match[2]);
    for (let i = 0; i + arity <= args.length; i += arity) {
      const a = args.slice(i, i + arity);
      const abs = (x: number, y: number): Point => (relative ? { x: pen.x + x, y: pen.y + y } : { x, y });
      let cubicControl: Point | null = null;
      let quadControl: Point | null = null;

      switch (lower) {
        case "m": {
          const to = abs(a[0], a[1]);
          // Pairs after the first are implicit line-tos.
          if (i === 0) {
            out.push({ kind: "moveTo", to });
            subpathStart = to;
          } else {
            out.push({ kind: "lineTo", to });
          }
          pen = to;
          break;
        }
        case "l":
        case "a": {
          const to = lower === "a" ? abs(a[5], a[6]) : abs(a[0], a[1]);
          out.push({ kind: "lineTo", to });
          pen = to;
          break;
        }
        case "h": {
          const to = { x: relative ? pen.x + a[0] : a[0], y: pen.y };
          out.push({ kind: "lineTo", to });
          pen = to;
          break;
        }
        case "v": {
          const to = { x: pen.x, y: relative ? pen.y + a[0] : a[0] };
          out.push({ kind: "lineTo", to });
          pen = to;
          break;
        }
        case "c": {
          const controlA = abs(a[0], a[1]);
          const controlB = abs(a[2], a[3]);
          const to = abs(a[4], a[5]);
          out.push({ kind: "curveTo", to, controlA, controlB });
          cubicControl = controlB;
          pen = to;
          break;
        }
        case "s": {
          const controlA = lastCubicControl ? reflect(pen, lastCubicControl) : pen;
          const controlB = abs(a[0], a[1]);
          const to = abs(a[2], a[3]);
          out.push({ kind: "curveTo", to, controlA, controlB });
          cubicControl = controlB;
          pen = to;
          break;
        }
        case "q": {
          const control = abs(a[0], a[1]);
          const to = abs(a[2], a[3]);
          out.push(quadToCubic(pen, control, to));
          quadControl = control;
          pen = to;
          break;
        }
        case "t": {
          const control: Point = lastQuadControl ? reflect(pen, lastQuadControl) : pen;
          const to = abs(a[0], a[1]);
          out.push(quadToCubic(pen, control, to));
          quadControl = control;
          pen = to;
          break;
        }
      }

      lastCubicControl = cubicControl;
      lastQuadControl = quadControl;
    }
  }

  return out;
}

/** Every `<path d="…">` in document order. */
export function extractPathData(svg: string): string[] {
  return [...svg.matchAll(PATH_ELEMENT_RE)].map((m) => m[1]);
}

// ── Candidate scoring ──

function countLetters(d: string, letters: string): number {
  let n = 0;
  for (const ch of d) if (letters.includes(ch)) n++;
  return n;
}

const commandCount = (d: string) => countLetters(d, "MmLlCcQqZz");
const isClosed = (d: string) => d.toLowerCase().includes("z");

export function traceableScore(d: string): number {
  let score = countLetters(d, "CcQq") * 3;
  const commands = commandCount(d);
  if (commands > 5 && commands < 50) score += 10;
  if (isClosed(d)) score += 5;
  if (d.length < 20 || d.length > 2000) score -= 5;
  return score;
}

export function perimeterScore(d: string): number {
  let score = 0;
  if (isClosed(d)) score += 20;
  if (d.length > 100) score += 15;
  const commands = commandCount(d);
  if (commands > 4 && commands < 30) score += 10;
  if (d.length < 50) score -= 10;
  return score;
}

export type Bounds = { minX: number; minY: number; maxX: number; maxY: number };

function extendBounds(bounds: Bounds | null, p: Point): Bounds {
  if (!bounds) return { minX: p.x, minY: p.y, maxX: p.x, maxY: p.y };
  bounds.minX = Math.min(bounds.minX, p.x);
  bounds.minY = Math.min(bounds.minY, p.y);
  bounds.maxX = Math.max(bounds.maxX, p.x);
  bounds.maxY = Math.max(bounds.maxY, p.y);
  return bounds;
}

/** Bounding box over anchors and control points; null when there are none. */
export function commandBounds(commands: readonly PathCommand[]): Bounds | null {
  let bounds: Bounds | null = null;
  for (const command of commands) {
    if (command.kind === "closePath") continue;
    bounds = extendBounds(bounds, command.to);
    if (command.kind === "curveTo") {
      bounds = extendBounds(bounds, command.controlA);
      bounds = extendBounds(bounds, command.controlB);
    }
  }
  return bounds;
}

function boundsArea(d: string): number {
  const b = commandBounds(parsePathData(d));
  return b ? (b.maxX - b.minX) * (b.maxY - b.minY) : 0;
}

/** Highest-scoring candidate; the first one wins ties. */
export function selectTraceablePath(candidates: readonly string[]): string | undefined {
  let best: { d: string; score: number } | undefined;
  for (const d of candidates) {
    const score = traceableScore(d);
    if (!best || score > best.score) best = { d, score };
  }
  return best?.d;
}

/** Likely outer boundary: perimeter score first, then bounding-box area. */
export function selectPerimeterPath(candidates: readonly string[]): string | undefined {
  let best: { d: string; score: number; area: number } | undefined;
  for (const d of candidates) {
    const score = perimeterScore(d);
    const area = boundsArea(d);
    if (!best || score > best.score || (score === best.score && area > best.area)) {
      best = { d, score, area };
    }
  }
  return best?.d;
}

function mapPoints(command: PathCommand, f: (p: Point) => Point): PathCommand {
  switch (command.kind) {
    case "moveTo":
    case "lineTo":
      return { kind: command.kind, to: f(command.to) };
    case "curveTo":
      return { kind: "curveTo", to: f(command.to), controlA: f(command.controlA), controlB: f(command.controlB) };
    case "closePath":
      return command;
  }
}

/** Uniformly scale into `size` (aspect kept), bounding box moved to the origin. */
export function fitToSize(commands: readonly PathCommand[], size: Size): PathCommand[] {
  const b = commandBounds(commands);
  if (!b) return [...commands];
  const width = b.maxX - b.minX;
  const height = b.maxY - b.minY;
  if (!(width > 0 && height > 0)) return [...commands];

  const scale = Math.min(size.width / width, size.height / height);
  return commands.map((c) =>
    mapPoints(c, (p) => ({ x: (p.x - b.minX) * scale, y: (p.y - b.minY) * scale })),
  );
}

export type ExtractOptions = {
  size?: Size;
  mode?: TraceMode;
};

export function fallbackCircle(size: Size): PathCommand[] {
  const center = { x: size.width / 2, y: size.height / 2 };
  return circleCommands(center, Math.min(size.width, size.height) / 3);
}

/**
 * Pick one path from an SVG document and return it ready for tracing.
 * Documents without any usable path yield a centred circle.
 */
export function extractTracePath(svg: string, options: ExtractOptions = {}): PathCommand[] {
  const size = options.size ?? DEFAULT_TRACE_SIZE;
  const candidates = extractPathData(svg);
  const chosen = options.mode === "perimeter"
    ? selectPerimeterPath(candidates)
    : selectTraceablePath(candidates);
  if (chosen == null) return fallbackCircle(size);

  const commands = parsePathData(chosen);
  if (commands.length === 0) return fallbackCircle(size);
  return fitToSize(commands, size);
}
