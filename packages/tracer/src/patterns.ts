import type { PathCommand, PatternNumber, Point, Size } from "@neon/types";

// ────────────────────────────────────────────
// Pattern Generator
//
// Closed geometric paths keyed by number 1–9,
// centred in the target box.
// ────────────────────────────────────────────

export const DEFAULT_PATTERN_SIZE: Size = { width: 320, height: 320 };

export const PATTERN_NUMBERS: readonly PatternNumber[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

const CIRCLE_STEPS = 60;
const LEMNISCATE_STEPS = 100;

const DESCRIPTIONS: Record<PatternNumber, string> = {
  1: "Diamond",
  2: "Circle",
  3: "Triangle",
  4: "Square",
  5: "Pentagon",
  6: "Hexagon",
  7: "Heptagon",
  8: "Infinity",
  9: "Enneagon",
};

export function isPatternNumber(n: unknown): n is PatternNumber {
  return typeof n === "number" && Number.isInteger(n) && n >= 1 && n <= 9;
}

export function describePattern(n: number): string {
  return isPatternNumber(n) ? DESCRIPTIONS[n] : "Circle";
}

function polyline(points: readonly Point[]): PathCommand[] {
  const commands = points.map((to, i): PathCommand => (i === 0 ? { kind: "moveTo", to } : { kind: "lineTo", to }));
  commands.push({ kind: "closePath" });
  return commands;
}

/** Regular polygon, first vertex at the top. */
export function polygonCommands(center: Point, radius: number, sides: number): PathCommand[] {
  const points: Point[] = [];
  for (let i = 0; i < sides; i++) {
    const angle = (i * 2 * Math.PI) / sides - Math.PI / 2;
    points.push({ x: center.x + radius * Math.cos(angle), y: center.y + radius * Math.sin(angle) });
  }
  return polyline(points);
}

/** Circle as `steps` chords starting at angle 0; the last vertex repeats the first. */
export function circleCommands(center: Point, radius: number, steps = CIRCLE_STEPS): PathCommand[] {
  const points: Point[] = [];
  for (let i = 0; i <= steps; i++) {
    const angle = (i * 2 * Math.PI) / steps;
    points.push({ x: center.x + radius * Math.cos(angle), y: center.y + radius * Math.sin(angle) });
  }
  return polyline(points);
}

function diamondCommands(center: Point, r: number): PathCommand[] {
  return polyline([
    { x: center.x, y: center.y - r },
    { x: center.x + r * 0.7, y: center.y },
    { x: center.x, y: center.y + r },
    { x: center.x - r * 0.7, y: center.y },
  ]);
}

function squareCommands(center: Point, r: number): PathCommand[] {
  const half = r * 0.8;
  return polyline([
    { x: center.x - half, y: center.y - half },
    { x: center.x + half, y: center.y - half },
    { x: center.x + half, y: center.y + half },
    { x: center.x - half, y: center.y + half },
  ]);
}

/** Figure-eight from the lemniscate of Bernoulli. */
function lemniscateCommands(center: Point, r: number): PathCommand[] {
  const width = r * 1.2;
  const height = r * 0.8;
  const points: Point[] = [];
  for (let i = 0; i <= LEMNISCATE_STEPS; i++) {
    const t = (i * 2 * Math.PI) / LEMNISCATE_STEPS;
    const denom = 1 + Math.sin(t) * Math.sin(t);
    points.push({
      x: center.x + (width * Math.cos(t)) / denom,
      y: center.y + (height * Math.sin(t) * Math.cos(t)) / denom,
    });
  }
  return polyline(points);
}

export function createPattern(n: number, size: Size = DEFAULT_PATTERN_SIZE): PathCommand[] {
  const center = { x: size.width / 2, y: size.height / 2 };
  const r = Math.min(size.width, size.height) * 0.3;

  switch (n) {
    case 1: return diamondCommands(center, r);
    case 2: return circleCommands(center, r);
    case 3: return polygonCommands(center, r, 3);
    case 4: return squareCommands(center, r);
    case 5: return polygonCommands(center, r, 5);
    case 6: return polygonCommands(center, r, 6);
    case 7: return polygonCommands(center, r, 7);
    case 8: return lemniscateCommands(center, r);
    case 9: return polygonCommands(center, r, 9);
    default: return circleCommands(center, r);
  }
}
