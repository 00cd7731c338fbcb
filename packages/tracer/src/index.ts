export {
  build,
  buildCurve,
  distance,
  isDegenerate,
  lengthAt,
  lerpPoint,
  pointAt,
  segmentAt,
  type SegmentHit,
} from "./pathSampler";
export {
  animateTrail,
  baseProgress,
  cycleSeconds,
  DEFAULT_PARTICLE_COUNT,
  DEFAULT_TRAIL_CONFIG,
  effectiveBpm,
  fract,
  particleProgress,
  particleWeight,
  resolveTrailConfig,
} from "./trailAnimator";
export {
  circleCommands,
  createPattern,
  DEFAULT_PATTERN_SIZE,
  describePattern,
  isPatternNumber,
  PATTERN_NUMBERS,
  polygonCommands,
} from "./patterns";
export {
  commandBounds,
  DEFAULT_TRACE_SIZE,
  extractPathData,
  extractTracePath,
  fallbackCircle,
  fitToSize,
  parsePathData,
  perimeterScore,
  selectPerimeterPath,
  selectTraceablePath,
  traceableScore,
  type Bounds,
  type ExtractOptions,
} from "./svgPath";
export { startTrailTicker, type TrailTicker, type TrailTickerOptions } from "./trailTicker";
