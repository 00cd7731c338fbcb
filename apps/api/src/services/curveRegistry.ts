import { randomUUID } from "node:crypto";
import type { CurveSource, CurveSummary, PathCommand, PatternNumber, SampledCurve } from "@neon/types";
import { buildCurve, createPattern, isPatternNumber } from "@neon/tracer";
import { CacheManager } from "../infra/cacheManager";

export type RegisteredCurve = {
  summary: CurveSummary;
  curve: SampledCurve;
};

export type CurveRegistryOptions = {
  curveSegments: number;
  patternSize: number;
  cacheTtlMs: number;
};

const PATTERN_ID_RE = /^pattern-([1-9])$/;

export function patternCurveId(n: PatternNumber): string {
  return `pattern-${n}`;
}

export function isReservedCurveId(id: string): boolean {
  return id.startsWith("pattern-");
}

// ────────────────────────────────────────────
// Curve Registry
//
// Pattern curves are built on first use and kept in a
// TTL cache; uploaded curves live until the process ends.
// A curve is rebuilt from its commands, never patched.
// ────────────────────────────────────────────

export class CurveRegistry {
  private readonly patternCache: CacheManager<RegisteredCurve>;
  private readonly uploads = new Map<string, RegisteredCurve>();

  constructor(private readonly options: CurveRegistryOptions) {
    this.patternCache = new CacheManager<RegisteredCurve>(20, options.cacheTtlMs);
  }

  pattern(n: PatternNumber): RegisteredCurve {
    const { patternSize, curveSegments } = this.options;
    const key = `pattern:${n}:${patternSize}:${curveSegments}`;
    return this.patternCache.getOrCreate(key, () =>
      this.compile(patternCurveId(n), "pattern", createPattern(n, { width: patternSize, height: patternSize })),
    );
  }

  register(commands: readonly PathCommand[], source: Exclude<CurveSource, "pattern">, id?: string): RegisteredCurve {
    const entry = this.compile(id ?? randomUUID(), source, commands);
    this.uploads.set(entry.summary.id, entry);
    return entry;
  }

  get(id: string): RegisteredCurve | undefined {
    const n = Number(id.match(PATTERN_ID_RE)?.[1]);
    if (isPatternNumber(n)) return this.pattern(n);
    return this.uploads.get(id);
  }

  list(): CurveSummary[] {
    return [...this.uploads.values()].map((entry) => entry.summary);
  }

  cacheStats() {
    return this.patternCache.stats();
  }

  private compile(id: string, source: CurveSource, commands: readonly PathCommand[]): RegisteredCurve {
    const curve = buildCurve(commands, { curveSegments: this.options.curveSegments });
    return {
      curve,
      summary: {
        id,
        source,
        segmentCount: curve.segments.length,
        totalLength: curve.totalLength,
        createdAt: new Date().toISOString(),
      },
    };
  }
}
