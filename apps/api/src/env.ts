import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).default(4000),
  CORS_ORIGIN: z.string().default("http://localhost:3000"),

  // Trail timing and shape
  TRACER_PARTICLE_COUNT: z.coerce.number().int().min(0).default(10),
  TRACER_BPM_FLOOR: z.coerce.number().positive().default(40),
  TRACER_BEATS_PER_CYCLE: z.coerce.number().positive().default(4),
  TRACER_SPACING: z.coerce.number().min(0).default(0.015),
  TRACER_BASE_SIZE: z.coerce.number().min(0).default(16),
  TRACER_SIZE_DECAY: z.coerce.number().min(0).default(1.2),

  // Curve building
  TRACER_CURVE_SEGMENTS: z.coerce.number().int().min(1).default(1),
  TRACER_PATTERN_SIZE: z.coerce.number().positive().default(320),
  TRACER_CURVE_CACHE_TTL_MS: z.coerce.number().int().positive().default(300_000),

  // SSE stream
  TRACER_STREAM_FPS: z.coerce.number().positive().max(120).default(30),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(processEnv: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(processEnv);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid environment variables:\n${msg}`);
  }
  return parsed.data;
}
