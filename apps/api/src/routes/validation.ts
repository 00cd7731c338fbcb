import type { Response } from "express";
import type { z } from "zod";

/** Parsed value, or `undefined` after answering 400 with the zod issues. */
export function parseOr400<T extends z.ZodTypeAny>(schema: T, value: unknown, res: Response): z.output<T> | undefined {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  res.status(400).json({
    error: "Invalid request",
    issues: parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)),
  });
  return undefined;
}
