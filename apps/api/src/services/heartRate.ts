import type { HeartRateReading } from "@neon/types";

// ────────────────────────────────────────────
// Heart-rate store
//
// Holds the latest BPM sample pushed by a sensor
// bridge. Zero, negative and non-finite samples are
// recorded as "no reading" and never replace the last
// valid value.
// ────────────────────────────────────────────

/** Average resting rate, used until a valid sample arrives. */
export const RESTING_BPM = 72;

export class HeartRateStore {
  private lastValid: number | null = null;
  private updatedAt: string | null = null;

  record(bpm: number, at: Date = new Date()): HeartRateReading {
    this.updatedAt = at.toISOString();
    if (Number.isFinite(bpm) && bpm > 0) this.lastValid = bpm;
    return this.snapshot();
  }

  current(): number {
    return this.lastValid ?? RESTING_BPM;
  }

  snapshot(): HeartRateReading {
    return {
      current: this.current(),
      lastValid: this.lastValid,
      updatedAt: this.updatedAt,
    };
  }
}
