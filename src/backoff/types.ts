import type { RandomGenerator } from "pure-rand";

export interface BackoffConfig {
  /** Ceiling of the first retry's delay in ms (default: 1000) */
  initialDelayMs: number;
  /** Growth factor applied once per retry after the first (default: 2) */
  multiplier: number;
  /** Cap on the pre-jitter delay in ms (default: 300000) */
  maxDelayMs: number;
}

export interface BackoffPolicyOptions extends Partial<BackoffConfig> {
  /** Seed for the policy's generator. A random seed is drawn when omitted. */
  seed?: number;
  /** Use this generator instead of seeding a new one. Takes precedence over `seed`. */
  random?: RandomGenerator;
}
