import { randomInt } from "node:crypto";
import { type RandomGenerator, mersenne, unsafeUniformIntDistribution } from "pure-rand";
import { DEFAULT_BACKOFF_CONFIG } from "../constants.js";
import { RetryKitError, RetryKitErrorCode } from "../errors.js";
import type { BackoffConfig, BackoffPolicyOptions } from "./types.js";

const MAX_SEED = 0x7fffffff;

function assertNonNegative(name: keyof BackoffConfig, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RetryKitError(RetryKitErrorCode.INVALID_CONFIG, `BackoffPolicy: ${name} must be a finite number >= 0`, {
      context: { [name]: value },
    });
  }
}

/**
 * Exponential backoff with full jitter.
 *
 * The ceiling for retry `n` is `initialDelayMs * multiplier^(n-1)`, capped at `maxDelayMs`
 * after every multiplication; the delay is drawn uniformly from `[0, ceiling]`.
 *
 * The policy owns a Mersenne Twister generator that advances on every `getDelay` call, so a
 * single instance should drive one retry sequence at a time.
 */
export class BackoffPolicy {
  private readonly config: BackoffConfig;
  private readonly rng: RandomGenerator;

  constructor(options?: BackoffPolicyOptions) {
    const { seed, random, ...config } = options ?? {};
    this.config = { ...DEFAULT_BACKOFF_CONFIG, ...config };

    assertNonNegative("initialDelayMs", this.config.initialDelayMs);
    assertNonNegative("multiplier", this.config.multiplier);
    assertNonNegative("maxDelayMs", this.config.maxDelayMs);

    this.rng = random ?? mersenne(seed ?? randomInt(MAX_SEED));
  }

  get initialDelayMs(): number {
    return this.config.initialDelayMs;
  }

  get multiplier(): number {
    return this.config.multiplier;
  }

  get maxDelayMs(): number {
    return this.config.maxDelayMs;
  }

  /** Largest delay `getDelay(attempt)` can return */
  getCeiling(attempt: number): number {
    if (!Number.isInteger(attempt) || attempt < 1) {
      throw new RetryKitError(RetryKitErrorCode.INVALID_CONFIG, `BackoffPolicy: attempt must be an integer >= 1`, {
        context: { attempt },
      });
    }

    const { initialDelayMs, multiplier, maxDelayMs } = this.config;
    let ceiling = Math.floor(Math.min(initialDelayMs, maxDelayMs));

    for (let i = 0; i < attempt - 1; i++) {
      // Fixed point: pinned at the cap, at zero, or not growing.
      if ((ceiling === maxDelayMs && multiplier >= 1) || ceiling === 0 || multiplier === 1) break;
      ceiling = Math.min(Math.floor(ceiling * multiplier), maxDelayMs);
    }

    return Math.floor(ceiling);
  }

  /**
   * Randomized delay in ms before retry `attempt` (1-based: attempt 1 follows the first failure).
   * Advances the policy's generator.
   */
  getDelay(attempt: number): number {
    return unsafeUniformIntDistribution(0, this.getCeiling(attempt), this.rng);
  }
}
