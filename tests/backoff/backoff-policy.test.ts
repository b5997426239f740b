import { mersenne } from "pure-rand";
import { describe, expect, it } from "vitest";
import { BackoffPolicy } from "../../src/backoff/backoff-policy.js";
import { RetryKitError, RetryKitErrorCode } from "../../src/errors.js";

describe("BackoffPolicy", () => {
  it("uses 1s / x2 / 5min by default", () => {
    const policy = new BackoffPolicy();
    expect(policy.initialDelayMs).toBe(1_000);
    expect(policy.multiplier).toBe(2);
    expect(policy.maxDelayMs).toBe(300_000);
  });

  it("grows the ceiling exponentially and caps it", () => {
    const policy = new BackoffPolicy();
    expect(policy.getCeiling(1)).toBe(1_000);
    expect(policy.getCeiling(2)).toBe(2_000);
    expect(policy.getCeiling(5)).toBe(16_000);
    expect(policy.getCeiling(9)).toBe(256_000);
    expect(policy.getCeiling(10)).toBe(300_000);
    expect(policy.getCeiling(50)).toBe(300_000);
  });

  it("keeps the ceiling non-decreasing and within maxDelayMs", () => {
    const policy = new BackoffPolicy({ initialDelayMs: 37, multiplier: 1.7, maxDelayMs: 20_000 });
    let previous = 0;
    for (let attempt = 1; attempt <= 40; attempt++) {
      const ceiling = policy.getCeiling(attempt);
      expect(ceiling).toBeGreaterThanOrEqual(previous);
      expect(ceiling).toBeLessThanOrEqual(20_000);
      previous = ceiling;
    }
  });

  it("floors fractional growth to whole milliseconds", () => {
    const policy = new BackoffPolicy({ initialDelayMs: 1_000, multiplier: 1.5 });
    expect(policy.getCeiling(2)).toBe(1_500);
    expect(policy.getCeiling(3)).toBe(2_250);
    expect(policy.getCeiling(4)).toBe(3_375);
    expect(policy.getCeiling(5)).toBe(5_062);
  });

  it("caps after every multiplication so huge multipliers cannot overflow", () => {
    const policy = new BackoffPolicy({ initialDelayMs: 1, multiplier: 1e308, maxDelayMs: 1_000 });
    expect(policy.getCeiling(2)).toBe(1_000);
    expect(policy.getCeiling(3)).toBe(1_000);
    expect(policy.getDelay(3)).toBeLessThanOrEqual(1_000);
  });

  it("caps the first retry when initialDelayMs exceeds maxDelayMs", () => {
    const policy = new BackoffPolicy({ initialDelayMs: 10_000, maxDelayMs: 4_000 });
    expect(policy.getCeiling(1)).toBe(4_000);
  });

  it("draws whole-millisecond delays within [0, ceiling]", () => {
    const policy = new BackoffPolicy({ initialDelayMs: 100, maxDelayMs: 3_000 });
    for (let attempt = 1; attempt <= 8; attempt++) {
      const ceiling = policy.getCeiling(attempt);
      for (let i = 0; i < 200; i++) {
        const delay = policy.getDelay(attempt);
        expect(Number.isInteger(delay)).toBe(true);
        expect(delay).toBeGreaterThanOrEqual(0);
        expect(delay).toBeLessThanOrEqual(ceiling);
      }
    }
  });

  it("returns zero delays when initialDelayMs is zero", () => {
    const policy = new BackoffPolicy({ initialDelayMs: 0 });
    expect(policy.getDelay(1)).toBe(0);
    expect(policy.getDelay(12)).toBe(0);
  });

  it("reproduces the same delays for the same seed", () => {
    const a = new BackoffPolicy({ seed: 42 });
    const b = new BackoffPolicy({ seed: 42 });
    const delaysA = [1, 2, 3, 4, 5, 6].map((attempt) => a.getDelay(attempt));
    const delaysB = [1, 2, 3, 4, 5, 6].map((attempt) => b.getDelay(attempt));
    expect(delaysA).toEqual(delaysB);
  });

  it("accepts an injected generator", () => {
    const injected = new BackoffPolicy({ random: mersenne(7) });
    const seeded = new BackoffPolicy({ seed: 7 });
    expect(injected.getDelay(4)).toBe(seeded.getDelay(4));
  });

  it("rejects negative or non-finite settings", () => {
    expect(() => new BackoffPolicy({ initialDelayMs: -1 })).toThrow(RetryKitError);
    expect(() => new BackoffPolicy({ multiplier: Number.POSITIVE_INFINITY })).toThrow(
      "BackoffPolicy: multiplier must be a finite number >= 0",
    );
    expect(() => new BackoffPolicy({ maxDelayMs: Number.NaN })).toThrow(
      expect.objectContaining({ code: RetryKitErrorCode.INVALID_CONFIG }),
    );
  });

  it("stops growing once the ceiling can no longer change", () => {
    const flat = new BackoffPolicy({ initialDelayMs: 750, multiplier: 1 });
    const zero = new BackoffPolicy({ initialDelayMs: 0 });
    const capped = new BackoffPolicy({ initialDelayMs: 10, maxDelayMs: 40 });

    expect(flat.getCeiling(Number.MAX_SAFE_INTEGER)).toBe(750);
    expect(zero.getCeiling(Number.MAX_SAFE_INTEGER)).toBe(0);
    expect(capped.getCeiling(Number.MAX_SAFE_INTEGER)).toBe(40);
  });

  it("rejects attempts below 1", () => {
    const policy = new BackoffPolicy();
    expect(() => policy.getDelay(0)).toThrow("BackoffPolicy: attempt must be an integer >= 1");
    expect(() => policy.getCeiling(1.5)).toThrow(RetryKitError);
  });
});
