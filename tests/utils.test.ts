import { afterEach, describe, expect, it, vi } from "vitest";
import { MAX_TIMER_DELAY_MS, sleep, toError } from "../src/utils.js";

describe("toError", () => {
  it("keeps Error instances", () => {
    const err = new TypeError("bad input");
    expect(toError(err)).toBe(err);
  });

  it("wraps other thrown values", () => {
    expect(toError("nope").message).toBe("nope");
    expect(toError(404).message).toBe("404");
    expect(toError(undefined).message).toBe("undefined");
  });
});

describe("sleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("waits past the single-timer limit in chunks", async () => {
    vi.useFakeTimers();
    let settled = false;
    const pending = sleep(MAX_TIMER_DELAY_MS + 5_000).then(() => {
      settled = true;
    });

    await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(4_999);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(settled).toBe(true);
  });
});
