import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CancellationSource, CancellationToken } from "../../src/cancellation/cancellation.js";
import { interruptibleSleep } from "../../src/cancellation/interruptible-sleep.js";

describe("interruptibleSleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("waits the full duration when the token has no source", async () => {
    let settled = false;
    const pending = interruptibleSleep(1_000, CancellationToken.none).then((cancelled) => {
      settled = true;
      return cancelled;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await expect(pending).resolves.toBe(false);
  });

  it("waits a month-long duration in full when the token has no source", async () => {
    const thirtyDaysMs = 30 * 24 * 60 * 60 * 1_000;
    let settled = false;
    const pending = interruptibleSleep(thirtyDaysMs, CancellationToken.none).then((cancelled) => {
      settled = true;
      return cancelled;
    });

    await vi.advanceTimersByTimeAsync(1_000);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(thirtyDaysMs - 1_001);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await expect(pending).resolves.toBe(false);
  });

  it("completes in ticks when no stop is requested", async () => {
    const source = new CancellationSource();
    let settled = false;
    const pending = interruptibleSleep(25, source.token).then((cancelled) => {
      settled = true;
      return cancelled;
    });

    await vi.advanceTimersByTimeAsync(20);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(5);
    await expect(pending).resolves.toBe(false);
  });

  it("returns within one tick of a stop request", async () => {
    const source = new CancellationSource();
    let settled = false;
    const pending = interruptibleSleep(60_000, source.token).then((cancelled) => {
      settled = true;
      return cancelled;
    });

    await vi.advanceTimersByTimeAsync(25);
    source.requestStop();
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(10);
    await expect(pending).resolves.toBe(true);
  });

  it("reports a stop requested before the wait, even for a zero duration", async () => {
    const source = new CancellationSource();
    source.requestStop();
    await expect(interruptibleSleep(0, source.token)).resolves.toBe(true);
    await expect(interruptibleSleep(5_000, source.token)).resolves.toBe(true);
  });

  it("stops when an AbortSignal fires", async () => {
    const controller = new AbortController();
    const pending = interruptibleSleep(10_000, CancellationToken.fromAbortSignal(controller.signal));

    await vi.advanceTimersByTimeAsync(100);
    controller.abort();
    await vi.advanceTimersByTimeAsync(10);
    await expect(pending).resolves.toBe(true);
  });
});
