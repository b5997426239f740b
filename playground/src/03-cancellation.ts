/**
 * Demo 03 — cooperative cancellation of a long backoff
 */
import { CancellationSource, CancellationToken, RetryEvent, RetryExecutor, RetryKitErrorCode } from "../../src/index.js";
import { c, pass, runTest, step, timer } from "./utils.js";

async function test() {
  step("Stop requested mid-backoff");
  {
    const source = new CancellationSource();
    const executor = RetryExecutor.builder<string>()
      .retryIfResult(() => false)
      .retryIfError(() => true)
      .withBackoff({ initialDelayMs: 30_000, multiplier: 1, maxDelayMs: 30_000, seed: 1 })
      .withCancellation(source.token)
      .build();

    executor.events.on(RetryEvent.RETRYING, ({ delayMs }) => {
      console.log(`    ${c.dim(`backing off ${delayMs}ms, stopping in 100ms`)}`);
      setTimeout(() => source.requestStop(), 100);
    });

    const t = timer();
    const result = await executor.run(() => {
      throw new Error("ETIMEDOUT");
    });
    const elapsed = t();

    if (result.ok || result.error.code !== RetryKitErrorCode.CANCELLED) throw new Error("Expected CANCELLED");
    pass(`"${result.error.message}" after ${c.info(`${elapsed}ms`)}`);
  }

  step("AbortSignal bridge");
  {
    const controller = new AbortController();
    controller.abort();
    const executor = RetryExecutor.builder<number>()
      .retryIfResult((n) => n < 10)
      .retryIfError(() => true)
      .build();

    const result = await executor.run(() => 1, {
      cancellationToken: CancellationToken.fromAbortSignal(controller.signal),
    });
    if (result.ok || result.error.attempts !== 1) throw new Error("Expected cancellation after one attempt");
    pass("Aborted signal cancels at the first backoff");
  }
}

export const run = () => runTest("03 — Cancellation", test);

const isMain = process.argv[1]?.includes("03-cancellation");
if (isMain) void run();
