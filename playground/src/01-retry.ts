/**
 * Demo 01 — retry(): result and error classification, exhaustion, hooks
 *
 * Pure logic with real timings; delays come from playground/.env.
 */
import { RetryKitErrorCode, retry } from "../../src/index.js";
import { c, loadSettings, pass, prettyLogger, runTest, step, timer } from "./utils.js";

async function test() {
  const settings = loadSettings();

  // ── 1. Accepted on the first try ──────────────────────────────
  step("First-try success");
  {
    let called = 0;
    const result = await retry(
      async () => {
        called++;
        return 42;
      },
      { ...settings, shouldRetryResult: () => false, shouldRetryError: () => true },
    );

    if (!result.ok || result.value !== 42) throw new Error("Expected 42");
    if (called !== 1) throw new Error(`Expected 1 call, got ${called}`);
    pass("Returns value on first success, called once");
  }

  // ── 2. Retry until the result is acceptable ───────────────────
  step("Retry while the result is not ready");
  {
    let counter = 0;
    const t = timer();
    const result = await retry(() => ++counter, {
      ...settings,
      maxAttempts: 3,
      shouldRetryResult: (x) => x < 3,
      shouldRetryError: () => true,
      logger: prettyLogger,
    });

    if (!result.ok || result.value !== 3) throw new Error("Expected 3");
    pass(`Accepted ${c.info(String(result.value))} after ${counter} attempts in ${c.info(`${t()}ms`)}`);
  }

  // ── 3. Terminal error stops immediately ───────────────────────
  step("Terminal error");
  {
    let attempts = 0;
    const result = await retry(
      () => {
        attempts++;
        throw new Error("permission denied");
      },
      { ...settings, shouldRetryResult: () => false, shouldRetryError: (err) => !err.message.includes("denied") },
    );

    if (result.ok || result.error.code !== RetryKitErrorCode.TERMINAL_ERROR) throw new Error("Expected TERMINAL_ERROR");
    if (attempts !== 1) throw new Error(`Expected 1 attempt, got ${attempts}`);
    pass(`"${result.error.message}"`);
  }

  // ── 4. Exhaustion ─────────────────────────────────────────────
  step("Attempts exhausted");
  {
    const delays: number[] = [];
    const result = await retry(
      () => {
        throw new Error("503 Service Unavailable");
      },
      {
        ...settings,
        shouldRetryResult: () => false,
        shouldRetryError: () => true,
        onRetry: ({ delayMs }) => {
          delays.push(delayMs);
        },
      },
    );

    if (result.ok || result.error.code !== RetryKitErrorCode.ATTEMPTS_EXHAUSTED) {
      throw new Error("Expected ATTEMPTS_EXHAUSTED");
    }
    pass(`"${result.error.message}" delays: [${delays.map((d) => `${d}ms`).join(", ")}]`);
  }
}

export const run = () => runTest("01 — retry()", test);

// Auto-run when executed directly
const isMain = process.argv[1]?.includes("01-retry");
if (isMain) void run();
