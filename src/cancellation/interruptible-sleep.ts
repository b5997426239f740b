import { CANCELLATION_POLL_INTERVAL_MS } from "../constants.js";
import { sleep } from "../utils.js";
import type { CancellationToken } from "./cancellation.js";

/**
 * Wait `durationMs`, checking `token` every {@link CANCELLATION_POLL_INTERVAL_MS}.
 * Resolves true if a stop was requested, either before the wait or during it.
 * A token with no source gets a single uninterrupted wait.
 */
export async function interruptibleSleep(durationMs: number, token: CancellationToken): Promise<boolean> {
  if (!token.stopPossible) {
    await sleep(durationMs);
    return false;
  }

  let remaining = durationMs;
  while (remaining > 0 && !token.stopRequested) {
    const tick = Math.min(CANCELLATION_POLL_INTERVAL_MS, remaining);
    await sleep(tick);
    remaining -= tick;
  }

  return token.stopRequested;
}
