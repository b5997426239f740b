/** Normalize anything thrown into an Error, keeping real errors as they are */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}

/** Longest delay a single Node timer honours; larger values fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export async function sleep(ms: number): Promise<void> {
  let remaining = ms;
  do {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
    await new Promise((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  } while (remaining > 0);
}
