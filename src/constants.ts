export const DEFAULT_BACKOFF_CONFIG = {
  initialDelayMs: 1_000,
  multiplier: 2,
  maxDelayMs: 300_000,
} as const;

export const DEFAULT_MAX_ATTEMPTS = 5;

/** Upper bound on how long a requested stop can go unnoticed during a backoff wait */
export const CANCELLATION_POLL_INTERVAL_MS = 10;

export const FAILURE_MESSAGES = {
  cancelled: "Retry operation was cancelled during backoff.",
  terminal: (description: string) => `Retry failed with exception: ${description}`,
  exhausted: (maxAttempts: number) => `Retry failed after ${maxAttempts} attempts.`,
} as const;
