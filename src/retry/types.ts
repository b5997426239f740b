import type { BackoffPolicy } from "../backoff/backoff-policy.js";
import type { BackoffPolicyOptions } from "../backoff/types.js";
import type { CancellationToken } from "../cancellation/cancellation.js";
import type { Logger } from "../types.js";

/** Lifecycle of a single retry sequence */
export enum RetryState {
  NOT_STARTED = "not_started",
  ATTEMPTING = "attempting",
  WAITING = "waiting",
  SUCCEEDED = "succeeded",
  FAILED_TERMINAL = "failed_terminal",
  FAILED_EXHAUSTED = "failed_exhausted",
  FAILED_CANCELLED = "failed_cancelled",
}

/** Outcome of one invocation of the operation */
export type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; error: Error };

export interface RetryInfo<T> {
  /** 1-based retry number, the argument passed to `BackoffPolicy.getDelay` */
  attempt: number;
  delayMs: number;
  reason: "result" | "error";
  result?: T | undefined;
  error?: Error | undefined;
}

export interface RetryOptions<T> {
  /** Return true if this result is not acceptable yet and the operation should run again */
  shouldRetryResult: (result: T) => boolean;
  /** Return true if this error is transient; false ends the sequence immediately */
  shouldRetryError: (error: Error) => boolean;
  /** Total invocations of the operation allowed (default: 5) */
  maxAttempts?: number;
  backoff?: BackoffPolicy | BackoffPolicyOptions;
  cancellationToken?: CancellationToken;
  /** Called before each backoff wait */
  onRetry?: (info: RetryInfo<T>) => void | Promise<void>;
  /** Optional state-transition hook, mostly for observability */
  onStateChange?: (state: RetryState, attempts: number) => void;
  logger?: Logger;
}

export type Operation<T> = () => T | Promise<T>;
