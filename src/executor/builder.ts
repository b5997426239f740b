import type { BackoffPolicy } from "../backoff/backoff-policy.js";
import type { BackoffPolicyOptions } from "../backoff/types.js";
import type { CancellationToken } from "../cancellation/cancellation.js";
import type { Logger } from "../types.js";
import { RetryExecutor } from "./retry-executor.js";
import type { RunOptions } from "./types.js";

/**
 * Fluent builder for constructing a RetryExecutor.
 *
 * Usage:
 *   const executor = RetryExecutor.builder<Response>()
 *     .retryIfResult((res) => res.status === 503)
 *     .retryIfError((err) => err.message.includes("ECONNRESET"))
 *     .maxAttempts(4)
 *     .withBackoff({ initialDelayMs: 200, maxDelayMs: 5_000 })
 *     .build();
 */
export class RetryExecutorBuilder<T> {
  private config: RunOptions<T> = {};

  /** Retry while `predicate` returns true for the operation's result */
  retryIfResult(predicate: (result: T) => boolean): this {
    this.config.shouldRetryResult = predicate;
    return this;
  }

  /** Retry while `predicate` returns true for the operation's error; false makes it terminal */
  retryIfError(predicate: (error: Error) => boolean): this {
    this.config.shouldRetryError = predicate;
    return this;
  }

  /** Set the total number of invocations allowed */
  maxAttempts(count: number): this {
    this.config.maxAttempts = count;
    return this;
  }

  /** Configure backoff timing, or share an existing policy */
  withBackoff(backoff: BackoffPolicy | BackoffPolicyOptions): this {
    this.config.backoff = backoff;
    return this;
  }

  /** Set the default cancellation token for every run */
  withCancellation(token: CancellationToken): this {
    this.config.cancellationToken = token;
    return this;
  }

  /** Set the logger */
  withLogger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  /** Build and return the RetryExecutor */
  build(): RetryExecutor<T> {
    const { shouldRetryResult, shouldRetryError, ...rest } = this.config;
    if (!shouldRetryResult) {
      throw new Error("RetryExecutorBuilder: a result predicate is required. Call .retryIfResult()");
    }
    if (!shouldRetryError) {
      throw new Error("RetryExecutorBuilder: an error predicate is required. Call .retryIfError()");
    }

    return new RetryExecutor<T>({ ...rest, shouldRetryResult, shouldRetryError });
  }
}
