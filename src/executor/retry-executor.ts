import { BackoffPolicy } from "../backoff/backoff-policy.js";
import { DEFAULT_MAX_ATTEMPTS } from "../constants.js";
import type { RetryFailure } from "../errors.js";
import { RetryEvent, TypedEventEmitter } from "../events.js";
import { retry } from "../retry/retry.js";
import { type Operation, RetryState } from "../retry/types.js";
import type { Result } from "../types.js";
import { RetryExecutorBuilder } from "./builder.js";
import type { RetryExecutorConfig, RunOptions } from "./types.js";

/**
 * Reusable retry runner. Holds the predicates, attempt budget and backoff policy shared by
 * every `run`, and reports progress on `events`.
 *
 * The backoff policy (and its generator) is created once and reused across runs, so runs on
 * one executor should not overlap if delay sequences need to be reproducible.
 */
export class RetryExecutor<T> {
  readonly events: TypedEventEmitter;
  private readonly config: Readonly<RetryExecutorConfig<T>>;

  /** @param config - Prefer {@link RetryExecutor.builder} for construction. */
  constructor(config: RetryExecutorConfig<T>) {
    const backoff = config.backoff instanceof BackoffPolicy ? config.backoff : new BackoffPolicy(config.backoff);
    this.config = { ...config, backoff };
    this.events = new TypedEventEmitter();
  }

  /** Create a fluent builder for configuring and constructing a RetryExecutor */
  static builder<T>(): RetryExecutorBuilder<T> {
    return new RetryExecutorBuilder<T>();
  }

  /**
   * Run `operation` under this executor's policy.
   *
   * @param overrides - Per-run replacements for any preset option.
   * @returns The accepted value, or the RetryFailure that ended the sequence.
   */
  async run(operation: Operation<T>, overrides?: RunOptions<T>): Promise<Result<T, RetryFailure>> {
    const options: RetryExecutorConfig<T> = { ...this.config };
    // An override left undefined keeps the preset.
    if (overrides?.shouldRetryResult) options.shouldRetryResult = overrides.shouldRetryResult;
    if (overrides?.shouldRetryError) options.shouldRetryError = overrides.shouldRetryError;
    if (overrides?.maxAttempts !== undefined) options.maxAttempts = overrides.maxAttempts;
    if (overrides?.backoff) options.backoff = overrides.backoff;
    if (overrides?.cancellationToken) options.cancellationToken = overrides.cancellationToken;
    if (overrides?.logger) options.logger = overrides.logger;
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    let attempts = 0;

    const result = await retry(operation, {
      ...options,
      onStateChange: (state, invocations) => {
        attempts = invocations;
        if (state === RetryState.ATTEMPTING) {
          this.events.emit(RetryEvent.ATTEMPT, { attempt: invocations + 1, maxAttempts });
        }
      },
      onRetry: (info) => {
        this.events.emit(RetryEvent.RETRYING, {
          attempt: info.attempt,
          maxAttempts,
          delayMs: info.delayMs,
          error: info.error,
        });
      },
    });

    if (result.ok) {
      this.events.emit(RetryEvent.SUCCEEDED, { attempts });
    } else {
      this.events.emit(RetryEvent.FAILED, { failure: result.error });
    }
    return result;
  }

  /**
   * Like {@link RetryExecutor.run}, but returns the value directly.
   * @throws {RetryFailure} When the sequence ends without an accepted result.
   */
  async runOrThrow(operation: Operation<T>, overrides?: RunOptions<T>): Promise<T> {
    const result = await this.run(operation, overrides);
    if (!result.ok) throw result.error;
    return result.value;
  }
}
