import { BackoffPolicy } from "../backoff/backoff-policy.js";
import { CancellationToken } from "../cancellation/cancellation.js";
import { interruptibleSleep } from "../cancellation/interruptible-sleep.js";
import { DEFAULT_MAX_ATTEMPTS, FAILURE_MESSAGES } from "../constants.js";
import { RetryFailure, RetryKitError, RetryKitErrorCode } from "../errors.js";
import type { Result } from "../types.js";
import { toError } from "../utils.js";
import { type AttemptOutcome, type Operation, type RetryOptions, RetryState } from "./types.js";

async function invoke<T>(operation: Operation<T>): Promise<AttemptOutcome<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (err) {
    return { ok: false, error: toError(err) };
  }
}

/**
 * Run `operation` until its outcome is accepted, it fails terminally, `maxAttempts`
 * invocations have been spent, or cancellation is observed during a backoff wait.
 *
 * Every retry-domain failure is returned as `{ ok: false, error: RetryFailure }`.
 * Errors thrown by the predicates or hooks propagate to the caller.
 *
 * @example
 *   const result = await retry(() => fetchQuote(id), {
 *     shouldRetryResult: (quote) => quote.stale,
 *     shouldRetryError: (err) => err.message.includes("ECONNRESET"),
 *     maxAttempts: 3,
 *   });
 *   if (!result.ok) console.error(result.error.message);
 */
export async function retry<T>(operation: Operation<T>, options: RetryOptions<T>): Promise<Result<T, RetryFailure>> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  if (!Number.isInteger(maxAttempts)) {
    throw new RetryKitError(RetryKitErrorCode.INVALID_CONFIG, "retry: maxAttempts must be an integer", {
      context: { maxAttempts },
    });
  }

  const backoff = options.backoff instanceof BackoffPolicy ? options.backoff : new BackoffPolicy(options.backoff);
  const token = options.cancellationToken ?? CancellationToken.none;
  const { logger } = options;

  let invocations = 0;
  const transition = (state: RetryState) => options.onStateChange?.(state, invocations);
  let last: AttemptOutcome<T> | undefined;

  transition(RetryState.NOT_STARTED);

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (attempt > 0) {
      const delayMs = backoff.getDelay(attempt);
      transition(RetryState.WAITING);
      logger?.warn("Attempt rejected, backing off", { attempt: invocations, maxAttempts, delayMs });

      if (options.onRetry && last) {
        await options.onRetry({
          attempt,
          delayMs,
          reason: last.ok ? "result" : "error",
          result: last.ok ? last.value : undefined,
          error: last.ok ? undefined : last.error,
        });
      }

      if (await interruptibleSleep(delayMs, token)) {
        transition(RetryState.FAILED_CANCELLED);
        logger?.error("Cancelled during backoff", { attempts: invocations });
        return {
          ok: false,
          error: new RetryFailure(RetryKitErrorCode.CANCELLED, FAILURE_MESSAGES.cancelled, {
            attempts: invocations,
            context: { maxAttempts, delayMs },
          }),
        };
      }
    }

    transition(RetryState.ATTEMPTING);
    logger?.debug("Invoking operation", { attempt: attempt + 1, maxAttempts });
    last = await invoke(operation);
    invocations++;

    if (last.ok) {
      if (!options.shouldRetryResult(last.value)) {
        transition(RetryState.SUCCEEDED);
        if (invocations > 1) logger?.info("Operation succeeded after retries", { attempts: invocations });
        return { ok: true, value: last.value };
      }
    } else if (!options.shouldRetryError(last.error)) {
      transition(RetryState.FAILED_TERMINAL);
      logger?.error("Non-retryable error", { attempts: invocations, error: last.error.message });
      return {
        ok: false,
        error: new RetryFailure(RetryKitErrorCode.TERMINAL_ERROR, FAILURE_MESSAGES.terminal(last.error.message), {
          attempts: invocations,
          cause: last.error,
          context: { maxAttempts },
        }),
      };
    }
  }

  transition(RetryState.FAILED_EXHAUSTED);
  logger?.error("Retry attempts exhausted", { attempts: invocations, maxAttempts });
  return {
    ok: false,
    error: new RetryFailure(RetryKitErrorCode.ATTEMPTS_EXHAUSTED, FAILURE_MESSAGES.exhausted(maxAttempts), {
      attempts: invocations,
      cause: last && !last.ok ? last.error : undefined,
      context: { maxAttempts },
    }),
  };
}
