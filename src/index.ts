// Retry
export { retry, RetryState } from "./retry/index.js";
export type { AttemptOutcome, Operation, RetryInfo, RetryOptions } from "./retry/index.js";

// Executor
export { RetryExecutor, RetryExecutorBuilder } from "./executor/index.js";
export type { RetryExecutorConfig, RunOptions } from "./executor/index.js";

// Backoff
export { BackoffPolicy } from "./backoff/index.js";
export type { BackoffConfig, BackoffPolicyOptions } from "./backoff/index.js";

// Cancellation
export { CancellationSource, CancellationToken, interruptibleSleep } from "./cancellation/index.js";

// Shared
export { RetryKitError, RetryFailure, RetryKitErrorCode } from "./errors.js";
export type { RetryFailureCode } from "./errors.js";
export { TypedEventEmitter, RetryEvent } from "./events.js";
export type { RetryEventMap } from "./events.js";
export type { Logger, Result } from "./types.js";
export { DEFAULT_BACKOFF_CONFIG, DEFAULT_MAX_ATTEMPTS, CANCELLATION_POLL_INTERVAL_MS } from "./constants.js";
export { createDefaultLogger } from "./logger.js";
